import { promises as fs } from "fs";
import path from "path";
import type { PipelineOptions } from "../cli/options.js";
import type { ClusterConfig } from "../config/clusterConfig.js";
import { ErrorCode, MppError, errorMessage } from "../core/errors.js";
import type { ProcessRunner } from "../execution/backends/types.js";
import { expandHostlist, type JobContext } from "../execution/slurm/jobContext.js";
import type { TransferBackend } from "../execution/transfer.js";
import type { TaskLog } from "../runs/taskLog.js";
import { resolveSubjects, subjectForTask } from "../subjects/subjectList.js";
import { cleanupFailures, cleanupTask, eventLogPath, type CleanupReport } from "./cleanup.js";
import { findDomainImages, joinInputImages } from "./images.js";
import { planTaskLayout, type TaskLayout } from "./layout.js";
import { buildPipelineArgs, invokePipeline, type PipelineRun } from "./pipeline.js";
import { TaskScope, type SignalSource } from "./taskScope.js";
import { resolveTemplates, type TemplatePaths } from "./templates.js";

export interface TaskRunnerDeps {
  config: ClusterConfig;
  job: JobContext;
  transfer: TransferBackend;
  runner: ProcessRunner;
  log: TaskLog;
  signals?: SignalSource;
}

export interface TaskOutcome {
  subjectId: string;
  layout: TaskLayout;
  images: { x: string[]; y: string[] };
  pipeline: PipelineRun;
  cleanup: CleanupReport;
}

interface TaskContext extends TaskRunnerDeps {
  options: PipelineOptions;
  layout: TaskLayout;
}

function allocatedNodeCount(ctx: TaskContext): number {
  try {
    return expandHostlist(ctx.job.nodeList).length;
  } catch (err) {
    ctx.log.warn("setup.nodelist", `unable to expand node list ${ctx.job.nodeList}: ${errorMessage(err)}`);
    return 1;
  }
}

async function stage(ctx: TaskContext, what: string, source: string, staged: string, abort: AbortSignal): Promise<void> {
  try {
    await ctx.transfer.copyTree(source, ctx.layout.scratchDir, abort);
  } catch (err) {
    if (abort.aborted) throw err;
    throw new MppError(ErrorCode.Staging, `staging ${what} from ${source} failed: ${errorMessage(err)}`, { cause: err });
  }

  const entries = await fs.readdir(staged).catch((err: unknown) => {
    throw new MppError(ErrorCode.Staging, `${what} missing in scratch after transfer: ${staged}`, { cause: err });
  });
  if (!entries.length) {
    throw new MppError(ErrorCode.Staging, `${what} is empty in scratch after transfer: ${staged}`);
  }
  ctx.log.event("setup.staged", `${what} -> ${staged}`, { source, staged, entries: entries.length });
}

async function setup(ctx: TaskContext, abort: AbortSignal): Promise<TemplatePaths> {
  const { job, layout, log, options } = ctx;

  await fs.mkdir(layout.scratchDir, { recursive: true });
  log.event("setup.start", `transferring files from server to compute node ${job.nodeName}`);
  log.banner([
    ` This job is allocated on ${allocatedNodeCount(ctx)} node(s)`,
    `SLURM: sbatch is running on ${job.submitHost}`,
    `SLURM: server calling directory is ${job.submitDir}`,
    `SLURM: node is ${job.nodeName}`,
    `SLURM: node working directory is ${layout.scratchDir}`,
    `SLURM: job name is ${job.jobName}`,
    `SLURM: master job identifier of the job array is ${job.arrayJobId}`,
    `SLURM: job array index identifier is ${job.arrayTaskId}`,
    `SLURM: job identifier-sum master job ID and job array index is ${job.jobId}`
  ]);

  await stage(ctx, "pipeline toolset", layout.toolsetDir, layout.stagedToolsetDir, abort);
  await stage(ctx, `raw data for subject ${layout.subjectId}`, layout.rawSubjectDir, layout.stagedSubjectDir, abort);
  await fs.mkdir(layout.scratchLogDir, { recursive: true });

  const templates = await resolveTemplates(ctx.config);
  log.event("setup.done", `subject ${layout.subjectId} staged`, {
    study_folder: options.studyFolder,
    subject: layout.subjectId,
    class: options.className,
    domain_x: options.domainX,
    domain_y: options.domainY,
    mni_registration_method: options.mniRegistrationMethod,
    window_size: options.windowSize,
    printcom: options.printcom
  });
  return templates;
}

async function findImages(ctx: TaskContext, domain: string): Promise<string[]> {
  const { layout, options } = ctx;
  const images = await findDomainImages({
    searchRoot: path.join(layout.stagedSubjectDir, options.className),
    subjectId: layout.subjectId,
    className: options.className,
    domain
  });
  ctx.log.event("main.images", `Found ${images.length} ${domain} Images for subject ${layout.subjectId}`, {
    domain,
    count: images.length,
    paths: images
  });
  return images;
}

async function main(
  ctx: TaskContext,
  templates: TemplatePaths,
  abort: AbortSignal
): Promise<{ images: TaskOutcome["images"]; pipeline: PipelineRun }> {
  const { options, layout } = ctx;
  const x = await findImages(ctx, options.domainX);
  const y = await findImages(ctx, options.domainY);
  if (!x.length && options.customBrain === "NONE") {
    throw new MppError(ErrorCode.Staging, `no ${options.domainX} images found for subject ${layout.subjectId}`);
  }

  const args = buildPipelineArgs({
    options,
    layout,
    templates,
    images: { xInputImages: joinInputImages(x), yInputImages: joinInputImages(y) }
  });
  const pipeline = await invokePipeline({
    runner: ctx.runner,
    layout,
    args,
    printcom: options.printcom,
    log: ctx.log,
    signal: abort
  });
  return { images: { x, y }, pipeline };
}

/**
 * One array task: resolve the subject for this array index, stage it to scratch, run the
 * pipeline, then copy everything back. Cleanup runs exactly once on every exit path; a
 * pipeline failure or an incomplete cleanup is reported as an error after it.
 */
export async function runTask(options: PipelineOptions, deps: TaskRunnerDeps): Promise<TaskOutcome> {
  const { job, log } = deps;

  const { subjects } = await resolveSubjects(options.subjects);
  const subjectId = subjectForTask(subjects, job.arrayTaskId);
  const layout = planTaskLayout({ options, config: deps.config, job, subjectId });
  log.event("task.subject", `array task ${job.arrayTaskId} of ${subjects.length} -> subject ${subjectId}`, {
    array_task_id: job.arrayTaskId,
    subject: subjectId,
    scratch_dir: layout.scratchDir
  });

  const ctx: TaskContext = { ...deps, options, layout };
  const scope = new TaskScope<CleanupReport>({
    release: () => cleanupTask({ layout, transfer: deps.transfer, log }),
    log,
    signals: deps.signals
  });

  const result = await scope.run(async (abort) => {
    const templates = await setup(ctx, abort);
    return main(ctx, templates, abort);
  });
  const cleanup = await scope.release();

  const exitCode = result.pipeline.result.exitCode;
  const failures = cleanupFailures(cleanup);
  let failure: MppError | null = null;
  if (exitCode !== 0) {
    failure = new MppError(
      ErrorCode.Pipeline,
      `pipeline exited with code ${exitCode} for subject ${subjectId}; see ${path.join(layout.studyLogDir, `${subjectId}.err`)}`
    );
  } else if (failures.length) {
    failure = new MppError(
      ErrorCode.Staging,
      `cleanup incomplete for subject ${subjectId}: ${failures.map((f) => `${f.step}: ${f.detail}`).join("; ")}`
    );
  }

  if (failure) log.event("task.failed", failure.message, { code: failure.code });
  else log.event("task.done", `subject ${subjectId} finished`);
  if (!cleanup.skipped) {
    await log.writeJsonl(eventLogPath(layout)).catch((err: unknown) => {
      log.warn("task.event_log_failed", errorMessage(err));
    });
  }
  if (failure) throw failure;

  return { subjectId, layout, images: result.images, pipeline: result.pipeline, cleanup };
}
