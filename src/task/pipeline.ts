import path from "path";
import type { PipelineOptions } from "../cli/options.js";
import { ErrorCode, MppError, errorMessage } from "../core/errors.js";
import type { ProcessResult, ProcessRunner } from "../execution/backends/types.js";
import type { TaskLog } from "../runs/taskLog.js";
import type { TaskLayout } from "./layout.js";
import type { TemplatePaths } from "./templates.js";

export interface PipelineInputs {
  xInputImages: string;
  yInputImages: string;
}

export function buildPipelineArgs(input: {
  options: PipelineOptions;
  layout: TaskLayout;
  templates: TemplatePaths;
  images: PipelineInputs;
}): string[] {
  const { options: o, layout, templates: t, images } = input;
  return [
    `--studyName=${layout.studyName}`,
    `--subject=${layout.subjectId}`,
    `--class=${o.className}`,
    `--domainX=${o.domainX}`,
    `--domainY=${o.domainY}`,
    `--x=${images.xInputImages}`,
    `--y=${images.yInputImages}`,
    `--xTemplate=${t.xTemplate}`,
    `--xTemplateBrain=${t.xTemplateBrain}`,
    `--xTemplate2mm=${t.xTemplate2mm}`,
    `--yTemplate=${t.yTemplate}`,
    `--yTemplateBrain=${t.yTemplateBrain}`,
    `--yTemplate2mm=${t.yTemplate2mm}`,
    `--templateMask=${t.templateMask}`,
    `--template2mmMask=${t.template2mmMask}`,
    `--brainSize=${o.brainSize}`,
    `--MNIRegistrationMethod=${o.mniRegistrationMethod}`,
    `--windowSize=${o.windowSize}`,
    `--customBrain=${o.customBrain}`,
    `--brainExtractionMethod=${o.brainExtractionMethod}`,
    `--FNIRTConfig=${t.fnirtConfig}`,
    `--printcom=${o.printcom}`
  ];
}

export interface PipelineRun {
  argv: string[];
  dryRun: boolean;
  stdoutPath: string;
  stderrPath: string;
  result: ProcessResult;
}

/**
 * Runs the pipeline entry from the scratch directory with its output redirected to
 * `<scratchLogs>/<subject>.out|.err`. With `printcom` set the entry and its arguments are handed
 * to that command instead, so `--printcom=echo` records the would-be invocation.
 */
export async function invokePipeline(input: {
  runner: ProcessRunner;
  layout: TaskLayout;
  args: string[];
  printcom: string;
  log: TaskLog;
  signal?: AbortSignal;
}): Promise<PipelineRun> {
  const { layout, printcom, log } = input;
  const dryRun = printcom.trim().length > 0;
  const argv = dryRun ? [printcom.trim(), layout.pipelineEntry, ...input.args] : [layout.pipelineEntry, ...input.args];
  const stdoutPath = path.join(layout.scratchLogDir, `${layout.subjectId}.out`);
  const stderrPath = path.join(layout.scratchLogDir, `${layout.subjectId}.err`);

  if (dryRun) {
    log.event("pipeline.dry_run", `${layout.pipelineEntry} ${input.args.join(" ")}`, { printcom: printcom.trim() });
  } else {
    log.event("pipeline.start", layout.pipelineEntry, { args: input.args });
  }

  let result: ProcessResult;
  try {
    result = await input.runner.execute({
      argv,
      cwd: layout.scratchDir,
      redirect: { stdoutPath, stderrPath },
      signal: input.signal
    });
  } catch (err) {
    if (input.signal?.aborted) throw err;
    throw new MppError(ErrorCode.Pipeline, `unable to run ${argv[0] ?? "pipeline"}: ${errorMessage(err)}`, {
      cause: err
    });
  }

  log.event("pipeline.exit", `exit code ${result.exitCode}`, {
    exit_code: result.exitCode,
    signal: result.signal,
    started_at: result.startedAt,
    finished_at: result.finishedAt
  });

  return { argv, dryRun, stdoutPath, stderrPath, result };
}
