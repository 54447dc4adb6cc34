import { promises as fs } from "fs";
import path from "path";
import { forwardPipelineArgs, type PipelineOptions, type SchedulerOptions } from "../cli/options.js";
import { CONFIG_ENV_VAR, type ClusterConfig } from "../config/clusterConfig.js";
import { newSubmissionId, type SubmissionId } from "../core/ids.js";
import { usageError } from "../core/errors.js";
import { renderArrayScript, schedulerJobName } from "../execution/slurm/arrayScript.js";
import type { SlurmSubmitter } from "../execution/slurm/submitter.js";
import { buildArraySpec, resolveSubjects, type SubjectSource } from "../subjects/subjectList.js";

export interface SubmissionOutcome {
  submissionId: SubmissionId;
  slurmJobId: string;
  jobName: string;
  arraySpec: string;
  subjects: string[];
  subjectSource: SubjectSource;
  scriptPath: string;
  script: string;
}

export type ProgressSink = (line: string) => void;

/**
 * Renders and submits one sbatch array covering every subject. Everything that can fail on bad
 * input (subject resolution, rendering) happens before anything is written or submitted.
 */
export async function submitStudy(input: {
  pipeline: PipelineOptions;
  scheduler: SchedulerOptions;
  config: ClusterConfig;
  submitDir: string;
  submitter: SlurmSubmitter;
  progress?: ProgressSink;
}): Promise<SubmissionOutcome> {
  const { scheduler, config, submitter } = input;
  const progress = input.progress ?? (() => undefined);
  const submitDir = path.resolve(input.submitDir);

  const resolved = await resolveSubjects(input.pipeline.subjects);
  if (!resolved.subjects.length) {
    throw usageError(`no subject IDs found in --subjects=${input.pipeline.subjects}`);
  }
  const arraySpec = buildArraySpec(resolved.subjects.length);

  // The runner resolves the list again on the worker node, so a file is forwarded by absolute path.
  const pipeline: PipelineOptions = {
    ...input.pipeline,
    studyFolder: path.resolve(submitDir, input.pipeline.studyFolder),
    subjects:
      resolved.source === "file" ? path.resolve(submitDir, input.pipeline.subjects) : resolved.subjects.join(" ")
  };

  const jobName = schedulerJobName({
    studyFolder: pipeline.studyFolder,
    brainExtractionMethod: pipeline.brainExtractionMethod,
    mniRegistrationMethod: pipeline.mniRegistrationMethod,
    className: pipeline.className,
    jobName: scheduler.jobName
  });

  const schedulerLogDir = path.join(submitDir, "logs", "slurm");
  const script = renderArrayScript({
    jobName,
    arraySpec,
    scheduler,
    schedulerLogDir,
    runnerArgv: config.runnerArgv,
    runnerArgs: forwardPipelineArgs(pipeline),
    env: config.sourcePath ? { [CONFIG_ENV_VAR]: config.sourcePath } : undefined
  });

  const submissionId = newSubmissionId();
  const scriptDir = path.join(schedulerLogDir, "scripts");
  await fs.mkdir(scriptDir, { recursive: true });
  const scriptPath = path.join(scriptDir, `${jobName}_${submissionId}.sbatch`);
  await fs.writeFile(scriptPath, script, "utf8");
  progress(`wrote ${scriptPath}`);

  const submit = await submitter.submit(scriptPath, { cwd: submitDir });
  progress(`submitted job array ${submit.slurmJobId} (${resolved.subjects.length} subjects, --array=${arraySpec})`);

  return {
    submissionId,
    slurmJobId: submit.slurmJobId,
    jobName,
    arraySpec,
    subjects: resolved.subjects,
    subjectSource: resolved.source,
    scriptPath,
    script
  };
}
