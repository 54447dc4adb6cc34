import path from "path";
import type { PipelineOptions } from "../cli/options.js";
import type { ClusterConfig } from "../config/clusterConfig.js";
import type { JobContext } from "../execution/slurm/jobContext.js";

export interface TaskLayout {
  subjectId: string;
  studyName: string;
  scratchDir: string;
  scratchLogDir: string;
  /** Shared toolset directory and its copy in scratch. */
  toolsetDir: string;
  stagedToolsetDir: string;
  pipelineEntry: string;
  rawSubjectDir: string;
  stagedSubjectDir: string;
  stagedOutputDir: string;
  permanentOutputDir: string;
  studyLogDir: string;
  schedulerLogDir: string;
  schedulerCaptures: Array<{ source: string; relocated: string }>;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe task path: ${name}`);
  }
  return joined;
}

/** `<method>/<registration>/<class>`, the key shared by output, log and scheduler-log directories. */
export function methodSubpath(options: PipelineOptions): string {
  return path.join(options.brainExtractionMethod, options.mniRegistrationMethod, options.className);
}

export function scratchDirName(options: PipelineOptions, subjectId: string, jobId: string): string {
  return `SLURM_${options.brainExtractionMethod}_${options.mniRegistrationMethod}_${options.className}_${subjectId}_${jobId}`;
}

export function planTaskLayout(input: {
  options: PipelineOptions;
  config: ClusterConfig;
  job: JobContext;
  subjectId: string;
}): TaskLayout {
  const { options, config, job, subjectId } = input;
  const studyFolder = path.resolve(options.studyFolder);
  const studyName = path.basename(studyFolder);
  const methods = methodSubpath(options);

  const scratchDir = safeJoin(path.resolve(config.scratchRoot), scratchDirName(options, subjectId, job.jobId));
  const toolsetDir = path.resolve(job.submitDir, config.toolsetDir ?? job.submitDir);
  const stagedToolsetDir = path.join(scratchDir, path.basename(toolsetDir));
  const submitLogDir = path.join(path.resolve(job.submitDir), "logs", "slurm");
  const schedulerLogDir = path.join(submitLogDir, methods);
  const capture = `slurm-${job.arrayJobId}_${job.arrayTaskId}`;

  return {
    subjectId,
    studyName,
    scratchDir,
    scratchLogDir: path.join(scratchDir, "logs"),
    toolsetDir,
    stagedToolsetDir,
    pipelineEntry: safeJoin(stagedToolsetDir, config.pipelineEntry),
    rawSubjectDir: safeJoin(path.join(studyFolder, "raw"), subjectId),
    stagedSubjectDir: safeJoin(scratchDir, subjectId),
    stagedOutputDir: path.join(scratchDir, studyName, "preprocessed", methods, subjectId),
    permanentOutputDir: path.join(studyFolder, "preprocessed", methods, subjectId),
    studyLogDir: path.join(studyFolder, "logs", methods),
    schedulerLogDir,
    schedulerCaptures: ["out", "err"].map((ext) => ({
      source: path.join(submitLogDir, `${capture}.${ext}`),
      relocated: path.join(schedulerLogDir, `slurm-${subjectId}.${ext}`)
    }))
  };
}
