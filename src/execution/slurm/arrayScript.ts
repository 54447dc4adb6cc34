import path from "path";
import type { SchedulerOptions } from "../../cli/options.js";

export interface ArrayScriptInput {
  jobName: string;
  arraySpec: string;
  scheduler: SchedulerOptions;
  /** Scheduler stdout/stderr land here as slurm-<arrayJobId>_<taskIndex>.{out,err}. */
  schedulerLogDir: string;
  runnerArgv: string[];
  runnerArgs: string[];
  env?: Record<string, string>;
}

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\"'\"'`)}'`;
}

function assertEnvKey(key: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    throw new Error(`invalid env var name: ${key}`);
  }
}

function directive(flag: string, value: string | number): string[] {
  const v = String(value);
  if (!v) return [];
  if (/[\s"'\\]/.test(v)) throw new Error(`invalid value for #SBATCH --${flag}: ${v}`);
  return [`#SBATCH --${flag}=${v}`];
}

export function schedulerJobName(input: {
  studyFolder: string;
  brainExtractionMethod: string;
  mniRegistrationMethod: string;
  className: string;
  jobName: string;
}): string {
  const studyName = path.basename(path.resolve(input.studyFolder));
  return [studyName, input.brainExtractionMethod, input.mniRegistrationMethod, input.className, input.jobName]
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "-")
    .slice(0, 128);
}

export function renderArrayScript(input: ArrayScriptInput): string {
  const s = input.scheduler;
  const logDir = path.resolve(input.schedulerLogDir);
  if (!input.runnerArgv.length) throw new Error("runner argv must be non-empty");

  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push(...directive("job-name", input.jobName));
  lines.push(...directive("partition", s.partition));
  lines.push(...directive("exclude", s.exclude));
  lines.push(...directive("nodes", s.nodes));
  lines.push(...directive("time", s.time));
  lines.push(...directive("ntasks", s.ntasks));
  lines.push(...directive("mem", s.mem));
  lines.push(...directive("export", s.export));
  lines.push(...directive("mail-type", s.mailType));
  lines.push(...directive("mail-user", s.mailUser));
  lines.push(...directive("array", input.arraySpec));
  lines.push(...directive("output", path.join(logDir, "slurm-%A_%a.out")));
  lines.push(...directive("error", path.join(logDir, "slurm-%A_%a.err")));
  lines.push("");
  lines.push("set -euo pipefail");
  lines.push("");

  const envKeys = Object.keys(input.env ?? {}).sort();
  for (const k of envKeys) {
    assertEnvKey(k);
    lines.push(`export ${k}=${bashSingleQuote(input.env?.[k] ?? "")}`);
  }
  if (envKeys.length > 0) lines.push("");

  const words = [...input.runnerArgv, ...input.runnerArgs].map((w) => bashSingleQuote(w));
  lines.push(`exec ${words.join(" \\\n  ")}`);
  lines.push("");

  return lines.join("\n");
}
