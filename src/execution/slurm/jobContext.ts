import os from "os";
import * as z from "zod/v4";
import { ErrorCode, MppError } from "../../core/errors.js";

export interface JobContext {
  submitHost: string;
  nodeName: string;
  submitDir: string;
  jobName: string;
  arrayJobId: string;
  arrayTaskId: number;
  jobId: string;
  nodeList: string;
}

const zId = z.string().trim().regex(/^\d+$/, "must be a numeric id");

const zSlurmEnv = z.object({
  SLURM_SUBMIT_HOST: z.string().optional(),
  SLURMD_NODENAME: z.string().optional(),
  SLURM_SUBMIT_DIR: z.string().trim().min(1, "must be set"),
  SLURM_JOB_NAME: z.string().optional(),
  SLURM_ARRAY_JOB_ID: zId,
  SLURM_ARRAY_TASK_ID: zId.transform((v) => Number.parseInt(v, 10)),
  SLURM_JOB_ID: zId,
  SLURM_JOB_NODELIST: z.string().optional()
});

/** Reads the scheduler environment once; everything downstream takes the returned value. */
export function jobContextFromEnv(env: NodeJS.ProcessEnv): JobContext {
  const parsed = zSlurmEnv.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => {
        const name = String(i.path[0] ?? "");
        return env[name] === undefined ? `${name} is not set` : `${name}: ${i.message}`;
      })
      .join("; ");
    throw new MppError(ErrorCode.Config, `not running inside a Slurm array task: ${detail}`);
  }

  const e = parsed.data;
  const nodeName = e.SLURMD_NODENAME?.trim() || os.hostname();
  return {
    submitHost: e.SLURM_SUBMIT_HOST?.trim() ?? "",
    nodeName,
    submitDir: e.SLURM_SUBMIT_DIR,
    jobName: e.SLURM_JOB_NAME?.trim() ?? "",
    arrayJobId: e.SLURM_ARRAY_JOB_ID,
    arrayTaskId: e.SLURM_ARRAY_TASK_ID,
    jobId: e.SLURM_JOB_ID,
    nodeList: e.SLURM_JOB_NODELIST?.trim() || nodeName
  };
}

function splitTopLevel(expr: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of expr) {
    if (ch === "[") depth++;
    if (ch === "]") depth--;
    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function expandRange(range: string, expr: string): string[] {
  const m = /^(\d+)(?:-(\d+))?$/.exec(range.trim());
  if (!m || m[1] === undefined) throw new Error(`invalid hostlist range "${range}" in ${expr}`);

  const startText = m[1];
  const endText = m[2] ?? startText;
  const start = Number.parseInt(startText, 10);
  const end = Number.parseInt(endText, 10);
  if (end < start) throw new Error(`invalid hostlist range "${range}" in ${expr}`);

  const width = startText.length;
  const out: string[] = [];
  for (let n = start; n <= end; n++) out.push(String(n).padStart(width, "0"));
  return out;
}

function expandHost(host: string, expr: string): string[] {
  const open = host.indexOf("[");
  if (open === -1) return [host];
  const close = host.indexOf("]", open);
  if (close === -1) throw new Error(`unbalanced brackets in hostlist ${expr}`);

  const prefix = host.slice(0, open);
  const suffixes = expandHost(host.slice(close + 1), expr);
  const out: string[] = [];
  for (const range of host.slice(open + 1, close).split(",")) {
    for (const n of expandRange(range, expr)) {
      for (const s of suffixes) out.push(`${prefix}${n}${s}`);
    }
  }
  return out;
}

/** Expands Slurm hostlist syntax, e.g. `node[01-03,07],gpu1` (what `scontrol show hostnames` prints). */
export function expandHostlist(expr: string): string[] {
  return splitTopLevel(expr).flatMap((h) => expandHost(h, expr));
}
