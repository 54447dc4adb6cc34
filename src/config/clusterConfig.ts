import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ErrorCode, MppError } from "../core/errors.js";
import type { SchedulerOptionKey } from "../cli/options.js";

export const CONFIG_ENV_VAR = "MPP_CLUSTER_CONFIG";
export const DEFAULT_CONFIG_RELPATH = path.join("config", "cluster.yaml");

export type TransferKind = "scp" | "local";

export interface ClusterConfig {
  sourcePath: string | null;
  scratchRoot: string;
  templateRoot: string | null;
  pipelineConfigRoot: string | null;
  /** null means the scheduler submit directory. */
  toolsetDir: string | null;
  pipelineEntry: string;
  transfer: {
    kind: TransferKind;
    scpPath: string;
  };
  runnerArgv: string[];
  submitDefaults: Partial<Record<SchedulerOptionKey, string>>;
}

const zScalar = z.union([z.string(), z.number()]).transform((v) => String(v));

const zConfigFile = z
  .object({
    version: z.literal(1),
    paths: z
      .object({
        scratch_root: z.string().min(1).optional(),
        template_root: z.string().nullable().optional(),
        pipeline_config_root: z.string().nullable().optional(),
        toolset_dir: z.string().nullable().optional()
      })
      .strict()
      .optional(),
    pipeline: z
      .object({
        entry: z.string().min(1).optional()
      })
      .strict()
      .optional(),
    transfer: z
      .object({
        kind: z.enum(["scp", "local"]).optional(),
        scp_path: z.string().min(1).optional()
      })
      .strict()
      .optional(),
    runner: z
      .object({
        argv: z.array(z.string().min(1)).min(1).optional()
      })
      .strict()
      .optional(),
    submit: z
      .object({
        defaults: z
          .object({
            job_name: zScalar.optional(),
            partition: zScalar.optional(),
            exclude: zScalar.optional(),
            nodes: zScalar.optional(),
            time: zScalar.optional(),
            ntasks: zScalar.optional(),
            mem: zScalar.optional(),
            export: zScalar.optional(),
            mail_type: zScalar.optional(),
            mail_user: zScalar.optional()
          })
          .strict()
          .optional()
      })
      .strict()
      .optional()
  })
  .strict();

type ConfigFile = z.infer<typeof zConfigFile>;

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(trimmed) ?? /^\$([A-Za-z_][A-Za-z0-9_]*)$/.exec(trimmed);
  if (!m) return trimmed.length > 0 ? trimmed : null;

  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

function optionalPath(value: string | null | undefined, fallback: string | null, env: NodeJS.ProcessEnv): string | null {
  if (value === null) return null;
  const raw = value ?? fallback;
  return raw === null ? null : expandEnvToken(raw, env);
}

function submitDefaults(file: ConfigFile): Partial<Record<SchedulerOptionKey, string>> {
  const d = file.submit?.defaults ?? {};
  const out: Partial<Record<SchedulerOptionKey, string>> = {};
  if (d.job_name !== undefined) out.jobName = d.job_name;
  if (d.partition !== undefined) out.partition = d.partition;
  if (d.exclude !== undefined) out.exclude = d.exclude;
  if (d.nodes !== undefined) out.nodes = d.nodes;
  if (d.time !== undefined) out.time = d.time;
  if (d.ntasks !== undefined) out.ntasks = d.ntasks;
  if (d.mem !== undefined) out.mem = d.mem;
  if (d.export !== undefined) out.export = d.export;
  if (d.mail_type !== undefined) out.mailType = d.mail_type;
  if (d.mail_user !== undefined) out.mailUser = d.mail_user;
  return out;
}

export function parseClusterConfig(
  value: unknown,
  opts: { env?: NodeJS.ProcessEnv; sourcePath?: string | null } = {}
): ClusterConfig {
  const env = opts.env ?? process.env;
  const sourcePath = opts.sourcePath ?? null;
  const where = sourcePath ?? "cluster config";

  const parsed = zConfigFile.safeParse(value ?? { version: 1 });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new MppError(ErrorCode.Config, `invalid ${where}: ${detail}`);
  }
  const file = parsed.data;

  const scratchRoot = expandEnvToken(file.paths?.scratch_root ?? "/tmp/work", env);
  if (!scratchRoot) {
    throw new MppError(ErrorCode.Config, `invalid ${where}: paths.scratch_root resolves to an empty value`);
  }

  return {
    sourcePath,
    scratchRoot,
    templateRoot: optionalPath(file.paths?.template_root, "${MNI_Templates}", env),
    pipelineConfigRoot: optionalPath(file.paths?.pipeline_config_root, "${MPP_Config}", env),
    toolsetDir: optionalPath(file.paths?.toolset_dir, null, env),
    pipelineEntry: file.pipeline?.entry ?? "MPP.sh",
    transfer: {
      kind: file.transfer?.kind ?? "scp",
      scpPath: file.transfer?.scp_path ?? "/usr/bin/scp"
    },
    runnerArgv: file.runner?.argv ?? ["mpp-task"],
    submitDefaults: submitDefaults(file)
  };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    return st.isFile();
  } catch {
    return false;
  }
}

async function readConfigFile(filePath: string, env: NodeJS.ProcessEnv): Promise<ClusterConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new MppError(ErrorCode.Config, `unable to read cluster config ${filePath}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = YAML.parse(raw) as unknown;
  } catch (err) {
    throw new MppError(ErrorCode.Config, `cluster config ${filePath} is not valid YAML`, { cause: err });
  }
  return parseClusterConfig(doc, { env, sourcePath: filePath });
}

/** Explicit path, then MPP_CLUSTER_CONFIG, then config/cluster.yaml under cwd, then built-in defaults. */
export async function loadClusterConfig(
  input: { explicitPath?: string | null; env?: NodeJS.ProcessEnv; cwd?: string } = {}
): Promise<ClusterConfig> {
  const env = input.env ?? process.env;
  const cwd = input.cwd ?? process.cwd();

  if (input.explicitPath) return readConfigFile(path.resolve(cwd, input.explicitPath), env);

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) return readConfigFile(path.resolve(cwd, fromEnv), env);

  const local = path.resolve(cwd, DEFAULT_CONFIG_RELPATH);
  if (await isFile(local)) return readConfigFile(local, env);

  return parseClusterConfig(null, { env });
}
