import * as z from "zod/v4";
import { usageError } from "../core/errors.js";

export interface OptionDef<K extends string = string> {
  flag: `--${string}`;
  key: K;
  summary: string;
  description: string;
  mandatory?: boolean;
  defaultValue?: string;
  aliases?: readonly `--${string}`[];
}

export const PIPELINE_OPTIONS = [
  {
    flag: "--studyFolder",
    key: "studyFolder",
    summary: "study folder path",
    description: "path to the study folder; raw subject data lives under <studyFolder>/raw/<subject>",
    mandatory: true
  },
  {
    flag: "--subjects",
    key: "subjects",
    summary: "file with subject IDs, or an inline list",
    description: "path to a file with one subject ID per line, or a whitespace-separated list of subject IDs",
    mandatory: true,
    aliases: ["--subject", "--subjectList", "--subjList"]
  },
  {
    flag: "--class",
    key: "className",
    summary: "class name",
    description: "name of the class (e.g. 3T, 7T, T1w_MPR, T2w_SPC)",
    defaultValue: "3T"
  },
  {
    flag: "--domainX",
    key: "domainX",
    summary: "domain X",
    description: "name of domain X (e.g. 3T, 7T, T1w_MPR, T2w_SPC)",
    defaultValue: "T1w_MPR"
  },
  {
    flag: "--domainY",
    key: "domainY",
    summary: "domain Y",
    description: "name of domain Y (e.g. 3T, 7T, T1w_MPR, T2w_SPC)",
    defaultValue: "T2w_SPC"
  },
  {
    flag: "--windowSize",
    key: "windowSize",
    summary: "window size for bias correction",
    description: "window size for bias correction; for 7T MRI the optimal value is between 20 and 30",
    defaultValue: "30"
  },
  {
    flag: "--brainSize",
    key: "brainSize",
    summary: "brain size",
    description: "average brain size in mm; 150 for humans",
    defaultValue: "150"
  },
  {
    flag: "--customBrain",
    key: "customBrain",
    summary: "custom mask or structural images provided",
    description:
      "MASK uses <subject>/<domainX>/custom_bc_brain_mask.nii.gz, CUSTOM uses hand-corrected <domain>_bc and " +
      "<domain>_bc_brain images; both run only the atlas registration step. NONE runs the standard pipeline",
    defaultValue: "NONE",
    aliases: ["--custombrain"]
  },
  {
    flag: "--brainExtractionMethod",
    key: "brainExtractionMethod",
    summary: "brain extraction method",
    description: "registration (RPP) or segmentation (SPP) based brain extraction",
    defaultValue: "RPP"
  },
  {
    flag: "--MNIRegistrationMethod",
    key: "mniRegistrationMethod",
    summary: "(non)linear registration to MNI",
    description: "linear runs an affine registration to MNI only, nonlinear adds FNIRT",
    defaultValue: "linear"
  },
  {
    flag: "--printcom",
    key: "printcom",
    summary: "dry-run command",
    description: "when set (e.g. echo), the pipeline invocation is passed to this command instead of being run",
    defaultValue: "",
    aliases: ["--PRINTCOM"]
  },
  {
    flag: "--config",
    key: "config",
    summary: "cluster config file",
    description: "YAML cluster config; defaults to $MPP_CLUSTER_CONFIG, then ./config/cluster.yaml"
  }
] as const satisfies readonly OptionDef[];

export const SCHEDULER_OPTIONS = [
  {
    flag: "--job-name",
    key: "jobName",
    summary: "name for the job allocation",
    description: "suffix of the scheduler job name <study>_<method>_<registration>_<class>_<job-name>",
    defaultValue: "MPP"
  },
  {
    flag: "--partition",
    key: "partition",
    summary: "partition",
    description: "request a specific partition for the allocation",
    defaultValue: "standard"
  },
  {
    flag: "--exclude",
    key: "exclude",
    summary: "nodes to exclude",
    description: "explicitly exclude nodes from the resources granted to the job",
    defaultValue: ""
  },
  {
    flag: "--nodes",
    key: "nodes",
    summary: "minimum number of nodes",
    description: "minimum number of nodes allocated to each array task",
    defaultValue: "1"
  },
  {
    flag: "--time",
    key: "time",
    summary: "time limit",
    description: "run time limit per array task (days-hours:minutes:seconds); tasks get SIGTERM when it expires",
    defaultValue: "0-05:00:00"
  },
  {
    flag: "--ntasks",
    key: "ntasks",
    summary: "maximum number of tasks",
    description: "maximum number of tasks launched by job steps within the allocation",
    defaultValue: "1"
  },
  {
    flag: "--mem",
    key: "mem",
    summary: "memory per node",
    description: "real memory required per node (e.g. 2gb, 4000M)",
    defaultValue: "2gb"
  },
  {
    flag: "--export",
    key: "export",
    summary: "exported environment",
    description: "environment variables propagated to the array tasks; SLURM_* variables are always propagated",
    defaultValue: "ALL"
  },
  {
    flag: "--mail-type",
    key: "mailType",
    summary: "mail events",
    description: "notify the mail user when these event types occur",
    defaultValue: "FAIL,END"
  },
  {
    flag: "--mail-user",
    key: "mailUser",
    summary: "mail user",
    description: "user to receive state change notifications",
    defaultValue: ""
  }
] as const satisfies readonly OptionDef[];

export type PipelineOptionKey = (typeof PIPELINE_OPTIONS)[number]["key"];
export type SchedulerOptionKey = (typeof SCHEDULER_OPTIONS)[number]["key"];

const zToken = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "must be a simple name (letters, digits, _ . -)");
const zPositiveInt = z
  .string()
  .regex(/^[1-9][0-9]*$/, "must be a positive integer")
  .transform((v) => Number.parseInt(v, 10));

export const CUSTOM_BRAIN_MODES = ["NONE", "MASK", "CUSTOM"] as const;
export const BRAIN_EXTRACTION_METHODS = ["RPP", "SPP"] as const;
export const MNI_REGISTRATION_METHODS = ["linear", "nonlinear"] as const;

export const zPipelineOptions = z.object({
  studyFolder: z.string().min(1),
  subjects: z.string().min(1),
  className: zToken,
  domainX: zToken,
  domainY: zToken,
  windowSize: zPositiveInt,
  brainSize: zPositiveInt,
  customBrain: z.enum(CUSTOM_BRAIN_MODES),
  brainExtractionMethod: z.enum(BRAIN_EXTRACTION_METHODS),
  mniRegistrationMethod: z.enum(MNI_REGISTRATION_METHODS),
  printcom: z.string(),
  config: z.string().min(1).optional()
});

export type PipelineOptions = z.infer<typeof zPipelineOptions>;

export const zSchedulerOptions = z.object({
  jobName: zToken,
  partition: zToken,
  exclude: z.string().regex(/^[A-Za-z0-9_.,[\]-]*$/, "must be a node list"),
  nodes: zPositiveInt,
  time: z
    .string()
    .regex(
      /^(?:\d+-\d+(?::\d{1,2}){0,2}|\d+(?::\d{1,2}){0,2}|UNLIMITED|INFINITE)$/,
      "must be a time limit like 0-05:00:00"
    ),
  ntasks: zPositiveInt,
  mem: z.string().regex(/^\d+(?:[KMGT]B?)?$/i, "must be a memory size like 2gb"),
  export: z.string().min(1),
  mailType: z.string().regex(/^[A-Z_0-9]+(?:,[A-Z_0-9]+)*$/, "must be a comma-separated list of mail types"),
  mailUser: z.string()
});

export type SchedulerOptions = z.infer<typeof zSchedulerOptions>;

export interface RawOptionArgs {
  help: boolean;
  values: Record<string, string>;
}

function findDef(defs: readonly OptionDef[], name: string): OptionDef | undefined {
  return defs.find((d) => d.flag === name || (d.aliases ?? []).some((a) => a === name));
}

/** Accepts `--flag=value` and `--flag value`; a repeated flag keeps its last value. */
export function readOptionArgs(defs: readonly OptionDef[], argv: string[]): RawOptionArgs {
  const values: Record<string, string> = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a === "--help" || a === "-h") {
      help = true;
      continue;
    }
    if (!a.startsWith("--")) throw usageError(`unexpected arg: ${a}`);

    const eq = a.indexOf("=");
    const name = eq === -1 ? a : a.slice(0, eq);
    const def = findDef(defs, name);
    if (!def) throw usageError(`unknown option: ${name}`);

    if (eq !== -1) {
      values[def.key] = a.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw usageError(`missing value for ${def.flag}`);
    values[def.key] = next;
    i++;
  }

  return { help, values };
}

function resolveOptions<T>(
  defs: readonly OptionDef[],
  values: Record<string, string>,
  schema: z.ZodType<T>,
  fallbacks: Record<string, string | undefined> = {}
): T {
  const merged: Record<string, string> = {};
  const missing: string[] = [];

  for (const def of defs) {
    const v = values[def.key] ?? fallbacks[def.key] ?? def.defaultValue;
    if (v !== undefined) {
      merged[def.key] = v;
    } else if (def.mandatory) {
      missing.push(def.flag);
    }
  }
  if (missing.length) throw usageError(`missing mandatory option(s): ${missing.join(", ")}`);

  const parsed = schema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => {
        const key = String(issue.path[0] ?? "");
        const flag = defs.find((d) => d.key === key)?.flag ?? key;
        return `${flag}: ${issue.message}`;
      })
      .join("; ");
    throw usageError(`invalid option(s): ${detail}`);
  }
  return parsed.data;
}

export function resolvePipelineOptions(values: Record<string, string>): PipelineOptions {
  return resolveOptions(PIPELINE_OPTIONS, values, zPipelineOptions);
}

/** CLI values win over config defaults, which win over built-in defaults. */
export function resolveSchedulerOptions(
  values: Record<string, string>,
  configDefaults: Partial<Record<SchedulerOptionKey, string>> = {}
): SchedulerOptions {
  return resolveOptions(SCHEDULER_OPTIONS, values, zSchedulerOptions, configDefaults);
}

/** Pipeline options as `--flag=value` arguments for the per-task runner; `--config` travels in the environment. */
export function forwardPipelineArgs(options: PipelineOptions): string[] {
  const record: Record<string, string | number | undefined> = options;
  const args: string[] = [];
  for (const def of PIPELINE_OPTIONS) {
    if (def.key === "config") continue;
    args.push(`${def.flag}=${String(record[def.key] ?? "")}`);
  }
  return args;
}

export function renderUsage(input: { tool: string; headline: string; defs: readonly OptionDef[] }): string {
  const synopsis = input.defs
    .map((d) => (d.mandatory ? `${d.flag}=<${d.key}>` : `[${d.flag}=<${d.key}>]`))
    .join(" ");

  const lines: string[] = [`${input.tool}: ${input.headline}`, "", `usage: ${input.tool} ${synopsis}`, "", "arguments:"];
  for (const d of input.defs) {
    const aliases = d.aliases?.length ? ` (aliases: ${d.aliases.join(", ")})` : "";
    lines.push(`  ${d.flag}${aliases}  ${d.mandatory ? "required" : "optional"}; ${d.summary}`);
    const dflt = d.defaultValue !== undefined ? ` Default: ${d.defaultValue === "" ? "<empty>" : d.defaultValue}.` : "";
    lines.push(`      ${d.description}.${dflt}`);
  }
  lines.push("", "  --help  print this message and exit", "");
  return lines.join("\n");
}

export function describeValues(defs: readonly OptionDef[], values: Record<string, string | number | undefined>): string[] {
  return defs.map((d) => `${d.flag.slice(2)}: ${values[d.key] === undefined || values[d.key] === "" ? "<empty>" : String(values[d.key])}`);
}
