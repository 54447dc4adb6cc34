#!/usr/bin/env node
import {
  PIPELINE_OPTIONS,
  SCHEDULER_OPTIONS,
  describeValues,
  readOptionArgs,
  renderUsage,
  resolvePipelineOptions,
  resolveSchedulerOptions
} from "../src/cli/options.js";
import { loadClusterConfig } from "../src/config/clusterConfig.js";
import { errorMessage, exitCodeFor } from "../src/core/errors.js";
import { SbatchSubmitter } from "../src/execution/slurm/submitter.js";
import { submitStudy } from "../src/submit/submitStudy.js";

const DEFS = [...PIPELINE_OPTIONS, ...SCHEDULER_OPTIONS];

function usage(): string {
  return renderUsage({
    tool: "mpp-submit",
    headline: "submit one Slurm job array that runs the MPP pipeline once per subject",
    defs: DEFS
  });
}

async function main(): Promise<void> {
  const args = readOptionArgs(DEFS, process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const pipeline = resolvePipelineOptions(args.values);
  const config = await loadClusterConfig({ explicitPath: pipeline.config });
  const scheduler = resolveSchedulerOptions(args.values, config.submitDefaults);

  const rule = "------------------------------------------------------";
  process.stdout.write(
    [rule, ...describeValues(PIPELINE_OPTIONS, pipeline), ...describeValues(SCHEDULER_OPTIONS, scheduler), rule, ""].join(
      "\n"
    )
  );

  const res = await submitStudy({
    pipeline,
    scheduler,
    config,
    submitDir: process.cwd(),
    submitter: new SbatchSubmitter(process.env.SBATCH_PATH ?? "sbatch"),
    progress: (line) => process.stdout.write(`${line}\n`)
  });
  process.stdout.write(`${res.slurmJobId}\n`);
}

main().catch((err) => {
  const code = exitCodeFor(err);
  console.error(errorMessage(err));
  if (code === 2) console.error(`\n${usage()}`);
  process.exitCode = code;
});
