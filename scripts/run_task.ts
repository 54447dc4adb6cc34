#!/usr/bin/env node
import {
  PIPELINE_OPTIONS,
  describeValues,
  readOptionArgs,
  renderUsage,
  resolvePipelineOptions
} from "../src/cli/options.js";
import { loadClusterConfig } from "../src/config/clusterConfig.js";
import { TerminatedError, errorMessage, exitCodeFor } from "../src/core/errors.js";
import { LocalProcessRunner } from "../src/execution/backends/localProcess.js";
import { jobContextFromEnv } from "../src/execution/slurm/jobContext.js";
import { createTransfer } from "../src/execution/transfer.js";
import { TaskLog } from "../src/runs/taskLog.js";
import { runTask } from "../src/task/taskRunner.js";

function usage(): string {
  return renderUsage({
    tool: "mpp-task",
    headline: "run the MPP pipeline for the subject of the current Slurm array task",
    defs: PIPELINE_OPTIONS
  });
}

async function main(): Promise<void> {
  const args = readOptionArgs(PIPELINE_OPTIONS, process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const options = resolvePipelineOptions(args.values);
  const job = jobContextFromEnv(process.env);
  const config = await loadClusterConfig({ explicitPath: options.config, cwd: job.submitDir });
  const runner = new LocalProcessRunner();
  const log = new TaskLog();

  for (const line of describeValues(PIPELINE_OPTIONS, options)) log.event("task.option", line);

  const outcome = await runTask(options, {
    config,
    job,
    transfer: createTransfer(config, runner),
    runner,
    log,
    signals: process
  });
  log.event("task.outputs", outcome.layout.permanentOutputDir);
}

main().catch((err) => {
  console.error(errorMessage(err));
  const code = exitCodeFor(err);
  process.exitCode = code;
  // Listeners are gone once runTask settles, so a terminated task exits right away.
  if (err instanceof TerminatedError) process.exit(code);
});
