import { promises as fs } from "fs";
import path from "path";
import { errorMessage } from "../core/errors.js";
import type { TransferBackend } from "../execution/transfer.js";
import type { TaskLog } from "../runs/taskLog.js";
import type { TaskLayout } from "./layout.js";

export interface CleanupStep {
  step: string;
  ok: boolean;
  detail: string;
}

export interface CleanupReport {
  skipped: boolean;
  steps: CleanupStep[];
}

export function eventLogPath(layout: TaskLayout): string {
  return path.join(layout.studyLogDir, `${layout.subjectId}.events.jsonl`);
}

export function cleanupFailures(report: CleanupReport): CleanupStep[] {
  return report.steps.filter((s) => !s.ok);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copies results and logs back to shared storage, relocates the scheduler's capture files,
 * removes the scratch directory and writes the task's event log into the study log directory.
 * A failing step is recorded and the remaining steps still run. Without a scratch directory
 * there is nothing to do, so a repeated call is a no-op.
 */
export async function cleanupTask(input: {
  layout: TaskLayout;
  transfer: TransferBackend;
  log: TaskLog;
}): Promise<CleanupReport> {
  const { layout, transfer, log } = input;

  if (!(await exists(layout.scratchDir))) {
    log.event("cleanup.skipped", `scratch directory ${layout.scratchDir} is already gone`);
    return { skipped: true, steps: [] };
  }

  const steps: CleanupStep[] = [];
  const step = async (name: string, fn: () => Promise<string>): Promise<void> => {
    try {
      const detail = await fn();
      steps.push({ step: name, ok: true, detail });
      log.event(`cleanup.${name}`, detail);
    } catch (err) {
      const detail = errorMessage(err);
      steps.push({ step: name, ok: false, detail });
      log.warn(`cleanup.${name}_failed`, detail);
    }
  };

  log.event("cleanup.start", "transferring files from node to server");

  await step("outputs", async () => {
    if (!(await exists(layout.stagedOutputDir))) return `no pipeline output at ${layout.stagedOutputDir}`;
    await fs.mkdir(layout.permanentOutputDir, { recursive: true });
    await transfer.copyContents(layout.stagedOutputDir, layout.permanentOutputDir);
    return `copied outputs to ${layout.permanentOutputDir}`;
  });

  await step("logs", async () => {
    if (!(await exists(layout.scratchLogDir))) return "no scratch logs";
    await fs.mkdir(layout.studyLogDir, { recursive: true });
    await transfer.copyContents(layout.scratchLogDir, layout.studyLogDir);
    return `copied logs to ${layout.studyLogDir}`;
  });

  for (const capture of layout.schedulerCaptures) {
    await step("scheduler_log", async () => {
      if (!(await exists(capture.source))) return `no scheduler capture at ${capture.source}`;
      await fs.mkdir(layout.schedulerLogDir, { recursive: true });
      await fs.rename(capture.source, capture.relocated);
      await fs.mkdir(layout.studyLogDir, { recursive: true });
      await transfer.copyFile(capture.relocated, layout.studyLogDir);
      return `relocated ${path.basename(capture.source)} to ${capture.relocated}`;
    });
  }

  await step("scratch", async () => {
    await fs.rm(layout.scratchDir, { recursive: true, force: true });
    return `removed ${layout.scratchDir}`;
  });

  // Written last so it holds every step above.
  await step("event_log", async () => {
    const target = eventLogPath(layout);
    await log.writeJsonl(target);
    return `wrote ${target}`;
  });

  return { skipped: false, steps };
}
