import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { resolvePipelineOptions } from "../src/cli/options.js";
import { parseClusterConfig } from "../src/config/clusterConfig.js";
import { LocalTransfer, type TransferBackend } from "../src/execution/transfer.js";
import { TaskLog } from "../src/runs/taskLog.js";
import { cleanupFailures, cleanupTask } from "../src/task/cleanup.js";
import { planTaskLayout, type TaskLayout } from "../src/task/layout.js";

class FailingContentsTransfer extends LocalTransfer {
  override async copyContents(): Promise<void> {
    throw new Error("disk full");
  }
}

describe("cleanupTask", () => {
  let tmpDir: string;
  let layout: TaskLayout;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "mpp-cleanup-"));
    const options = resolvePipelineOptions({ studyFolder: path.join(tmpDir, "study"), subjects: "101" });
    const config = parseClusterConfig({ version: 1, paths: { scratch_root: path.join(tmpDir, "scratch") } }, { env: {} });
    layout = planTaskLayout({
      options,
      config,
      job: {
        submitHost: "login1",
        nodeName: "node07",
        submitDir: path.join(tmpDir, "submit"),
        jobName: "study_RPP_linear_3T_MPP",
        arrayJobId: "1000",
        arrayTaskId: 2,
        jobId: "1002",
        nodeList: "node07"
      },
      subjectId: "101"
    });

    await mkdir(layout.stagedOutputDir, { recursive: true });
    await writeFile(path.join(layout.stagedOutputDir, "result.txt"), "ok", "utf8");
    await mkdir(layout.scratchLogDir, { recursive: true });
    await writeFile(path.join(layout.scratchLogDir, "101.out"), "pipeline out", "utf8");
    await mkdir(path.join(tmpDir, "submit", "logs", "slurm"), { recursive: true });
    await writeFile(path.join(tmpDir, "submit", "logs", "slurm", "slurm-1000_2.out"), "sched out", "utf8");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("copies results and logs back, relocates scheduler logs and removes scratch", async () => {
    const log = new TaskLog(() => undefined);
    const report = await cleanupTask({ layout, transfer: new LocalTransfer(), log });

    expect(report.skipped).toBe(false);
    expect(report.steps.map((s) => s.step)).toEqual([
      "outputs",
      "logs",
      "scheduler_log",
      "scheduler_log",
      "scratch",
      "event_log"
    ]);
    expect(cleanupFailures(report)).toEqual([]);

    expect(await readFile(path.join(layout.permanentOutputDir, "result.txt"), "utf8")).toBe("ok");
    expect(await readFile(path.join(layout.studyLogDir, "101.out"), "utf8")).toBe("pipeline out");
    expect(await readFile(path.join(layout.schedulerLogDir, "slurm-101.out"), "utf8")).toBe("sched out");
    expect(await readFile(path.join(layout.studyLogDir, "slurm-101.out"), "utf8")).toBe("sched out");
    expect(report.steps[3]?.detail).toBe(`no scheduler capture at ${layout.schedulerCaptures[1]?.source}`);

    await expect(access(path.join(tmpDir, "submit", "logs", "slurm", "slurm-1000_2.out"))).rejects.toThrow();
    await expect(access(layout.scratchDir)).rejects.toThrow();

    const events = (await readFile(path.join(layout.studyLogDir, "101.events.jsonl"), "utf8")).trim().split("\n");
    expect(events.map((line) => JSON.parse(line).kind)).toEqual([
      "cleanup.start",
      "cleanup.outputs",
      "cleanup.logs",
      "cleanup.scheduler_log",
      "cleanup.scheduler_log",
      "cleanup.scratch"
    ]);
  });

  it("is a no-op once scratch is gone", async () => {
    const log = new TaskLog(() => undefined);
    await cleanupTask({ layout, transfer: new LocalTransfer(), log });
    await expect(cleanupTask({ layout, transfer: new LocalTransfer(), log })).resolves.toEqual({
      skipped: true,
      steps: []
    });
    expect(log.kinds()[log.kinds().length - 1]).toBe("cleanup.skipped");
  });

  it("records failing steps and still runs the rest", async () => {
    const log = new TaskLog(() => undefined);
    const transfer: TransferBackend = new FailingContentsTransfer();
    const report = await cleanupTask({ layout, transfer, log });

    expect(cleanupFailures(report)).toEqual([
      { step: "outputs", ok: false, detail: "disk full" },
      { step: "logs", ok: false, detail: "disk full" }
    ]);
    expect(log.kinds()).toContain("cleanup.outputs_failed");
    expect(await readFile(path.join(layout.schedulerLogDir, "slurm-101.out"), "utf8")).toBe("sched out");
    await expect(access(layout.scratchDir)).rejects.toThrow();
  });
});
