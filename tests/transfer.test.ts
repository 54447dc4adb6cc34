import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { LocalProcessRunner, runChecked } from "../src/execution/backends/localProcess.js";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "../src/execution/backends/types.js";
import { LocalTransfer, ScpTransfer, createTransfer } from "../src/execution/transfer.js";
import { parseClusterConfig } from "../src/config/clusterConfig.js";

class RecordingRunner implements ProcessRunner {
  readonly specs: ProcessSpec[] = [];

  constructor(private readonly exitCode = 0) {}

  async execute(spec: ProcessSpec): Promise<ProcessResult> {
    this.specs.push(spec);
    const now = new Date().toISOString();
    return {
      exitCode: this.exitCode,
      signal: null,
      stdout: "",
      stderr: this.exitCode ? "Permission denied" : "",
      startedAt: now,
      finishedAt: now
    };
  }
}

describe("LocalProcessRunner", () => {
  it("captures output and exit code", async () => {
    const res = await new LocalProcessRunner().execute({ argv: ["/bin/sh", "-c", "echo hi; echo oops >&2; exit 3"] });
    expect(res.exitCode).toBe(3);
    expect(res.signal).toBeNull();
    expect(res.stdout).toBe("hi\n");
    expect(res.stderr).toBe("oops\n");
  });

  it("reports death by signal as 128 + signal number", async () => {
    const res = await new LocalProcessRunner().execute({ argv: ["/bin/sh", "-c", "kill -TERM $$"] });
    expect(res.signal).toBe("SIGTERM");
    expect(res.exitCode).toBe(143);
  });

  it("turns a failed command into an error with its stderr", async () => {
    await expect(runChecked(new LocalProcessRunner(), { argv: ["/bin/sh", "-c", "echo oops >&2; exit 1"] })).rejects.toThrow(
      "/bin/sh failed: oops"
    );
  });
});

describe("transfer backends", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "mpp-transfer-"));
    await mkdir(path.join(tmpDir, "src", "nested"), { recursive: true });
    await writeFile(path.join(tmpDir, "src", "b.txt"), "b", "utf8");
    await writeFile(path.join(tmpDir, "src", "nested", "a.txt"), "a", "utf8");
    await mkdir(path.join(tmpDir, "dest"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("builds scp -r commands with sorted sources", async () => {
    const runner = new RecordingRunner();
    const scp = new ScpTransfer("/usr/bin/scp", runner);
    const src = path.join(tmpDir, "src");
    const dest = path.join(tmpDir, "dest");

    await scp.copyTree(src, dest);
    await scp.copyContents(src, dest);
    await scp.copyFile(path.join(src, "b.txt"), dest);

    expect(runner.specs.map((s) => s.argv)).toEqual([
      ["/usr/bin/scp", "-r", src, dest],
      ["/usr/bin/scp", "-r", path.join(src, "b.txt"), path.join(src, "nested"), dest],
      ["/usr/bin/scp", path.join(src, "b.txt"), dest]
    ]);
  });

  it("fails when scp fails", async () => {
    const scp = new ScpTransfer("/usr/bin/scp", new RecordingRunner(1));
    await expect(scp.copyTree(path.join(tmpDir, "src"), path.join(tmpDir, "dest"))).rejects.toThrow(
      "/usr/bin/scp failed: Permission denied"
    );
  });

  it("copies locally with the same layout as scp -r", async () => {
    const local = new LocalTransfer();
    const src = path.join(tmpDir, "src");

    await local.copyTree(src, path.join(tmpDir, "dest"));
    expect(await readFile(path.join(tmpDir, "dest", "src", "nested", "a.txt"), "utf8")).toBe("a");

    await mkdir(path.join(tmpDir, "flat"));
    await local.copyContents(src, path.join(tmpDir, "flat"));
    expect(await readFile(path.join(tmpDir, "flat", "b.txt"), "utf8")).toBe("b");
    expect(await readFile(path.join(tmpDir, "flat", "nested", "a.txt"), "utf8")).toBe("a");
  });

  it("stops once aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("terminated"));
    await expect(
      new LocalTransfer().copyTree(path.join(tmpDir, "src"), path.join(tmpDir, "dest"), controller.signal)
    ).rejects.toThrow("terminated");
  });

  it("picks the backend from config", () => {
    expect(createTransfer(parseClusterConfig({ version: 1 }, { env: {} })).kind).toBe("scp");
    expect(createTransfer(parseClusterConfig({ version: 1, transfer: { kind: "local" } }, { env: {} })).kind).toBe("local");
  });
});
