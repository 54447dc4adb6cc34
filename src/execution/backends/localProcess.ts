import { spawn, type ChildProcess } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import type { ProcessResult, ProcessRunner, ProcessSpec } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

function waitForExit(child: ChildProcess): Promise<{ exitCode: number; signal: NodeJS.Signals | null }> {
  return new Promise((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== null) resolve({ exitCode: code, signal: null });
      else resolve({ exitCode: signal ? 128 + os.constants.signals[signal] : 1, signal });
    });
  });
}

export class LocalProcessRunner implements ProcessRunner {
  async execute(spec: ProcessSpec): Promise<ProcessResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw new Error("process argv must be non-empty");
    const startedAt = new Date().toISOString();
    const env = { ...process.env, ...spec.env };

    if (spec.redirect) {
      const out = await fs.open(spec.redirect.stdoutPath, "w");
      try {
        const err = await fs.open(spec.redirect.stderrPath, "w");
        try {
          const child = spawn(command, args, {
            cwd: spec.cwd,
            env,
            stdio: ["ignore", out.fd, err.fd],
            signal: spec.signal
          });
          const exit = await waitForExit(child);
          return { ...exit, stdout: "", stderr: "", startedAt, finishedAt: new Date().toISOString() };
        } finally {
          await err.close();
        }
      } finally {
        await out.close();
      }
    }

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"],
      signal: spec.signal
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    const exit = await waitForExit(child);
    const finishedAt = new Date().toISOString();

    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

    return { ...exit, stdout, stderr, startedAt, finishedAt };
  }
}

/** Runs the process and turns a non-zero exit into an error carrying its stderr (or stdout). */
export async function runChecked(runner: ProcessRunner, spec: ProcessSpec): Promise<ProcessResult> {
  const result = await runner.execute(spec);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
    throw new Error(`${spec.argv[0] ?? "command"} failed: ${detail}`);
  }
  return result;
}
