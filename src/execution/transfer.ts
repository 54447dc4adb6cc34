import { promises as fs } from "fs";
import path from "path";
import type { ClusterConfig, TransferKind } from "../config/clusterConfig.js";
import { LocalProcessRunner, runChecked } from "./backends/localProcess.js";
import type { ProcessRunner } from "./backends/types.js";

/**
 * Moves trees between shared storage and node-local scratch.
 *
 * `copyTree(src, destDir)` behaves like `scp -r src destDir`: the result is `destDir/<basename(src)>`.
 * `copyContents(srcDir, destDir)` behaves like `scp -r srcDir/* destDir/`.
 */
export interface TransferBackend {
  readonly kind: TransferKind;
  copyTree(source: string, destDir: string, signal?: AbortSignal): Promise<void>;
  copyContents(sourceDir: string, destDir: string, signal?: AbortSignal): Promise<void>;
  copyFile(source: string, destDir: string, signal?: AbortSignal): Promise<void>;
}

async function listEntries(dir: string): Promise<string[]> {
  const names = await fs.readdir(dir);
  return names.sort().map((n) => path.join(dir, n));
}

export class ScpTransfer implements TransferBackend {
  readonly kind = "scp" as const;

  constructor(
    private readonly scpPath: string,
    private readonly runner: ProcessRunner = new LocalProcessRunner()
  ) {}

  private async scp(sources: string[], destDir: string, signal?: AbortSignal): Promise<void> {
    if (!sources.length) return;
    await runChecked(this.runner, { argv: [this.scpPath, "-r", ...sources, destDir], signal });
  }

  async copyTree(source: string, destDir: string, signal?: AbortSignal): Promise<void> {
    await this.scp([source], destDir, signal);
  }

  async copyContents(sourceDir: string, destDir: string, signal?: AbortSignal): Promise<void> {
    await this.scp(await listEntries(sourceDir), destDir, signal);
  }

  async copyFile(source: string, destDir: string, signal?: AbortSignal): Promise<void> {
    await runChecked(this.runner, { argv: [this.scpPath, source, destDir], signal });
  }
}

export class LocalTransfer implements TransferBackend {
  readonly kind = "local" as const;

  async copyTree(source: string, destDir: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await fs.cp(source, path.join(destDir, path.basename(source)), { recursive: true, errorOnExist: false });
  }

  async copyContents(sourceDir: string, destDir: string, signal?: AbortSignal): Promise<void> {
    for (const entry of await listEntries(sourceDir)) {
      signal?.throwIfAborted();
      await fs.cp(entry, path.join(destDir, path.basename(entry)), { recursive: true });
    }
  }

  async copyFile(source: string, destDir: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await fs.copyFile(source, path.join(destDir, path.basename(source)));
  }
}

export function createTransfer(config: ClusterConfig, runner?: ProcessRunner): TransferBackend {
  if (config.transfer.kind === "local") return new LocalTransfer();
  return new ScpTransfer(config.transfer.scpPath, runner);
}
