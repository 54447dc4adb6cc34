import { promises as fs } from "fs";
import path from "path";
import type { JsonObject } from "../core/json.js";

export type LogSink = (line: string) => void;

export interface TaskEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + "\n");
};

/**
 * Structured event log for one array task. Human-readable lines go to the sink (stdout, which
 * Slurm captures); the JSON events are kept and written next to the pipeline logs at cleanup.
 */
export class TaskLog {
  private readonly events: TaskEvent[] = [];

  constructor(private readonly sink: LogSink = stdoutSink) {}

  event(kind: string, message: string, data: JsonObject | null = null): void {
    this.events.push({ ts: new Date().toISOString(), kind, message, data });
    this.sink(`[${kind}] ${message}`);
  }

  warn(kind: string, message: string, data: JsonObject | null = null): void {
    this.event(kind, `WARNING: ${message}`, data);
  }

  banner(lines: string[]): void {
    const rule = "------------------------------------------------------";
    for (const line of [rule, ...lines, rule]) this.sink(line);
  }

  kinds(): string[] {
    return this.events.map((e) => e.kind);
  }

  toJsonl(): string {
    return this.events.map((e) => JSON.stringify(e)).join("\n") + (this.events.length ? "\n" : "");
  }

  async writeJsonl(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, this.toJsonl(), "utf8");
  }
}
