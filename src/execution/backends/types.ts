export interface ProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface ProcessSpec {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Send stdout/stderr to these files instead of capturing them. */
  redirect?: {
    stdoutPath: string;
    stderrPath: string;
  };
  signal?: AbortSignal;
}

export interface ProcessRunner {
  execute(spec: ProcessSpec): Promise<ProcessResult>;
}
