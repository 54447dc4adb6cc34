import os from "os";

export const ErrorCode = {
  Usage: "usage",
  Config: "config",
  SubjectResolution: "subject_resolution",
  Staging: "staging",
  Pipeline: "pipeline",
  Submission: "submission",
  Terminated: "terminated"
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const EXIT_CODES: Record<Exclude<ErrorCode, "terminated">, number> = {
  usage: 2,
  config: 3,
  subject_resolution: 4,
  staging: 5,
  pipeline: 6,
  submission: 7
};

export class MppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MppError";
  }
}

export class TerminatedError extends MppError {
  constructor(readonly signal: NodeJS.Signals) {
    super(ErrorCode.Terminated, `terminated by ${signal}`);
    this.name = "TerminatedError";
  }
}

export function usageError(message: string): MppError {
  return new MppError(ErrorCode.Usage, message);
}

/** 128 + signal number for terminations, fixed codes for the rest, 1 for anything unexpected. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof TerminatedError) {
    const signo = os.constants.signals[err.signal];
    return 128 + signo;
  }
  if (err instanceof MppError && err.code !== ErrorCode.Terminated) {
    return EXIT_CODES[err.code];
  }
  return 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
