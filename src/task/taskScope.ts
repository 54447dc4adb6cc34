import { errorMessage, TerminatedError } from "../core/errors.js";
import type { TaskLog } from "../runs/taskLog.js";

export type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

// SIGKILL cannot be caught; SIGSEGV means the runtime itself is unusable.
export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Owns a task's scratch resources: `release` runs exactly once, whether the body finishes,
 * throws, or a termination signal arrives first. On a signal the body's abort signal fires
 * (killing any child it spawned) and release starts right away instead of waiting for it.
 */
export class TaskScope<R = void> {
  private readonly controller = new AbortController();
  private released: Promise<R> | null = null;
  private receivedSignal: NodeJS.Signals | null = null;
  private releasing = false;
  private onSignal: ((signal: NodeJS.Signals) => void) | null = null;

  constructor(
    private readonly deps: {
      release: () => Promise<R>;
      log: TaskLog;
      signals?: SignalSource;
      watch?: readonly NodeJS.Signals[];
    }
  ) {}

  get signal(): NodeJS.Signals | null {
    return this.receivedSignal;
  }

  /** Memoized: later calls return the first release's result. */
  release(): Promise<R> {
    this.released ??= this.deps.release();
    return this.released;
  }

  async run<T>(body: (abort: AbortSignal) => Promise<T>): Promise<T> {
    const interrupted = new Promise<NodeJS.Signals>((resolve) => {
      this.onSignal = resolve;
    });
    const listener: SignalListener = (signal) => this.handleSignal(signal);
    const watched = this.deps.watch ?? TERMINATION_SIGNALS;
    for (const s of watched) this.deps.signals?.on(s, listener);

    try {
      const outcome = await Promise.race([
        body(this.controller.signal).then((value) => ({ done: true as const, value })),
        interrupted.then((signal) => ({ done: false as const, signal }))
      ]);
      if (!outcome.done) throw new TerminatedError(outcome.signal);
      return outcome.value;
    } catch (err) {
      if (this.receivedSignal && !(err instanceof TerminatedError)) {
        this.deps.log.warn("task.interrupted", errorMessage(err));
        throw new TerminatedError(this.receivedSignal);
      }
      throw err;
    } finally {
      // Listeners stay attached until release settles; signals meanwhile are logged and ignored.
      this.releasing = true;
      try {
        await this.release();
      } finally {
        for (const s of watched) this.deps.signals?.off(s, listener);
      }
    }
  }

  private handleSignal(signal: NodeJS.Signals): void {
    if (this.receivedSignal || this.releasing) {
      const state = this.receivedSignal ? "already terminating" : "cleaning up";
      this.deps.log.warn("task.signal_ignored", `${signal} received while ${state}`);
      return;
    }
    this.receivedSignal = signal;
    this.deps.log.banner(["", ` ############ WARNING:  EARLY TERMINATION (${signal}) #############`, ""]);
    this.onSignal?.(signal);
    this.controller.abort(new TerminatedError(signal));
  }
}
