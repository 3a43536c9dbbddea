import type { JobStatus } from "@blockprover/shared";

/** The part of a ChildProcess this handle listens to. */
export interface ExitSource {
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Handle on a spawned prover process. The exit listener attached at spawn
 * time records the outcome and runs the release callback exactly once, so
 * status reads never have to wait on the child.
 */
export class ProofProcess {
  readonly pid: number;
  readonly startedAt = new Date();
  readonly exited: Promise<ProcessExit>;

  private outcome: ProcessExit | null = null;

  constructor(child: ExitSource, pid: number, release: () => void = () => undefined) {
    this.pid = pid;
    this.exited = new Promise<ProcessExit>((resolve) => {
      const settle = (exit: ProcessExit) => {
        if (this.outcome) {
          return;
        }
        this.outcome = exit;
        release();
        resolve(exit);
      };

      child.once("exit", (exitCode, signal) => settle({ exitCode, signal }));
      // A process that fails after spawning may emit "error" without "exit".
      // Stays attached: a later failed kill() emits "error" again.
      child.on("error", () => settle({ exitCode: null, signal: null }));
    });
  }

  get exitCode(): number | null {
    return this.outcome?.exitCode ?? null;
  }

  get signal(): NodeJS.Signals | null {
    return this.outcome?.signal ?? null;
  }

  isRunning(): boolean {
    return this.outcome === null;
  }

  status(): JobStatus {
    if (!this.outcome) {
      return "InProgress";
    }
    return this.outcome.exitCode === 0 ? "Completed" : "Failed";
  }
}
