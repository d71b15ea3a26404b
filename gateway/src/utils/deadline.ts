import { TimeoutError } from "../errors.js";

/**
 * An absolute point in time a unit of work must finish by, threaded through
 * every call boundary of a request. Its signal aborts when the time passes or
 * when the deadline (or any parent) is cancelled.
 */
export class Deadline {
  readonly at: number;
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private detachParent: (() => void) | null = null;

  private constructor(at: number, parent?: Deadline) {
    this.at = at;

    if (parent) {
      if (parent.signal.aborted) {
        this.controller.abort(parent.signal.reason);
      } else {
        const onAbort = () => this.abort(parent.signal.reason);
        parent.signal.addEventListener("abort", onAbort, { once: true });
        this.detachParent = () => parent.signal.removeEventListener("abort", onAbort);
      }
    }

    if (!this.controller.signal.aborted) {
      const delay = Math.max(0, at - Date.now());
      this.timer = setTimeout(() => this.abort(new TimeoutError("Deadline")), delay);
      // Don't block process exit
      if (typeof this.timer === "object" && "unref" in this.timer) {
        this.timer.unref();
      }
    }
  }

  static after(ms: number): Deadline {
    return new Deadline(Date.now() + ms);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remainingMs(): number {
    return Math.max(0, this.at - Date.now());
  }

  get expired(): boolean {
    return this.controller.signal.aborted || this.remainingMs() === 0;
  }

  /** A nested deadline that never outlives this one. */
  child(budgetMs?: number): Deadline {
    const at = budgetMs === undefined ? this.at : Math.min(this.at, Date.now() + budgetMs);
    return new Deadline(at, this);
  }

  cancel(reason: unknown = new TimeoutError("Deadline")): void {
    this.abort(reason);
  }

  /** Release timers and parent listeners once the work has settled. */
  dispose(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.detachParent) {
      this.detachParent();
      this.detachParent = null;
    }
  }

  private abort(reason: unknown): void {
    this.dispose();
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }
}

/**
 * Settle with the task's result, or reject with TimeoutError(label) once the
 * deadline passes. A cancelled deadline rejects with its cancel reason.
 */
export function withDeadline<T>(task: Promise<T>, deadline: Deadline, label: string): Promise<T> {
  const signal = deadline.signal;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal.reason, label));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function abortReason(reason: unknown, label: string): unknown {
  return reason instanceof TimeoutError ? new TimeoutError(label) : reason;
}
