export interface DeferredTask {
  readonly label: string;
  /** Resolves once the task ran (successfully or not) or was cancelled */
  readonly settled: Promise<void>;
  cancel(): void;
}

/**
 * Runs delayed fire-and-forget work, e.g. removing the "processing…" status
 * message some seconds after a download.  Task errors are logged and never
 * reach the caller, and pending timers do not keep the process alive.
 */
export class DeferredTaskScheduler {
  private readonly pending = new Map<NodeJS.Timeout, () => void>();

  schedule(label: string, delayMs: number, task: () => Promise<void> | void): DeferredTask {
    let settle: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      settle = resolve;
    });

    const timer = setTimeout(() => {
      this.pending.delete(timer);
      Promise.resolve()
        .then(task)
        .catch((err: unknown) => {
          console.error(`[deferredTaskScheduler] Task "${label}" failed`, err);
        })
        .finally(settle);
    }, delayMs);
    timer.unref();
    this.pending.set(timer, settle);

    return {
      label,
      settled,
      cancel: () => {
        if (!this.pending.has(timer)) return;
        clearTimeout(timer);
        this.pending.delete(timer);
        settle();
      },
    };
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Drops every task that has not started yet (used on shutdown). */
  cancelAll(): void {
    for (const [timer, settle] of this.pending) {
      clearTimeout(timer);
      settle();
    }
    this.pending.clear();
  }
}
