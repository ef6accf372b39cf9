/**
 * Total time budget for one pipeline run.
 *
 * Aborts its signal when the budget runs out so every pending call is
 * cancelled at once. dispose() must be called when the run ends.
 */
export class Deadline {
  readonly startedAt: number;
  readonly budgetMs: number;
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout>;
  private now: () => number;

  constructor(budgetMs: number, now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
    this.budgetMs = budgetMs;
    this.timer = setTimeout(() => this.controller.abort(), budgetMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted || this.remaining() <= 0;
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }

  remaining(): number {
    return Math.max(0, this.budgetMs - this.elapsed());
  }

  /**
   * Per-call timeout that never outlives the deadline
   */
  callTimeout(perCallMs: number): number {
    return Math.max(1, Math.min(perCallMs, this.remaining()));
  }

  /**
   * Resolve after ms, or early when the deadline fires
   */
  sleep(ms: number): Promise<void> {
    if (ms <= 0 || this.expired) return Promise.resolve();
    return new Promise(resolve => {
      const done = (): void => {
        clearTimeout(timer);
        this.signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.signal.addEventListener('abort', done, { once: true });
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
  }
}
