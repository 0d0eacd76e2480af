import { sleep } from "./sleep.js";

/**
 * Spaces out the start of scheduled tasks by at least `delayMs`.
 * Tasks themselves may overlap once started.
 */
export class RateLimiter {
  private queue: Promise<void> = Promise.resolve();
  private lastStartAt = 0;

  constructor(private delayMs: number) {}

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.queue.then(async () => {
      const now = Date.now();
      const waitMs = Math.max(0, this.lastStartAt + this.delayMs - now);
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStartAt = Date.now();
    });
    this.queue = turn;
    await turn;
    return task();
  }
}
