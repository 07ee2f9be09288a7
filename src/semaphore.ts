/**
 * Counting semaphore. One permit turns it into the per-device and per-cloud
 * lock: a second caller waits until the first request/response cycle ends.
 */
export class Semaphore {
  private permits: number;
  private queue: Array<(value: void | PromiseLike<void>) => void> = [];

  constructor(permits = 1) {
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const resolve = this.queue.shift();
    if (resolve) {
      resolve();
    } else {
      this.permits++;
    }
  }

  /**
   * Runs `task` while holding a permit, releasing it however the task ends
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
