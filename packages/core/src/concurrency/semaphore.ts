export class Semaphore {
  private inFlightCount = 0;
  private readonly waiters: Array<(release: () => void) => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`Semaphore maxConcurrency must be >= 1 (got ${maxConcurrency})`);
    }
  }

  async acquire(): Promise<() => void> {
    if (this.inFlightCount < this.maxConcurrency) {
      this.inFlightCount++;
      return this.createRelease();
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `task` once a slot is free, releasing the slot when it settles.
   */
  async run<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      this.inFlightCount--;
      const next = this.waiters.shift();
      if (next) {
        this.inFlightCount++;
        next(this.createRelease());
      }
    };
  }
}

/** Single-holder semaphore guarding shared result lists */
export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }
}
