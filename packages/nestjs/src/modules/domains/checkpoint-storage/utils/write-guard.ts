/**
 * FIFO async mutex owned by one checkpointer instance.
 *
 * Writes (and schema creation) run one at a time in acquisition order;
 * reads never take it. Only guards callers within this process.
 */
export class WriteGuard {
  private queue: Array<(release: () => void) => void> = [];
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.queue.length;
  }

  acquire(): Promise<() => void> {
    return new Promise<() => void>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
      } else {
        this.queue.push(resolve);
      }
    });
  }

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
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
      if (released) {
        return;
      }
      released = true;

      const next = this.queue.shift();
      if (next) {
        // ownership passes straight to the next waiter
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
