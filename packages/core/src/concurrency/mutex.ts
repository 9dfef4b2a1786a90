/**
 * FIFO async mutex.
 *
 * Waiters are resumed in the order they called acquire().
 */
export class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }
}
