/** Counting semaphore; `limit` of undefined means unbounded. */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit?: number) {}

  async acquire(): Promise<void> {
    if (this.limit === undefined || this.active < this.limit) {
      this.active++;
      return;
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    // the slot passes straight to the next waiter
    if (next) next();
    else this.active--;
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
