/**
 * Counting gate shared by every validation in a batch. A slot is held from
 * before provisioning until teardown has finished.
 */
export class ConcurrencyGate {
  private readonly maxActive: number;
  private activeCount = 0;
  private readonly pending: Array<() => void> = [];

  constructor(maxActive: number) {
    this.maxActive = Math.max(1, Math.floor(maxActive));
  }

  get width(): number {
    return this.maxActive;
  }

  get active(): number {
    return this.activeCount;
  }

  get queued(): number {
    return this.pending.length;
  }

  /** Resolves with an idempotent release function once a slot is free. */
  acquire(): Promise<() => void> {
    if (this.activeCount < this.maxActive) {
      this.activeCount++;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.pending.push(() => resolve(this.createRelease()));
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
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
      this.activeCount--;
      this.drainNext();
    };
  }

  private drainNext(): void {
    if (this.activeCount >= this.maxActive) return;
    const next = this.pending.shift();
    if (next) {
      this.activeCount++;
      next();
    }
  }
}
