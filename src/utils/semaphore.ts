export class Semaphore {
  private readonly max: number;
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(max: number) {
    const n = Number.isFinite(max) ? Math.floor(max) : 1;
    this.max = n > 0 ? n : 1;
  }

  get capacity(): number {
    return this.max;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.max) {
      this.active += 1;
      return () => this.release();
    }
    // The releasing holder hands its slot over, so `active` is unchanged here.
    await new Promise<void>((resolve) => this.queue.push(resolve));
    return () => this.release();
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/** Worker count for a batch: never more workers than units of work, never fewer than one. */
export function poolSize(requested: number | undefined, units: number): number {
  const n = Number.isFinite(requested) ? Math.floor(requested ?? 1) : 1;
  return Math.max(1, Math.min(n > 0 ? n : 1, units));
}
