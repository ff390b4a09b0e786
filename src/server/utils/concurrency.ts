/**
 * Concurrency gate shared by every job's page fetches. All jobs in one process
 * go through the same gate, so FETCH_CONCURRENCY bounds total outbound requests.
 */
export class ConcurrencyGate {
  private readonly waiting: Array<() => void> = [];
  private active = 0;

  constructor(private readonly concurrency: number) {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
      throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const resumeNext = this.waiting.shift();
    if (resumeNext) {
      resumeNext();
    }
  }
}

export function pLimit(concurrency: number): ConcurrencyGate {
  return new ConcurrencyGate(concurrency);
}
