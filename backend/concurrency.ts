/**
 * Caps how many callers may be inside `run` at once. Waiters are served in
 * arrival order.
 */
export class ConcurrencyGate {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`Concurrency limit must be a positive integer, got: ${limit}`);
    }
  }

  getActiveCount(): number {
    return this.active;
  }

  getQueuedCount(): number {
    return this.waiters.length;
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
    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

export interface WorkerPoolOptions {
  concurrency: number;
  /** Checked before each item is picked up; once false, remaining items are skipped. */
  shouldStart?: () => boolean;
}

export interface WorkerPoolOutcome<T> {
  completed: Map<number, T>;
  skipped: number[];
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results are keyed
 * by item index, so completion order does not matter to the caller.
 */
export async function runWorkerPool<I, T>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<T>,
  options: WorkerPoolOptions,
): Promise<WorkerPoolOutcome<T>> {
  const completed = new Map<number, T>();
  const skipped: number[] = [];
  let next = 0;
  const workers = Math.max(1, Math.min(options.concurrency, items.length));

  async function drain(): Promise<void> {
    while (true) {
      const current = next;
      next += 1;
      if (current >= items.length) {
        break;
      }
      if (options.shouldStart && !options.shouldStart()) {
        skipped.push(current);
        continue;
      }
      completed.set(current, await worker(items[current], current));
    }
  }

  await Promise.all(Array.from({ length: workers }, () => drain()));
  skipped.sort((a, b) => a - b);
  return { completed, skipped };
}
