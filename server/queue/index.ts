import { metrics } from "../metrics";

// Settles the caller's promise itself, so it never rejects.
type PendingJob = () => Promise<void>;

/** In-process pool that runs at most `concurrency` jobs at once, FIFO. */
export class WorkPool {
  private running = 0;
  private queue: PendingJob[] = [];

  constructor(
    readonly name: string,
    private readonly concurrency: number,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`work pool "${name}" needs a positive concurrency (got ${concurrency})`);
    }
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(task).then(resolve, reject));
      this.drain();
    });
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      this.running += 1;
      metrics.setPoolActive(this.name, this.running);
      void job().finally(() => {
        this.running = Math.max(0, this.running - 1);
        metrics.setPoolActive(this.name, this.running);
        this.drain();
      });
    }
  }
}

/** Maps `items` through `worker` on the pool, keeping input order in the output. */
export function mapOnPool<I, O>(pool: WorkPool, items: I[], worker: (item: I, index: number) => Promise<O>): Promise<O[]> {
  return Promise.all(items.map((item, index) => pool.run(() => worker(item, index))));
}
