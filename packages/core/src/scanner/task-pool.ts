/**
 * Bounded in-process job queue. At most `concurrency` jobs run at once;
 * a job that rejects only rejects its own promise.
 */

type QueuedJob = () => Promise<void>;

export interface PoolStats {
  submitted: number;
  completed: number;
  failed: number;
  active: number;
  queued: number;
}

export class TaskPool {
  private readonly concurrency: number;
  private readonly queue: QueuedJob[] = [];
  private active = 0;
  private submitted = 0;
  private completed = 0;
  private failed = 0;

  constructor(concurrency: number) {
    this.concurrency = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  }

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    this.submitted++;
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
          this.completed++;
        } catch (err) {
          this.failed++;
          reject(err);
        }
      });
      this.drain();
    });
  }

  /** One job per item; results keep input order */
  map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O> | O): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.run(() => fn(item, index))));
  }

  stats(): PoolStats {
    return {
      submitted: this.submitted,
      completed: this.completed,
      failed: this.failed,
      active: this.active,
      queued: this.queue.length,
    };
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const job = this.queue.shift();
      if (!job) return;
      this.active++;
      void this.execute(job);
    }
  }

  private async execute(job: QueuedJob): Promise<void> {
    try {
      await job();
    } finally {
      this.active--;
      this.drain();
    }
  }
}
