export type PoolTask = () => Promise<void>;

export interface WorkerPoolOptions {
  concurrency?: number;
}

interface QueuedTask {
  task: PoolTask;
  onStart: () => void;
}

export class WorkerPool {
  private readonly concurrency: number;
  private readonly queue: QueuedTask[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private readonly failures: unknown[] = [];
  private activeCount = 0;

  constructor(options: WorkerPoolOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  get active(): number {
    return this.activeCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Queues a task and resolves once it has a slot, so a producer that
   * awaits each submission never runs ahead of the workers.
   */
  submit(task: PoolTask): Promise<void> {
    return new Promise((resolve) => {
      this.queue.push({ task, onStart: resolve });
      this.schedule();
    });
  }

  async drain(): Promise<void> {
    while (true) {
      this.schedule();
      if (this.queue.length === 0 && this.inflight.size === 0) {
        break;
      }
      await Promise.race(this.inflight);
    }
    const [failure] = this.failures.splice(0);
    if (failure !== undefined) {
      throw failure;
    }
  }

  private schedule(): void {
    while (this.activeCount < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      const promise = this.run(next.task);
      this.inflight.add(promise);
      next.onStart();
      void promise.finally(() => {
        this.inflight.delete(promise);
        this.schedule();
      });
    }
  }

  private async run(task: PoolTask): Promise<void> {
    this.activeCount += 1;
    try {
      await task();
    } catch (error) {
      this.failures.push(error);
    } finally {
      this.activeCount -= 1;
    }
  }
}
