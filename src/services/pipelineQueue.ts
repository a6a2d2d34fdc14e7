import { config } from "../config";

export interface PipelineQueueCallbacks {
  onQueued?: (pending: number) => void;
}

/**
 * Runs submitted jobs with bounded concurrency. Jobs past the limit wait in
 * FIFO order; each caller awaits the promise for its own job.
 */
export class PipelineQueue {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly maxConcurrent: number;

  constructor(
    maxConcurrent = config.maxConcurrentPipelines,
    private readonly callbacks: PipelineQueueCallbacks = {}
  ) {
    this.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  async submit<T>(job: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await job();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.active += 1;
        resolve();
      });
      this.callbacks.onQueued?.(this.waiting.length);
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.waiting.shift();
    next?.();
  }
}
