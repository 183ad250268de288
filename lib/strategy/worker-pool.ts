/**
 * Bounded worker pool for one analysis.
 *
 * A counting semaphore: at most `size` submitted calls run at once, the rest
 * wait in FIFO order. Shutting the pool down refuses new work but lets
 * running and queued calls finish.
 */

import { StrategyDeskError } from "./errors";
import { TaskHandle } from "./task-handle";

export class WorkerPool {
  readonly size: number;
  private permits: number;
  private queue: Array<() => void> = [];
  private closed = false;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new StrategyDeskError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.permits = size;
  }

  submit<T>(label: string, task: () => Promise<T>): TaskHandle<T> {
    if (this.closed) {
      throw new StrategyDeskError(`Cannot submit ${label}: worker pool is shut down`);
    }

    const call = this.acquire().then(async (release) => {
      try {
        return await task();
      } finally {
        release();
      }
    });

    return new TaskHandle(label, call);
  }

  shutdown(): void {
    this.closed = true;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /** Calls waiting for a free worker. */
  get queued(): number {
    return this.queue.length;
  }

  private async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return () => this.release();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        this.permits--;
        resolve(() => this.release());
      });
    });
  }

  private release(): void {
    this.permits++;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
