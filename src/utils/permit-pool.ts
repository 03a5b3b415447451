// This module implements a bounded-concurrency gate for outbound calls with an optional wait bound.

import { PermanentUpstreamError } from './errors.js';

interface Waiter {
  resolve: () => void;
  timer: NodeJS.Timeout | null;
}

export interface PermitPoolOptions {
  permits: number;
  // Zero waits without bound.
  maxWaitMs: number;
}

// This class hands out a fixed number of permits and queues further callers in FIFO order.
export class PermitPool {
  private readonly permits: number;
  private readonly maxWaitMs: number;
  private inUse = 0;
  private readonly waiters: Waiter[] = [];

  public constructor(options: PermitPoolOptions) {
    if (!Number.isInteger(options.permits) || options.permits < 1) {
      throw new RangeError('PermitPool requires at least one permit.');
    }

    this.permits = options.permits;
    this.maxWaitMs = options.maxWaitMs;
  }

  public get available(): number {
    return this.permits - this.inUse;
  }

  public get pending(): number {
    return this.waiters.length;
  }

  // This method resolves once a permit is held; it rejects when the configured wait bound elapses.
  public acquire(): Promise<void> {
    if (this.inUse < this.permits) {
      this.inUse += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, timer: null };

      if (this.maxWaitMs > 0) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(new PermanentUpstreamError(`Timed out after ${this.maxWaitMs}ms waiting for an outbound request permit.`));
        }, this.maxWaitMs);
      }

      this.waiters.push(waiter);
    });
  }

  // This method hands the permit to the oldest waiter or returns it to the pool.
  public release(): void {
    const next = this.waiters.shift();
    if (next) {
      if (next.timer) {
        clearTimeout(next.timer);
      }
      next.resolve();
      return;
    }

    if (this.inUse > 0) {
      this.inUse -= 1;
    }
  }

  // This helper runs one task while holding a permit.
  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
