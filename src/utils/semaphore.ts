/**
 * Counting semaphore bounding in-flight phases and capability calls
 *
 * Waiters are served first come, first served. A waiter whose signal
 * aborts leaves the queue and rejects with the signal's reason, so a
 * cancelled run never sits behind slots it will not use.
 */

import { logger } from './logger.js';

const log = logger.child('semaphore');

export interface SemaphoreState {
  available: number;
  maxPermits: number;
  queued: number;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(
    readonly name: string,
    readonly maxPermits: number
  ) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore "${name}" needs at least one permit, got ${maxPermits}`);
    }
    this.available = maxPermits;
  }

  /**
   * Take a permit if one is free
   */
  tryAcquire(): boolean {
    if (this.available === 0) return false;
    this.available--;
    return true;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.tryAcquire()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) this.waiters.splice(index, 1);
        log.debug('Waiter left the queue', { name: this.name, queued: this.waiters.length });
        reject(signal?.reason);
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(grant);
      log.debug('Waiting for permit', { name: this.name, queued: this.waiters.length });
    });
  }

  /**
   * Return a permit; the oldest waiter takes it over directly
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.available < this.maxPermits) {
      this.available++;
    }
  }

  /**
   * Run `fn` under a permit
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getState(): SemaphoreState {
    return {
      available: this.available,
      maxPermits: this.maxPermits,
      queued: this.waiters.length,
    };
  }
}
