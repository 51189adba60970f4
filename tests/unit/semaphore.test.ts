import { describe, it, expect, vi } from 'vitest';
import { Semaphore } from '../../src/utils/semaphore.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

describe('Semaphore', () => {
  it('should reject fewer than one permit', () => {
    expect(() => new Semaphore('slots', 0)).toThrow(RangeError);
    expect(() => new Semaphore('slots', 1.5)).toThrow('Semaphore "slots" needs at least one permit, got 1.5');
  });

  it('should hand a released permit to the oldest waiter', async () => {
    const sem = new Semaphore('phases', 1);
    await sem.acquire();

    const order: string[] = [];
    const first = sem.acquire().then(() => order.push('first'));
    const second = sem.acquire().then(() => order.push('second'));
    expect(sem.getState()).toEqual({ available: 0, maxPermits: 1, queued: 2 });

    sem.release();
    await first;
    expect(order).toEqual(['first']);
    expect(sem.getState().available).toBe(0);

    sem.release();
    await second;
    expect(order).toEqual(['first', 'second']);

    sem.release();
    expect(sem.getState()).toEqual({ available: 1, maxPermits: 1, queued: 0 });
  });

  it('should acquire without waiting only when a permit is free', () => {
    const sem = new Semaphore('phases', 2);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(true);
    expect(sem.tryAcquire()).toBe(false);
    sem.release();
    expect(sem.tryAcquire()).toBe(true);
  });

  it('should never exceed max permits on extra releases', () => {
    const sem = new Semaphore('phases', 2);
    sem.release();
    sem.release();
    expect(sem.getState().available).toBe(2);
  });

  describe('execute', () => {
    it('should release the permit when the task throws', async () => {
      const sem = new Semaphore('capabilities', 1);
      await expect(sem.execute(async () => {
        throw new Error('boom');
      })).rejects.toThrow('boom');
      expect(sem.getState().available).toBe(1);
    });

    it('should bound concurrent tasks', async () => {
      const sem = new Semaphore('capabilities', 2);
      let running = 0;
      let peak = 0;

      const task = async (): Promise<void> => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 10));
        running--;
      };

      await Promise.all(Array.from({ length: 5 }, () => sem.execute(task)));
      expect(peak).toBe(2);
      expect(sem.getState().available).toBe(2);
    });
  });

  describe('abort', () => {
    it('should reject at once when the signal is already aborted', async () => {
      const sem = new Semaphore('capabilities', 1);
      const controller = new AbortController();
      controller.abort(new Error('run stopped'));

      await expect(sem.acquire(controller.signal)).rejects.toThrow('run stopped');
      expect(sem.getState().available).toBe(1);
    });

    it('should drop an aborted waiter from the queue', async () => {
      const sem = new Semaphore('capabilities', 1);
      await sem.acquire();
      const controller = new AbortController();

      const waiting = sem.acquire(controller.signal);
      expect(sem.getState().queued).toBe(1);
      controller.abort(new Error('run stopped'));

      await expect(waiting).rejects.toThrow('run stopped');
      expect(sem.getState().queued).toBe(0);
      sem.release();
      expect(sem.getState().available).toBe(1);
    });

    it('should not run the task when the permit never arrives', async () => {
      const sem = new Semaphore('capabilities', 1);
      await sem.acquire();
      const controller = new AbortController();
      const task = vi.fn(async () => 'ran');

      const pending = sem.execute(task, controller.signal);
      controller.abort(new Error('run stopped'));

      await expect(pending).rejects.toThrow('run stopped');
      expect(task).not.toHaveBeenCalled();
    });
  });
});
