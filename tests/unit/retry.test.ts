import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, backoffDelay, retryWithBackoff, sleep } from '../../src/utils/retry.js';
import { CapabilityFatalError, CapabilityUnavailableError } from '../../src/utils/errors.js';

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

const fast = { initialDelayMs: 1, maxDelayMs: 5, jitter: 0 };

describe('backoffDelay', () => {
  it('should grow exponentially up to the cap', () => {
    expect(backoffDelay(1, 500, 2, 10_000)).toBe(500);
    expect(backoffDelay(2, 500, 2, 10_000)).toBe(1000);
    expect(backoffDelay(3, 500, 2, 10_000)).toBe(2000);
    expect(backoffDelay(10, 500, 2, 10_000)).toBe(10_000);
  });
});

describe('retryWithBackoff', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => `attempt ${attempt}`);
    await expect(retryWithBackoff(fn, fast)).resolves.toBe('attempt 1');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry recoverable errors', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new CapabilityUnavailableError('security-audit', 'busy');
      return 'ok';
    });
    const onRetry = vi.fn();

    await expect(retryWithBackoff(fn, { ...fast, maxAttempts: 3, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should treat transient network messages as recoverable', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new Error('socket hang up: ECONNRESET');
      return 'ok';
    });
    await expect(retryWithBackoff(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should rethrow non-retryable errors untouched', async () => {
    const fatal = new CapabilityFatalError('quality-review', 'bad input');
    const fn = vi.fn(async () => {
      throw fatal;
    });
    await expect(retryWithBackoff(fn, fast)).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wrap the last error once attempts run out', async () => {
    const fn = vi.fn(async () => {
      throw new CapabilityUnavailableError('security-audit', 'still busy');
    });

    const error = await retryWithBackoff(fn, { ...fast, maxAttempts: 2 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 2, message: 'Gave up after 2 attempts: still busy' });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const unavailable = new CapabilityUnavailableError('security-audit', 'busy');
    const fn = vi.fn(async () => {
      controller.abort();
      throw unavailable;
    });

    await expect(
      retryWithBackoff(fn, { ...fast, maxAttempts: 5, signal: controller.signal })
    ).rejects.toBe(unavailable);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('should wake early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });
});
