import { describe, expect, it, vi } from 'vitest';
import { computeBackoffMs, sleep, withRetry } from '../../src/utils/retry.js';
import { withTimeout } from '../../src/utils/timeout.js';
import { CallTimeoutError } from '../../src/types/errors.js';

describe('withRetry', () => {
  it('returns success immediately when the operation succeeds on first attempt', async () => {
    const fn = vi.fn(async () => 'ok');

    const result = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('ok');
    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries failed operations and eventually succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('transient-failure'))
      .mockResolvedValueOnce('recovered');

    const result = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 0,
      label: 'retry-recovery',
    });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('recovered');
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('returns a failed result after exhausting all attempts', async () => {
    const failure = new Error('permanent-failure');
    const fn = vi.fn(async () => {
      throw failure;
    });

    const result = await withRetry(fn, {
      maxAttempts: 2,
      baseDelayMs: 0,
      label: 'retry-exhausted',
    });

    expect(result.ok).toBe(false);
    expect(result.error).toBe('permanent-failure');
    expect(result.lastError).toBe(failure);
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once when shouldRetry rejects the error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });
    const onAttemptFailed = vi.fn();

    const result = await withRetry(fn, {
      maxAttempts: 5,
      baseDelayMs: 0,
      shouldRetry: () => false,
      onAttemptFailed,
    });

    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onAttemptFailed).toHaveBeenCalledTimes(1);
  });

  it('waits the exponential backoff between attempts', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn(async () => {
        throw new Error('down');
      });

      const pending = withRetry(fn, { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150 });

      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(149);
      expect(fn).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(fn).toHaveBeenCalledTimes(3);

      const result = await pending;
      expect(result.ok).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });

  it('does not start another attempt once the signal has aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort(new Error('deadline'));
      throw new Error('down');
    });

    const result = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 10_000, signal: controller.signal });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    expect(result.error).toBe('down');
  });
});

describe('computeBackoffMs', () => {
  it('doubles from the base and caps at the maximum', () => {
    expect([0, 1, 2, 3, 4, 5].map((index) => computeBackoffMs(index, 250, 4000))).toEqual([
      250, 500, 1000, 2000, 4000, 4000,
    ]);
  });
});

describe('sleep', () => {
  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the call finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 1000, 'fast-call')).resolves.toBe('done');
  });

  it('rejects with CallTimeoutError and aborts the signal handed to the call', async () => {
    let seen: AbortSignal | undefined;
    const call = withTimeout((signal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    }, 20, 'slow-call');

    await expect(call).rejects.toBeInstanceOf(CallTimeoutError);
    await expect(call).rejects.toThrow('slow-call timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('rejects with the parent reason when the parent signal aborts first', async () => {
    const parent = new AbortController();
    const call = withTimeout(() => new Promise<string>(() => undefined), 10_000, 'parent-call', parent.signal);
    parent.abort(new Error('request deadline reached'));
    await expect(call).rejects.toThrow('request deadline reached');
  });
});
