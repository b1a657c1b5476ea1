import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../../src/shared/RetryPolicy.js';

const POLICY = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 8000 };

describe('RetryPolicy', () => {
  it('should succeed on first try', async () => {
    const fn = vi.fn().mockReturnValue('ok');
    const wait = vi.fn(async () => {});
    const result = await withRetry(fn, { ...POLICY, wait });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('should retry on retryable error and succeed', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValue('ok');

    const result = await withRetry(fn, {
      ...POLICY,
      wait: async () => {},
      isRetryable: (err) => err instanceof Error && err.message === 'busy',
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should give up after maxAttempts and wait 1, 2, 4, 8 seconds in between', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));
    const waits: number[] = [];

    await expect(
      withRetry(fn, { ...POLICY, wait: async (ms) => { waits.push(ms); } }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(5);
    expect(waits).toEqual([1000, 2000, 4000, 8000]);
  });

  it('should not retry non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, {
        ...POLICY,
        wait: async () => {},
        isRetryable: (err) => err instanceof Error && err.message === 'busy',
      }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should call onRetry with attempt number and delay', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValue('ok');

    await withRetry(fn, { ...POLICY, wait: async () => {}, onRetry });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 1000);
  });

  it('caps the backoff delay at maxDelayMs', () => {
    expect(backoffDelay(POLICY, 1)).toBe(1000);
    expect(backoffDelay(POLICY, 4)).toBe(8000);
    expect(backoffDelay(POLICY, 6)).toBe(8000);
  });
});
