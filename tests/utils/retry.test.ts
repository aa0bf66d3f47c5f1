import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../src/utils/retry';

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 200, 2000))).toEqual([200, 400, 800, 1600, 2000]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, { sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(200);
  });

  it('gives up after the configured attempts with the last error', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    let calls = 0;

    await expect(
      withRetry(async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      }, { attempts: 3, sleep })
    ).rejects.toThrow('failure 3');

    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[200], [400]]);
  });

  it('stops immediately on a non-retryable error', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    let calls = 0;

    await expect(
      withRetry(async () => {
        calls++;
        throw new Error('bad request');
      }, { sleep, shouldRetry: () => false })
    ).rejects.toThrow('bad request');

    expect(calls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
