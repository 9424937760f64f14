import { describe, expect, test, vi } from 'vitest';
import { humanDelay, humanDelayMs, pollUntil, randomBetween, retryWithBackoff } from '../../utils/retry';
import { recordingSleeper } from '../helpers/fake-page';

describe('retryWithBackoff', () => {
  test('retries with doubling delays', async () => {
    const { sleeper, delays } = recordingSleeper();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('done');

    await expect(retryWithBackoff(fn, { baseDelay: 100, sleeper })).resolves.toBe('done');
    expect(delays).toEqual([100, 200]);
  });

  test('gives up after maxRetries', async () => {
    const { sleeper } = recordingSleeper();
    const fn = vi.fn(async (): Promise<string> => {
      throw new Error('always');
    });

    await expect(retryWithBackoff(fn, { maxRetries: 2, sleeper })).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('delayFor replaces the exponential schedule', async () => {
    const { sleeper, delays } = recordingSleeper();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('done');

    await expect(retryWithBackoff(fn, { sleeper, delayFor: (attempt) => attempt * 7 })).resolves.toBe('done');
    expect(delays).toEqual([7, 14]);
  });

  test('stops when shouldRetry declines', async () => {
    const { sleeper } = recordingSleeper();
    const fn = vi.fn(async (): Promise<string> => {
      throw new Error('fatal');
    });

    await expect(retryWithBackoff(fn, { sleeper, shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('pollUntil', () => {
  test('returns the value once the step is done', async () => {
    const { sleeper, delays } = recordingSleeper();
    let calls = 0;

    const value = await pollUntil<string>(
      async () => (++calls === 3 ? { done: true, value: 'token' } : { done: false }),
      { timeoutMs: 60000, intervalMs: 5000, sleeper, now: () => 0 },
    );

    expect(value).toBe('token');
    expect(delays).toEqual([5000, 5000]);
  });

  test('returns null after the deadline', async () => {
    let clock = 0;
    const sleeper = async (ms: number) => {
      clock += ms;
    };

    const value = await pollUntil<string>(async () => ({ done: false }), {
      timeoutMs: 10000,
      intervalMs: 3000,
      sleeper,
      now: () => clock,
    });

    expect(value).toBeNull();
    expect(clock).toBe(12000);
  });

  test('clamps the interval to one second', async () => {
    const { sleeper, delays } = recordingSleeper();
    let calls = 0;

    await pollUntil<number>(async () => (++calls === 2 ? { done: true, value: 1 } : { done: false }), {
      timeoutMs: 5000,
      intervalMs: 10,
      sleeper,
      now: () => 0,
    });

    expect(delays).toEqual([1000]);
  });
});

describe('delays', () => {
  test('randomBetween scales the random value', () => {
    expect(randomBetween(10, 20, () => 0.25)).toBe(12.5);
    expect(randomBetween(5, 5, () => 0.9)).toBe(5);
  });

  test('humanDelayMs never goes below 500ms', () => {
    expect(humanDelayMs(100, 200, 0.3, () => 0)).toBe(500);
    expect(humanDelayMs(1000, 3000, 0.3, () => 0.5)).toBe(2000);
  });

  test('humanDelay sleeps for the computed delay', async () => {
    const { sleeper, delays } = recordingSleeper();

    const delay = await humanDelay(1000, 1000, { sleeper, random: () => 0 });

    expect(delay).toBe(700);
    expect(delays).toEqual([700]);
  });
});
