import { describe, expect, test, vi } from 'vitest';
import { CollectorErrors, ErrorCode, hasErrorCode } from '../../core/errors';
import { NavigationService } from '../../core/navigation-service';
import { RunMetrics } from '../../core/run-metrics';
import { recordingSleeper } from '../helpers/fake-page';

const config = { maxRetries: 3, jitterMinMs: 1000, jitterMaxMs: 3000 };

describe('NavigationService', () => {
  test('returns the first successful navigation', async () => {
    const { sleeper, delays } = recordingSleeper();
    const service = new NavigationService(config, { sleeper });
    const navigate = vi.fn(async () => 'loaded');

    await expect(service.navigate(navigate, 'https://jobs.example.com')).resolves.toEqual({ success: true, data: 'loaded' });
    expect(navigate).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  test('retries with jitter between attempts', async () => {
    const { sleeper, delays } = recordingSleeper();
    const metrics = new RunMetrics('indeed');
    const service = new NavigationService(config, { sleeper, metrics, random: () => 0.5 });
    const navigate = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('net::ERR_CONNECTION_RESET'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('loaded');

    await expect(service.navigate(navigate, 'https://jobs.example.com')).resolves.toEqual({ success: true, data: 'loaded' });
    expect(delays).toEqual([2000, 2000]);
    expect(metrics.counter('navigation_retries')).toBe(2);
  });

  test('reports NAVIGATION_FAILED with the last error once attempts run out', async () => {
    const { sleeper, delays } = recordingSleeper();
    const service = new NavigationService(config, { sleeper, random: () => 0 });
    const navigate = vi.fn(async (): Promise<string> => {
      throw new Error('net::ERR_TIMED_OUT');
    });

    const result = await service.navigate(navigate, 'https://jobs.example.com/a');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(hasErrorCode(result.error, ErrorCode.NAVIGATION_FAILED)).toBe(true);
      expect(result.error.message).toBe('Navigation failed after 3 attempts: https://jobs.example.com/a');
      expect(result.error.originalError?.message).toBe('net::ERR_TIMED_OUT');
    }
    expect(navigate).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 1000]);
  });

  test('run aborts propagate without retrying', async () => {
    const { sleeper, delays } = recordingSleeper();
    const service = new NavigationService(config, { sleeper });
    const navigate = vi.fn(async (): Promise<string> => {
      throw CollectorErrors.runAborted('operator');
    });

    await expect(service.navigate(navigate, 'https://jobs.example.com')).rejects.toThrow('Run aborted: operator');
    expect(navigate).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  test('makes one attempt when retries are disabled', async () => {
    const { sleeper } = recordingSleeper();
    const service = new NavigationService({ ...config, maxRetries: 0 }, { sleeper });
    const navigate = vi.fn(async (): Promise<string> => {
      throw new Error('boom');
    });

    const result = await service.navigate(navigate, 'u');

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Navigation failed after 1 attempts: u');
    expect(navigate).toHaveBeenCalledTimes(1);
  });
});
