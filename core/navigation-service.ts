import type { NavigationConfig } from '../types/config';
import { createEnhancedLogger } from '../utils/logger';
import { fail, fromPromise, isOk, type Result } from '../utils/result';
import { randomBetween, retryWithBackoff, sleep, type Sleeper } from '../utils/retry';
import { type CollectorError, CollectorErrors, isRunAborted } from './errors';
import type { ResilienceEventBus } from './event-bus';
import type { RunMetrics } from './run-metrics';

const logger = createEnhancedLogger('NavigationService');

export interface NavigationServiceOptions {
  eventBus?: ResilienceEventBus;
  metrics?: RunMetrics;
  sleeper?: Sleeper;
  random?: () => number;
}

/**
 * Retries caller-supplied navigations with uniform jitter. The jitter is
 * independent of challenge backoff: a failed navigation says nothing about
 * whether the network identity is burned.
 */
export class NavigationService {
  private readonly sleeper: Sleeper;
  private readonly random: () => number;

  constructor(
    private readonly config: NavigationConfig = { maxRetries: 3, jitterMinMs: 1000, jitterMaxMs: 3000 },
    private readonly options: NavigationServiceOptions = {},
  ) {
    this.sleeper = options.sleeper ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Runs `navigateFn` up to `maxRetries` times. Once every attempt has failed
   * the result carries `NAVIGATION_FAILED` with the last error, and the caller
   * skips the page. `RUN_ABORTED` is thrown at once.
   */
  async navigate<T>(navigateFn: () => Promise<T>, url: string): Promise<Result<T, CollectorError>> {
    const attempts = Math.max(1, this.config.maxRetries);

    const result = await fromPromise(
      retryWithBackoff(navigateFn, {
        maxRetries: attempts - 1,
        sleeper: this.sleeper,
        delayFor: () => Math.round(randomBetween(this.config.jitterMinMs, this.config.jitterMaxMs, this.random)),
        shouldRetry: (error) => !isRunAborted(error),
        onRetry: (error, attempt) => {
          this._log(`Navigation failed (attempt ${attempt}/${attempts}): ${errorMessage(error)}`, 'warn');
          this.options.metrics?.inc('navigation_retries');
        },
      }),
      (error) => error,
    );
    if (isOk(result)) return result;
    if (isRunAborted(result.error)) throw result.error;

    this._log(`Navigation failed: ${url} (${errorMessage(result.error)})`, 'error');
    return fail(CollectorErrors.navigationFailed(url, attempts, result.error), result.error);
  }

  private _log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    if (level === 'error') {
      logger.error(message);
    } else {
      logger[level](message);
    }
    this.options.eventBus?.emitLog(message, level);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
