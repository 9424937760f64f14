import type { BackoffConfig } from '../types/config';
import { createEnhancedLogger } from '../utils/logger';
import { sleep, type Sleeper } from '../utils/retry';

const logger = createEnhancedLogger('BackoffController');

/**
 * Consecutive-challenge backoff for one browser session.
 *
 * The counter is not keyed by URL: challenges on different pages still
 * compound, since they point at the current network identity.
 * Delay = min(base * 2^(count-1), cap).
 */
export class BackoffController {
  private consecutive = 0;
  private readonly baseMs: number;
  private readonly capMs: number;

  constructor(
    config: BackoffConfig = { baseSeconds: 60, maxSeconds: 300 },
    private readonly sleeper: Sleeper = sleep,
  ) {
    this.baseMs = config.baseSeconds * 1000;
    this.capMs = config.maxSeconds * 1000;
  }

  onChallenge(): void {
    this.consecutive++;
  }

  onClear(): void {
    this.consecutive = 0;
  }

  /**
   * Starts a fresh count for a new browser session after proxy rotation or
   * relaunch; challenges on the old identity no longer compound.
   */
  reset(reason: string): void {
    if (this.consecutive > 0) {
      logger.info('Backoff reset for new browser session', { reason, previous: this.consecutive });
    }
    this.consecutive = 0;
  }

  get consecutiveChallenges(): number {
    return this.consecutive;
  }

  /**
   * Milliseconds to wait before the next attempt; the base value when no
   * challenge is outstanding.
   */
  computeDelay(): number {
    const exponent = Math.max(this.consecutive, 1) - 1;
    return Math.min(this.baseMs * 2 ** exponent, this.capMs);
  }

  /**
   * Sleeps for the current delay when at least one challenge is outstanding.
   * Returns the milliseconds waited.
   */
  async wait(): Promise<number> {
    if (this.consecutive <= 0) return 0;
    const delay = this.computeDelay();
    logger.info(`Backing off for ${Math.round(delay / 1000)}s to reduce challenge triggers`, {
      consecutive: this.consecutive,
    });
    await this.sleeper(delay);
    return delay;
  }
}
