/**
 * Retry, polling and delay helpers.
 *
 * Every blocking wait in the project goes through a `Sleeper` so tests can
 * substitute a recording fake instead of waiting on the clock.
 */

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  /** Replaces the exponential schedule, e.g. with uniform jitter */
  delayFor?: (attempt: number) => number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleeper?: Sleeper;
}

/**
 * Runs `fn`, retrying with exponential backoff. `maxRetries` counts retries,
 * so the function runs at most `maxRetries + 1` times.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelay = options.baseDelay ?? 1000;
  const maxDelay = options.maxDelay ?? 30000;
  const wait = options.sleeper ?? sleep;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      attempt++;
      if (attempt > maxRetries || (options.shouldRetry && !options.shouldRetry(error, attempt))) {
        throw error;
      }
      const delay = options.delayFor ? options.delayFor(attempt) : Math.min(baseDelay * 2 ** (attempt - 1), maxDelay);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  sleeper?: Sleeper;
  now?: () => number;
}

export type PollStep<T> = { done: true; value: T } | { done: false };

/**
 * Calls `step` every `intervalMs` until it reports done or `timeoutMs` elapses.
 * Returns `null` on timeout; errors thrown by `step` propagate unchanged.
 */
export async function pollUntil<T>(step: () => Promise<PollStep<T>>, options: PollOptions): Promise<T | null> {
  const now = options.now ?? Date.now;
  const wait = options.sleeper ?? sleep;
  const deadline = now() + Math.max(options.timeoutMs, 1000);
  const interval = Math.max(options.intervalMs, 1000);

  while (now() < deadline) {
    const result = await step();
    if (result.done) {
      return result.value;
    }
    await wait(interval);
  }
  return null;
}

export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return min + random() * (max - min);
}

/**
 * Human-like delay in milliseconds: a uniform base in `[minMs, maxMs]` with
 * `± jitterFactor` jitter applied on top, never below 500ms.
 */
export function humanDelayMs(
  minMs: number,
  maxMs: number,
  jitterFactor = 0.3,
  random: () => number = Math.random,
): number {
  const base = randomBetween(minMs, maxMs, random);
  const jitter = base * jitterFactor;
  const delay = base + randomBetween(-jitter, jitter, random);
  return Math.max(500, Math.round(delay));
}

export async function humanDelay(
  minMs: number,
  maxMs: number,
  options: { jitterFactor?: number; sleeper?: Sleeper; random?: () => number } = {},
): Promise<number> {
  const delay = humanDelayMs(minMs, maxMs, options.jitterFactor, options.random);
  await (options.sleeper ?? sleep)(delay);
  return delay;
}
