import { fail, ok, type Result } from '../utils/result';
import { isRunAborted } from './errors';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('FetchCache');

export type FetchResult<T> = Result<T, string>;

/**
 * Per-run memo of expensive per-URL fetches.
 *
 * `fetchFn` runs at most once per key: the first outcome is stored whether it
 * succeeded or threw, and later calls return it unchanged. Retries belong
 * inside `fetchFn`. A run abort is rethrown and not cached.
 */
export class FetchCache<T> {
  private readonly entries = new Map<string, FetchResult<T>>();
  private hitCount = 0;

  constructor(private readonly normalize: (url: string) => string = (url) => url) {}

  async getOrFetch(url: string, fetchFn: (url: string) => Promise<T>): Promise<FetchResult<T>> {
    const key = this.normalize(url);
    const cached = this.entries.get(key);
    if (cached) {
      this.hitCount++;
      return cached;
    }

    let result: FetchResult<T>;
    try {
      result = ok(await fetchFn(url));
    } catch (error) {
      if (isRunAborted(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('Fetch failed, caching failure', { url: key, error: message });
      result = fail(message, error);
    }
    this.entries.set(key, result);
    return result;
  }

  has(url: string): boolean {
    return this.entries.has(this.normalize(url));
  }

  get(url: string): FetchResult<T> | undefined {
    return this.entries.get(this.normalize(url));
  }

  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this.hitCount;
  }
}
