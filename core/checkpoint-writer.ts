import { z } from 'zod';
import type { Checkpoint, JobPosting } from '../types/job';
import { readTextIfExists, writeJsonAtomic } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import type { ResilienceEventBus } from './event-bus';

const logger = createEnhancedLogger('CheckpointWriter');

const checkpointSchema = z.object({
  timestamp: z.string(),
  totalCollected: z.number(),
  totalWithSalary: z.number(),
  currentQuery: z.string().nullable(),
  items: z.array(z.unknown()),
});

export interface CheckpointStats {
  totalWithSalary: number;
  currentQuery: string | null;
}

/**
 * Periodic full-state snapshots. Every write replaces the previous file, so a
 * crash loses at most `interval` items.
 */
export class CheckpointWriter<T = JobPosting> {
  private lastMultiple = 0;
  private writeCount = 0;

  constructor(
    private readonly filePath: string,
    private readonly interval: number,
    private readonly options: { eventBus?: ResilienceEventBus; now?: () => Date } = {},
  ) {}

  get writes(): number {
    return this.writeCount;
  }

  /**
   * Called with the cumulative item list after each collection step. Writes
   * one checkpoint per interval multiple crossed, each holding the items up to
   * that multiple, so a batch produces the same files as adding items one at
   * a time. `stats` may be computed per snapshot.
   */
  async onItemsCollected(
    items: T[],
    stats: CheckpointStats | ((snapshot: T[]) => CheckpointStats),
  ): Promise<boolean> {
    if (this.interval <= 0) return false;
    const reached = Math.floor(items.length / this.interval);

    let written = false;
    for (let multiple = this.lastMultiple + 1; multiple <= reached; multiple++) {
      this.lastMultiple = multiple;
      const snapshot = items.slice(0, multiple * this.interval);
      const ok = await this.write(snapshot, typeof stats === 'function' ? stats(snapshot) : stats);
      written = written || ok;
    }
    return written;
  }

  /**
   * Writes a checkpoint unconditionally. Failures are logged and reported as
   * `false`; collection goes on.
   */
  async write(items: T[], stats: CheckpointStats): Promise<boolean> {
    const payload: Checkpoint<T> = {
      timestamp: (this.options.now ?? (() => new Date()))().toISOString(),
      totalCollected: items.length,
      totalWithSalary: stats.totalWithSalary,
      currentQuery: stats.currentQuery,
      items: [...items],
    };

    try {
      await writeJsonAtomic(this.filePath, payload);
    } catch (error) {
      logger.error('Checkpoint write failed', error instanceof Error ? error : new Error(String(error)), {
        path: this.filePath,
      });
      return false;
    }

    this.writeCount++;
    logger.debug('Checkpoint written', { path: this.filePath, totalCollected: items.length });
    this.options.eventBus?.emitCheckpointWritten({ path: this.filePath, totalCollected: items.length });
    return true;
  }

  /**
   * Reads the last checkpoint, or `null` when none exists or it is unreadable.
   */
  async load(): Promise<Checkpoint<unknown> | null> {
    let content: string | null;
    try {
      content = await readTextIfExists(this.filePath);
    } catch (error) {
      logger.warn('Failed to read checkpoint', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      logger.warn('Checkpoint is not valid JSON', { path: this.filePath });
      return null;
    }
    const parsed = checkpointSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Checkpoint has an unexpected shape', { path: this.filePath });
      return null;
    }
    return parsed.data;
  }
}
