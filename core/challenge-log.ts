import { writeJsonAtomic } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';

const logger = createEnhancedLogger('ChallengeLog');

/**
 * One detected block, recorded whether or not it was resolved.
 */
export interface ChallengeEvent {
  timestamp: string;
  queryContext: string | null;
  /** Position of the item being collected when the block appeared */
  sequenceNumber: number;
  detailFetchCount: number;
  url: string;
  reason: string;
}

/**
 * Append-only list of challenge events, persisted as a JSON array that is
 * rewritten after each append.
 */
export class ChallengeLog {
  private readonly events: ChallengeEvent[] = [];
  private firstFetchCount: number | null = null;

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async append(entry: Omit<ChallengeEvent, 'timestamp'>): Promise<ChallengeEvent> {
    const event: ChallengeEvent = { timestamp: this.now().toISOString(), ...entry };
    this.events.push(event);
    if (this.firstFetchCount === null) {
      this.firstFetchCount = entry.detailFetchCount;
    }

    try {
      await writeJsonAtomic(this.filePath, this.events);
    } catch (error) {
      logger.error('Challenge log write failed', error instanceof Error ? error : new Error(String(error)), {
        path: this.filePath,
      });
    }
    return event;
  }

  get size(): number {
    return this.events.length;
  }

  list(): readonly ChallengeEvent[] {
    return this.events;
  }

  /** Detail fetches completed before the first block of the run */
  get firstChallengeFetchCount(): number | null {
    return this.firstFetchCount;
  }
}
