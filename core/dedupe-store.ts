import { createHash } from 'crypto';
import { z } from 'zod';
import type { DedupeRecord, JobPosting } from '../types/job';
import { appendLines, readTextIfExists } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import { CollectorErrors } from './errors';
import { SyncExtractorChain, type SyncExtractor } from './extractor-chain';

const logger = createEnhancedLogger('DedupeStore');

const logLineSchema = z.object({ hash: z.string().min(1) }).passthrough();

function queryParam(link: string | undefined, name: string): string | null {
  if (!link) return null;
  try {
    const value = new URL(link).searchParams.get(name)?.trim();
    return value ? value : null;
  } catch {
    return null;
  }
}

function sourceIs(job: JobPosting, source: string): boolean {
  return job.source.trim().toLowerCase() === source;
}

function external(job: JobPosting): string | null {
  const id = job.externalId?.trim();
  return id ? id : null;
}

const indeedKey: SyncExtractor<JobPosting, string> = {
  name: 'indeed',
  extract(job) {
    if (!sourceIs(job, 'indeed')) return null;
    const id = external(job) ?? queryParam(job.link, 'jk');
    return id ? `indeed|${id}` : null;
  },
};

const linkedinKey: SyncExtractor<JobPosting, string> = {
  name: 'linkedin',
  extract(job) {
    if (!sourceIs(job, 'linkedin')) return null;
    const fromPath = job.link?.match(/\/jobs\/view\/(?:[^/?#]*?-)?(\d+)/)?.[1];
    const id = external(job) ?? fromPath ?? queryParam(job.link, 'currentJobId');
    return id ? `linkedin|${id}` : null;
  },
};

const glassdoorKey: SyncExtractor<JobPosting, string> = {
  name: 'glassdoor',
  extract(job) {
    if (!sourceIs(job, 'glassdoor')) return null;
    const id = external(job) ?? queryParam(job.link, 'jl') ?? queryParam(job.link, 'jobListingId');
    return id ? `glassdoor|${id}` : null;
  },
};

const externalIdKey: SyncExtractor<JobPosting, string> = {
  name: 'external-id',
  extract(job) {
    const id = external(job);
    const source = job.source.trim().toLowerCase();
    return id && source ? `${source}|${id}` : null;
  },
};

const compositeKey: SyncExtractor<JobPosting, string> = {
  name: 'composite',
  extract(job) {
    const part = (value: string | undefined) => (value ?? '').trim().toLowerCase();
    return `${part(job.source)}|${part(job.title)}|${part(job.company)}|${part(job.location)}`;
  },
};

const stableKeyChain = new SyncExtractorChain<JobPosting, string>([
  indeedKey,
  linkedinKey,
  glassdoorKey,
  externalIdKey,
  compositeKey,
]);

/**
 * Key that survives tracking-parameter and title changes: a board listing id
 * where one exists (from the link for known boards, else `externalId`),
 * otherwise `source|title|company|location` normalised.
 */
export function stableKey(job: JobPosting): string {
  const hit = stableKeyChain.run(job);
  return hit ? hit.value : '';
}

export function hashJob(job: JobPosting): string {
  return createHash('sha256').update(stableKey(job), 'utf8').digest('hex');
}

/**
 * DedupeStore
 *
 * Cross-run de-duplication over an append-only JSONL hash log. The log is
 * never rewritten or compacted.
 */
export class DedupeStore {
  private readonly seen = new Set<string>();
  /** Hashes already in the log file */
  private readonly recorded = new Set<string>();
  private loaded = false;

  constructor(private readonly logPath: string) {}

  /**
   * Rebuilds the seen-set from the log. Invalid lines are skipped.
   */
  async load(): Promise<number> {
    let content: string | null;
    try {
      content = await readTextIfExists(this.logPath);
    } catch (error) {
      throw CollectorErrors.fileSystem('Failed to read dedupe log', { path: this.logPath }, error);
    }

    this.loaded = true;
    if (content === null) return 0;

    let invalid = 0;
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        parsed = null;
      }
      const entry = logLineSchema.safeParse(parsed);
      if (entry.success) {
        this.seen.add(entry.data.hash);
        this.recorded.add(entry.data.hash);
      } else {
        invalid++;
      }
    }
    if (invalid > 0) {
      logger.warn(`Skipping ${invalid} invalid dedupe line(s)`, { path: this.logPath });
    }
    logger.debug('Dedupe log loaded', { path: this.logPath, hashes: this.seen.size });
    return this.seen.size;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get size(): number {
    return this.seen.size;
  }

  has(job: JobPosting): boolean {
    return this.seen.has(hashJob(job));
  }

  /**
   * Splits items into new and previously seen ones. New hashes join the
   * in-memory set at once, so duplicates inside one batch are caught too.
   */
  filterNew<T extends JobPosting>(items: T[]): { fresh: T[]; duplicates: T[] } {
    const fresh: T[] = [];
    const duplicates: T[] = [];
    for (const item of items) {
      const hash = hashJob(item);
      if (this.seen.has(hash)) {
        duplicates.push(item);
        continue;
      }
      this.seen.add(hash);
      fresh.push(item);
    }
    return { fresh, duplicates };
  }

  /**
   * Appends one log line per stable key not yet in the log. Returns the number
   * of lines written.
   */
  async record(items: JobPosting[]): Promise<number> {
    const lines: string[] = [];
    const added = new Set<string>();
    for (const job of items) {
      const hash = hashJob(job);
      this.seen.add(hash);
      if (this.recorded.has(hash) || added.has(hash)) continue;
      added.add(hash);
      const entry: DedupeRecord = {
        hash,
        link: job.link ? String(job.link) : null,
        title: job.title,
        company: job.company,
        location: job.location,
        source: job.source,
        collectedAt: job.collectedAt,
      };
      lines.push(JSON.stringify(entry));
    }
    if (lines.length === 0) return 0;

    try {
      await appendLines(this.logPath, lines);
    } catch (error) {
      throw CollectorErrors.fileSystem('Failed to write dedupe log', { path: this.logPath }, error);
    }
    for (const hash of added) this.recorded.add(hash);
    return lines.length;
  }
}
