/**
 * RunSession
 *
 * Owns every piece of per-run state: skip flag, fetch cache, backoff counter,
 * proxy sessions, metrics, checkpoints and the dedupe store. Nothing here is
 * process-global, so several sessions can live side by side in one process.
 */

import type { BrowserContextHandle, BrowserPage } from '../types/browser';
import type { ResilienceConfig } from '../types/config';
import type { JobDetail, JobPosting } from '../types/job';
import { createEnhancedLogger } from '../utils/logger';
import { humanDelay, sleep, type Sleeper } from '../utils/retry';
import { isOk, type Result, unwrapOr } from '../utils/result';
import { BackoffController } from './backoff-controller';
import { ChallengeDetector } from './challenge-detector';
import { ChallengeGuard, type GuardOutcome } from './challenge-guard';
import { ChallengeLog } from './challenge-log';
import { createChallengeResolver, type ChallengeResolver } from './challenge-resolver';
import { type CheckpointStats, CheckpointWriter } from './checkpoint-writer';
import { DedupeStore } from './dedupe-store';
import { ErrorSnapshotter } from './error-snapshotter';
import { CollectorError, isRunAborted } from './errors';
import type { ResilienceEventBus } from './event-bus';
import { FetchCache } from './fetch-cache';
import { NavigationService } from './navigation-service';
import { ProxySessionManager, type ProxyDescriptor } from './proxy-session-manager';
import { RunMetrics, type RunSummary } from './run-metrics';
import type { OperatorPrompt, SkipSink } from './solvers/backends';
import type { FlareSolverrClient } from './solvers/flaresolverr-client';
import type { TokenSolverApi } from './solvers/token-solver';

const logger = createEnhancedLogger('RunSession');

const TRACKING_PARAMS = new Set(['trk', 'refid', 'trackingid', 'from', 'vjs']);

/**
 * Cache key for a detail URL: fragment dropped, tracking parameters removed,
 * remaining query keys sorted. Unparseable input is returned trimmed.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }
  parsed.hash = '';
  const kept = [...parsed.searchParams.entries()]
    .filter(([key]) => {
      const lower = key.toLowerCase();
      return !lower.startsWith('utm_') && !TRACKING_PARAMS.has(lower);
    })
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  parsed.search = new URLSearchParams(kept).toString();
  return parsed.toString();
}

export interface RunSessionOptions {
  eventBus?: ResilienceEventBus;
  prompt?: OperatorPrompt;
  tokenApi?: TokenSolverApi | null;
  flareSolverr?: FlareSolverrClient | null;
  sleeper?: Sleeper;
  random?: () => number;
  now?: () => Date;
  runId?: string;
}

export type RunResult = 'completed' | 'aborted' | 'failed';

export interface FinalizeOptions {
  result?: RunResult;
  error?: unknown;
  /** Collection stage the run was in when it failed */
  failureStage?: string;
}

export interface FinalizeReport<T> {
  summary: RunSummary;
  /** Items that survived cross-run de-duplication */
  items: T[];
  duplicates: T[];
  metricsPath: string | null;
}

export class RunSession<T extends JobPosting = JobPosting> implements SkipSink {
  readonly metrics: RunMetrics;
  readonly detector: ChallengeDetector;
  readonly resolver: ChallengeResolver;
  readonly backoff: BackoffController;
  readonly proxy: ProxySessionManager;
  readonly cache: FetchCache<JobDetail>;
  readonly challengeLog: ChallengeLog;
  readonly guard: ChallengeGuard;
  readonly navigation: NavigationService;
  readonly dedupe: DedupeStore | null;
  readonly checkpoint: CheckpointWriter<T> | null;

  private readonly items: T[] = [];
  private readonly sleeper: Sleeper;
  private readonly random: () => number;
  private skipDetails = false;
  private skipReason: string | null = null;
  private detailFetches = 0;
  private currentQuery: string | null = null;
  private lastUrl: string | null = null;
  private finalized: FinalizeReport<T> | null = null;

  constructor(
    readonly config: ResilienceConfig,
    private readonly options: RunSessionOptions = {},
  ) {
    this.sleeper = options.sleeper ?? sleep;
    this.random = options.random ?? Math.random;

    this.metrics = new RunMetrics(config.metrics.board, { runId: options.runId, now: options.now });
    this.detector = new ChallengeDetector({ contentMarkers: config.detection.contentMarkers });
    this.backoff = new BackoffController(config.backoff, this.sleeper);
    this.proxy = new ProxySessionManager(config.proxy, { eventBus: options.eventBus });
    this.cache = new FetchCache<JobDetail>(normalizeUrl);
    this.challengeLog = new ChallengeLog(config.checkpoint.challengeLogPath, options.now);
    this.resolver = createChallengeResolver(config, {
      skipSink: this,
      prompt: options.prompt,
      tokenApi: options.tokenApi,
      flareSolverr: options.flareSolverr,
      sleeper: this.sleeper,
    });
    this.guard = new ChallengeGuard({
      detector: this.detector,
      resolver: this.resolver,
      backoff: this.backoff,
      metrics: this.metrics,
      challengeLog: this.challengeLog,
      proxy: this.proxy,
      snapshotter: new ErrorSnapshotter(config.checkpoint.snapshotDir, options.now),
      eventBus: options.eventBus,
      escalateSkipsAfter: config.policy.escalateSkipsAfter,
      userAgent: config.browser.userAgent,
    });
    this.navigation = new NavigationService(config.navigation, {
      eventBus: options.eventBus,
      metrics: this.metrics,
      sleeper: this.sleeper,
      random: this.random,
    });
    this.dedupe = config.dedupe.enabled ? new DedupeStore(config.dedupe.path) : null;
    this.checkpoint = config.checkpoint.enabled
      ? new CheckpointWriter<T>(config.checkpoint.path, config.checkpoint.interval, {
          eventBus: options.eventBus,
          now: options.now,
        })
      : null;
  }

  /**
   * Loads the dedupe log and proxy files. Call once before collecting.
   */
  async init(): Promise<void> {
    await this.proxy.init();
    if (this.dedupe) {
      const loaded = await this.dedupe.load();
      logger.info('Run session ready', { board: this.config.metrics.board, knownHashes: loaded });
    }
    this.metrics.recordEvent('run_started', { resolvers: this.resolver.describe().join(',') });
  }

  markSkipDetails(reason: string): void {
    if (this.skipDetails) return;
    this.skipDetails = true;
    this.skipReason = reason;
    logger.warn('Skipping remaining detail fetches for this run', { reason });
    this.metrics.recordEvent('detail_fetches_disabled', { reason });
  }

  get skippingDetails(): boolean {
    return this.skipDetails;
  }

  get skipDetailsReason(): string | null {
    return this.skipReason;
  }

  get detailFetchCount(): number {
    return this.detailFetches;
  }

  get collected(): readonly T[] {
    return this.items;
  }

  setQuery(query: string | null): void {
    this.currentQuery = query;
  }

  /**
   * Proxy for the current query scope, or `null` when proxying is off.
   */
  currentProxy(): ProxyDescriptor | null {
    return this.proxy.getProxyFor(this.currentQuery ?? undefined);
  }

  /**
   * Navigates with retries. A failed result means the page should be skipped;
   * the failure is already logged and recorded.
   */
  async navigate<R>(navigateFn: () => Promise<R>, url: string): Promise<Result<R, CollectorError>> {
    this.lastUrl = url;
    const result = await this.navigation.navigate(navigateFn, url);
    if (!isOk(result)) {
      this.metrics.inc('navigation_failures');
      this.metrics.recordEvent('navigation_failed', { url, error: result.error.message });
    }
    return result;
  }

  /**
   * Runs the challenge flow on the page the caller just navigated to.
   */
  async checkPage(page: BrowserPage, context: BrowserContextHandle, sequenceNumber: number): Promise<GuardOutcome> {
    return this.guard.check(page, context, {
      queryContext: this.currentQuery,
      sequenceNumber,
      detailFetchCount: this.detailFetches,
      scopeKey: this.currentQuery ?? undefined,
    });
  }

  /**
   * Fetches optional detail fields for a listing at most once per URL. Returns
   * an empty detail when detail fetches are skipped or the fetch failed.
   */
  async fetchDetail(url: string, fetchFn: (url: string) => Promise<JobDetail>): Promise<JobDetail> {
    if (this.skipDetails) {
      this.metrics.inc('detail_fetches_skipped');
      return {};
    }
    if (this.cache.has(url)) {
      this.metrics.inc('detail_fetch_cache_hits');
      return unwrapOr(await this.cache.getOrFetch(url, fetchFn), {});
    }

    this.lastUrl = url;
    const result = await this.cache.getOrFetch(url, async (target) => {
      await humanDelay(this.config.delays.detailMinMs, this.config.delays.detailMaxMs, {
        jitterFactor: this.config.delays.jitterFactor,
        sleeper: this.sleeper,
        random: this.random,
      });
      this.detailFetches++;
      this.metrics.inc('detail_fetches');
      return fetchFn(target);
    });

    if (isOk(result)) return result.data;

    logger.warn('Detail fetch failed', { url, error: result.error });
    this.metrics.recordEvent('detail_fetch_failed', { url, error: result.error });
    if (this.proxy.recordFailure()) {
      logger.info('Proxy rotation requested after fetch failure');
    }
    return {};
  }

  /**
   * Rotates the proxy when a fetch failure asked for it. The caller relaunches
   * the browser with the returned descriptor, which starts a fresh backoff.
   */
  rotateIfPending(): ProxyDescriptor | null {
    if (!this.proxy.needsRotation()) return null;
    const descriptor = this.proxy.performRotation(this.currentQuery ?? undefined, 'fetch_failure');
    if (descriptor) {
      this.metrics.inc('proxy_rotations');
      this.backoff.reset('proxy_rotation');
    }
    return descriptor;
  }

  /**
   * Adds collected items and writes a checkpoint whenever the total crosses
   * the next multiple of the checkpoint interval.
   */
  async addItems(items: T[]): Promise<void> {
    this.items.push(...items);
    this.updateGauges();
    if (this.checkpoint) {
      await this.checkpoint.onItemsCollected(this.items, (snapshot) => this.checkpointStats(snapshot));
    }
  }

  /**
   * Ends the run: de-duplicates against earlier runs, writes the final
   * checkpoint and the metrics document. Safe to call after an abort; state
   * written so far is preserved.
   */
  async finalize(options: FinalizeOptions = {}): Promise<FinalizeReport<T>> {
    if (this.finalized) return this.finalized;

    const result: RunResult = options.result ?? (options.error === undefined ? 'completed' : resultFor(options.error));
    let fresh: T[] = [...this.items];
    let duplicates: T[] = [];

    if (this.dedupe) {
      const split = this.dedupe.filterNew(this.items);
      fresh = split.fresh;
      duplicates = split.duplicates;
      this.metrics.inc('dedupe_duplicates', duplicates.length);
      try {
        await this.dedupe.record(fresh);
      } catch (error) {
        logger.error('Failed to record dedupe hashes', error instanceof Error ? error : new Error(String(error)));
        this.metrics.setExtra('dedupe_error', error instanceof Error ? error.message : String(error));
      }
      logger.info(`Cross-run dedupe: ${duplicates.length} duplicates removed`);
    }
    this.metrics.setGauge('jobs_unique_collected', fresh.length);
    this.updateGauges();

    if (this.checkpoint && this.items.length > 0) {
      await this.checkpoint.write(this.items, this.checkpointStats(this.items));
    }

    const extra: Record<string, unknown> = {
      result,
      last_url: this.lastUrl ?? undefined,
      detail_fetches_skipped_reason: this.skipReason ?? undefined,
    };
    if (options.error !== undefined) {
      const error = options.error;
      extra.failure_stage = options.failureStage ?? 'collect';
      extra.failure_kind = error instanceof CollectorError ? error.code : 'UNKNOWN_ERROR';
      extra.exception_class = error instanceof Error ? error.constructor.name : typeof error;
      extra.exception_message = error instanceof Error ? error.message : String(error);
    }
    const summary = this.metrics.finalize(extra);

    let metricsPath: string | null = null;
    try {
      metricsPath = await this.metrics.write(this.config.metrics.pathTemplate);
    } catch (error) {
      logger.error('Failed to write run metrics', error instanceof Error ? error : new Error(String(error)));
    }

    this.finalized = { summary, items: fresh, duplicates, metricsPath };
    return this.finalized;
  }

  private checkpointStats(items: readonly T[]): CheckpointStats {
    return {
      totalWithSalary: items.filter(hasSalary).length,
      currentQuery: this.currentQuery,
    };
  }

  private updateGauges(): void {
    this.metrics.setGauge('jobs_collected', this.items.length);
    this.metrics.setGauge('jobs_with_salary', this.items.filter(hasSalary).length);
  }
}

function hasSalary(job: JobPosting): boolean {
  return typeof job.salary === 'string' && job.salary.trim().length > 0;
}

function resultFor(error: unknown): RunResult {
  return isRunAborted(error) ? 'aborted' : 'failed';
}
