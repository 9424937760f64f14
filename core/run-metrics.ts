import { randomUUID } from 'crypto';
import * as path from 'path';
import { renderPathTemplate, sortKeysDeep, writeJsonAtomic } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import { CollectorErrors } from './errors';

const logger = createEnhancedLogger('RunMetrics');

export interface MetricsEvent {
  t: string;
  kind: string;
  [key: string]: unknown;
}

/**
 * Summary document read by the reliability benchmarking tooling.
 */
export interface RunSummary {
  board: string;
  runId: string;
  startedAt: string;
  endedAt: string;
  durationSeconds: number;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  events: MetricsEvent[];
  extra?: Record<string, unknown>;
  outputPath?: string;
}

export interface RunMetricsOptions {
  runId?: string;
  /** Wall clock, for timestamps */
  now?: () => Date;
  /** Monotonic milliseconds, for durations */
  clock?: () => number;
}

/**
 * Counters, gauges and structured events for one run.
 */
export class RunMetrics {
  readonly board: string;
  readonly runId: string;
  readonly startedAt: string;

  private readonly counters: Record<string, number> = {};
  private readonly gauges: Record<string, number> = {};
  private readonly events: MetricsEvent[] = [];
  private readonly extra: Record<string, unknown> = {};
  private readonly now: () => Date;
  private readonly clock: () => number;
  private readonly startedAtMs: number;
  private summary: RunSummary | null = null;

  constructor(board: string, options: RunMetricsOptions = {}) {
    this.board = board;
    this.runId = options.runId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
    this.clock = options.clock ?? (() => performance.now());
    this.startedAt = this.now().toISOString();
    this.startedAtMs = this.clock();
  }

  inc(key: string, amount = 1): void {
    if (!key) return;
    this.counters[key] = (this.counters[key] ?? 0) + amount;
  }

  setGauge(key: string, value: number): void {
    if (!key) return;
    this.gauges[key] = value;
  }

  setExtra(key: string, value: unknown): void {
    if (!key || value === undefined) return;
    this.extra[key] = value;
  }

  /**
   * Appends `{t, kind, ...data}`; undefined and null values are dropped.
   */
  recordEvent(kind: string, data: Record<string, unknown> = {}): void {
    if (!kind) return;
    const event: MetricsEvent = { t: this.now().toISOString(), kind };
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined && value !== null) event[key] = value;
    }
    this.events.push(event);
  }

  counter(key: string): number {
    return this.counters[key] ?? 0;
  }

  gauge(key: string): number | undefined {
    return this.gauges[key];
  }

  eventsOfKind(kind: string): MetricsEvent[] {
    return this.events.filter((e) => e.kind === kind);
  }

  get isFinalized(): boolean {
    return this.summary !== null;
  }

  /**
   * Freezes the end time and returns the summary. Later calls return the same
   * document with any extra fields merged in.
   */
  finalize(extra: Record<string, unknown> = {}): RunSummary {
    for (const [key, value] of Object.entries(extra)) this.setExtra(key, value);

    if (!this.summary) {
      const durationSeconds = Math.max(this.clock() - this.startedAtMs, 0) / 1000;
      this.summary = {
        board: this.board,
        runId: this.runId,
        startedAt: this.startedAt,
        endedAt: this.now().toISOString(),
        durationSeconds: Math.round(durationSeconds * 1000) / 1000,
        counters: { ...this.counters },
        gauges: { ...this.gauges },
        events: [...this.events],
      };
    }
    if (Object.keys(this.extra).length > 0) {
      this.summary.extra = { ...this.extra };
    }
    return this.summary;
  }

  /**
   * Writes the finalized summary with sorted keys to the rendered template
   * path and returns that path.
   */
  async write(pathTemplate: string): Promise<string> {
    const summary = this.finalize();
    const outputPath = path.resolve(renderPathTemplate(pathTemplate || 'output/run_metrics_{timestamp}.json'));
    summary.outputPath = outputPath;
    try {
      await writeJsonAtomic(outputPath, sortKeysDeep(summary));
    } catch (error) {
      throw CollectorErrors.fileSystem('Failed to write run metrics', { path: outputPath }, error);
    }
    logger.info('Run metrics written', { path: outputPath });
    return outputPath;
  }
}
