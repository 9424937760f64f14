/**
 * ChallengeGuard
 *
 * Runs the per-navigation challenge flow: detect, record, back off, resolve
 * once, re-classify, then decide whether the proxy session has to rotate.
 */

import type { BrowserContextHandle, BrowserPage } from '../types/browser';
import { createEnhancedLogger } from '../utils/logger';
import type { BackoffController } from './backoff-controller';
import type { ChallengeDetector } from './challenge-detector';
import type { ChallengeLog } from './challenge-log';
import type { ChallengeResolver, ResolveResult } from './challenge-resolver';
import type { ErrorSnapshotter } from './error-snapshotter';
import { CollectorErrors, isRunAborted } from './errors';
import type { ResilienceEventBus } from './event-bus';
import type { ProxyDescriptor, ProxySessionManager } from './proxy-session-manager';
import type { RunMetrics } from './run-metrics';
import type { BackendKind } from './solvers/backends';

const logger = createEnhancedLogger('ChallengeGuard');

export interface GuardMeta {
  queryContext: string | null;
  sequenceNumber: number;
  detailFetchCount: number;
  /** Proxy scope for `sessionScope: 'query'` */
  scopeKey?: string;
}

export type GuardOutcome =
  | { kind: 'clear' }
  | {
      kind: 'resolved';
      backend: BackendKind;
      reason: string;
      /** The operator cleared the page by hand; the caller should navigate again */
      renavigate: boolean;
    }
  | { kind: 'skipped'; reason: string }
  | { kind: 'unresolved'; reason: string }
  | {
      kind: 'rotate';
      reason: string;
      proxy: ProxyDescriptor | null;
      /** True when the skip flag was also set during this check */
      skipped: boolean;
    };

export interface ChallengeGuardDeps {
  detector: ChallengeDetector;
  resolver: ChallengeResolver;
  backoff: BackoffController;
  metrics: RunMetrics;
  challengeLog: ChallengeLog;
  proxy?: ProxySessionManager | null;
  snapshotter?: ErrorSnapshotter | null;
  eventBus?: ResilienceEventBus;
  /** Skip decisions tolerated before the next one escalates to abort; 0 never escalates */
  escalateSkipsAfter?: number;
  userAgent?: string;
}

export class ChallengeGuard {
  private snapshotTaken = false;
  private skipDecisions = 0;

  constructor(private readonly deps: ChallengeGuardDeps) {}

  get skipCount(): number {
    return this.skipDecisions;
  }

  async check(page: BrowserPage, context: BrowserContextHandle, meta: GuardMeta): Promise<GuardOutcome> {
    const { detector, resolver, backoff, metrics } = this.deps;

    const inspection = await detector.inspect(page);
    if (inspection.verdict.kind === 'clear' || !inspection.signal) {
      backoff.onClear();
      return { kind: 'clear' };
    }

    const signal = inspection.signal;
    const reason = inspection.verdict.reason;
    await this.recordBlock(page, signal.url, reason, meta);

    backoff.onChallenge();
    logger.warn('Page blocked by challenge', {
      reason,
      url: signal.url,
      title: signal.title,
      consecutive: backoff.consecutiveChallenges,
    });
    await backoff.wait();

    const proxyDescriptor = this.deps.proxy?.getProxyFor(meta.scopeKey) ?? null;
    let result: ResolveResult;
    try {
      result = await resolver.resolve(signal, reason, page, context, {
        proxyUrl: proxyDescriptor?.url,
        userAgent: this.deps.userAgent,
      });
    } catch (error) {
      if (isRunAborted(error)) {
        metrics.recordEvent('run_aborted', { url: signal.url, reason });
      }
      throw error;
    }

    for (const counter of result.counters) metrics.inc(counter);
    metrics.recordEvent('challenge_resolution', {
      url: signal.url,
      reason,
      backend: result.backend ?? undefined,
      ok: result.outcome.ok,
      outcome: result.outcome.reason,
      attempted: result.outcome.attempted,
    });
    this.deps.eventBus?.emitChallengeResolved({
      url: signal.url,
      ok: result.outcome.ok,
      backend: result.backend ?? 'none',
      reason: result.outcome.reason,
    });

    let cleared = false;
    if (result.outcome.ok) {
      const recheck = await detector.inspect(page);
      cleared = recheck.verdict.kind === 'clear';
      if (cleared) {
        backoff.onClear();
      } else {
        logger.warn('Page still blocked after resolution', { backend: result.backend, url: signal.url });
      }
    }

    if (result.skipped) {
      this.skipDecisions++;
      const limit = this.deps.escalateSkipsAfter ?? 0;
      if (limit > 0 && this.skipDecisions > limit) {
        metrics.recordEvent('run_aborted', { url: signal.url, reason: 'skip_escalation' });
        throw CollectorErrors.runAborted(`${this.skipDecisions} skip decisions exceed the limit of ${limit}`, {
          url: signal.url,
        });
      }
    }

    const rotation = this.rotationFor(cleared, meta);
    if (rotation) {
      return { kind: 'rotate', reason, proxy: rotation, skipped: result.skipped };
    }

    if (result.skipped) {
      return { kind: 'skipped', reason };
    }
    if (cleared && result.backend) {
      return {
        kind: 'resolved',
        backend: result.backend,
        reason: result.outcome.reason,
        renavigate: result.backend === 'manual',
      };
    }
    return { kind: 'unresolved', reason: result.outcome.reason };
  }

  private async recordBlock(page: BrowserPage, url: string, reason: string, meta: GuardMeta): Promise<void> {
    const { metrics, challengeLog } = this.deps;
    metrics.inc('blocked_pages');
    metrics.inc('captcha_encounters');
    metrics.recordEvent('challenge_detected', {
      url,
      reason,
      query: meta.queryContext ?? undefined,
      sequenceNumber: meta.sequenceNumber,
    });

    await challengeLog.append({
      queryContext: meta.queryContext,
      sequenceNumber: meta.sequenceNumber,
      detailFetchCount: meta.detailFetchCount,
      url,
      reason,
    });
    if (challengeLog.size === 1) {
      metrics.setGauge('first_challenge_fetch_count', meta.detailFetchCount);
    }

    this.deps.eventBus?.emitChallengeDetected({
      url,
      reason,
      queryContext: meta.queryContext ?? '',
      sequenceNumber: meta.sequenceNumber,
    });

    if (this.deps.snapshotter && !this.snapshotTaken) {
      this.snapshotTaken = true;
      await this.deps.snapshotter.capture(page, reason, meta.queryContext ?? 'challenge');
    }
  }

  private rotationFor(cleared: boolean, meta: GuardMeta): ProxyDescriptor | null {
    const proxy = this.deps.proxy;
    if (!proxy || !proxy.isEnabled()) return null;
    if (!proxy.recordChallenge(cleared)) return null;

    const descriptor = proxy.performRotation(meta.scopeKey, 'consecutive_challenges');
    this.deps.backoff.reset('proxy_rotation');
    this.deps.metrics.inc('proxy_rotations');
    this.deps.metrics.recordEvent('proxy_rotated', {
      bucket: descriptor?.bucket,
      rotationCount: descriptor?.rotationCount,
    });
    return descriptor;
  }
}
