/**
 * ChallengeResolver
 *
 * Resolves one blocked page per call. Automatic backends run first (token
 * solver, then the full-challenge solver for whole-page interstitials or when
 * the token backend hands off); the configured fallback policy applies when
 * neither clears the block. Every path makes a bounded number of attempts.
 */

import type { BrowserContextHandle, BrowserPage, PageSignal, SolveOutcome } from '../types/browser';
import type { FallbackPolicy, ResilienceConfig } from '../types/config';
import { createEnhancedLogger } from '../utils/logger';
import type { Sleeper } from '../utils/retry';
import { CollectorErrors } from './errors';
import {
  ChallengeSolverBackend,
  ManualBackend,
  ReadlineOperatorPrompt,
  SkipBackend,
  TokenSolverBackend,
  type BackendKind,
  type BackendResult,
  type ChallengeBackend,
  type OperatorPrompt,
  type ResolveContext,
  type SkipSink,
} from './solvers/backends';
import { CapSolverClient } from './solvers/capsolver-client';
import { FlareSolverrClient } from './solvers/flaresolverr-client';
import { createTokenSolver, type TokenSolverApi } from './solvers/token-solver';
import { TwoCaptchaClient } from './solvers/two-captcha-client';

const logger = createEnhancedLogger('ChallengeResolver');

/** Reasons that mark a whole-page interstitial rather than an embedded widget */
const INTERSTITIAL_PREFIXES = ['title:', 'url:', 'selector:#cf-challenge-running', 'selector:form#challenge-form'];

export function isInterstitial(reason: string): boolean {
  return INTERSTITIAL_PREFIXES.some((prefix) => reason.startsWith(prefix));
}

export interface ResolveOptions {
  proxyUrl?: string;
  userAgent?: string;
}

export interface ResolveResult {
  outcome: SolveOutcome;
  /** Backend that produced the final outcome */
  backend: BackendKind | null;
  /** True when the skip flag was set for the rest of the run */
  skipped: boolean;
  /** Every backend consulted, in order */
  trail: BackendKind[];
  counters: string[];
}

export interface ChallengeResolverDeps {
  tokenSolver?: TokenSolverBackend | null;
  challengeSolver?: ChallengeSolverBackend | null;
  manual?: ManualBackend | null;
  skip: SkipBackend;
  policy: FallbackPolicy;
}

export class ChallengeResolver {
  private readonly tokenSolver: TokenSolverBackend | null;
  private readonly challengeSolver: ChallengeSolverBackend | null;
  private readonly fallback: ChallengeBackend | null;
  private readonly policy: FallbackPolicy;

  constructor(deps: ChallengeResolverDeps) {
    this.tokenSolver = deps.tokenSolver ?? null;
    this.challengeSolver = deps.challengeSolver ?? null;
    this.policy = deps.policy;

    if (deps.policy === 'manual') {
      this.fallback = deps.manual ?? deps.skip;
    } else if (deps.policy === 'skip') {
      this.fallback = deps.skip;
    } else {
      this.fallback = null;
    }
  }

  /** Names of the backends in the order they may be consulted */
  describe(): string[] {
    const names: string[] = [];
    if (this.tokenSolver) names.push(this.tokenSolver.name);
    if (this.challengeSolver) names.push(this.challengeSolver.name);
    names.push(this.fallback ? this.fallback.name : 'abort');
    return names;
  }

  async resolve(
    signal: PageSignal,
    reason: string,
    page: BrowserPage,
    context: BrowserContextHandle,
    options: ResolveOptions = {},
  ): Promise<ResolveResult> {
    const ctx: ResolveContext = { signal, reason, page, context, ...options };
    const trail: BackendKind[] = [];
    const counters: string[] = [];
    const state = { attempted: false, lastReason: reason };

    const run = async (backend: ChallengeBackend): Promise<BackendResult> => {
      trail.push(backend.kind);
      const result = await logger.trackAsync(`resolve:${backend.kind}`, () => backend.resolve(ctx), { reason });
      state.attempted = state.attempted || result.attempted;
      state.lastReason = result.reason;
      counters.push(...(result.counters ?? []));
      logger.debug('Backend finished', { backend: backend.name, ok: result.ok, reason: result.reason });
      return result;
    };

    let tryChallengeSolver = isInterstitial(reason);

    if (this.tokenSolver) {
      const result = await run(this.tokenSolver);
      if (result.ok) return this.finish(result, 'token-solver', state.attempted, trail, counters);
      tryChallengeSolver = tryChallengeSolver || result.fallbackToChallengeSolver === true;
    }

    if (this.challengeSolver && tryChallengeSolver) {
      const result = await run(this.challengeSolver);
      if (result.ok) return this.finish(result, 'challenge-solver', state.attempted, trail, counters);
    }

    if (!this.fallback) {
      throw CollectorErrors.runAborted(`challenge policy is abort (${reason})`, {
        url: signal.url,
        reason: state.lastReason,
      });
    }

    const result = await run(this.fallback);
    return this.finish(result, this.fallback.kind, state.attempted, trail, counters);
  }

  private finish(
    result: BackendResult,
    backend: BackendKind,
    attempted: boolean,
    trail: BackendKind[],
    counters: string[],
  ): ResolveResult {
    const outcome: SolveOutcome = { ok: result.ok, reason: result.reason, attempted };
    logger.info(outcome.ok ? 'Challenge resolved' : 'Challenge not resolved', {
      backend,
      reason: outcome.reason,
      attempted,
      policy: this.policy,
    });
    return { outcome, backend, skipped: backend === 'skip' || result.reason === 'skipped', trail, counters };
  }
}

export interface ResolverFactoryOptions {
  skipSink: SkipSink;
  prompt?: OperatorPrompt;
  tokenApi?: TokenSolverApi | null;
  flareSolverr?: FlareSolverrClient | null;
  sleeper?: Sleeper;
}

/**
 * Builds a resolver from configuration. The manual backend is only wired when
 * an operator can answer prompts; otherwise `manual` degrades to `skip`.
 */
export function createChallengeResolver(config: ResilienceConfig, options: ResolverFactoryOptions): ChallengeResolver {
  const tokenApi =
    options.tokenApi !== undefined
      ? options.tokenApi
      : createTokenSolver(config.captcha, {
          '2captcha': (o) => new TwoCaptchaClient(o),
          capsolver: (o) => new CapSolverClient(o),
        });

  const tokenSolver = tokenApi
    ? new TokenSolverBackend(tokenApi, {
        maxAttempts: config.captcha.maxSolveAttempts,
        estimatedCostUsd: config.captcha.estimatedCostUsdPerSolve,
        sleeper: options.sleeper,
      })
    : null;

  let flare: FlareSolverrClient | null = null;
  if (options.flareSolverr !== undefined) {
    flare = options.flareSolverr;
  } else if (config.flaresolverr.enabled) {
    flare = new FlareSolverrClient({ url: config.flaresolverr.url, timeoutSeconds: config.flaresolverr.timeoutSeconds });
  }

  const skip = new SkipBackend(options.skipSink);
  const interactive = config.policy.interactive || options.prompt !== undefined;
  const manual = interactive ? new ManualBackend(options.prompt ?? new ReadlineOperatorPrompt(), skip) : null;

  if (config.captcha.enabled && !tokenApi) {
    logger.warn('Captcha solving enabled but no API key configured; using fallback policy', {
      provider: config.captcha.provider,
      policy: config.captcha.onDetect,
    });
  }

  return new ChallengeResolver({
    tokenSolver,
    challengeSolver: flare ? new ChallengeSolverBackend(flare) : null,
    manual,
    skip,
    policy: config.captcha.onDetect,
  });
}
