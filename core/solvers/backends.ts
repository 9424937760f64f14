/**
 * Challenge backends: token solving, full-challenge solving, manual operator
 * and skip. Each is chosen once at construction and reports a SolveOutcome.
 */

import * as readline from 'readline';
import type { BrowserContextHandle, BrowserPage, PageSignal, SolveOutcome } from '../../types/browser';
import { isFail } from '../../utils/result';
import { createEnhancedLogger } from '../../utils/logger';
import { randomBetween, sleep, type Sleeper } from '../../utils/retry';
import { CollectorError, CollectorErrors, ErrorCode, isRunAborted } from '../errors';
import type { FlareSolverrClient } from './flaresolverr-client';
import { isFullChallenge, SitekeyExtractor } from './sitekey-extractor';
import { injectToken } from './token-injector';
import type { TokenSolverApi } from './token-solver';

const logger = createEnhancedLogger('ChallengeBackends');

export type BackendKind = 'token-solver' | 'challenge-solver' | 'manual' | 'skip';

export interface ResolveContext {
  signal: PageSignal;
  /** Detector reason tag for the block being resolved */
  reason: string;
  page: BrowserPage;
  context: BrowserContextHandle;
  /** Proxy URL handed to services that fetch the page themselves */
  proxyUrl?: string;
  userAgent?: string;
}

export interface BackendResult extends SolveOutcome {
  /** Ask the resolver to try the full-challenge backend next */
  fallbackToChallengeSolver?: boolean;
  /** Counter names the caller should increment */
  counters?: string[];
}

interface BackendBase {
  readonly name: string;
  resolve(ctx: ResolveContext): Promise<BackendResult>;
}

export interface TokenSolverBackendShape extends BackendBase {
  readonly kind: 'token-solver';
}
export interface ChallengeSolverBackendShape extends BackendBase {
  readonly kind: 'challenge-solver';
}
export interface ManualBackendShape extends BackendBase {
  readonly kind: 'manual';
}
export interface SkipBackendShape extends BackendBase {
  readonly kind: 'skip';
}

export type ChallengeBackend =
  | TokenSolverBackendShape
  | ChallengeSolverBackendShape
  | ManualBackendShape
  | SkipBackendShape;

function errorReason(error: unknown): string {
  if (error instanceof CollectorError && error.code === ErrorCode.SOLVE_TIMEOUT) return 'timeout';
  return error instanceof Error ? error.message : String(error);
}

export interface TokenSolverBackendOptions {
  maxAttempts?: number;
  estimatedCostUsd?: number;
  sleeper?: Sleeper;
  random?: () => number;
}

/**
 * Solves widget challenges through a third-party token API and injects the
 * token. Solve attempts are bounded; a token is never injected twice.
 */
export class TokenSolverBackend implements TokenSolverBackendShape {
  readonly kind = 'token-solver';
  readonly name: string;

  private readonly extractor = new SitekeyExtractor();
  private readonly maxAttempts: number;
  private readonly estimatedCostUsd: number;
  private readonly sleeper: Sleeper;
  private readonly random: () => number;

  constructor(
    private readonly api: TokenSolverApi,
    options: TokenSolverBackendOptions = {},
  ) {
    this.name = api.provider;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 1);
    this.estimatedCostUsd = options.estimatedCostUsd ?? 0.0025;
    this.sleeper = options.sleeper ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async resolve(ctx: ResolveContext): Promise<BackendResult> {
    if (await isFullChallenge(ctx.page)) {
      logger.info('Widget reports a full-page challenge, deferring to the challenge solver');
      return { ok: false, reason: 'full_challenge', attempted: false, fallbackToChallengeSolver: true };
    }

    const params = await this.extractor.extract(ctx.page);
    if (!params) {
      logger.warn('Could not extract captcha sitekey from page');
      return { ok: false, reason: 'no_sitekey_found', attempted: false };
    }

    const pageUrl = ctx.signal.url;
    logger.info(`Solving ${params.kind} captcha`, {
      provider: this.api.provider,
      sitekey: params.sitekey.slice(0, 16),
      source: params.source,
    });

    const done = logger.startOperation('token-solve', { provider: this.api.provider });
    let token: string | null = null;
    let lastReason = 'solve_failed';
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        token = await this.api.solve({
          kind: params.kind,
          sitekey: params.sitekey,
          pageUrl,
          action: params.action,
          cdata: params.cdata,
          userAgent: ctx.userAgent,
        });
        break;
      } catch (error) {
        if (isRunAborted(error)) throw error;
        lastReason = errorReason(error);
        logger.warn(`Solve attempt ${attempt}/${this.maxAttempts} failed`, {
          provider: this.api.provider,
          reason: lastReason,
        });
        if (attempt < this.maxAttempts) {
          const delay = Math.min(5000 * 2 ** (attempt - 1), 30000) + randomBetween(0, 1000, this.random);
          await this.sleeper(delay);
        }
      }
    }
    done();

    if (token === null) {
      return {
        ok: false,
        reason: `${this.api.provider}_error:${lastReason}`,
        attempted: true,
        counters: ['solver_failures'],
      };
    }

    const injected = await injectToken(ctx.page, token, params.kind);
    if (isFail(injected)) {
      const error = CollectorErrors.injectionFailed(`Token injection failed: ${injected.error}`, {
        provider: this.api.provider,
        url: pageUrl,
      });
      logger.error('Token solved but injection failed', error);
      return {
        ok: false,
        reason: 'injection_failed',
        attempted: true,
        fallbackToChallengeSolver: true,
        counters: ['injection_failures'],
      };
    }

    logger.info('Token injected', {
      provider: this.api.provider,
      via: injected.data.via,
      estimatedCostUsd: this.estimatedCostUsd,
    });
    const providerCounter = this.api.provider === 'capsolver' ? 'capsolver_solved' : 'twocaptcha_solved';
    return { ok: true, reason: 'solved', attempted: true, counters: ['captcha_solved', providerCounter] };
  }
}

/**
 * Clears whole-page interstitials by letting FlareSolverr load the URL, then
 * copies its clearance cookies and user agent into the browser and reloads.
 */
export class ChallengeSolverBackend implements ChallengeSolverBackendShape {
  readonly kind = 'challenge-solver';
  readonly name = 'flaresolverr';

  constructor(private readonly client: FlareSolverrClient) {}

  async resolve(ctx: ResolveContext): Promise<BackendResult> {
    if (!(await this.client.isAvailable())) {
      return { ok: false, reason: 'flaresolverr_unavailable', attempted: false };
    }

    const solved = await this.client.solve(ctx.signal.url, { proxyUrl: ctx.proxyUrl });
    if (isFail(solved)) {
      logger.warn('FlareSolverr could not solve the challenge', { reason: solved.error });
      return { ok: false, reason: `flaresolverr_error:${solved.error}`, attempted: true, counters: ['solver_failures'] };
    }

    const { cookies, userAgent } = solved.data;
    if (cookies.length === 0) {
      return { ok: false, reason: 'flaresolverr_no_cookies', attempted: true, counters: ['solver_failures'] };
    }

    const added = await ctx.context.addCookies(cookies);
    if (isFail(added)) {
      return { ok: false, reason: `cookie_injection_failed:${added.error}`, attempted: true, counters: ['injection_failures'] };
    }
    if (userAgent) {
      const setUa = await ctx.context.setUserAgent(userAgent);
      if (isFail(setUa)) {
        logger.warn('Could not apply FlareSolverr user agent', { kind: setUa.error });
      }
    }

    const reloaded = await ctx.page.reload();
    if (isFail(reloaded)) {
      return { ok: false, reason: `reload_failed:${reloaded.error}`, attempted: true, counters: ['injection_failures'] };
    }

    logger.info('FlareSolverr clearance applied', { cookies: cookies.length });
    return { ok: true, reason: 'solved', attempted: true, counters: ['captcha_solved', 'flaresolverr_solved'] };
  }
}

export type OperatorChoice = 'retry' | 'abort' | 'skip';

export interface OperatorPrompt {
  ask(url: string, reason: string): Promise<OperatorChoice>;
}

/**
 * Terminal prompt: 1) solve in the browser and resume, 2) abort, 3) skip
 * remaining detail fetches.
 */
export class ReadlineOperatorPrompt implements OperatorPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async ask(url: string, reason: string): Promise<OperatorChoice> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    const question = (text: string) => new Promise<string>((resolve) => rl.question(text, resolve));
    try {
      this.output.write(`\nChallenge detected (${reason}) at ${url}\n`);
      this.output.write('  1) Solve manually (pause and resume)\n');
      this.output.write('  2) Abort run (save collected data)\n');
      this.output.write('  3) Skip remaining detail fetches\n');
      for (;;) {
        const choice = (await question('Enter 1, 2, or 3: ')).trim();
        if (choice === '1') {
          await question('Solve the challenge in the browser window, then press ENTER to continue.');
          return 'retry';
        }
        if (choice === '2') return 'abort';
        if (choice === '3') return 'skip';
        this.output.write('Invalid choice. Please enter 1, 2, or 3.\n');
      }
    } finally {
      rl.close();
    }
  }
}

/**
 * Run-scoped skip flag owner.
 */
export interface SkipSink {
  markSkipDetails(reason: string): void;
}

export class SkipBackend implements SkipBackendShape {
  readonly kind = 'skip';
  readonly name = 'skip';

  constructor(private readonly sink: SkipSink) {}

  async resolve(ctx: ResolveContext): Promise<BackendResult> {
    this.sink.markSkipDetails(`challenge at ${ctx.signal.url}`);
    return { ok: false, reason: 'skipped', attempted: false };
  }
}

/**
 * Pauses for an operator. Choosing abort raises `RUN_ABORTED`; choosing skip
 * delegates to the skip backend.
 */
export class ManualBackend implements ManualBackendShape {
  readonly kind = 'manual';
  readonly name = 'manual';

  constructor(
    private readonly prompt: OperatorPrompt,
    private readonly skip: SkipBackend,
  ) {}

  async resolve(ctx: ResolveContext): Promise<BackendResult> {
    const choice = await this.prompt.ask(ctx.signal.url, ctx.reason);
    if (choice === 'abort') {
      throw CollectorErrors.runAborted('operator requested abort after challenge', { url: ctx.signal.url });
    }
    if (choice === 'skip') {
      return this.skip.resolve(ctx);
    }
    return { ok: true, reason: 'manual', attempted: false, counters: ['manual_resolutions'] };
  }
}
