/**
 * FlareSolverr client for full-page Cloudflare interstitials.
 *
 * The service is optional: every caller must handle it being absent.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { BrowserCookie } from '../../types/browser';
import { fail, ok, type Result } from '../../utils/result';
import { createModuleLogger } from '../../utils/logger';
import { describeHttpError } from './token-solver';

const logger = createModuleLogger('FlareSolverrClient');

export interface FlareSolution {
  cookies: BrowserCookie[];
  userAgent: string;
}

export interface FlareSolverrClientOptions {
  url?: string;
  timeoutSeconds?: number;
  http?: AxiosInstance;
}

const rawCookieSchema = z.object({
  name: z.unknown(),
  value: z.unknown(),
  domain: z.unknown(),
  path: z.unknown(),
  expiry: z.unknown(),
  httpOnly: z.unknown(),
  secure: z.unknown(),
  sameSite: z.unknown(),
}).partial();

const solveResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
  solution: z
    .object({
      cookies: z.array(z.unknown()).optional(),
      userAgent: z.string().optional(),
    })
    .nullish(),
});

function normalizeSameSite(value: unknown): BrowserCookie['sameSite'] {
  const lower = typeof value === 'string' ? value.toLowerCase() : '';
  if (lower === 'strict') return 'Strict';
  if (lower === 'none') return 'None';
  return 'Lax';
}

function toExpiry(value: unknown): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) && parsed !== 0 ? Math.trunc(parsed) : -1;
}

/**
 * Converts FlareSolverr cookies to browser cookies. Entries without a name,
 * a value or a domain are dropped.
 */
export function convertFlareCookies(cookies: unknown[]): BrowserCookie[] {
  const converted: BrowserCookie[] = [];
  for (const entry of cookies) {
    const parsed = rawCookieSchema.safeParse(entry);
    if (!parsed.success) continue;
    const cookie = parsed.data;
    if (!cookie.name || cookie.value === undefined || cookie.value === null || !cookie.domain) continue;

    converted.push({
      name: String(cookie.name),
      value: String(cookie.value),
      domain: String(cookie.domain),
      path: cookie.path ? String(cookie.path) : '/',
      expires: toExpiry(cookie.expiry),
      httpOnly: Boolean(cookie.httpOnly),
      secure: Boolean(cookie.secure),
      sameSite: normalizeSameSite(cookie.sameSite),
    });
  }
  return converted;
}

export class FlareSolverrClient {
  readonly url: string;
  readonly timeoutSeconds: number;
  private readonly http: AxiosInstance;
  private available: boolean | null = null;

  constructor(options: FlareSolverrClientOptions = {}) {
    this.url = (options.url || 'http://localhost:8191').replace(/\/+$/, '');
    this.timeoutSeconds = options.timeoutSeconds || 60;
    this.http =
      options.http ??
      axios.create({
        baseURL: this.url,
        validateStatus: () => true,
      });
  }

  /**
   * Checks `/health` once; the answer is cached for the client's lifetime.
   */
  async isAvailable(): Promise<boolean> {
    if (this.available !== null) return this.available;

    try {
      const response = await this.http.get('/health', { timeout: 5000 });
      const body = z.object({ status: z.string() }).safeParse(response.data);
      this.available = response.status < 400 && body.success && body.data.status === 'ok';
    } catch (error) {
      logger.debug('Health check failed', { url: this.url, error: describeHttpError(error) });
      this.available = false;
    }

    if (!this.available) {
      logger.warn('FlareSolverr not available', { url: this.url });
    }
    return this.available;
  }

  async solve(targetUrl: string, options: { proxyUrl?: string } = {}): Promise<Result<FlareSolution, string>> {
    if (!targetUrl) return fail('missing target url');
    if (!(await this.isAvailable())) return fail('FlareSolverr not available');

    const payload: Record<string, unknown> = {
      cmd: 'request.get',
      url: targetUrl,
      maxTimeout: this.timeoutSeconds * 1000,
    };
    if (options.proxyUrl) {
      payload.proxy = { url: options.proxyUrl };
    }

    let response: { status: number; data: unknown };
    try {
      response = await this.http.post('/v1', payload, {
        timeout: Math.max(10, this.timeoutSeconds + 10) * 1000,
      });
    } catch (error) {
      logger.warn('FlareSolverr request failed', { error: describeHttpError(error) });
      return fail(describeHttpError(error), error);
    }

    if (response.status >= 400) {
      return fail(`HTTP ${response.status} from FlareSolverr`);
    }
    const parsed = solveResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      return fail('unexpected response from FlareSolverr');
    }
    if (parsed.data.status !== 'ok') {
      return fail(parsed.data.message || parsed.data.error || 'Unknown error');
    }

    const solution = parsed.data.solution;
    return ok({
      cookies: convertFlareCookies(solution?.cookies ?? []),
      userAgent: solution?.userAgent ?? '',
    });
  }
}
