/**
 * 2captcha HTTP API client (`/in.php` submit, `/res.php` poll).
 *
 * Never logs API keys or tokens.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createModuleLogger } from '../../utils/logger';
import { pollUntil, type Sleeper } from '../../utils/retry';
import { CollectorErrors } from '../errors';
import {
  describeHttpError,
  requireApiKey,
  type SolverClientOptions,
  type TokenSolveRequest,
  type TokenSolverApi,
} from './token-solver';

const logger = createModuleLogger('TwoCaptchaClient');

const PROVIDER = '2captcha';
const NOT_READY = 'CAPCHA_NOT_READY';

const responseSchema = z.object({
  status: z.union([z.number(), z.string()]).transform(Number),
  request: z.string().default(''),
});

type TwoCaptchaResponse = z.infer<typeof responseSchema>;

export class TwoCaptchaClient implements TokenSolverApi {
  readonly provider = PROVIDER;

  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleeper?: Sleeper;
  private readonly now?: () => number;

  constructor(options: SolverClientOptions) {
    this.apiKey = requireApiKey(PROVIDER, options.apiKey);
    this.timeoutMs = options.timeoutMs;
    this.pollIntervalMs = options.pollIntervalMs;
    this.sleeper = options.sleeper;
    this.now = options.now;
    this.http =
      options.http ??
      axios.create({
        baseURL: (options.baseUrl ?? 'https://2captcha.com').replace(/\/+$/, ''),
        timeout: 30000,
        validateStatus: () => true,
      });
  }

  async solve(request: TokenSolveRequest): Promise<string> {
    const sitekey = request.sitekey.trim();
    if (!sitekey) {
      throw CollectorErrors.solveFailed(PROVIDER, `${request.kind} sitekey is required`);
    }

    const requestId = await this.submit({ ...request, sitekey });
    logger.debug('Task submitted', { kind: request.kind, sitekey: sitekey.slice(0, 16) });

    const token = await pollUntil(() => this.poll(requestId), {
      timeoutMs: this.timeoutMs,
      intervalMs: this.pollIntervalMs,
      sleeper: this.sleeper,
      now: this.now,
    });
    if (token === null) {
      throw CollectorErrors.solveTimeout(PROVIDER, this.timeoutMs);
    }
    return token;
  }

  private buildSubmitPayload(request: TokenSolveRequest): URLSearchParams {
    const payload = new URLSearchParams({ key: this.apiKey, pageurl: request.pageUrl, json: '1' });

    switch (request.kind) {
      case 'turnstile':
        payload.set('method', 'turnstile');
        payload.set('sitekey', request.sitekey);
        if (request.userAgent) payload.set('userAgent', request.userAgent);
        if (request.action) payload.set('action', request.action);
        if (request.cdata) payload.set('data', request.cdata);
        break;
      case 'hcaptcha':
        payload.set('method', 'hcaptcha');
        payload.set('sitekey', request.sitekey);
        break;
      case 'recaptcha_v2':
        payload.set('method', 'userrecaptcha');
        payload.set('googlekey', request.sitekey);
        break;
    }
    return payload;
  }

  private async submit(request: TokenSolveRequest): Promise<string> {
    const response = await this.send(() => this.http.post('/in.php', this.buildSubmitPayload(request)));
    if (response.status !== 1) {
      throw CollectorErrors.solveFailed(PROVIDER, `submit error: ${response.request}`);
    }
    const requestId = response.request.trim();
    if (!requestId) {
      throw CollectorErrors.solveFailed(PROVIDER, 'submit returned empty request id');
    }
    return requestId;
  }

  private async poll(requestId: string): Promise<{ done: true; value: string } | { done: false }> {
    const response = await this.send(() =>
      this.http.get('/res.php', { params: { key: this.apiKey, action: 'get', id: requestId, json: 1 } }),
    );
    const value = response.request.trim();
    if (response.status === 1) {
      if (!value) {
        throw CollectorErrors.solveFailed(PROVIDER, 'returned empty token');
      }
      return { done: true, value };
    }
    if (value === NOT_READY) {
      return { done: false };
    }
    throw CollectorErrors.solveFailed(PROVIDER, `poll error: ${value}`);
  }

  private async send(call: () => Promise<{ status: number; data: unknown }>): Promise<TwoCaptchaResponse> {
    let response: { status: number; data: unknown };
    try {
      response = await call();
    } catch (error) {
      throw CollectorErrors.solveFailed(PROVIDER, `request error: ${describeHttpError(error)}`, {}, error);
    }
    if (response.status >= 400) {
      throw CollectorErrors.solveFailed(PROVIDER, `HTTP ${response.status}`, { statusCode: response.status });
    }
    const body: unknown = typeof response.data === 'string' ? safeJson(response.data) : response.data;
    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw CollectorErrors.solveFailed(PROVIDER, 'returned unexpected response shape');
    }
    return parsed.data;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
