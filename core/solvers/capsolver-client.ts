/**
 * CapSolver HTTP API client (`/createTask`, `/getTaskResult`).
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createModuleLogger } from '../../utils/logger';
import { pollUntil, type PollStep, type Sleeper } from '../../utils/retry';
import { CollectorErrors } from '../errors';
import type { WidgetKind } from './sitekey-extractor';
import {
  describeHttpError,
  requireApiKey,
  type SolverClientOptions,
  type TokenSolveRequest,
  type TokenSolverApi,
} from './token-solver';

const logger = createModuleLogger('CapSolverClient');

const PROVIDER = 'capsolver';

const TASK_TYPES: Record<WidgetKind, string> = {
  turnstile: 'AntiTurnstileTaskProxyLess',
  hcaptcha: 'HCaptchaTaskProxyLess',
  recaptcha_v2: 'ReCaptchaV2TaskProxyLess',
};

const envelopeSchema = z.object({
  errorId: z.union([z.number(), z.string()]).transform(Number).default(0),
  errorDescription: z.string().optional(),
});

const createTaskSchema = envelopeSchema.extend({
  taskId: z.string().optional(),
});

const taskResultSchema = envelopeSchema.extend({
  status: z.string().default(''),
  solution: z
    .object({
      token: z.string().optional(),
      gRecaptchaResponse: z.string().optional(),
    })
    .nullish(),
});

export class CapSolverClient implements TokenSolverApi {
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
        baseURL: (options.baseUrl ?? 'https://api.capsolver.com').replace(/\/+$/, ''),
        timeout: 30000,
        validateStatus: () => true,
      });
  }

  async solve(request: TokenSolveRequest): Promise<string> {
    const pageUrl = request.pageUrl.trim();
    const sitekey = request.sitekey.trim();
    if (!pageUrl) throw CollectorErrors.solveFailed(PROVIDER, 'missing page url');
    if (!sitekey) throw CollectorErrors.solveFailed(PROVIDER, 'missing sitekey');

    const task: Record<string, string> = {
      type: TASK_TYPES[request.kind],
      websiteURL: pageUrl,
      websiteKey: sitekey,
    };
    if (request.kind === 'turnstile' && (request.action || request.cdata)) {
      const metadata: Record<string, string> = {};
      if (request.action) metadata.action = request.action;
      if (request.cdata) metadata.cdata = request.cdata;
      Object.assign(task, { metadata });
    }

    const created = createTaskSchema.safeParse(
      await this.post('/createTask', { clientKey: this.apiKey, task }),
    );
    if (!created.success) {
      throw CollectorErrors.solveFailed(PROVIDER, 'createTask returned unexpected response shape');
    }
    if (created.data.errorId !== 0) {
      throw CollectorErrors.solveFailed(
        PROVIDER,
        `createTask error: ${created.data.errorDescription ?? 'unknown'}`,
      );
    }
    const taskId = created.data.taskId;
    if (!taskId) {
      throw CollectorErrors.solveFailed(PROVIDER, 'createTask returned no taskId');
    }
    logger.debug('Task created', { kind: request.kind, sitekey: sitekey.slice(0, 16) });

    const token = await pollUntil(() => this.poll(taskId), {
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

  private async poll(taskId: string): Promise<PollStep<string>> {
    const parsed = taskResultSchema.safeParse(
      await this.post('/getTaskResult', { clientKey: this.apiKey, taskId }),
    );
    if (!parsed.success) {
      throw CollectorErrors.solveFailed(PROVIDER, 'getTaskResult returned unexpected response shape');
    }
    const result = parsed.data;
    if (result.errorId !== 0) {
      throw CollectorErrors.solveFailed(
        PROVIDER,
        `getTaskResult error: ${result.errorDescription ?? 'unknown'}`,
      );
    }

    const status = result.status.trim().toLowerCase();
    if (status === 'ready') {
      const token = (result.solution?.token ?? result.solution?.gRecaptchaResponse ?? '').trim();
      if (!token) {
        throw CollectorErrors.solveFailed(PROVIDER, 'returned empty token');
      }
      return { done: true, value: token };
    }
    if (status === 'processing' || status === 'idle') {
      return { done: false };
    }
    throw CollectorErrors.solveFailed(PROVIDER, `unexpected status: ${status || 'empty'}`);
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    let response: { status: number; data: unknown };
    try {
      response = await this.http.post(path, payload);
    } catch (error) {
      throw CollectorErrors.solveFailed(PROVIDER, `request error: ${describeHttpError(error)}`, {}, error);
    }
    if (response.status >= 400) {
      throw CollectorErrors.solveFailed(PROVIDER, `HTTP ${response.status}`, { statusCode: response.status });
    }
    return response.data;
  }
}
