import type { AxiosInstance } from 'axios';
import type { CaptchaConfig, TokenProvider } from '../../types/config';
import type { Sleeper } from '../../utils/retry';
import { CollectorErrors } from '../errors';
import type { WidgetKind } from './sitekey-extractor';

export interface TokenSolveRequest {
  kind: WidgetKind;
  sitekey: string;
  pageUrl: string;
  action?: string;
  cdata?: string;
  userAgent?: string;
}

/**
 * Third-party token-solving API. `solve` resolves with a non-empty token or
 * rejects with a `SOLVE_FAILED` / `SOLVE_TIMEOUT` CollectorError.
 */
export interface TokenSolverApi {
  readonly provider: TokenProvider;
  solve(request: TokenSolveRequest): Promise<string>;
}

export interface SolverClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
  pollIntervalMs: number;
  http?: AxiosInstance;
  sleeper?: Sleeper;
  now?: () => number;
}

export function requireApiKey(provider: TokenProvider, apiKey: string | undefined): string {
  const key = apiKey?.trim();
  if (!key) {
    throw CollectorErrors.solverNotConfigured(provider, 'missing API key');
  }
  return key;
}

export function describeHttpError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type SolverClientFactory = (options: SolverClientOptions) => TokenSolverApi;

/**
 * Builds the configured provider's client, or returns `null` when token
 * solving is disabled or has no API key.
 */
export function createTokenSolver(
  config: CaptchaConfig,
  factories: Record<TokenProvider, SolverClientFactory>,
  overrides: Partial<Omit<SolverClientOptions, 'apiKey'>> = {},
): TokenSolverApi | null {
  if (!config.enabled || !config.apiKey?.trim()) {
    return null;
  }
  return factories[config.provider]({
    apiKey: config.apiKey,
    timeoutMs: config.timeoutSeconds * 1000,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    ...overrides,
  });
}
