/**
 * Resolves a complete ResilienceConfig from defaults, caller overrides and env.
 */

import { z } from 'zod';
import {
  DEFAULT_CONFIG,
  type ResilienceConfig,
  type ResilienceConfigInput,
} from '../types/config';
import { CollectorErrors } from './errors';
import type { Env } from './env';

/** CapSolver answers faster than 2captcha, so its timings differ from the defaults */
const CAPSOLVER_DEFAULTS = { timeoutSeconds: 120, pollIntervalSeconds: 3 } as const;

const proxyEndpointSchema = z.object({
  server: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
});

const configSchema = z.object({
  detection: z.object({
    contentMarkers: z.array(z.string().min(1)),
  }),
  backoff: z
    .object({
      baseSeconds: z.number().nonnegative(),
      maxSeconds: z.number().nonnegative(),
    })
    .refine((b) => b.maxSeconds >= b.baseSeconds, { message: 'backoff.maxSeconds must be >= baseSeconds' }),
  captcha: z.object({
    enabled: z.boolean(),
    provider: z.enum(['2captcha', 'capsolver']),
    apiKey: z.string().optional(),
    timeoutSeconds: z.number().positive(),
    pollIntervalSeconds: z.number().positive(),
    maxSolveAttempts: z.number().int().min(1),
    estimatedCostUsdPerSolve: z.number().nonnegative(),
    onDetect: z.enum(['manual', 'skip', 'abort']),
  }),
  flaresolverr: z.object({
    enabled: z.boolean(),
    url: z.string().url(),
    timeoutSeconds: z.number().positive(),
  }),
  proxy: z.object({
    enabled: z.boolean(),
    provider: z.string(),
    server: z.string(),
    username: z.string().optional(),
    password: z.string().optional(),
    usernameTemplate: z.string().optional(),
    sticky: z.boolean(),
    sessionScope: z.enum(['run', 'query']),
    poolSize: z.number().int().min(1),
    sessionTtlSeconds: z.number().nonnegative(),
    rotateOnChallengeConsecutive: z.number().int().nonnegative(),
    rotateOnFailure: z.boolean(),
    endpoints: z.array(proxyEndpointSchema),
    proxyDir: z.string().optional(),
  }),
  checkpoint: z.object({
    enabled: z.boolean(),
    interval: z.number().int().min(1),
    path: z.string().min(1),
    challengeLogPath: z.string().min(1),
    snapshotDir: z.string().min(1),
  }),
  dedupe: z.object({
    enabled: z.boolean(),
    path: z.string().min(1),
  }),
  metrics: z.object({
    board: z.string().min(1),
    pathTemplate: z.string().min(1),
  }),
  navigation: z.object({
    maxRetries: z.number().int().nonnegative(),
    jitterMinMs: z.number().nonnegative(),
    jitterMaxMs: z.number().nonnegative(),
  }),
  delays: z.object({
    detailMinMs: z.number().nonnegative(),
    detailMaxMs: z.number().nonnegative(),
    jitterFactor: z.number().min(0).max(1),
  }),
  policy: z.object({
    escalateSkipsAfter: z.number().int().nonnegative(),
    interactive: z.boolean(),
  }),
  browser: z.object({
    headless: z.boolean(),
    executablePath: z.string().optional(),
    userAgent: z.string().optional(),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Fills secrets and endpoints the config leaves empty from the environment.
 */
function applyEnv(config: Record<string, unknown>, env: Partial<Env>): Record<string, unknown> {
  const captcha = isPlainObject(config.captcha) ? config.captcha : {};
  const proxy = isPlainObject(config.proxy) ? config.proxy : {};
  const flaresolverr = isPlainObject(config.flaresolverr) ? config.flaresolverr : {};
  const browser = isPlainObject(config.browser) ? config.browser : {};

  const captchaEnv: Record<string, unknown> = {};
  const flaresolverrEnv: Record<string, unknown> = {};
  const proxyEnv: Record<string, unknown> = {};
  const browserEnv: Record<string, unknown> = {};

  if (!captcha.apiKey) {
    const envKey = captcha.provider === 'capsolver' ? env.CAPSOLVER_API_KEY : env.CAPTCHA_API_KEY;
    if (envKey) captchaEnv.apiKey = envKey;
  }
  if (env.FLARESOLVERR_URL && flaresolverr.url === DEFAULT_CONFIG.flaresolverr.url) {
    flaresolverrEnv.url = env.FLARESOLVERR_URL;
  }
  if (!proxy.server && env.PROXY_SERVER) proxyEnv.server = env.PROXY_SERVER;
  if (!proxy.username && env.PROXY_USER) proxyEnv.username = env.PROXY_USER;
  if (!proxy.password && env.PROXY_PASS) proxyEnv.password = env.PROXY_PASS;
  if (!browser.executablePath && env.PUPPETEER_EXECUTABLE_PATH) {
    browserEnv.executablePath = env.PUPPETEER_EXECUTABLE_PATH;
  }

  return deepMerge(config, {
    captcha: captchaEnv,
    flaresolverr: flaresolverrEnv,
    proxy: proxyEnv,
    browser: browserEnv,
  });
}

export function resolveConfig(
  overrides: ResilienceConfigInput = {},
  env: Partial<Env> = {},
): ResilienceConfig {
  const captchaOverrides = overrides.captcha ?? {};
  const providerDefaults =
    captchaOverrides.provider === 'capsolver'
      ? {
          captcha: {
            timeoutSeconds: captchaOverrides.timeoutSeconds ?? CAPSOLVER_DEFAULTS.timeoutSeconds,
            pollIntervalSeconds: captchaOverrides.pollIntervalSeconds ?? CAPSOLVER_DEFAULTS.pollIntervalSeconds,
          },
        }
      : {};
  const merged = applyEnv(deepMerge(deepMerge({ ...DEFAULT_CONFIG }, { ...overrides }), providerDefaults), env);
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw CollectorErrors.invalidConfiguration(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  if (parsed.data.proxy.enabled && !parsed.data.proxy.server && parsed.data.proxy.endpoints.length === 0 && !parsed.data.proxy.proxyDir) {
    throw CollectorErrors.invalidConfiguration('proxy.enabled requires proxy.server, proxy.endpoints or proxy.proxyDir');
  }
  return parsed.data;
}
