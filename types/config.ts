/**
 * Configuration types and interfaces
 * Centralized configuration for the resilience layer
 */

export type TokenProvider = '2captcha' | 'capsolver';

/**
 * What to do with a block no automatic backend cleared.
 * `manual` pauses for an operator when input is interactive and otherwise
 * falls through to `skip`.
 */
export type FallbackPolicy = 'manual' | 'skip' | 'abort';

export type SessionScope = 'run' | 'query';

export interface ProxyEndpoint {
  server: string;
  username?: string;
  password?: string;
}

/**
 * Challenge detection configuration
 */
export interface DetectionConfig {
  /** Selectors that only render on a genuine content page (per-site allowlist) */
  contentMarkers: string[];
}

/**
 * Consecutive-challenge backoff
 */
export interface BackoffConfig {
  baseSeconds: number;
  maxSeconds: number;
}

/**
 * Token-solving backend configuration
 */
export interface CaptchaConfig {
  /** Enable automatic token solving */
  enabled: boolean;
  provider: TokenProvider;
  apiKey?: string;
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  /** Solve attempts per challenge episode */
  maxSolveAttempts: number;
  estimatedCostUsdPerSolve: number;
  /** Policy applied when automatic solving is disabled, unconfigured or fails */
  onDetect: FallbackPolicy;
}

/**
 * Full-challenge-solving backend configuration
 */
export interface FlareSolverrConfig {
  enabled: boolean;
  url: string;
  timeoutSeconds: number;
}

/**
 * Proxy pool and session affinity
 */
export interface ProxyConfig {
  enabled: boolean;
  /** Provider name; `iproyal` tags the username with the session id */
  provider: string;
  server: string;
  username?: string;
  password?: string;
  /** Username containing `{session}` */
  usernameTemplate?: string;
  sticky: boolean;
  sessionScope: SessionScope;
  poolSize: number;
  /** 0 disables expiry */
  sessionTtlSeconds: number;
  /** Consecutive challenges before rotation is requested; 0 disables */
  rotateOnChallengeConsecutive: number;
  rotateOnFailure: boolean;
  /** Additional endpoints; bucket N uses endpoint N modulo the endpoint count */
  endpoints: ProxyEndpoint[];
  /** Directory of `*.txt` files with `host:port[:user:pass]` lines */
  proxyDir?: string;
}

export interface CheckpointConfig {
  enabled: boolean;
  /** Write a checkpoint every N collected items */
  interval: number;
  path: string;
  challengeLogPath: string;
  snapshotDir: string;
}

export interface DedupeConfig {
  enabled: boolean;
  path: string;
}

export interface MetricsConfig {
  board: string;
  /** Output path; `{timestamp}` is replaced at write time */
  pathTemplate: string;
}

export interface NavigationConfig {
  maxRetries: number;
  jitterMinMs: number;
  jitterMaxMs: number;
}

export interface DelayConfig {
  /** Human-like pause before each detail fetch */
  detailMinMs: number;
  detailMaxMs: number;
  jitterFactor: number;
}

export interface PolicyConfig {
  /** Skip decisions in one run before escalating to abort; 0 never escalates */
  escalateSkipsAfter: number;
  /** Whether an operator can answer prompts */
  interactive: boolean;
}

export interface BrowserConfig {
  headless: boolean;
  executablePath?: string;
  userAgent?: string;
}

/**
 * Complete configuration object
 */
export interface ResilienceConfig {
  detection: DetectionConfig;
  backoff: BackoffConfig;
  captcha: CaptchaConfig;
  flaresolverr: FlareSolverrConfig;
  proxy: ProxyConfig;
  checkpoint: CheckpointConfig;
  dedupe: DedupeConfig;
  metrics: MetricsConfig;
  navigation: NavigationConfig;
  delays: DelayConfig;
  policy: PolicyConfig;
  browser: BrowserConfig;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U> ? U[] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ResilienceConfigInput = DeepPartial<ResilienceConfig>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ResilienceConfig = {
  detection: {
    contentMarkers: [],
  },
  backoff: {
    baseSeconds: 60,
    maxSeconds: 300,
  },
  captcha: {
    enabled: false,
    provider: '2captcha',
    timeoutSeconds: 180,
    pollIntervalSeconds: 5,
    maxSolveAttempts: 1,
    estimatedCostUsdPerSolve: 0.0025,
    onDetect: 'manual',
  },
  flaresolverr: {
    enabled: false,
    url: 'http://localhost:8191',
    timeoutSeconds: 60,
  },
  proxy: {
    enabled: false,
    provider: 'http',
    server: '',
    sticky: true,
    sessionScope: 'run',
    poolSize: 4,
    sessionTtlSeconds: 1800,
    rotateOnChallengeConsecutive: 2,
    rotateOnFailure: false,
    endpoints: [],
  },
  checkpoint: {
    enabled: true,
    interval: 25,
    path: 'output/progress_checkpoint.json',
    challengeLogPath: 'output/captcha_log.json',
    snapshotDir: 'output/errors',
  },
  dedupe: {
    enabled: true,
    path: 'output/dedupe_hashes.jsonl',
  },
  metrics: {
    board: 'default',
    pathTemplate: 'output/run_metrics_{timestamp}.json',
  },
  navigation: {
    maxRetries: 3,
    jitterMinMs: 1000,
    jitterMaxMs: 3000,
  },
  delays: {
    detailMinMs: 2000,
    detailMaxMs: 5000,
    jitterFactor: 0.3,
  },
  policy: {
    escalateSkipsAfter: 0,
    interactive: false,
  },
  browser: {
    headless: true,
  },
};
