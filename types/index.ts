export type {
  BrowserContextHandle,
  BrowserCookie,
  BrowserPage,
  ChallengeVerdict,
  ElementInfo,
  JsonValue,
  PageErrorKind,
  PageResult,
  PageSignal,
  SolveOutcome,
} from './browser';
export {
  type BackoffConfig,
  type BrowserConfig,
  type CaptchaConfig,
  type CheckpointConfig,
  DEFAULT_CONFIG,
  type DedupeConfig,
  type DelayConfig,
  type DetectionConfig,
  type FallbackPolicy,
  type FlareSolverrConfig,
  type MetricsConfig,
  type NavigationConfig,
  type PolicyConfig,
  type ProxyConfig,
  type ProxyEndpoint,
  type ResilienceConfig,
  type ResilienceConfigInput,
  type SessionScope,
  type TokenProvider,
} from './config';
export type { Checkpoint, DedupeRecord, JobDetail, JobPosting } from './job';
