/**
 * Core Module Exports
 */

// Configuration
export { type Env, envSchema, parseEnv } from './env';
export { resolveConfig } from './config';

// Errors
export {
  classifyPageError,
  CollectorError,
  CollectorErrors,
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  hasErrorCode,
  isRunAborted,
} from './errors';

// Events
export {
  type ChallengeDetectedData,
  type ChallengeResolvedData,
  type CheckpointWrittenData,
  createEventBus,
  type LogMessageData,
  type ProxyRotatedData,
  ResilienceEventBus,
} from './event-bus';

export {
  type ExtractionHit,
  type Extractor,
  ExtractorChain,
  type SyncExtractor,
  SyncExtractorChain,
} from './extractor-chain';

// Detection and resolution
export {
  CHALLENGE_BODY_PHRASES,
  CHALLENGE_MARKERS,
  CHALLENGE_TITLES,
  CHALLENGE_URL_MARKERS,
  ChallengeDetector,
  type ChallengeDetectorOptions,
  type Inspection,
  type MarkerRule,
} from './challenge-detector';
export {
  ChallengeResolver,
  type ChallengeResolverDeps,
  createChallengeResolver,
  isInterstitial,
  type ResolveOptions,
  type ResolveResult,
  type ResolverFactoryOptions,
} from './challenge-resolver';
export {
  ChallengeGuard,
  type ChallengeGuardDeps,
  type GuardMeta,
  type GuardOutcome,
} from './challenge-guard';
export * from './solvers';

// Run state
export { BackoffController } from './backoff-controller';
export { FetchCache, type FetchResult } from './fetch-cache';
export {
  buildProxyUrl,
  looksSessionTagged,
  newSessionId,
  parseProxyLines,
  type ProxyDescriptor,
  ProxySessionManager,
  type ProxySessionStats,
  stableBucket,
} from './proxy-session-manager';
export { DedupeStore, hashJob, stableKey } from './dedupe-store';
export { type MetricsEvent, RunMetrics, type RunMetricsOptions, type RunSummary } from './run-metrics';
export { type CheckpointStats, CheckpointWriter } from './checkpoint-writer';
export { type ChallengeEvent, ChallengeLog } from './challenge-log';
export { ErrorSnapshotter } from './error-snapshotter';
export { NavigationService, type NavigationServiceOptions } from './navigation-service';
export {
  type FinalizeOptions,
  type FinalizeReport,
  normalizeUrl,
  type RunResult,
  RunSession,
  type RunSessionOptions,
} from './run-session';

// Browser
export {
  BROWSER_ARGS,
  BROWSER_VIEWPORT,
  type BrowserLauncher,
  BrowserSession,
  installRenderHook,
  type LaunchConfig,
  launchArgs,
} from './browser-session';
export { PuppeteerPage } from './puppeteer-page';
