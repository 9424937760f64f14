export {
  type BackendKind,
  type BackendResult,
  type ChallengeBackend,
  ChallengeSolverBackend,
  ManualBackend,
  type OperatorChoice,
  type OperatorPrompt,
  ReadlineOperatorPrompt,
  type ResolveContext,
  SkipBackend,
  type SkipSink,
  TokenSolverBackend,
  type TokenSolverBackendOptions,
} from './backends';
export { CapSolverClient } from './capsolver-client';
export {
  convertFlareCookies,
  type FlareSolution,
  FlareSolverrClient,
  type FlareSolverrClientOptions,
} from './flaresolverr-client';
export {
  type ChallengeParams,
  createSitekeyChain,
  detectWidgetKind,
  isFullChallenge,
  SitekeyExtractor,
  sitekeyFromIframeSrc,
  sitekeyFromSource,
  type WidgetKind,
} from './sitekey-extractor';
export { injectToken, type InjectionReport, RESPONSE_FIELDS } from './token-injector';
export {
  createTokenSolver,
  type SolverClientFactory,
  type SolverClientOptions,
  type TokenSolveRequest,
  type TokenSolverApi,
} from './token-solver';
export { TwoCaptchaClient } from './two-captcha-client';
