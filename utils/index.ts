/**
 * Utils Module Exports
 */

export {
  appendLines,
  ensureDirExists,
  readTextIfExists,
  renderPathTemplate,
  sanitizeSegment,
  sortKeysDeep,
  writeJsonAtomic,
} from './fileutils';
export {
  closeLogger,
  createEnhancedLogger,
  createModuleLogger,
  EnhancedLogger,
  type LogContext,
  LOG_LEVELS,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
export {
  type Failure,
  fail,
  fromPromise,
  isFail,
  isOk,
  ok,
  type Result,
  type Success,
  unwrapOr,
} from './result';
export {
  humanDelay,
  humanDelayMs,
  pollUntil,
  type PollOptions,
  type PollStep,
  randomBetween,
  retryWithBackoff,
  type RetryOptions,
  sleep,
  type Sleeper,
} from './retry';
