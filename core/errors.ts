/**
 * Error handling module for the resilience layer
 * Defines error codes, the CollectorError class and classification logic
 */

import type { PageErrorKind } from '../types/browser';

/**
 * Standard error codes
 */
export enum ErrorCode {
  // Detection (always absorbed: the page is treated as clear)
  DETECTION_FAILED = "DETECTION_FAILED",

  // Solving
  SOLVE_FAILED = "SOLVE_FAILED",
  SOLVE_TIMEOUT = "SOLVE_TIMEOUT",
  SOLVER_NOT_CONFIGURED = "SOLVER_NOT_CONFIGURED",
  INJECTION_FAILED = "INJECTION_FAILED",

  // Navigation
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  // Operator
  RUN_ABORTED = "RUN_ABORTED",

  // System
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
  BROWSER_ERROR = "BROWSER_ERROR",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  url?: string;
  provider?: string;
  operation?: string;
  statusCode?: number;
  attempt?: number;
  reason?: string;
  [key: string]: unknown;
}

/**
 * Custom error class for collection errors
 */
export class CollectorError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      originalError?: Error;
    } = {}
  ) {
    super(message);
    this.name = "CollectorError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CollectorError);
    }
  }

  public isRecoverable(): boolean {
    return this.retryable;
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

function asError(value: unknown): Error | undefined {
  return value instanceof Error ? value : undefined;
}

/**
 * Factory for creating common errors
 */
export const CollectorErrors = {
  solveFailed: (provider: string, message: string, context?: ErrorContext, originalError?: unknown) =>
    new CollectorError(ErrorCode.SOLVE_FAILED, `${provider}: ${message}`, {
      retryable: true,
      context: { ...context, provider },
      originalError: asError(originalError),
    }),

  solveTimeout: (provider: string, timeoutMs: number, context?: ErrorContext) =>
    new CollectorError(ErrorCode.SOLVE_TIMEOUT, `${provider} timed out waiting for solution`, {
      retryable: true,
      context: { ...context, provider, timeoutMs },
    }),

  solverNotConfigured: (provider: string, reason: string) =>
    new CollectorError(ErrorCode.SOLVER_NOT_CONFIGURED, `${provider} is not configured: ${reason}`, {
      retryable: false,
      context: { provider, reason },
    }),

  injectionFailed: (message: string, context?: ErrorContext, originalError?: unknown) =>
    new CollectorError(ErrorCode.INJECTION_FAILED, message, {
      retryable: false,
      context,
      originalError: asError(originalError),
    }),

  navigationFailed: (url: string, attempts: number, originalError?: unknown) =>
    new CollectorError(ErrorCode.NAVIGATION_FAILED, `Navigation failed after ${attempts} attempts: ${url}`, {
      retryable: true,
      context: { url, attempt: attempts },
      originalError: asError(originalError),
    }),

  runAborted: (reason: string, context?: ErrorContext) =>
    new CollectorError(ErrorCode.RUN_ABORTED, `Run aborted: ${reason}`, {
      retryable: false,
      context: { ...context, reason },
    }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new CollectorError(ErrorCode.CONFIG_ERROR, message, {
      retryable: false,
      context,
    }),

  fileSystem: (message: string, context?: ErrorContext, originalError?: unknown) =>
    new CollectorError(ErrorCode.FILE_SYSTEM_ERROR, message, {
      retryable: false,
      context,
      originalError: asError(originalError),
    }),

  browserNotInitialized: () =>
    new CollectorError(ErrorCode.BROWSER_ERROR, "Browser not initialized", {
      retryable: false,
    }),
};

export function isRunAborted(error: unknown): error is CollectorError {
  return error instanceof CollectorError && error.code === ErrorCode.RUN_ABORTED;
}

export function hasErrorCode(error: unknown, code: ErrorCode): error is CollectorError {
  return error instanceof CollectorError && error.code === code;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a driver exception onto the browser-boundary error kinds.
 */
export function classifyPageError(error: unknown): PageErrorKind {
  const lower = messageOf(error).toLowerCase();

  if (lower.includes("detached") || lower.includes("frame was detached")) {
    return "detached-frame";
  }
  if (
    lower.includes("execution context was destroyed") ||
    lower.includes("cannot find context") ||
    lower.includes("navigating frame")
  ) {
    return "navigation-race";
  }
  if (
    lower.includes("target closed") ||
    lower.includes("session closed") ||
    lower.includes("has been closed") ||
    lower.includes("connection closed")
  ) {
    return "target-closed";
  }
  if (lower.includes("timeout") || lower.includes("timed out")) {
    return "timeout";
  }
  return "unknown";
}

/**
 * Utility to classify unknown errors
 */
export class ErrorClassifier {
  public static classify(error: unknown, context?: ErrorContext): CollectorError {
    if (error instanceof CollectorError) {
      if (context) {
        Object.assign(error.context, context);
      }
      return error;
    }

    const message = messageOf(error);
    const originalError = asError(error);
    const lowerMessage = message.toLowerCase();

    if (lowerMessage.includes("navigation") || lowerMessage.includes("net::err_")) {
      return new CollectorError(ErrorCode.NAVIGATION_FAILED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (classifyPageError(error) !== "unknown") {
      return new CollectorError(ErrorCode.BROWSER_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (lowerMessage.includes("enoent") || lowerMessage.includes("eacces") || lowerMessage.includes("enospc")) {
      return new CollectorError(ErrorCode.FILE_SYSTEM_ERROR, message, {
        retryable: false,
        context,
        originalError,
      });
    }

    return new CollectorError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }
}
