/**
 * Error handling utilities
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import type { Either } from 'fp-ts/Either';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { RetryPolicy, SyncErrorEntry } from '../types/base';
import type { SyncError } from '../types/errors';
import {
  transientIOError,
  unknownError,
  isSyncError,
  isTransientIOError,
  isMappingError,
  isFatalRunError,
} from '../types/errors';

export const defaultRetryPolicy: RetryPolicy = {
  maxRetries: 3,
  baseDelay: 1000,
  backoffMultiplier: 2,
  maxDelay: 30000,
};

// Calculate exponential backoff delay
export const calculateBackoff = (attempt: number, policy: RetryPolicy): number => {
  const delay = policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelay);
};

// Check if error is retryable
export const isRetryable = (error: SyncError): boolean =>
  isTransientIOError(error) && error.retryable;

// Delay execution
export const delay = (ms: number): TaskEither<never, void> =>
  TE.fromTask(() => new Promise((resolve) => setTimeout(resolve, ms)));

export type RetryListener = (error: SyncError, attempt: number, delayMs: number) => void;

// Retry with exponential backoff; maxRetries counts attempts after the first
export const retryWithBackoff = <A>(
  task: TaskEither<SyncError, A>,
  policy: RetryPolicy = defaultRetryPolicy,
  onRetry?: RetryListener,
): TaskEither<SyncError, A> => {
  const attempt = (currentAttempt: number): TaskEither<SyncError, A> =>
    pipe(
      task,
      TE.orElse((error) => {
        if (currentAttempt > policy.maxRetries || !isRetryable(error)) {
          return TE.left(error);
        }
        const delayMs = calculateBackoff(currentAttempt, policy);
        onRetry?.(error, currentAttempt, delayMs);
        return pipe(
          delay(delayMs),
          TE.chain(() => attempt(currentAttempt + 1)),
        );
      }),
    );

  return attempt(1);
};

// Fail a slow attempt with a retryable transient error
export const withTimeout = <A>(
  task: TaskEither<SyncError, A>,
  timeoutMs: number,
  operation: string,
): TaskEither<SyncError, A> => () => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Either<SyncError, A>>((resolve) => {
    timer = setTimeout(
      () =>
        resolve(
          E.left(transientIOError(`${operation} timed out after ${timeoutMs}ms`, operation, true)),
        ),
      timeoutMs,
    );
  });
  return Promise.race([task(), timeout]).finally(() => clearTimeout(timer));
};

/**
 * Bound an attempt that can be cancelled. On timeout the signal is aborted and
 * the attempt is awaited, so a retry never overlaps it. A late success stands.
 */
export const withAbortTimeout = <A>(
  start: (signal: AbortSignal) => TaskEither<SyncError, A>,
  timeoutMs: number,
  operation: string,
): TaskEither<SyncError, A> => async () => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const result = await start(controller.signal)();
    return controller.signal.aborted && E.isLeft(result)
      ? E.left(transientIOError(`${operation} timed out after ${timeoutMs}ms`, operation, true))
      : result;
  } finally {
    clearTimeout(timer);
  }
};

const TRANSIENT_PATTERN = /network|timeout|timed out|unavailable|econnrefused|econnreset/i;

// Convert unknown errors to SyncError
export const toSyncError = (error: unknown): SyncError => {
  if (isSyncError(error)) {
    return error;
  }
  if (error instanceof Error) {
    if (TRANSIENT_PATTERN.test(error.name) || TRANSIENT_PATTERN.test(error.message)) {
      return transientIOError(error.message, 'unknown', true);
    }
    return unknownError(error.message, error);
  }
  return unknownError('Unknown error occurred', error);
};

const errorCode = (error: SyncError): string => {
  if (isMappingError(error) || isFatalRunError(error)) {
    return error.reason;
  }
  return error.type;
};

// Flatten an error into a run report entry
export const toErrorEntry = (error: SyncError): SyncErrorEntry => ({
  code: errorCode(error),
  message: error.message,
  resourceId: error.context?.resourceId,
  field: error.context?.field,
  retryable: isRetryable(error),
  timestamp: error.timestamp,
});

// Error logging
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly log: (level: LogLevel, message: string, context?: Record<string, unknown>) => void;
}

export const consoleLogger: Logger = {
  log: (level, message, context) => {
    // Skip all logs in test environment if LOG_LEVEL is not set
    if (process.env['NODE_ENV'] === 'test' && !process.env['LOG_LEVEL']) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    switch (level) {
      case 'error':
        console.error(logMessage, context);
        break;
      case 'warn':
        console.warn(logMessage, context);
        break;
      default:
        if (level === 'debug' && process.env['NODE_ENV'] === 'production') {
          return;
        }
        console.log(logMessage, context);
    }
  },
};

// Log error with context
export const logError = (
  logger: Logger,
  error: SyncError,
  context?: Record<string, unknown>,
): void => {
  const errorContext = {
    ...context,
    errorType: error.type,
    timestamp: error.timestamp,
    ...(error.context || {}),
  };

  logger.log('error', error.message, errorContext);
};

// Wrap task with error handling and logging
export const withErrorHandling = <A>(
  task: TaskEither<unknown, A>,
  logger: Logger = consoleLogger,
  context?: Record<string, unknown>,
): TaskEither<SyncError, A> =>
  pipe(
    task,
    TE.mapLeft((error) => {
      const syncError = toSyncError(error);
      logError(logger, syncError, context);
      return syncError;
    }),
  );
