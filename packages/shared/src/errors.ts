/**
 * Error codes used throughout the planner.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'OracleUnavailable'
  | 'MalformedResponse'
  | 'HttpError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'SearchError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all planner errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'Backend request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'ollama' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * Raised at construction time, never while planning.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when an oracle backend fails.
 * May be retryable depending on the underlying cause.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * The oracle backend could not be reached, timed out, or answered with a
 * non-success status. Oracles recover from it locally.
 */
export class OracleUnavailableError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('OracleUnavailable', message, options);
  }
}

/**
 * The oracle backend answered, but with text that yields nothing usable.
 */
export class MalformedResponseError extends AppError {
  /** The raw backend text, kept for diagnostics */
  public readonly rawText: string;

  constructor(message: string, rawText: string, options: AppErrorOptions = {}) {
    super('MalformedResponse', message, options);
    this.rawText = rawText;
  }
}

/**
 * Error thrown for HTTP-related failures.
 * Includes the response status when one was received.
 */
export class HttpError extends AppError {
  /** HTTP status code of the failed response */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('HttpError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when rate limited by a backend.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when the tree search is handed something it cannot use,
 * such as a non-finite leaf estimate.
 */
export class SearchError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SearchError', message, options);
  }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
