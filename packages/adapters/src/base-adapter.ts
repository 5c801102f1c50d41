import { ConfigError, HttpError, RateLimitError, TimeoutError } from '@gamemind/shared';

/**
 * Interface for API error types that have a status code.
 * Used by the base adapter to handle common error mapping.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Configuration for error type checking in provider adapters.
 * Each provider can supply its own error class checks.
 */
export interface ErrorTypeConfig {
  /** Check if the error is an API error with status code */
  isAPIError: (error: unknown) => error is APIErrorLike;
  /** Check if the error is a connection timeout error */
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for oracle backend adapters that provides common error mapping logic.
 * Subclasses configure error type checks for their specific client.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Maps provider-specific errors to standardized errors:
   * - 429 status -> RateLimitError
   * - 401/403 status -> ConfigError
   * - other statuses -> HttpError
   * - Timeout errors -> TimeoutError
   * - Other errors -> passed through or wrapped
   */
  protected mapError(error: unknown): Error {
    if (error instanceof TimeoutError || error instanceof ConfigError) {
      return error;
    }

    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
      if (typeof error.status === 'number') {
        return new HttpError(error.message, { cause: error, status: error.status });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
