import type { Logger } from '@gamemind/shared';

/**
 * Configuration options for retry behavior on transient failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 2,
 *   initialDelayMs: 250,
 *   maxDelayMs: 2000,
 *   backoffFactor: 2,
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 0 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 500 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 5000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed to adapter methods for each request.
 * Provides access to logging and execution configuration.
 */
export interface AdapterContext {
  /** Identifier of the planner instance issuing the request */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Maximum time in milliseconds for one attempt */
  timeoutMs?: number;
  /** Retry configuration for transient failures */
  retryOptions?: RetryOptions;
}
