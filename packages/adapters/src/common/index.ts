import {
  ConfigError,
  RateLimitError,
  TimeoutError,
  writeLog,
  type ChatMessage,
  type PlanningEvent,
  type Usage,
} from '@gamemind/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for backend requests.
 *
 * Oracle calls sit on the planning path, so the default is a single attempt:
 * a failed call is answered from the rule table rather than waited on.
 * Callers that can afford latency raise `maxRetries` through configuration.
 *
 * ## Retriable Errors
 *
 * - `RateLimitError` (HTTP 429)
 * - `TimeoutError`
 * - Server errors (HTTP 5xx)
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter)
 * ```
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 0,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function readCount(value: unknown, key: string): number | undefined {
  const count = readField(value, key);
  return typeof count === 'number' ? count : undefined;
}

/**
 * Token counts carried by a `ModelResponse`-shaped result, if any.
 */
export function usageOf(result: unknown): Usage | undefined {
  const usage = readField(result, 'usage');
  if (typeof usage !== 'object' || usage === null) return undefined;
  return {
    inputTokens: readCount(usage, 'inputTokens'),
    outputTokens: readCount(usage, 'outputTokens'),
    totalTokens: readCount(usage, 'totalTokens'),
  };
}

/**
 * Determines if an error is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = readField(error, 'status') ?? readField(error, 'statusCode');
  if (typeof status === 'number') {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = readField(error, 'code') ?? readField(readField(error, 'cause'), 'code');
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Executes a backend request with retry and a per-attempt timeout.
 *
 * Every attempt gets its own AbortSignal, which fires once `ctx.timeoutMs`
 * elapses. Its reason is a `TimeoutError`, and that error is what the request
 * rejects with. Token usage on a successful result is copied into the
 * `ProviderRequestFinished` event. A failing logger never fails the request.
 *
 * ```typescript
 * const text = await executeProviderRequest(
 *   ctx,
 *   'ollama',
 *   'llama2',
 *   (signal) => fetch(url, { method: 'POST', body, signal }).then((r) => r.text()),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();
  const record = (event: PlanningEvent) => writeLog(`${event.type} event`, () => ctx.logger.log(event));

  await record({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      model,
    },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const abortController = new AbortController();

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
      }, ctx.timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      if (timeoutId) clearTimeout(timeoutId);

      await record({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
          usage: usageOf(result),
        },
      });

      return result;
    } catch (error: unknown) {
      if (timeoutId) clearTimeout(timeoutId);

      // A request cut off by our own timer surfaces the timer's reason.
      const reason: unknown = abortController.signal.reason;
      lastError = reason instanceof TimeoutError ? reason : error;

      if (lastError instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(lastError) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const finalDelay = Math.max(0, delay + jitter);

      await new Promise((resolve) => setTimeout(resolve, finalDelay));
    }
  }

  await record({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}

/**
 * Flattens a conversation into a single completion prompt.
 * A conversation made of one user message is sent verbatim.
 *
 * ```
 * System: <content>
 *
 * User: <content>
 *
 * Assistant:
 * ```
 */
export function messagesToPrompt(messages: ChatMessage[]): string {
  if (messages.length === 1 && messages[0].role === 'user') {
    return messages[0].content;
  }

  const labels: Record<ChatMessage['role'], string> = {
    system: 'System',
    user: 'User',
    assistant: 'Assistant',
  };

  let prompt = '';
  for (const message of messages) {
    prompt += `${labels[message.role]}: ${message.content}\n\n`;
  }
  return prompt + 'Assistant: ';
}
