import { z } from 'zod';
import {
  ConfigError,
  TimeoutError,
  type ModelRequest,
  type ModelResponse,
  type ProbeResult,
} from '@gamemind/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest, messagesToPrompt } from '../common';

export interface OllamaAdapterConfig {
  /** Server root, e.g. `http://localhost:11434` */
  baseUrl: string;
  model: string;
  /** Sent as a bearer token when set (for servers behind an auth proxy) */
  apiKey?: string;
}

const GenerateResponseSchema = z
  .object({
    response: z.string().default(''),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
  })
  .passthrough();

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

const OLLAMA_SAMPLING_DEFAULTS = {
  top_p: 0.9,
  repeat_penalty: 1.1,
};

class OllamaStatusError extends Error implements APIErrorLike {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'OllamaStatusError';
  }
}

/**
 * Talks to an Ollama-compatible `/api/generate` endpoint over HTTP.
 * Stateless between calls; safe to share across concurrent planners.
 */
export class OllamaAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof OllamaStatusError,
    isTimeoutError: (error: unknown) =>
      error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError'),
  };

  private readonly baseUrl: string;
  private readonly model: string;
  private readonly apiKey?: string;

  constructor(config: OllamaAdapterConfig) {
    super();
    if (!config.baseUrl) {
      throw new ConfigError('Ollama provider requires a baseUrl');
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.apiKey = config.apiKey;
  }

  id(): string {
    return 'ollama';
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const payload = {
      model: this.model,
      prompt: messagesToPrompt(req.messages),
      stream: false,
      options: {
        num_predict: req.maxTokens,
        temperature: req.temperature,
        ...OLLAMA_SAMPLING_DEFAULTS,
      },
    };

    return executeProviderRequest(ctx, this.id(), this.model, async (signal) => {
      try {
        const response = await fetch(`${this.baseUrl}/api/generate`, {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify(payload),
          signal,
        });

        if (!response.ok) {
          const errorBody = await response.text();
          throw new OllamaStatusError(
            `Ollama API error: ${response.status} ${response.statusText} - ${errorBody}`,
            response.status,
          );
        }

        const parsed = GenerateResponseSchema.parse(await response.json());
        const inputTokens = parsed.prompt_eval_count;
        const outputTokens = parsed.eval_count;
        return {
          text: parsed.response,
          usage:
            inputTokens !== undefined || outputTokens !== undefined
              ? {
                  inputTokens,
                  outputTokens,
                  totalTokens: (inputTokens ?? 0) + (outputTokens ?? 0),
                }
              : undefined,
          raw: parsed,
        };
      } catch (error) {
        const reason: unknown = signal.reason;
        if (signal.aborted && reason instanceof TimeoutError) {
          throw reason;
        }
        throw this.mapError(error);
      }
    });
  }

  /**
   * Lists the installed models via `GET /api/tags`; reachability doubles as
   * the availability check.
   */
  async probe(timeoutMs: number): Promise<ProbeResult> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        return {
          available: false,
          models: [],
          error: `Ollama server returned status ${response.status}`,
        };
      }
      const parsed = TagsResponseSchema.safeParse(await response.json());
      return {
        available: true,
        models: parsed.success ? parsed.data.models.map((m) => m.name) : [],
      };
    } catch (error) {
      return {
        available: false,
        models: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
