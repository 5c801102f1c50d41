import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import {
  ConfigError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProbeResult,
} from '@gamemind/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';

export interface OpenAIAdapterConfig {
  model: string;
  apiKey?: string;
  /** Root of an OpenAI-compatible API, e.g. `http://localhost:11434/v1` */
  baseUrl?: string;
}

function toChatCompletionMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Chat-completions backend for any OpenAI-compatible server.
 */
export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIAdapterConfig) {
    super();
    if (!config.apiKey) {
      throw new ConfigError(
        'Missing API key for OpenAI-compatible oracle. Set oracle.apiKey or oracle.apiKeyEnv.',
      );
    }
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.id(), this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: req.messages.map(toChatCompletionMessage),
            max_tokens: req.maxTokens,
            temperature: req.temperature,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content ?? undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  async probe(timeoutMs: number): Promise<ProbeResult> {
    try {
      const page = await this.client.models.list({ timeout: timeoutMs });
      return { available: true, models: page.data.map((m) => m.id) };
    } catch (error) {
      return {
        available: false,
        models: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
