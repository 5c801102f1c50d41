/**
 * A message in a conversation with an oracle backend.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Generate 3-5 specific subgoals for: survive' }],
 *   maxTokens: 128,
 *   temperature: 0.7
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation to send to the model. A lone user message is sent as a raw prompt. */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Additional metadata to pass through */
  metadata?: Record<string, unknown>;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  /** Number of tokens in the input/prompt */
  inputTokens?: number;
  /** Number of tokens generated in the output */
  outputTokens?: number;
  /** Total tokens (input + output) */
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Outcome of a backend availability probe.
 */
export interface ProbeResult {
  available: boolean;
  /** Model names the backend reported, when it lists them */
  models: string[];
  /** Why the probe failed, when it did */
  error?: string;
}
