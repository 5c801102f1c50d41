import type {
  ModelRequest,
  ModelResponse,
  ProbeResult,
} from '@gamemind/shared';
import type { AdapterContext } from './types';

/**
 * Interface for oracle backend adapters.
 * Adapters give the remote oracle one way of talking to different text
 * generation backends (a local Ollama server, an OpenAI-compatible API, ...).
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   async generate(req, ctx) { return { text: '1. find trees' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /**
   * Returns the unique identifier for this adapter instance.
   */
  id(): string;
  /**
   * Generate a response from the model.
   * @param req - The model request containing messages and options
   * @param ctx - The adapter context with logger, abort signal, etc.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
  /**
   * Check whether the backend is reachable (optional).
   * Implementations resolve with `available: false` instead of rejecting.
   * @param timeoutMs - Upper bound for the whole probe
   */
  probe?(timeoutMs: number): Promise<ProbeResult>;
}
