import type {
  ModelRequest,
  ModelResponse,
  ProbeResult,
} from '@gamemind/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { messagesToPrompt } from '../common';

const CANNED_REPLIES: Array<{ keyword: string; reply: string }> = [
  {
    keyword: 'collect',
    reply: '1. Find resource location\n2. Approach resource\n3. Use appropriate tool\n4. Gather resource',
  },
  {
    keyword: 'craft',
    reply: '1. Gather required materials\n2. Find crafting station\n3. Select recipe\n4. Craft item',
  },
  {
    keyword: 'defeat',
    reply: '1. Find enemy\n2. Equip weapon\n3. Approach carefully\n4. Attack and retreat',
  },
];

const DEFAULT_REPLY =
  '1. Explore environment\n2. Gather resources\n3. Complete objective\n4. Return to base';

export interface FakeAdapterConfig {
  /**
   * Replies handed out in order, one per `generate` call. An Error entry is
   * thrown instead of returned. Once exhausted, canned keyword replies are used.
   */
  script?: Array<string | Error>;
  /** What `probe` reports. Default: available */
  available?: boolean;
  models?: string[];
}

/**
 * Offline backend with keyword-driven numbered-list replies.
 * Used by tests and by `--offline` runs of the CLI.
 */
export class FakeAdapter implements ProviderAdapter {
  /** Every request received, in order */
  readonly requests: ModelRequest[] = [];
  private readonly script: Array<string | Error>;

  constructor(private readonly config: FakeAdapterConfig = {}) {
    this.script = [...(config.script ?? [])];
  }

  id(): string {
    return 'fake';
  }

  async generate(request: ModelRequest, _context: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);

    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next !== undefined) {
      return { text: next };
    }

    const prompt = messagesToPrompt(request.messages).toLowerCase();
    const match = CANNED_REPLIES.find((entry) => prompt.includes(entry.keyword));
    return { text: match ? match.reply : DEFAULT_REPLY };
  }

  async probe(_timeoutMs: number): Promise<ProbeResult> {
    const available = this.config.available ?? true;
    return {
      available,
      models: available ? (this.config.models ?? ['fake']) : [],
      error: available ? undefined : 'Fake backend configured as unavailable',
    };
  }
}
