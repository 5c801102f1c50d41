import { describe, it, expect } from 'vitest';
import { NoopLogger, type ModelRequest, type ModelResponse } from '@gamemind/shared';
import { name, type AdapterContext, type ProviderAdapter } from './index';

class MockAdapter implements ProviderAdapter {
  id(): string {
    return 'mock-adapter';
  }

  async generate(_req: ModelRequest, _ctx: AdapterContext): Promise<ModelResponse> {
    return { text: '1. Mock subgoal', usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } };
  }
}

describe('adapters package', () => {
  it('exports name', () => {
    expect(name).toBe('@gamemind/adapters');
  });

  it('lets any class implement ProviderAdapter without a probe', async () => {
    const adapter: ProviderAdapter = new MockAdapter();
    const ctx: AdapterContext = { runId: 'test-run', logger: new NoopLogger() };

    expect(adapter.probe).toBeUndefined();
    expect((await adapter.generate({ messages: [] }, ctx)).text).toBe('1. Mock subgoal');
  });
});
