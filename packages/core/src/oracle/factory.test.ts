import { describe, it, expect } from 'vitest';
import { FakeAdapter, OllamaAdapter, OpenAIAdapter } from '@gamemind/adapters';
import { ConfigError, ConfigSchema } from '@gamemind/shared';
import { createAdapter, createOracle } from './factory';
import { FallbackOracle } from './fallback';
import { RemoteOracle } from './remote';

describe('createAdapter', () => {
  it('builds the adapter the provider names', () => {
    const base = ConfigSchema.parse({}).oracle;

    expect(createAdapter(base)).toBeInstanceOf(OllamaAdapter);
    expect(createAdapter({ ...base, provider: 'fake' })).toBeInstanceOf(FakeAdapter);
    expect(createAdapter({ ...base, provider: 'openai', apiKey: 'test-secret' })).toBeInstanceOf(
      OpenAIAdapter,
    );
  });

  it('reads the API key from the named environment variable', () => {
    const oracle = ConfigSchema.parse({ oracle: { provider: 'openai', apiKeyEnv: 'TEST_KEY' } }).oracle;

    expect(createAdapter(oracle, { TEST_KEY: 'test-secret' })).toBeInstanceOf(OpenAIAdapter);
    expect(() => createAdapter(oracle, {})).toThrow(ConfigError);
  });
});

describe('createOracle', () => {
  it('uses the rule table when the oracle is disabled', async () => {
    const config = ConfigSchema.parse({ oracle: { enabled: false } });
    expect(await createOracle(config)).toBeInstanceOf(FallbackOracle);
  });

  it('uses the rule table when subgoal generation is disabled', async () => {
    const config = ConfigSchema.parse({ planning: { subgoalGeneration: { enabled: false } } });
    expect(await createOracle(config)).toBeInstanceOf(FallbackOracle);
  });

  it('probes the backend of a remote oracle', async () => {
    const config = ConfigSchema.parse({ oracle: { provider: 'fake' } });
    const oracle = await createOracle(config, { adapter: new FakeAdapter({ available: false }) });

    expect(oracle).toBeInstanceOf(RemoteOracle);
    expect(oracle instanceof RemoteOracle && oracle.enabled).toBe(false);
  });

  it('can skip the probe', async () => {
    const config = ConfigSchema.parse({ oracle: { provider: 'fake' } });
    const oracle = await createOracle(config, {
      adapter: new FakeAdapter({ available: false }),
      probe: false,
    });

    expect(oracle instanceof RemoteOracle && oracle.enabled).toBe(true);
  });
});
