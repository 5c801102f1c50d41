import {
  ConfigError,
  DEFAULT_OLLAMA_BASE_URL,
  NoopLogger,
  type Config,
  type Logger,
  type OracleConfig,
} from '@gamemind/shared';
import {
  FakeAdapter,
  OllamaAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
} from '@gamemind/adapters';
import { FallbackOracle } from './fallback';
import { RemoteOracle } from './remote';
import type { SubgoalOracle } from './types';

export interface OracleFactoryOptions {
  logger?: Logger;
  runId?: string;
  env?: NodeJS.ProcessEnv;
  /** Use this adapter instead of the one `oracle.provider` names */
  adapter?: ProviderAdapter;
  /** Probe the backend before returning. Default: true */
  probe?: boolean;
}

function resolveApiKey(config: OracleConfig, env: NodeJS.ProcessEnv): string | undefined {
  if (config.apiKey) return config.apiKey;
  if (config.apiKeyEnv) return env[config.apiKeyEnv];
  return undefined;
}

export function createAdapter(
  config: OracleConfig,
  env: NodeJS.ProcessEnv = process.env,
): ProviderAdapter {
  const apiKey = resolveApiKey(config, env);
  switch (config.provider) {
    case 'ollama':
      return new OllamaAdapter({
        baseUrl: config.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        model: config.modelName,
        apiKey,
      });
    case 'openai':
      if (!apiKey) {
        throw new ConfigError(
          `OpenAI provider requires an API key (set oracle.apiKey or the variable named by oracle.apiKeyEnv)`,
        );
      }
      return new OpenAIAdapter({ model: config.modelName, apiKey, baseUrl: config.baseUrl });
    case 'fake':
      return new FakeAdapter();
  }
}

/**
 * Builds the oracle a configuration asks for: the rule table when the oracle
 * or subgoal generation is disabled, a probed {@link RemoteOracle} otherwise.
 */
export async function createOracle(
  config: Config,
  options: OracleFactoryOptions = {},
): Promise<SubgoalOracle> {
  if (!config.oracle.enabled || !config.planning.subgoalGeneration.enabled) {
    return new FallbackOracle();
  }

  const logger = options.logger ?? new NoopLogger();
  const adapter = options.adapter ?? createAdapter(config.oracle, options.env);
  const oracle = new RemoteOracle({
    adapter,
    logger: logger.child({ oracle: adapter.id() }),
    runId: options.runId,
    prompts: config.oracle.prompts,
    maxTokens: config.oracle.maxTokens,
    temperature: config.oracle.temperature,
    timeoutMs: config.oracle.timeoutMs,
    probeTimeoutMs: config.oracle.probeTimeoutMs,
    maxRetries: config.oracle.maxRetries,
  });

  if (options.probe ?? true) {
    await oracle.init();
  }
  return oracle;
}
