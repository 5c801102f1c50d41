import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type DeepPartial } from '@gamemind/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: DeepPartial<Config>; // CLI flags
  cwd?: string; // directory searched for .gamemind.yaml
  env?: NodeJS.ProcessEnv;
}

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Environment variables that override a single setting, applied last. */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; section: string; key: string }> = [
  { variable: 'GAMEMIND_ORACLE_BASE_URL', section: 'oracle', key: 'baseUrl' },
  { variable: 'GAMEMIND_ORACLE_MODEL', section: 'oracle', key: 'modelName' },
];

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
    let layer: ConfigLayer = {};
    for (const { variable, section, key } of ENV_OVERRIDES) {
      const value = env[variable];
      if (value) {
        layer = this.mergeConfigs(layer, { [section]: { [key]: value } });
      }
    }
    return layer;
  }

  /**
   * Resolves the effective configuration.
   *
   * Precedence, lowest first: schema defaults, `~/.gamemind/config.yaml`,
   * `<cwd>/.gamemind.yaml`, the `--config` file, CLI flags, environment.
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    const userConfig = this.loadYaml(path.join(os.homedir(), '.gamemind', 'config.yaml'));
    const repoConfig = this.loadYaml(path.join(cwd, '.gamemind.yaml'));

    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    const flagConfig: ConfigLayer = options.flags ?? {};

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);
    merged = this.mergeConfigs(merged, this.envLayer(env));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    if (config.oracle.apiKeyEnv && !config.oracle.apiKey) {
      const fromEnv = env[config.oracle.apiKeyEnv];
      if (fromEnv) {
        config.oracle.apiKey = fromEnv;
      }
    }
    return config;
  }
}
