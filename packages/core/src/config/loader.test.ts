import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from './loader';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.gamemind', 'config.yaml');
  const repoPath = path.join(mockCwd, '.gamemind.yaml');

  function withFiles(files: Record<string, unknown>) {
    vi.mocked(fs.existsSync).mockImplementation((p) => String(p) in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => {
      const content = files[String(p)];
      return typeof content === 'string' ? content : yaml.dump(content);
    });
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('should return schema defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });

      expect(config.configVersion).toBe(1);
      expect(config.planning).toEqual({
        enabled: true,
        mctsSimulations: 100,
        maxDepth: 10,
        explorationConstant: 1.0,
        rolloutSteps: 10,
        subgoalGeneration: { enabled: true, maxSubgoals: 5 },
      });
      expect(config.oracle.provider).toBe('ollama');
      expect(config.oracle.modelName).toBe('llama2');
      expect(config.oracle.baseUrl).toBeUndefined();
      expect(config.oracle.maxTokens).toBe(128);
      expect(config.oracle.temperature).toBe(0.7);
      expect(config.oracle.prompts.subgoalGeneration).toBe(
        'Generate 3-5 specific subgoals for: {goal}',
      );
    });

    it('should load user config', () => {
      withFiles({ [userPath]: { planning: { mctsSimulations: 25 } } });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.planning.mctsSimulations).toBe(25);
      expect(config.planning.maxDepth).toBe(10);
    });

    it('should respect precedence: env > flags > explicit > repo > user', () => {
      withFiles({
        [userPath]: { planning: { maxDepth: 1 }, oracle: { modelName: 'user-model' } },
        [repoPath]: { planning: { maxDepth: 2, explorationConstant: 0.5 } },
        '/explicit/config.yaml': { planning: { maxDepth: 3 } },
      });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        flags: { planning: { maxDepth: 4 }, oracle: { modelName: 'flag-model' } },
        env: { GAMEMIND_ORACLE_MODEL: 'env-model' },
      });

      expect(config.planning.maxDepth).toBe(4);
      expect(config.planning.explorationConstant).toBe(0.5);
      expect(config.oracle.modelName).toBe('env-model');
    });

    it('should deep-merge nested sections instead of replacing them', () => {
      withFiles({
        [userPath]: { planning: { subgoalGeneration: { maxSubgoals: 3 } } },
        [repoPath]: { planning: { subgoalGeneration: { enabled: false } } },
      });

      const config = ConfigLoader.load({ cwd: mockCwd, env: {} });
      expect(config.planning.subgoalGeneration).toEqual({ enabled: false, maxSubgoals: 3 });
    });

    it('should apply the base URL override from the environment', () => {
      const config = ConfigLoader.load({
        cwd: mockCwd,
        env: { GAMEMIND_ORACLE_BASE_URL: 'http://gpu-box:11434' },
      });
      expect(config.oracle.baseUrl).toBe('http://gpu-box:11434');
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: '/missing.yaml', env: {} })).toThrow(
        /Config file not found/,
      );
    });

    it('should fail on invalid YAML', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('invalid: yaml: :');

      expect(() => ConfigLoader.load({ configPath: '/invalid.yaml', env: {} })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('should fail when a file holds a list instead of a mapping', () => {
      withFiles({ '/list.yaml': '- a\n- b\n' });

      expect(() => ConfigLoader.load({ configPath: '/list.yaml', env: {} })).toThrow(
        /must contain a mapping/,
      );
    });

    it('should fail on schema validation', () => {
      withFiles({ '/config.yaml': { planning: { mctsSimulations: 0 } } });

      expect(() => ConfigLoader.load({ configPath: '/config.yaml', env: {} })).toThrow(
        /Configuration validation failed:\n- planning.mctsSimulations:/,
      );
    });

    it('should resolve apiKeyEnv', () => {
      withFiles({
        '/config.yaml': { oracle: { provider: 'openai', apiKeyEnv: 'MY_API_KEY' } },
      });

      const config = ConfigLoader.load({
        configPath: '/config.yaml',
        env: { MY_API_KEY: 'test-secret' },
      });
      expect(config.oracle.apiKey).toBe('test-secret');
    });

    it('should keep an explicit apiKey over apiKeyEnv', () => {
      withFiles({
        '/config.yaml': { oracle: { apiKey: 'file-key', apiKeyEnv: 'MY_API_KEY' } },
      });

      const config = ConfigLoader.load({
        configPath: '/config.yaml',
        env: { MY_API_KEY: 'test-secret' },
      });
      expect(config.oracle.apiKey).toBe('file-key');
    });
  });

  describe('mergeConfigs', () => {
    it('should replace arrays and primitives', () => {
      const merged = ConfigLoader.mergeConfigs(
        { a: [1, 2], b: 'x', c: { d: 1 } },
        { a: [3], b: 'y', c: undefined },
      );
      expect(merged).toEqual({ a: [3], b: 'y', c: { d: 1 } });
    });
  });
});
