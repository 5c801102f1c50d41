import { z } from 'zod';

export const DEFAULT_SUBGOAL_PROMPT = 'Generate 3-5 specific subgoals for: {goal}';
export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_TASK_ANALYSIS_PROMPT =
  'Analyze the current task: {task}. What are the key steps needed?';

export const SubgoalGenerationConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxSubgoals: z.number().int().min(1).default(5),
  })
  .default({});

export const PlanningConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    mctsSimulations: z.number().int().min(1).default(100),
    maxDepth: z.number().int().min(1).default(10),
    explorationConstant: z.number().min(0).default(1.0),
    /** Length of the default random rollout used to evaluate leaves */
    rolloutSteps: z.number().int().min(1).default(10),
    /** Seed for the search's random source; unseeded runs use Math.random */
    seed: z.number().int().optional(),
    subgoalGeneration: SubgoalGenerationConfigSchema,
  })
  .default({});

export const OracleProviderSchema = z.enum(['ollama', 'openai', 'fake']);

export const OraclePromptsSchema = z
  .object({
    subgoalGeneration: z.string().default(DEFAULT_SUBGOAL_PROMPT),
    taskAnalysis: z.string().default(DEFAULT_TASK_ANALYSIS_PROMPT),
  })
  .default({});

export const OracleConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    provider: OracleProviderSchema.default('ollama'),
    modelName: z.string().min(1).default('llama2'),
    /** Server root. Default: DEFAULT_OLLAMA_BASE_URL for ollama, the SDK default for openai */
    baseUrl: z.string().url().optional(),
    /** Name of the environment variable holding a bearer token, if the backend needs one */
    apiKeyEnv: z.string().optional(),
    apiKey: z.string().optional(),
    maxTokens: z.number().int().min(1).default(128),
    temperature: z.number().min(0).max(2).default(0.7),
    timeoutMs: z.number().int().min(1).default(30_000),
    probeTimeoutMs: z.number().int().min(1).default(5_000),
    maxRetries: z.number().int().min(0).default(0),
    prompts: OraclePromptsSchema,
  })
  .default({});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  planning: PlanningConfigSchema,
  oracle: OracleConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type PlanningConfig = z.infer<typeof PlanningConfigSchema>;
export type OracleConfig = z.infer<typeof OracleConfigSchema>;
export type OracleProvider = z.infer<typeof OracleProviderSchema>;
export type OraclePrompts = z.infer<typeof OraclePromptsSchema>;

/**
 * Recursively optional version of a config shape, used for file and flag layers.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends Array<infer U>
    ? Array<U>
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};
