import { z } from 'zod';
import { ConfigError, type PlanningConfig } from '@gamemind/shared';

const PlannerConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    mctsSimulations: z.number().int().min(1).default(100),
    maxDepth: z.number().int().min(1).default(10),
    explorationConstant: z.number().finite().min(0).default(1.0),
    rolloutSteps: z.number().int().min(1).default(10),
    seed: z.number().int().optional(),
    subgoalGenerationEnabled: z.boolean().default(true),
    maxSubgoals: z.number().int().min(1).default(5),
  })
  .strict();

export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;
export type PlannerConfig = Readonly<z.output<typeof PlannerConfigSchema>>;

/**
 * Validates planner settings once. The result is frozen; invalid values throw
 * a {@link ConfigError} listing every offending field.
 *
 * @example
 * ```typescript
 * const config = createPlannerConfig({ mctsSimulations: 50, maxDepth: 3 });
 * ```
 */
export function createPlannerConfig(input: PlannerConfigInput = {}): PlannerConfig {
  const result = PlannerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Planner configuration invalid:\n${issues}`, {
      details: { issues: result.error.issues },
    });
  }
  return Object.freeze(result.data);
}

/** Flattens the `planning` section of a loaded configuration. */
export function plannerConfigFromPlanning(planning: PlanningConfig): PlannerConfig {
  return createPlannerConfig({
    enabled: planning.enabled,
    mctsSimulations: planning.mctsSimulations,
    maxDepth: planning.maxDepth,
    explorationConstant: planning.explorationConstant,
    rolloutSteps: planning.rolloutSteps,
    seed: planning.seed,
    subgoalGenerationEnabled: planning.subgoalGeneration.enabled,
    maxSubgoals: planning.subgoalGeneration.maxSubgoals,
  });
}
