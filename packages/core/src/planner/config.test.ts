import { describe, it, expect } from 'vitest';
import { ConfigError, ConfigSchema } from '@gamemind/shared';
import { createPlannerConfig, plannerConfigFromPlanning } from './config';

describe('createPlannerConfig', () => {
  it('fills defaults and freezes the result', () => {
    const config = createPlannerConfig();

    expect(config).toEqual({
      enabled: true,
      mctsSimulations: 100,
      maxDepth: 10,
      explorationConstant: 1.0,
      rolloutSteps: 10,
      subgoalGenerationEnabled: true,
      maxSubgoals: 5,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each([
    [{ mctsSimulations: 0 }, 'mctsSimulations'],
    [{ maxDepth: -1 }, 'maxDepth'],
    [{ maxSubgoals: 0 }, 'maxSubgoals'],
    [{ explorationConstant: -1 }, 'explorationConstant'],
    [{ mctsSimulations: 1.5 }, 'mctsSimulations'],
  ])('rejects %o', (input, field) => {
    expect(() => createPlannerConfig(input)).toThrow(ConfigError);
    expect(() => createPlannerConfig(input)).toThrow(`- ${field}:`);
  });

  it('rejects unknown keys', () => {
    const input = { mctsSimulations: 5, simulations: 5 };
    expect(() => createPlannerConfig(input)).toThrow(/Unrecognized key/);
  });
});

describe('plannerConfigFromPlanning', () => {
  it('flattens the planning section', () => {
    const { planning } = ConfigSchema.parse({
      planning: { mctsSimulations: 50, seed: 3, subgoalGeneration: { enabled: false, maxSubgoals: 3 } },
    });

    expect(plannerConfigFromPlanning(planning)).toEqual({
      enabled: true,
      mctsSimulations: 50,
      maxDepth: 10,
      explorationConstant: 1.0,
      rolloutSteps: 10,
      seed: 3,
      subgoalGenerationEnabled: false,
      maxSubgoals: 3,
    });
  });
});
