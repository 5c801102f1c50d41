import type { Command } from 'commander';
import { Planner, createOracle, plannerConfigFromPlanning } from '@gamemind/core';
import type { Config, DeepPartial } from '@gamemind/shared';
import { createCommandContext } from '../context';
import { parseIntegerOption, parseNumberOption, parseStateOption } from './options';

export interface PlanCommandOptions {
  state?: string;
  simulations?: string;
  maxDepth?: string;
  exploration?: string;
  seed?: string;
  offline?: boolean;
}

/**
 * Translates `plan` flags into a configuration layer. Only flags that were
 * given are set, so file and default values still apply.
 */
export function planFlags(options: PlanCommandOptions): DeepPartial<Config> {
  const planning: DeepPartial<Config['planning']> = {};
  if (options.simulations !== undefined) {
    planning.mctsSimulations = parseIntegerOption('--simulations', options.simulations, 1);
  }
  if (options.maxDepth !== undefined) {
    planning.maxDepth = parseIntegerOption('--max-depth', options.maxDepth, 1);
  }
  if (options.exploration !== undefined) {
    planning.explorationConstant = parseNumberOption('--exploration', options.exploration, 0);
  }
  if (options.seed !== undefined) {
    planning.seed = parseIntegerOption('--seed', options.seed, 0);
  }

  const flags: DeepPartial<Config> = { planning };
  if (options.offline) {
    flags.oracle = { provider: 'fake' };
  }
  return flags;
}

export function registerPlanCommand(program: Command) {
  program
    .command('plan')
    .argument('<goal>', 'The goal to plan for')
    .description('Decompose a goal into subgoals and order them with tree search')
    .option('--state <json>', 'Current observation (JSON, or a plain description)')
    .option('--simulations <n>', 'Search iterations (integer >= 1)')
    .option('--max-depth <n>', 'Deepest node the search expands (integer >= 1)')
    .option('--exploration <c>', 'UCB1 exploration constant (number >= 0)')
    .option('--seed <n>', 'Seed the search for reproducible plans')
    .option('--offline', 'Answer oracle requests locally instead of calling the backend')
    .action(async (goal: string, options: PlanCommandOptions) => {
      const ctx = createCommandContext(program, planFlags(options));
      const observation = parseStateOption(options.state);

      if (ctx.verbose) ctx.renderer.log(`Planning goal: "${goal}"`);

      const oracle = await createOracle(ctx.config, { logger: ctx.logger, runId: ctx.runId });
      const planner = new Planner({
        config: plannerConfigFromPlanning(ctx.config.planning),
        oracle,
        logger: ctx.logger,
        runId: ctx.runId,
      });

      const plan = await planner.plan(observation, goal);

      ctx.renderer.renderPlan({ goal, runId: ctx.runId, oracle: planner.oracle.id(), plan });
    });
}
