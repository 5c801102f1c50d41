import type { Command } from 'commander';
import { createOracle } from '@gamemind/core';
import { createCommandContext } from '../context';

export interface AnalyzeCommandOptions {
  offline?: boolean;
}

export function registerAnalyzeCommand(program: Command) {
  program
    .command('analyze')
    .argument('<task>', 'The task to analyse')
    .description('Estimate the complexity and step count of a task')
    .option('--offline', 'Answer locally instead of calling the backend')
    .action(async (task: string, options: AnalyzeCommandOptions) => {
      const ctx = createCommandContext(
        program,
        options.offline ? { oracle: { provider: 'fake' } } : {},
      );

      const oracle = await createOracle(ctx.config, { logger: ctx.logger, runId: ctx.runId });
      const analysis = await oracle.analyzeTask(task);

      ctx.renderer.renderAnalysis({ ...analysis, oracle: oracle.id() });
    });
}
