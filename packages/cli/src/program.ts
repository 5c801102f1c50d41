import { Command } from 'commander';
import { version } from '../package.json';
import { registerPlanCommand } from './commands/plan';
import { registerAnalyzeCommand } from './commands/analyze';
import { registerDoctorCommand } from './commands/doctor';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('gamemind')
    .description('Hierarchical planner: subgoal decomposition refined by tree search')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append planning events, warnings and errors to a JSONL file');

  registerPlanCommand(program);
  registerAnalyzeCommand(program);
  registerDoctorCommand(program);

  return program;
}
