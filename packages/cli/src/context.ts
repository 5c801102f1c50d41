import type { Command } from 'commander';
import { ConfigLoader } from '@gamemind/core';
import {
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type DeepPartial,
  type Logger,
} from '@gamemind/shared';
import { OutputRenderer } from './output/renderer';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
}

export interface CommandContext {
  config: Config;
  logger: Logger;
  renderer: OutputRenderer;
  runId: string;
  verbose: boolean;
}

/**
 * Resolves configuration, logger and renderer for one command invocation.
 */
export function createCommandContext(
  program: Command,
  flags: DeepPartial<Config> = {},
): CommandContext {
  const globalOpts = program.opts<GlobalOptions>();
  const verbose = !!globalOpts.verbose;
  const renderer = new OutputRenderer(!!globalOpts.json);

  const config = ConfigLoader.load({ configPath: globalOpts.config, flags });

  const runId = Date.now().toString();
  const logger: Logger = globalOpts.logFile
    ? new JsonlLogger(globalOpts.logFile)
    : new ConsoleLogger({ level: verbose ? 'debug' : 'warn' });

  return { config, logger, renderer, runId, verbose };
}
