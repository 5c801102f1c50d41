import { ConfigError, UsageError } from '@gamemind/shared';
import { createProgram } from './program';
import type { GlobalOptions } from './context';
import { OutputRenderer } from './output/renderer';

export const name = '@gamemind/cli';

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    const opts = program.opts<GlobalOptions>();
    new OutputRenderer(!!opts.json).error(e, !!opts.verbose);

    return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
  }
}

export { createProgram };
