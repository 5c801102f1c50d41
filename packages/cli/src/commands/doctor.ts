import type { Command } from 'commander';
import { ConfigLoader, createAdapter } from '@gamemind/core';
import type { ProviderAdapter } from '@gamemind/adapters';
import { DEFAULT_OLLAMA_BASE_URL, errorMessage, type Config } from '@gamemind/shared';
import type { GlobalOptions } from '../context';
import { OutputRenderer, type DoctorCheck, type DoctorOutput } from '../output/renderer';

function modelInstalled(model: string, installed: string[]): boolean {
  return installed.some((name) => name === model || name.startsWith(`${model}:`));
}

function describeBackend(config: Config): string {
  const oracle = config.oracle;
  const baseUrl =
    oracle.baseUrl ?? (oracle.provider === 'ollama' ? DEFAULT_OLLAMA_BASE_URL : 'default endpoint');
  return `${oracle.provider} (${oracle.modelName} at ${baseUrl})`;
}

/**
 * Checks that the configured oracle backend can serve planning requests.
 * Never throws; every problem becomes a failed check.
 */
export async function runDoctorChecks(
  config: Config,
  adapterOverride?: ProviderAdapter,
): Promise<DoctorOutput> {
  const checks: DoctorCheck[] = [];
  const oracle = config.oracle;

  if (!config.planning.enabled) {
    checks.push({ status: 'warn', message: 'Planning is disabled; every plan will be empty.' });
  }
  if (!oracle.enabled || !config.planning.subgoalGeneration.enabled) {
    checks.push({
      status: 'ok',
      message: 'Oracle disabled; subgoals come from the built-in rule table.',
    });
    return { checks, models: [] };
  }

  let adapter: ProviderAdapter;
  try {
    adapter = adapterOverride ?? createAdapter(oracle);
  } catch (error: unknown) {
    checks.push({ status: 'fail', message: `Cannot build oracle backend: ${errorMessage(error)}` });
    return { checks, models: [] };
  }

  if (!adapter.probe) {
    checks.push({
      status: 'warn',
      message: `Backend ${describeBackend(config)} cannot be probed; assuming it is reachable.`,
    });
    return { checks, models: [] };
  }

  const result = await adapter.probe(oracle.probeTimeoutMs);
  if (!result.available) {
    checks.push({
      status: 'fail',
      message: `Backend ${describeBackend(config)} unreachable: ${result.error ?? 'no reason given'}`,
    });
    return { checks, models: [] };
  }

  checks.push({ status: 'ok', message: `Backend ${describeBackend(config)} reachable.` });
  if (result.models.length > 0 && !modelInstalled(oracle.modelName, result.models)) {
    checks.push({
      status: 'warn',
      message: `Model '${oracle.modelName}' is not among the ${result.models.length} models the backend reports.`,
    });
  }
  return { checks, models: result.models };
}

export const registerDoctorCommand = (program: Command) => {
  program
    .command('doctor')
    .description('Check configuration and oracle backend availability')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      let output: DoctorOutput;
      try {
        const config = ConfigLoader.load({ configPath: globalOpts.config });
        output = await runDoctorChecks(config);
        output.checks.unshift({ status: 'ok', message: 'Configuration is valid.' });
      } catch (error: unknown) {
        output = {
          checks: [{ status: 'fail', message: `Failed to load configuration: ${errorMessage(error)}` }],
          models: [],
        };
      }

      renderer.renderDoctor(output);
      if (output.checks.some((check) => check.status === 'fail')) {
        process.exitCode = 1;
      }
    });
};
