import pc from 'picocolors';
import { AppError } from '@gamemind/shared';
import { printTable } from './table';

export interface PlanOutput {
  goal: string;
  runId: string;
  oracle: string;
  plan: string[];
}

export interface AnalysisOutput {
  task: string;
  oracle: string;
  rationale: string;
  complexity: string;
  estimatedSteps: number;
}

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface DoctorCheck {
  status: CheckStatus;
  message: string;
}

export interface DoctorOutput {
  checks: DoctorCheck[];
  models: string[];
}

const CHECK_ICONS: Record<CheckStatus, string> = {
  ok: pc.green('✔'),
  warn: pc.yellow('!'),
  fail: pc.red('✖'),
};

/**
 * Writes command results to stdout, either as pretty JSON or for humans.
 * Diagnostics go to stderr so `--json` output stays machine-readable.
 */
export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderPlan(data: PlanOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    console.log(`${pc.bold('Goal:')} ${data.goal}`);
    console.log(pc.gray(`Oracle: ${data.oracle}  Run ID: ${data.runId}`));
    if (data.plan.length === 0) {
      console.log(pc.yellow('\nNo plan produced.'));
      return;
    }
    console.log(pc.bold('\nPlan:'));
    data.plan.forEach((step, i) => console.log(`  ${i + 1}. ${step}`));
  }

  renderAnalysis(data: AnalysisOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    console.log(`${pc.bold('Task:')} ${data.task}`);
    console.log(`${pc.bold('Complexity:')} ${data.complexity}`);
    console.log(`${pc.bold('Estimated steps:')} ${data.estimatedSteps}`);
    console.log(pc.bold('\nRationale:'));
    console.log(`  ${data.rationale}`);
    console.log(pc.gray(`\nOracle: ${data.oracle}`));
  }

  renderDoctor(data: DoctorOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    console.log(pc.bold('GameMind Environment Checkup'));
    console.log('---------------------------------');
    data.checks.forEach((check) => console.log(`${CHECK_ICONS[check.status]} ${check.message}`));
    console.log('---------------------------------');

    printTable(
      data.models.map((model) => ({ model })),
      { head: ['Available models'] },
    );

    if (data.checks.some((check) => check.status === 'fail')) {
      console.log(
        pc.red(pc.bold('Doctor checks failed.')) +
          ' Planning will use the built-in rule table until the issues marked with ' +
          CHECK_ICONS.fail +
          ' are resolved.',
      );
    } else {
      console.log(pc.green(pc.bold('All checks passed.')));
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.error(pc.gray(message));
    }
  }

  error(error: unknown, verbose = false): void {
    if (this.isJson) {
      console.log(JSON.stringify({ error: errorPayload(error) }));
      return;
    }

    console.error(pc.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    const details = error instanceof AppError ? error.details : undefined;
    if (details) {
      console.error(
        `  Details: ${typeof details === 'string' ? details : JSON.stringify(details, null, 2)}`,
      );
    }
    if (verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(pc.gray('\nFor more details, run with the --verbose flag.'));
    }
  }
}

export function errorPayload(error: unknown): {
  code: string;
  message: string;
  details?: Record<string, unknown> | string;
} {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return {
    code: 'UnknownError',
    message: error instanceof Error ? error.message : String(error),
  };
}
