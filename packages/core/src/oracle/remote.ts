import {
  DEFAULT_SUBGOAL_PROMPT,
  DEFAULT_TASK_ANALYSIS_PROMPT,
  MalformedResponseError,
  NoopLogger,
  OracleUnavailableError,
  errorMessage,
  writeLog,
  type Logger,
  type ModelRequest,
  type OracleFallback,
  type OraclePrompts,
} from '@gamemind/shared';
import type { AdapterContext, ProviderAdapter } from '@gamemind/adapters';
import { analysisFromRationale, FallbackOracle } from './fallback';
import { MAX_SUBGOALS, parseSubgoals } from './parsing';
import { buildSubgoalPrompt, buildTaskAnalysisPrompt } from './prompts';
import type { SubgoalOracle, TaskAnalysis } from './types';

export interface RemoteOracleOptions {
  adapter: ProviderAdapter;
  logger?: Logger;
  /** Stamped on every event this oracle emits */
  runId?: string;
  prompts?: Partial<OraclePrompts>;
  maxTokens?: number;
  temperature?: number;
  /** Per-attempt request timeout */
  timeoutMs?: number;
  probeTimeoutMs?: number;
  maxRetries?: number;
  /** Answers every failed request. Default: the built-in rule table */
  fallback?: FallbackOracle;
}

type FallbackReason = OracleFallback['payload']['reason'];

/**
 * Oracle backed by a text generation service reached through a provider adapter.
 *
 * Every failure (unreachable backend, timeout, error status, unusable text) is
 * logged and answered from the fallback rule table, so neither method rejects,
 * not even when the logger itself fails.
 * After {@link init} reports the backend unreachable the oracle stays disabled
 * and never contacts it again. `init` is the only writer of that flag; once it
 * has settled, one instance may be shared across concurrent planners.
 */
export class RemoteOracle implements SubgoalOracle {
  private readonly adapter: ProviderAdapter;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly prompts: OraclePrompts;
  private readonly fallback: FallbackOracle;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly maxRetries: number;
  private available = true;

  constructor(options: RemoteOracleOptions) {
    this.adapter = options.adapter;
    this.logger = options.logger ?? new NoopLogger();
    this.runId = options.runId ?? 'oracle';
    this.prompts = {
      subgoalGeneration: options.prompts?.subgoalGeneration ?? DEFAULT_SUBGOAL_PROMPT,
      taskAnalysis: options.prompts?.taskAnalysis ?? DEFAULT_TASK_ANALYSIS_PROMPT,
    };
    this.fallback = options.fallback ?? new FallbackOracle();
    this.maxTokens = options.maxTokens ?? 128;
    this.temperature = options.temperature ?? 0.7;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    this.maxRetries = options.maxRetries ?? 0;
  }

  /**
   * Constructs an oracle and probes its backend once.
   */
  static async connect(options: RemoteOracleOptions): Promise<RemoteOracle> {
    const oracle = new RemoteOracle(options);
    await oracle.init();
    return oracle;
  }

  id(): string {
    return `remote:${this.adapter.id()}`;
  }

  get enabled(): boolean {
    return this.available;
  }

  /**
   * Probes the backend. An unreachable backend disables the oracle for good.
   * Adapters without a probe are assumed reachable.
   */
  async init(): Promise<boolean> {
    if (!this.adapter.probe) {
      return this.available;
    }
    let reason: string | undefined;
    try {
      const result = await this.adapter.probe(this.probeTimeoutMs);
      if (result.available) {
        return this.available;
      }
      reason = result.error;
    } catch (error) {
      reason = errorMessage(error);
    }

    this.available = false;
    await this.warn(
      `Oracle backend ${this.adapter.id()} unavailable, using rule table: ${reason ?? 'no reason given'}`,
    );
    await this.emitFallback('probe', 'unavailable', reason);
    return this.available;
  }

  async generateSubgoals(goal: string, currentState?: unknown): Promise<string[]> {
    if (!this.available) {
      await this.emitFallback('generateSubgoals', 'disabled');
      return this.fallback.subgoalsFor(goal);
    }

    const prompt = buildSubgoalPrompt(this.prompts.subgoalGeneration, goal, currentState);
    try {
      const text = await this.complete(prompt);
      const subgoals = parseSubgoals(text, MAX_SUBGOALS);
      if (subgoals.length === 0) {
        throw new MalformedResponseError('Backend reply contained no usable subgoals', text);
      }
      return subgoals;
    } catch (error) {
      await this.recordFailure('generateSubgoals', error);
      return this.fallback.subgoalsFor(goal);
    }
  }

  async analyzeTask(task: string): Promise<TaskAnalysis> {
    if (!this.available) {
      await this.emitFallback('analyzeTask', 'disabled');
      return this.fallback.analysisFor(task);
    }

    const prompt = buildTaskAnalysisPrompt(this.prompts.taskAnalysis, task);
    try {
      const text = await this.complete(prompt);
      const rationale = text.trim();
      if (!rationale) {
        throw new MalformedResponseError('Backend reply was empty', text);
      }
      return analysisFromRationale(task, rationale);
    } catch (error) {
      await this.recordFailure('analyzeTask', error);
      return this.fallback.analysisFor(task);
    }
  }

  private async complete(prompt: string): Promise<string> {
    const request: ModelRequest = {
      messages: [{ role: 'user', content: prompt }],
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    };
    const context: AdapterContext = {
      runId: this.runId,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
      retryOptions: { maxRetries: this.maxRetries },
    };

    try {
      const response = await this.adapter.generate(request, context);
      return response.text ?? '';
    } catch (error) {
      throw new OracleUnavailableError(
        `Oracle backend ${this.adapter.id()} request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async recordFailure(
    operation: 'generateSubgoals' | 'analyzeTask',
    error: unknown,
  ): Promise<void> {
    const reason: FallbackReason =
      error instanceof MalformedResponseError ? 'malformed' : 'unavailable';
    const message = errorMessage(error);
    await this.warn(`${operation} fell back to the rule table: ${message}`);
    await this.emitFallback(operation, reason, message);
  }

  private warn(message: string): Promise<void> {
    return writeLog('oracle warning', () => this.logger.warn(message));
  }

  private async emitFallback(
    operation: OracleFallback['payload']['operation'],
    reason: FallbackReason,
    message?: string,
  ): Promise<void> {
    try {
      await this.logger.log({
        type: 'OracleFallback',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.runId,
        payload: { operation, reason, message },
      });
    } catch (error) {
      await this.warn(`Could not record OracleFallback event: ${errorMessage(error)}`);
    }
  }
}
