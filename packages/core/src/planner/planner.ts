import { randomUUID } from 'crypto';
import {
  errorMessage,
  logger as defaultLogger,
  writeLog,
  type Logger,
  type PlanningEvent,
} from '@gamemind/shared';
import { FallbackOracle } from '../oracle/fallback';
import type { SubgoalOracle } from '../oracle/types';
import { RandomRolloutEvaluator, type Evaluator } from '../search/evaluator';
import { MctsEngine } from '../search/mcts';
import { createSeededRandom, type RandomSource } from '../search/random';
import { createPlannerConfig, type PlannerConfig, type PlannerConfigInput } from './config';

/** Goal handed to the oracle when a negative reward discards the current plan. */
export const RECOVERY_GOAL = 'recover from failure';

export interface PlannerOptions<TObservation> {
  /** Validated config, or raw settings to validate */
  config?: PlannerConfig | PlannerConfigInput;
  /** Default: the rule-table oracle */
  oracle?: SubgoalOracle;
  /** Default: a random rollout of `config.rolloutSteps` steps */
  evaluator?: Evaluator<TObservation>;
  /** Default: seeded from `config.seed` when set, Math.random otherwise */
  random?: RandomSource;
  deriveState?: (parentState: TObservation, action: string) => TObservation;
  logger?: Logger;
  runId?: string;
}

/**
 * Hierarchical planner: an oracle proposes subgoals for a goal, and a tree
 * search orders them into a plan.
 *
 * Neither {@link plan} nor {@link updatePlan} rejects. Internal failures are
 * logged as `PlanFailed` and produce an empty plan.
 *
 * @example
 * ```typescript
 * const planner = new Planner({ config: { mctsSimulations: 50, maxDepth: 3 } });
 * const steps = await planner.plan(observation, 'defeat zombie');
 * // e.g. ['find weapon', 'attack', 'approach enemy']
 * ```
 */
export class Planner<TObservation = unknown> {
  readonly config: PlannerConfig;
  readonly oracle: SubgoalOracle;
  readonly runId: string;
  private readonly engine: MctsEngine<TObservation>;
  private readonly logger: Logger;

  constructor(options: PlannerOptions<TObservation> = {}) {
    this.config = createPlannerConfig(options.config);
    this.oracle =
      this.config.subgoalGenerationEnabled && options.oracle
        ? options.oracle
        : new FallbackOracle();
    this.runId = options.runId ?? randomUUID();
    this.logger = (options.logger ?? defaultLogger).child({ runId: this.runId });

    const seed = this.config.seed;
    this.engine = new MctsEngine<TObservation>({
      simulations: this.config.mctsSimulations,
      maxDepth: this.config.maxDepth,
      explorationConstant: this.config.explorationConstant,
      evaluator: options.evaluator ?? new RandomRolloutEvaluator({ steps: this.config.rolloutSteps }),
      random: options.random ?? (seed !== undefined ? createSeededRandom(seed) : Math.random),
      deriveState: options.deriveState,
    });
  }

  /**
   * Produces an ordered action plan for `goal`, using `observation` both as
   * oracle context and as the search's root state.
   */
  async plan(observation: TObservation, goal: string): Promise<string[]> {
    if (!this.config.enabled) {
      return [];
    }

    try {
      await this.emit({
        type: 'PlanRequested',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.runId,
        payload: { goal },
      });

      const subgoals = (await this.oracle.generateSubgoals(goal, observation)).slice(
        0,
        this.config.maxSubgoals,
      );
      await this.emit({
        type: 'SubgoalsGenerated',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.runId,
        payload: { goal, oracle: this.oracle.id(), subgoals },
      });

      const plan = subgoals.length > 0 ? await this.search(observation, subgoals) : [];

      await this.emit({
        type: 'PlanCreated',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.runId,
        payload: { planSteps: plan },
      });
      return plan;
    } catch (error) {
      await writeLog('planning error', () =>
        this.logger.error(
          error instanceof Error ? error : new Error(String(error)),
          `Planning failed for goal "${goal}"`,
        ),
      );
      await this.emit({
        type: 'PlanFailed',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: this.runId,
        payload: { goal, error: errorMessage(error) },
      });
      return [];
    }
  }

  /**
   * Reacts to the outcome of an executed action. A negative reward discards
   * the current plan and returns a recovery plan; anything else returns
   * `undefined`, meaning the caller keeps its previous plan.
   */
  async updatePlan(
    currentState: TObservation,
    executedAction: string,
    reward: number,
  ): Promise<string[] | undefined> {
    if (!(reward < 0)) {
      return undefined;
    }
    await this.emit({
      type: 'ReplanTriggered',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: this.runId,
      payload: { executedAction, reward },
    });
    return this.plan(currentState, RECOVERY_GOAL);
  }

  private async search(observation: TObservation, subgoals: string[]): Promise<string[]> {
    const startTime = Date.now();
    const result = this.engine.search(observation, subgoals);
    await this.emit({
      type: 'SearchCompleted',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: this.runId,
      payload: {
        simulations: this.engine.simulations,
        rootVisits: result.tree.root.visits,
        nodeCount: result.tree.size,
        degenerate: result.degenerate,
        durationMs: Date.now() - startTime,
      },
    });
    return result.plan;
  }

  /** Event sinks must not turn a finished plan into a failed one. */
  private async emit(event: PlanningEvent): Promise<void> {
    try {
      await this.logger.log(event);
    } catch (error) {
      await writeLog('planner warning', () =>
        this.logger.warn(`Could not record ${event.type} event: ${errorMessage(error)}`),
      );
    }
  }
}
