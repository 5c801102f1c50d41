import { estimateComplexity, estimateSteps, MAX_SUBGOALS } from './parsing';
import {
  DEFAULT_SUBGOALS,
  FALLBACK_ESTIMATED_STEPS,
  FALLBACK_RATIONALE,
  SUBGOAL_RULES,
  type SubgoalRule,
} from './rules';
import type { SubgoalOracle, TaskAnalysis } from './types';

/**
 * Rule-table oracle. Pure and stateless, so one instance can serve any number
 * of concurrent planners.
 */
export class FallbackOracle implements SubgoalOracle {
  constructor(
    private readonly rules: ReadonlyArray<SubgoalRule> = SUBGOAL_RULES,
    private readonly defaults: ReadonlyArray<string> = DEFAULT_SUBGOALS,
  ) {}

  id(): string {
    return 'fallback';
  }

  /** Synchronous form of {@link generateSubgoals}, shared with the remote oracle. */
  subgoalsFor(goal: string): string[] {
    const lower = goal.toLowerCase();
    const rule = this.rules.find((candidate) => lower.includes(candidate.key.toLowerCase()));
    return (rule ? rule.subgoals : this.defaults).slice(0, MAX_SUBGOALS);
  }

  analysisFor(task: string): TaskAnalysis {
    return {
      task,
      rationale: FALLBACK_RATIONALE,
      complexity: 'medium',
      estimatedSteps: FALLBACK_ESTIMATED_STEPS,
    };
  }

  async generateSubgoals(goal: string, _currentState?: unknown): Promise<string[]> {
    return this.subgoalsFor(goal);
  }

  async analyzeTask(task: string): Promise<TaskAnalysis> {
    return this.analysisFor(task);
  }
}

/**
 * Builds an analysis from backend free text.
 */
export function analysisFromRationale(task: string, rationale: string): TaskAnalysis {
  return {
    task,
    rationale,
    complexity: estimateComplexity(rationale),
    estimatedSteps: estimateSteps(rationale),
  };
}
