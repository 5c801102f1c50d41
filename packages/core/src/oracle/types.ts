export type TaskComplexity = 'simple' | 'medium' | 'complex';

/**
 * Lightweight structured reading of a task description.
 */
export interface TaskAnalysis {
  task: string;
  /** Free-text reasoning the estimates were derived from */
  rationale: string;
  complexity: TaskComplexity;
  /** Rough number of macro-steps, always in [2, 6] */
  estimatedSteps: number;
}

/**
 * Turns goals into ordered subgoals and analyses tasks.
 *
 * Implementations never reject: a failure is answered from a deterministic
 * rule table. Whether one instance may be shared between concurrent planners
 * is documented on each implementation.
 */
export interface SubgoalOracle {
  /** Short identifier used in logs and events */
  id(): string;
  /**
   * @param goal - Goal description, matched case-insensitively
   * @param currentState - Optional snapshot of the agent's observation
   * @returns At most five subgoals, freshly allocated per call
   */
  generateSubgoals(goal: string, currentState?: unknown): Promise<string[]>;
  analyzeTask(task: string): Promise<TaskAnalysis>;
}
