import type { RandomSource } from './random';
import { standardNormal } from './random';
import type { SearchNode } from './tree';

/**
 * Estimates the long-term value of a leaf reached during search.
 *
 * Swap in a domain simulator or a learned value estimate here; the engine
 * only needs a finite number back.
 */
export interface Evaluator<TState = unknown> {
  evaluate(node: SearchNode<TState>, random: RandomSource): number;
}

export interface RandomRolloutOptions {
  /** Number of simulated steps per rollout. Default: 10 */
  steps?: number;
}

/**
 * Domain-free rollout: the sum of `steps` standard normal rewards.
 * It carries no information about the node and exists so that the search runs
 * end to end before a real estimator is plugged in.
 */
export class RandomRolloutEvaluator implements Evaluator {
  readonly steps: number;

  constructor(options: RandomRolloutOptions = {}) {
    this.steps = options.steps ?? 10;
  }

  evaluate(_node: SearchNode<unknown>, random: RandomSource): number {
    let total = 0;
    for (let step = 0; step < this.steps; step++) {
      total += standardNormal(random);
    }
    return total;
  }
}

/**
 * Returns the same estimate for every node.
 */
export class ConstantEvaluator implements Evaluator {
  constructor(private readonly value: number = 0) {}

  evaluate(): number {
    return this.value;
  }
}
