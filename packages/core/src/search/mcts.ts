import { ConfigError, SearchError } from '@gamemind/shared';
import { RandomRolloutEvaluator, type Evaluator } from './evaluator';
import { pickUniform, type RandomSource } from './random';
import { ROOT_INDEX, SearchTree, type SearchTreeView } from './tree';

export interface MctsOptions<TState> {
  /** Select/expand/simulate/backpropagate iterations per search */
  simulations: number;
  /** Nodes at this depth or deeper are never expanded */
  maxDepth: number;
  /** The C in UCB1 */
  explorationConstant: number;
  /** Leaf estimator. Default: a 10-step random rollout */
  evaluator?: Evaluator<TState>;
  /** Uniform [0, 1) source used for expansion and rollouts. Default: Math.random */
  random?: RandomSource;
  /**
   * Produces the state stored on a new child from its parent's state.
   * Default: the parent's state is shared as is, since the engine never mutates it.
   */
  deriveState?: (parentState: TState, action: string) => TState;
}

export interface SearchResult<TState> {
  /** Actions along the most visited path from the root */
  plan: string[];
  /** True when the root was never expanded and `plan` is the candidate list */
  degenerate: boolean;
  /** The finished tree, sealed against further growth */
  tree: SearchTreeView<TState>;
}

/**
 * Monte Carlo Tree Search over an opaque state and a flat candidate action set.
 *
 * The same candidate set is offered at every node, so a path through the tree
 * is an ordering of candidates. The engine keeps no state between searches.
 */
export class MctsEngine<TState = unknown> {
  readonly simulations: number;
  readonly maxDepth: number;
  readonly explorationConstant: number;
  private readonly evaluator: Evaluator<TState>;
  private readonly random: RandomSource;
  private readonly deriveState: (parentState: TState, action: string) => TState;

  constructor(options: MctsOptions<TState>) {
    if (!Number.isInteger(options.simulations) || options.simulations < 1) {
      throw new ConfigError(`simulations must be an integer >= 1, got ${options.simulations}`);
    }
    if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
      throw new ConfigError(`maxDepth must be an integer >= 1, got ${options.maxDepth}`);
    }
    if (!Number.isFinite(options.explorationConstant) || options.explorationConstant < 0) {
      throw new ConfigError(
        `explorationConstant must be a finite number >= 0, got ${options.explorationConstant}`,
      );
    }
    this.simulations = options.simulations;
    this.maxDepth = options.maxDepth;
    this.explorationConstant = options.explorationConstant;
    this.evaluator = options.evaluator ?? new RandomRolloutEvaluator();
    this.random = options.random ?? Math.random;
    this.deriveState = options.deriveState ?? ((parentState) => parentState);
  }

  search(rootState: TState, actions: ReadonlyArray<string>): SearchResult<TState> {
    const tree = new SearchTree(rootState);

    for (let i = 0; i < this.simulations; i++) {
      const selected = this.select(tree, actions);
      const leaf = this.expand(tree, selected, actions);
      const estimate = this.simulate(tree, leaf);
      tree.backpropagate(leaf, estimate);
    }

    const degenerate = tree.root.children.length === 0;
    return {
      plan: degenerate ? [...actions] : this.extract(tree),
      degenerate,
      tree: tree.seal(),
    };
  }

  /**
   * Descends from the root while the current node has children and every
   * candidate action is already represented among them.
   */
  select(tree: SearchTree<TState>, actions: ReadonlyArray<string>): number {
    let current = ROOT_INDEX;
    while (tree.node(current).children.length > 0 && tree.isFullyExpanded(current, actions)) {
      current = this.bestChild(tree, current);
    }
    return current;
  }

  /**
   * Child with the highest UCB1 score; the first inserted wins ties, so an
   * unvisited child beats every visited sibling and the earliest unvisited one wins.
   */
  bestChild(tree: SearchTree<TState>, index: number): number {
    const children = tree.node(index).children;
    if (children.length === 0) {
      throw new SearchError(`Node ${index} has no children to select from`);
    }
    let best = children[0];
    let bestScore = tree.ucb(best, this.explorationConstant);
    for (let i = 1; i < children.length; i++) {
      const score = tree.ucb(children[i], this.explorationConstant);
      if (score > bestScore) {
        best = children[i];
        bestScore = score;
      }
    }
    return best;
  }

  /**
   * Attaches one child for a random untried action and returns it, or returns
   * `index` unchanged when the node is at the depth cap or has nothing left to try.
   */
  expand(tree: SearchTree<TState>, index: number, actions: ReadonlyArray<string>): number {
    const node = tree.node(index);
    if (node.depth >= this.maxDepth || actions.length === 0) {
      return index;
    }
    const untried = tree.untriedActions(index, actions);
    if (untried.length === 0) {
      return index;
    }
    const action = pickUniform(untried, this.random);
    return tree.addChild(index, action, this.deriveState(node.state, action));
  }

  simulate(tree: SearchTree<TState>, index: number): number {
    const estimate = this.evaluator.evaluate(tree.node(index), this.random);
    if (!Number.isFinite(estimate)) {
      throw new SearchError(`Evaluator returned a non-finite estimate: ${estimate}`);
    }
    return estimate;
  }

  /**
   * Follows the most visited child (first inserted on ties) from the root to a leaf.
   */
  extract(tree: SearchTree<TState>): string[] {
    const plan: string[] = [];
    let current = tree.root;
    while (current.children.length > 0) {
      let next = tree.node(current.children[0]);
      for (const childIndex of current.children.slice(1)) {
        const child = tree.node(childIndex);
        if (child.visits > next.visits) {
          next = child;
        }
      }
      if (next.action !== undefined) {
        plan.push(next.action);
      }
      current = next;
    }
    return plan;
  }
}
