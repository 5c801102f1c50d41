import { SearchError } from '@gamemind/shared';

/**
 * One node of a search tree. Nodes live in the tree's arena and refer to
 * each other by index.
 */
export interface SearchNode<TState> {
  /** Position of this node in the arena; the root is 0 */
  readonly index: number;
  /** Opaque payload; the engine never looks inside it */
  readonly state: TState;
  /** The action that produced this node from its parent; absent only for the root */
  readonly action?: string;
  /** Arena index of the parent; absent only for the root */
  readonly parent?: number;
  /** Child indices in insertion order, which is the tie-break order for selection */
  readonly children: ReadonlyArray<number>;
  /** Number of simulations that passed through this node */
  readonly visits: number;
  /** Sum of the estimates backed up through this node */
  readonly value: number;
  /** 0 for the root, otherwise parent depth + 1 */
  readonly depth: number;
}

interface ArenaNode<TState> {
  index: number;
  state: TState;
  action?: string;
  parent?: number;
  children: number[];
  visits: number;
  value: number;
  depth: number;
}

export const ROOT_INDEX = 0;

/**
 * Arena-backed tree: a dense array of nodes with parent and child links stored
 * as indices, so there are no reference cycles to manage.
 */
export class SearchTree<TState> {
  private readonly nodes: ArenaNode<TState>[];
  private sealed = false;

  constructor(rootState: TState) {
    this.nodes = [
      {
        index: ROOT_INDEX,
        state: rootState,
        children: [],
        visits: 0,
        value: 0,
        depth: 0,
      },
    ];
  }

  get size(): number {
    return this.nodes.length;
  }

  get root(): SearchNode<TState> {
    return this.nodes[ROOT_INDEX];
  }

  node(index: number): SearchNode<TState> {
    const node = this.nodes[index];
    if (!node) {
      throw new RangeError(`No search node at index ${index}`);
    }
    return node;
  }

  *[Symbol.iterator](): IterableIterator<SearchNode<TState>> {
    yield* this.nodes;
  }

  children(index: number): SearchNode<TState>[] {
    return this.node(index).children.map((child) => this.nodes[child]);
  }

  parentOf(index: number): SearchNode<TState> | undefined {
    const { parent } = this.node(index);
    return parent === undefined ? undefined : this.nodes[parent];
  }

  /**
   * Freezes the tree: `addChild` and `backpropagate` throw from now on.
   */
  seal(): SearchTreeView<TState> {
    this.sealed = true;
    return this;
  }

  /**
   * Appends a child under `parentIndex` and returns its index.
   */
  addChild(parentIndex: number, action: string, state: TState): number {
    this.assertOpen();
    const parent = this.nodes[parentIndex];
    if (!parent) {
      throw new RangeError(`No search node at index ${parentIndex}`);
    }
    const index = this.nodes.length;
    this.nodes.push({
      index,
      state,
      action,
      parent: parentIndex,
      children: [],
      visits: 0,
      value: 0,
      depth: parent.depth + 1,
    });
    parent.children.push(index);
    return index;
  }

  /**
   * Actions from `actions` not yet represented among the node's children,
   * deduplicated, in candidate order.
   */
  untriedActions(index: number, actions: ReadonlyArray<string>): string[] {
    const tried = new Set(this.children(index).map((child) => child.action));
    const untried: string[] = [];
    for (const action of actions) {
      if (!tried.has(action)) {
        tried.add(action);
        untried.push(action);
      }
    }
    return untried;
  }

  isFullyExpanded(index: number, actions: ReadonlyArray<string>): boolean {
    return this.untriedActions(index, actions).length === 0;
  }

  /**
   * UCB1 score of a node relative to its parent. Unvisited nodes score +Infinity.
   */
  ucb(index: number, explorationConstant: number): number {
    const node = this.node(index);
    if (node.visits === 0) {
      return Number.POSITIVE_INFINITY;
    }
    const parent = this.parentOf(index);
    const parentVisits = parent ? parent.visits : node.visits;
    const exploitation = node.value / node.visits;
    const exploration = explorationConstant * Math.sqrt(Math.log(parentVisits) / node.visits);
    return exploitation + exploration;
  }

  /**
   * Adds one visit and `value` to the node and every ancestor up to the root.
   */
  backpropagate(index: number, value: number): void {
    this.assertOpen();
    let current: ArenaNode<TState> | undefined = this.nodes[index];
    while (current) {
      current.visits += 1;
      current.value += value;
      current = current.parent === undefined ? undefined : this.nodes[current.parent];
    }
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new SearchError('Search tree is sealed; a finished search cannot be grown');
    }
  }
}

/**
 * Read-only face of a finished tree, as handed out in a search result.
 */
export type SearchTreeView<TState> = Omit<SearchTree<TState>, 'addChild' | 'backpropagate' | 'seal'>;
