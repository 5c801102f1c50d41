export const name = '@gamemind/core';

export * from './search/random';
export * from './search/tree';
export * from './search/evaluator';
export * from './search/mcts';
export * from './oracle';
export * from './planner';
export * from './config/loader';
