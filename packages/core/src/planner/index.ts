export * from './config';
export * from './planner';
