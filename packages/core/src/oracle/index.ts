export * from './types';
export * from './rules';
export * from './parsing';
export * from './prompts';
export * from './fallback';
export * from './remote';
export * from './factory';
