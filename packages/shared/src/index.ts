export const name = '@gamemind/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
