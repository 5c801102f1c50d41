export const name = '@gamemind/adapters';

export * from './types';

export * from './adapter';

export * from './base-adapter';

export * from './common';

export * from './ollama/adapter';
export * from './openai/adapter';
export * from './fake/adapter';
