import { describe, it, expect } from 'vitest';
import { name, Planner, MctsEngine, FallbackOracle, RemoteOracle, ConfigLoader } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@gamemind/core');
  });

  it('exports the planner building blocks', () => {
    expect(typeof Planner).toBe('function');
    expect(typeof MctsEngine).toBe('function');
    expect(typeof FallbackOracle).toBe('function');
    expect(typeof RemoteOracle).toBe('function');
    expect(typeof ConfigLoader.load).toBe('function');
  });
});
