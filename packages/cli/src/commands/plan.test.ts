import { describe, it, expect } from 'vitest';
import { UsageError } from '@gamemind/shared';
import { planFlags } from './plan';
import { parseStateOption } from './options';

describe('planFlags', () => {
  it('sets only the flags that were given', () => {
    expect(planFlags({})).toEqual({ planning: {} });
    expect(planFlags({ simulations: '50', maxDepth: '3' })).toEqual({
      planning: { mctsSimulations: 50, maxDepth: 3 },
    });
  });

  it('parses exploration as a float and seed as an integer', () => {
    expect(planFlags({ exploration: '1.41', seed: '42' })).toEqual({
      planning: { explorationConstant: 1.41, seed: 42 },
    });
  });

  it('switches the oracle to the offline backend', () => {
    expect(planFlags({ offline: true })).toEqual({
      planning: {},
      oracle: { provider: 'fake' },
    });
  });

  it('rejects invalid numbers with a UsageError', () => {
    expect(() => planFlags({ simulations: '0' })).toThrow(UsageError);
    expect(() => planFlags({ maxDepth: '2.5' })).toThrow(
      'Invalid --max-depth "2.5". Must be an integer >= 1.',
    );
    expect(() => planFlags({ exploration: '-1' })).toThrow(
      'Invalid --exploration "-1". Must be a number >= 0.',
    );
    expect(() => planFlags({ exploration: '' })).toThrow(UsageError);
  });
});

describe('parseStateOption', () => {
  it('decodes JSON and keeps other text as is', () => {
    expect(parseStateOption('{"health":9}')).toEqual({ health: 9 });
    expect(parseStateOption('[1,2,3]')).toEqual([1, 2, 3]);
    expect(parseStateOption('standing near a tree')).toBe('standing near a tree');
    expect(parseStateOption(undefined)).toBeUndefined();
  });
});
