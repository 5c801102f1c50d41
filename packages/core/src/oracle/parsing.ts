import type { TaskComplexity } from './types';

export const MAX_SUBGOALS = 5;

/** Shorter fragments are list noise ("1.", "ok", stray bullets). */
const MIN_SUBGOAL_LENGTH = 4;

const ENUMERATION_MARKER = /^(?:\d+[.)]|[-*•])\s*/;

/** Domain verbs counted when estimating how many steps a task needs. */
export const ACTION_VOCABULARY: ReadonlyArray<string> = [
  'collect',
  'craft',
  'place',
  'defeat',
  'find',
  'move',
  'use',
];

export const MIN_ESTIMATED_STEPS = 2;
export const MAX_ESTIMATED_STEPS = 6;

/**
 * Reads a numbered or bulleted list out of free text.
 *
 * @example
 * ```typescript
 * parseSubgoals('1. Find trees\n2. Chop wood\n\n3. Return');
 * // => ['Find trees', 'Chop wood', 'Return']
 * ```
 */
export function parseSubgoals(text: string | undefined, limit: number = MAX_SUBGOALS): string[] {
  if (!text) return [];

  const subgoals: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const content = line.replace(ENUMERATION_MARKER, '').trim();
    if (content.length < MIN_SUBGOAL_LENGTH) continue;

    subgoals.push(content);
    if (subgoals.length >= limit) break;
  }
  return subgoals;
}

export function estimateComplexity(rationale: string): TaskComplexity {
  const words = rationale.split(/\s+/).filter(Boolean);
  if (words.length < 10) return 'simple';
  if (words.length < 20) return 'medium';
  return 'complex';
}

/**
 * Counts how many vocabulary verbs appear anywhere in the text, clamped to [2, 6].
 */
export function estimateSteps(rationale: string): number {
  const lower = rationale.toLowerCase();
  const count = ACTION_VOCABULARY.filter((word) => lower.includes(word)).length;
  return Math.max(MIN_ESTIMATED_STEPS, Math.min(count, MAX_ESTIMATED_STEPS));
}
