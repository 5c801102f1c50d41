export interface SubgoalRule {
  /** Matched as a case-insensitive substring of the goal */
  key: string;
  subgoals: ReadonlyArray<string>;
}

/** Tried in order; the first matching key wins. */
export const SUBGOAL_RULES: ReadonlyArray<SubgoalRule> = [
  { key: 'survive', subgoals: ['find food', 'find shelter', 'avoid enemies', 'maintain health'] },
  { key: 'collect wood', subgoals: ['find trees', 'chop wood', 'gather resources', 'return to base'] },
  {
    key: 'make wood_pickaxe',
    subgoals: ['collect wood', 'find workbench', 'craft pickaxe', 'test tool'],
  },
  {
    key: 'place furnace',
    subgoals: ['collect stone', 'find location', 'place building', 'verify placement'],
  },
  { key: 'defeat zombie', subgoals: ['find weapon', 'approach enemy', 'attack'] },
  { key: 'explore', subgoals: ['move around', 'map area', 'find resources', 'avoid danger'] },
];

export const DEFAULT_SUBGOALS: ReadonlyArray<string> = [
  'explore environment',
  'gather resources',
  'avoid danger',
  'complete objective',
];

export const FALLBACK_RATIONALE = 'Basic task analysis';
export const FALLBACK_ESTIMATED_STEPS = 3;
