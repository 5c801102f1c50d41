import type { Usage } from './llm';

/**
 * Base interface for all planner events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the planner instance (or CLI run) that emitted the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when plan generation is requested */
export interface PlanRequested extends BaseEvent {
  type: 'PlanRequested';
  payload: {
    goal: string;
  };
}

/** Emitted once the oracle has produced the candidate action set */
export interface SubgoalsGenerated extends BaseEvent {
  type: 'SubgoalsGenerated';
  payload: {
    goal: string;
    /** Identifier of the oracle that answered */
    oracle: string;
    subgoals: string[];
  };
}

/**
 * Emitted when an oracle answers from its rule table instead of the backend.
 */
export interface OracleFallback extends BaseEvent {
  type: 'OracleFallback';
  payload: {
    operation: 'generateSubgoals' | 'analyzeTask' | 'probe';
    reason: 'disabled' | 'unavailable' | 'malformed';
    message?: string;
  };
}

/** Emitted after the tree search has spent its simulation budget */
export interface SearchCompleted extends BaseEvent {
  type: 'SearchCompleted';
  payload: {
    simulations: number;
    rootVisits: number;
    nodeCount: number;
    /** True when the root was never expanded and the candidates were returned as is */
    degenerate: boolean;
    durationMs: number;
  };
}

/** Emitted when a plan has been created */
export interface PlanCreated extends BaseEvent {
  type: 'PlanCreated';
  payload: {
    planSteps: string[];
  };
}

/** Emitted when a negative reward discards the current plan */
export interface ReplanTriggered extends BaseEvent {
  type: 'ReplanTriggered';
  payload: {
    executedAction: string;
    reward: number;
  };
}

/** Emitted when planning degraded to an empty plan because of an internal failure */
export interface PlanFailed extends BaseEvent {
  type: 'PlanFailed';
  payload: {
    goal: string;
    error: string;
  };
}

/**
 * Emitted when a provider API request starts.
 */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
    /** Token counts the backend reported for a successful request */
    usage?: Usage;
  };
}

export type PlanningEvent =
  | PlanRequested
  | SubgoalsGenerated
  | OracleFallback
  | SearchCompleted
  | PlanCreated
  | ReplanTriggered
  | PlanFailed
  | ProviderRequestStarted
  | ProviderRequestFinished;

export type PlanningEventType = PlanningEvent['type'];
