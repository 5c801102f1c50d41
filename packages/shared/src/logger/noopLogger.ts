import type { PlanningEvent } from '../types/events';
import type { Logger } from './types';

/** Discards everything. Useful for library callers and tests. */
export class NoopLogger implements Logger {
  log(_event: PlanningEvent): void {}
  trace(_event: PlanningEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}

  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
