import type { PlanningEvent } from '../types/events';
import type { Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /**
   * Minimum level written to the console. Events are written at debug level.
   * Everything goes to stderr; stdout carries command results only.
   */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
  }

  log(event: PlanningEvent): void {
    if (!this.enabled('debug')) return;
    console.error(JSON.stringify(event));
  }

  trace(event: PlanningEvent, message: string): void {
    if (!this.enabled('debug')) return;
    console.error(message, JSON.stringify(event));
  }

  debug(message: string): void {
    if (!this.enabled('debug')) return;
    console.error(message);
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    console.error(message);
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.error(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PlanningEvent) {
    return this.base.log(event);
  }

  trace(event: PlanningEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
