import * as fs from 'fs/promises';
import type { PlanningEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Serialises appends to one file so records land in call order, whichever
 * child logger wrote them.
 */
class JsonlFile {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  append(record: Record<string, unknown>): Promise<void> {
    const line = JSON.stringify(redactForLogs(record)) + '\n';
    this.tail = this.tail.then(() => this.write(line));
    return this.tail;
  }

  private async write(line: string): Promise<void> {
    try {
      await fs.appendFile(this.path, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.path}`, error);
    }
  }
}

/**
 * Writes planning events, warnings and errors as JSON lines to a file.
 *
 * Every record carries the logger's `child()` bindings under `context`, so a
 * line can be traced back to the planner run or oracle that produced it.
 * Secrets are redacted before anything is written. All messages are also
 * echoed to stderr; debug and info messages go nowhere else.
 *
 * ```jsonl
 * {"type":"PlanRequested","schemaVersion":1,...,"payload":{"goal":"survive"},"context":{"runId":"r1"}}
 * {"type":"LogMessage","level":"warn","timestamp":"...","message":"...","context":{"oracle":"ollama"}}
 * ```
 */
export class JsonlLogger implements Logger {
  private file: JsonlFile;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.file = new JsonlFile(filePath);
    this.bindings = bindings;
  }

  log(event: PlanningEvent): Promise<void> {
    return this.file.append(this.withContext({ ...event }));
  }

  trace(event: PlanningEvent, _message: string): Promise<void> {
    return this.log(event);
  }

  debug(message: string): void {
    console.error(this.withPrefix(message));
  }

  info(message: string): void {
    console.error(this.withPrefix(message));
  }

  warn(message: string): Promise<void> {
    console.error(this.withPrefix(message));
    return this.appendMessage('warn', message);
  }

  error(error: Error, message?: string): Promise<void> {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
    return this.appendMessage('error', message ?? error.message, {
      name: error.name,
      message: error.message,
    });
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new JsonlLogger(this.file.path, { ...this.bindings, ...bindings });
    child.file = this.file;
    return child;
  }

  private appendMessage(
    level: 'warn' | 'error',
    message: string,
    error?: { name: string; message: string },
  ): Promise<void> {
    return this.file.append(
      this.withContext({
        type: 'LogMessage',
        level,
        timestamp: new Date().toISOString(),
        message,
        ...(error ? { error } : {}),
      }),
    );
  }

  private withContext(record: Record<string, unknown>): Record<string, unknown> {
    return Object.keys(this.bindings).length > 0
      ? { ...record, context: this.bindings }
      : record;
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
