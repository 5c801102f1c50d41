import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { NoopLogger } from './noopLogger';
export { writeLog } from './guard';
export type { Logger, MaybePromise } from './types';
export type { LogLevel, ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, ScopedLogger, JsonlLogger, NoopLogger };
