// Thin function-style wrapper around JenkinsLogger so modules can import
// plain `debug`/`info`/`error` from `@/utils/logger`.
import { type JenkinsLogger, type LogContext, logger as enhancedLogger } from './logger/index';

export type { JenkinsLogger, LogContext };

export function info(message: string, meta?: LogContext): void {
  enhancedLogger.info(message, meta);
}

export function error(message: string, err?: Error | unknown, meta?: LogContext): void {
  enhancedLogger.error(message, err, meta);
}

export function debug(message: string, meta?: LogContext): void {
  enhancedLogger.debug(message, meta);
}
