/**
 * Centralized Logger Utility
 *
 * Every log line goes to stderr so that stdout carries only the command's
 * own output.
 */
import { existsSync, mkdirSync } from 'fs';
import winston, { type Logger } from 'winston';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

/**
 * Context information for logging
 */
export interface LogContext {
  /**
   * Unique request identifier
   */
  requestId?: string;

  /**
   * Operation duration in milliseconds
   */
  duration?: number;

  /**
   * Service or module name
   */
  service?: string;

  /**
   * Jenkins project being built
   */
  project?: string;

  /**
   * Git branch being built
   */
  branch?: string;

  /**
   * Additional context properties
   */
  [key: string]: unknown;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  name?: string;
  level?: LogLevel;
  enableConsole?: boolean;
  enableFile?: boolean;
  logDirectory?: string;
  maxFileSize?: string;
  maxFiles?: number;
}

/**
 * Logger interface for type safety and consistency
 */
export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
  child(context: LogContext): ILogger;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Winston-backed logger
 */
export class JenkinsLogger implements ILogger {
  private winston: Logger;
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = this.normalizeConfig(config);
    this.winston = this.createWinstonLogger();
  }

  /**
   * Normalize configuration with defaults
   */
  private normalizeConfig(config: LoggerConfig): Required<LoggerConfig> {
    const isProduction = process.env['NODE_ENV'] === 'production';
    const envLevel = process.env['LOG_LEVEL'];
    const forceFile =
      process.env['JENKINS_LOG_TO_FILE'] === '1' || process.env['JENKINS_LOG_TO_FILE'] === 'true';

    return {
      name: config.name ?? 'jenkins-build-trigger',
      level: config.level ?? (isLogLevel(envLevel) ? envLevel : 'warn'),
      enableConsole: config.enableConsole ?? true,
      enableFile: config.enableFile ?? forceFile,
      logDirectory: config.logDirectory ?? 'logs',
      maxFileSize: config.maxFileSize ?? (isProduction ? '10m' : '5m'),
      maxFiles: config.maxFiles ?? 5,
    };
  }

  /**
   * Create Winston logger instance
   */
  private createWinstonLogger(): Logger {
    const { level, enableConsole, enableFile, logDirectory, maxFileSize, maxFiles, name } =
      this.config;
    const isProduction = process.env['NODE_ENV'] === 'production';

    const devFormat = winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const baseLog = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
        return formatContextualLog(baseLog, meta);
      })
    );

    const prodFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const transports: winston.transport[] = [];

    if (enableConsole) {
      transports.push(
        new winston.transports.Console({
          format: isProduction ? prodFormat : devFormat,
          stderrLevels: [...LOG_LEVELS],
        })
      );
    }

    if (enableFile && this.ensureLogDirectory(logDirectory)) {
      transports.push(
        new winston.transports.File({
          filename: `${logDirectory}/error.log`,
          level: 'error',
          format: prodFormat,
          maxsize: parseFileSize(maxFileSize),
          maxFiles,
        })
      );

      transports.push(
        new winston.transports.File({
          filename: `${logDirectory}/combined.log`,
          format: prodFormat,
          maxsize: parseFileSize(maxFileSize),
          maxFiles,
        })
      );
    }

    return winston.createLogger({
      level,
      defaultMeta: { service: name },
      transports,
      // winston warns on a logger with no transports
      silent: transports.length === 0,
      exitOnError: false,
    });
  }

  /**
   * Ensure log directory exists; false when it cannot be created
   */
  private ensureLogDirectory(directory: string): boolean {
    try {
      if (!existsSync(directory)) {
        mkdirSync(directory, { recursive: true });
      }
      return true;
    } catch (error) {
      process.stderr.write(
        `Failed to create log directory ${directory}: ${error instanceof Error ? error.message : String(error)}\n`
      );
      return false;
    }
  }

  public debug(message: string, context: LogContext = {}): void {
    this.winston.debug(message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.winston.info(message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.winston.warn(message, context);
  }

  /**
   * Step-by-step execution tracing
   */
  public trace(message: string, context: LogContext = {}): void {
    this.winston.silly(message, context);
  }

  /**
   * Error level logging with optional error object
   */
  public error(message: string, error?: Error | unknown, context: LogContext = {}): void {
    const errorContext = { ...context };

    if (error instanceof Error) {
      errorContext['error'] = error.message;
      errorContext['stack'] = error.stack;
    } else if (error != null) {
      errorContext['error'] = String(error);
    }

    this.winston.error(message, errorContext);
  }

  /**
   * Create child logger with additional context
   */
  public child(context: LogContext): JenkinsLogger {
    const childLogger = new JenkinsLogger({ ...this.config, enableConsole: false, enableFile: false });
    childLogger.winston = this.winston.child(context);
    return childLogger;
  }
}

/**
 * Format contextual log with request information
 */
export function formatContextualLog(baseLog: string, context: Record<string, unknown>): string {
  const { requestId, duration, project, branch, ...otherMeta } = context;

  const contextParts: string[] = [];

  if (typeof requestId === 'string' && requestId) contextParts.push(`req=${requestId}`);
  if (typeof project === 'string' && project) contextParts.push(`project=${project}`);
  if (typeof branch === 'string' && branch) contextParts.push(`branch=${branch}`);
  if (typeof duration === 'number') contextParts.push(`${duration}ms`);

  const contextString = contextParts.length > 0 ? ` [${contextParts.join(' ')}]` : '';
  const metaString = Object.keys(otherMeta).length > 0 ? ` ${JSON.stringify(otherMeta)}` : '';

  return `${baseLog}${contextString}${metaString}`;
}

const FILE_SIZE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Parse file size string to bytes
 */
export function parseFileSize(size: string): number {
  const match = size.match(/^(\d+)([kmg]?)$/i);
  if (!match) return 10 * 1024 * 1024; // Default 10MB

  const [, num, unit] = match;
  if (!num) return 10 * 1024 * 1024;

  const multiplier = FILE_SIZE_UNITS[unit?.toLowerCase() ?? ''] ?? 1;

  return parseInt(num, 10) * multiplier;
}

let defaultLogger: JenkinsLogger | null = null;

/**
 * Get or create the default logger instance
 */
export function getLogger(config?: LoggerConfig): JenkinsLogger {
  if (!defaultLogger || config) {
    defaultLogger = new JenkinsLogger(config);
  }
  return defaultLogger;
}

/**
 * Convenience functions using the default logger
 */
export const logger = {
  debug: (message: string, context?: LogContext) => getLogger().debug(message, context),
  info: (message: string, context?: LogContext) => getLogger().info(message, context),
  error: (message: string, error?: Error | unknown, context?: LogContext) =>
    getLogger().error(message, error, context),
};
