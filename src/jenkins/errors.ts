/**
 * Error classes for Jenkins build triggering
 */
import type { AxiosError } from 'axios';

/**
 * Base error class for all trigger failures
 */
export class JenkinsTriggerError extends Error {
  public readonly code: string;
  public readonly exitCode: number;

  constructor(message: string, code: string, exitCode: number) {
    super(message);
    this.name = 'JenkinsTriggerError';
    this.code = code;
    this.exitCode = exitCode;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or invalid command-line input (usage error)
 */
export class ConfigurationError extends JenkinsTriggerError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'CONFIGURATION_ERROR', 2);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

/**
 * A value outside its allowed set
 */
export class ValidationError extends JenkinsTriggerError {
  public readonly field: string;
  public readonly allowed: readonly string[];

  constructor(message: string, field: string, allowed: readonly string[] = []) {
    super(message, 'VALIDATION_ERROR', 1);
    this.name = 'ValidationError';
    this.field = field;
    this.allowed = allowed;
  }
}

/**
 * Network or HTTP failure talking to Jenkins
 */
export class TransportError extends JenkinsTriggerError {
  public readonly statusCode?: number;
  public readonly requestId?: string;
  public readonly originalError?: Error;

  constructor(message: string, statusCode?: number, requestId?: string, originalError?: Error) {
    super(message, 'TRANSPORT_ERROR', 1);
    this.name = 'TransportError';
    this.statusCode = statusCode;
    this.requestId = requestId;
    this.originalError = originalError;
  }

  /**
   * Create from Axios error
   */
  static fromAxiosError(error: AxiosError, requestId?: string): TransportError {
    const method = error.config?.method?.toUpperCase() ?? 'REQUEST';
    const url = error.config?.url ?? 'unknown URL';

    if (error.response) {
      const { status, statusText } = error.response;
      const reason = statusText ? ` ${statusText}` : '';
      return new TransportError(
        `${method} ${url} failed with HTTP ${status}${reason}`,
        status,
        requestId,
        error
      );
    }
    if (error.request !== null && error.request !== undefined) {
      return new TransportError(
        `No response from Jenkins for ${method} ${url}: ${error.message}`,
        undefined,
        requestId,
        error
      );
    }
    return new TransportError(
      `Could not send ${method} ${url}: ${error.message}`,
      undefined,
      requestId,
      error
    );
  }
}

/**
 * Process exit code for an error that ends the run
 */
export function getExitCode(error: unknown): number {
  if (error instanceof JenkinsTriggerError) {
    return error.exitCode;
  }
  return 1;
}
