/**
 * Authentication and request tracing helpers for the Jenkins client
 */
import {
  type AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
  isAxiosError,
} from 'axios';
import { v4 as uuidv4 } from 'uuid';

import { debug, error as logError } from '@/utils/logger';

import { ConfigurationError, TransportError } from './errors';

/**
 * Credentials in Jenkins' `<user>:<api token>` form, split apart
 */
export interface JenkinsCredentials {
  username: string;
  token: string;
}

interface RequestMeta {
  requestId: string;
  start: number;
}

// Timing and request ID per outgoing request, keyed by its config object
const requestMeta = new WeakMap<InternalAxiosRequestConfig, RequestMeta>();

export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Request interceptor: tag with X-Request-ID and log
 */
export function addRequestId(config: InternalAxiosRequestConfig): InternalAxiosRequestConfig {
  const requestId = generateRequestId();

  config.headers['X-Request-ID'] = requestId;
  requestMeta.set(config, { requestId, start: Date.now() });

  debug('Starting Jenkins request', {
    requestId,
    method: config.method?.toUpperCase(),
    url: config.url,
    headers: {
      Authorization: config.headers['Authorization'] != null ? '[REDACTED]' : undefined,
      'X-Request-ID': requestId,
    },
  });

  return config;
}

/**
 * Response interceptor: log status and duration
 */
export function logResponse(response: AxiosResponse): AxiosResponse {
  const meta = requestMeta.get(response.config);
  const duration = meta ? Date.now() - meta.start : undefined;

  debug('Jenkins request completed', {
    requestId: meta?.requestId,
    method: response.config.method?.toUpperCase(),
    url: response.config.url,
    status: response.status,
    duration,
  });

  return response;
}

export function redactSecrets(value: string): string {
  return value
    .replace(/(token[=:\s]*)[^\s&]+/gi, '$1***')
    .replace(/(password[=:\s]*)[^\s&]+/gi, '$1***')
    .replace(/(authorization[=:\s]*)(basic\s+)?[^\s&]+/gi, '$1$2***');
}

/**
 * Error interceptor: log and turn into a TransportError
 */
export function logAndTransformError(error: unknown): Promise<never> {
  if (!isAxiosError(error)) {
    const wrapped = new TransportError(
      error instanceof Error ? error.message : String(error),
      undefined,
      undefined,
      error instanceof Error ? error : undefined
    );
    return Promise.reject(wrapped);
  }

  const axiosError: AxiosError = error;
  const meta = axiosError.config ? requestMeta.get(axiosError.config) : undefined;
  const transportError = TransportError.fromAxiosError(axiosError, meta?.requestId);

  logError('Jenkins request failed', undefined, {
    requestId: meta?.requestId,
    code: axiosError.code,
    message: redactSecrets(transportError.message),
    statusCode: transportError.statusCode,
    duration: meta ? Date.now() - meta.start : undefined,
  });

  return Promise.reject(transportError);
}

/**
 * Split a `<user>:<token>` credential string
 *
 * @throws ConfigurationError when empty or missing the separator
 */
export function parseCredentials(auth: string | undefined): JenkinsCredentials {
  if (auth === undefined || auth.length === 0) {
    throw new ConfigurationError(
      'Jenkins credentials are required: set JENKINS_AUTH or pass -u <user>:<token>',
      'auth'
    );
  }

  const separator = auth.indexOf(':');
  if (separator <= 0 || separator === auth.length - 1) {
    throw new ConfigurationError(
      'Jenkins credentials must have the form <user>:<token>',
      'auth'
    );
  }

  return {
    username: auth.slice(0, separator),
    token: auth.slice(separator + 1),
  };
}

/**
 * Validate Jenkins server URL
 */
export function validateServerUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}
