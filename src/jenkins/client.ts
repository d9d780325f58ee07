/**
 * Jenkins HTTP client
 *
 * A thin axios wrapper for the two calls a build trigger needs: the CSRF
 * crumb and the build POST itself. Requests are never retried.
 */
import axios, { type AxiosInstance } from 'axios';

import { info } from '@/utils/logger';

import {
  type JenkinsCredentials,
  addRequestId,
  logAndTransformError,
  logResponse,
  validateServerUrl,
} from './auth';
import { normalizeServerUrl } from './build-request';
import { ConfigurationError, TransportError } from './errors';

export const CRUMB_ISSUER_PATH = '/crumbIssuer/api/xml';
export const CRUMB_XPATH = 'concat(//crumbRequestField,":",//crumb)';

export interface JenkinsClientConfig {
  baseUrl: string;
  credentials: JenkinsCredentials;
  timeout?: number;
}

/**
 * CSRF header Jenkins expects on state-changing requests
 */
export interface JenkinsCrumb {
  field: string;
  value: string;
}

export interface PostBuildResult {
  status: number;
  /** Queue item URL from the `Location` header, when Jenkins sends one */
  queueUrl?: string;
}

/**
 * The calls the trigger manager depends on
 */
export interface JenkinsClientAdapter {
  fetchCrumb(): Promise<JenkinsCrumb>;
  postBuild(url: string, payload: string, crumb: JenkinsCrumb): Promise<PostBuildResult>;
}

/**
 * Parse the crumb issuer's `<field>:<value>` text response
 */
export function parseCrumb(body: string): JenkinsCrumb {
  const text = body.trim();
  const separator = text.indexOf(':');
  if (separator <= 0 || separator === text.length - 1) {
    throw new TransportError(
      `Unexpected crumb issuer response: '${text.slice(0, 100)}'`
    );
  }
  return {
    field: text.slice(0, separator).trim(),
    value: text.slice(separator + 1).trim(),
  };
}

/**
 * Encode the parameter payload the way the classic `build` endpoint reads it
 */
export function encodeBuildForm(payload: string): string {
  return new URLSearchParams({ json: payload }).toString();
}

export class JenkinsClient implements JenkinsClientAdapter {
  private readonly http: AxiosInstance;
  public readonly baseUrl: string;

  constructor(config: JenkinsClientConfig) {
    this.baseUrl = normalizeServerUrl(config.baseUrl);

    if (!validateServerUrl(this.baseUrl)) {
      throw new ConfigurationError(`Invalid Jenkins server URL: ${config.baseUrl}`, 'serverBaseUrl');
    }

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: config.timeout ?? 30000,
      auth: {
        username: config.credentials.username,
        password: config.credentials.token,
      },
    });

    this.http.interceptors.request.use(addRequestId);
    this.http.interceptors.response.use(logResponse, logAndTransformError);

    info('Jenkins client initialized', {
      baseUrl: this.baseUrl,
      timeout: config.timeout ?? 30000,
    });
  }

  async fetchCrumb(): Promise<JenkinsCrumb> {
    const response = await this.http.get<string>(CRUMB_ISSUER_PATH, {
      params: { xpath: CRUMB_XPATH },
      responseType: 'text',
      headers: { Accept: 'text/plain' },
    });
    return parseCrumb(String(response.data));
  }

  async postBuild(url: string, payload: string, crumb: JenkinsCrumb): Promise<PostBuildResult> {
    const response = await this.http.post<unknown>(url, encodeBuildForm(payload), {
      headers: {
        [crumb.field]: crumb.value,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
    });

    const location: unknown = response.headers['location'];
    return {
      status: response.status,
      queueUrl: typeof location === 'string' && location.length > 0 ? location : undefined,
    };
  }
}
