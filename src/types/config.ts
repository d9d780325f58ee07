/**
 * Configuration type definitions
 */
import { z } from 'zod';

import type { JenkinsCredentials } from '@/jenkins/auth';
import { DEFAULT_JENKINS_URL } from '@/jenkins/build-request';

// Environment variable schema
export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).optional(),
  // Validated once -H and the environment have been resolved
  JENKINS_URL: z.string().default(DEFAULT_JENKINS_URL),
  JENKINS_AUTH: z.string().optional(),
  // Any non-empty value turns tracing on
  TRACE: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Everything a trigger run needs besides the build request itself
 */
export interface TriggerConfiguration {
  serverBaseUrl: string;
  credentials: JenkinsCredentials;
  verbose: boolean;
  trace: boolean;
  logLevel?: EnvConfig['LOG_LEVEL'];
}
