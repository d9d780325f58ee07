/**
 * Configuration management
 *
 * Precedence, highest first: CLI flags, the --config file, the process
 * environment, a .env file in the working directory.
 */
import dotenv from 'dotenv';
import { ZodError } from 'zod';

import { parseCredentials, validateServerUrl } from '@/jenkins/auth';
import { ConfigurationError } from '@/jenkins/errors';
import { type EnvConfig, EnvSchema, type TriggerConfiguration } from '@/types/config';
import type { CliArgs } from '@/utils/cli-args';
import { loadEnvFile } from '@/utils/env-file';

// Load environment variables
dotenv.config();

type EnvSource = Record<string, string | undefined>;

// Unset and empty variables are treated alike
function dropEmpty(source: EnvSource): EnvSource {
  const result: EnvSource = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.length > 0) {
      result[key] = value;
    }
  }
  return result;
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate environment variables
 *
 * @throws ConfigurationError when a variable is malformed
 */
export function loadEnvironment(source: EnvSource = process.env): EnvConfig {
  try {
    return EnvSchema.parse(dropEmpty(source));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid environment: ${describeZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Layer the --config file over the given environment
 */
export function mergeConfigFile(args: Pick<CliArgs, 'config'>, source: EnvSource): EnvSource {
  if (args.config === undefined) {
    return source;
  }

  const loaded = loadEnvFile(args.config);
  if (!loaded.success) {
    throw new ConfigurationError(loaded.error ?? `Failed to load ${args.config}`, 'config');
  }
  return { ...source, ...dropEmpty(loaded.values ?? {}) };
}

/**
 * Resolve the run's configuration from CLI arguments and environment
 *
 * @throws ConfigurationError on missing credentials or an invalid server URL
 */
export function resolveTriggerConfiguration(
  args: CliArgs,
  source: EnvSource = process.env
): TriggerConfiguration {
  const env = loadEnvironment(mergeConfigFile(args, source));

  const serverBaseUrl = args.url !== undefined && args.url.length > 0 ? args.url : env.JENKINS_URL;
  if (!validateServerUrl(serverBaseUrl)) {
    throw new ConfigurationError(`Invalid Jenkins server URL: ${serverBaseUrl}`, 'serverBaseUrl');
  }

  const auth = args.auth !== undefined && args.auth.length > 0 ? args.auth : env.JENKINS_AUTH;

  return {
    serverBaseUrl,
    credentials: parseCredentials(auth),
    verbose: args.verbose,
    trace: env.TRACE !== undefined,
    logLevel: env.LOG_LEVEL,
  };
}
