/**
 * One trigger run, from argv to exit code
 */
import { resolveTriggerConfiguration } from '@/config';
import { BuildTriggerManager } from '@/jenkins/build-trigger-manager';
import { createBuildRequest } from '@/jenkins/build-request';
import { type JenkinsClientAdapter, type JenkinsClientConfig, JenkinsClient } from '@/jenkins/client';
import { ConfigurationError, getExitCode } from '@/jenkins/errors';
import type { TriggerConfiguration } from '@/types/config';
import { getHelpText, getVersion, parseCliArgs } from '@/utils/cli-args';
import { type LogLevel, getLogger } from '@/utils/logger/index';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface TriggerRunnerOptions {
  env?: Record<string, string | undefined>;
  stdout?: OutputStream;
  stderr?: OutputStream;
  createClient?: (config: JenkinsClientConfig) => JenkinsClientAdapter;
}

export function resolveLogLevel(config: TriggerConfiguration): LogLevel {
  if (config.trace) return 'silly';
  if (config.verbose) return 'debug';
  return config.logLevel ?? 'warn';
}

/**
 * Run the CLI and return the process exit code
 */
export async function runTrigger(
  argv: string[],
  options: TriggerRunnerOptions = {}
): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const createClient =
    options.createClient ?? ((config: JenkinsClientConfig) => new JenkinsClient(config));

  try {
    const args = parseCliArgs(argv);

    if (args.help) {
      stdout.write(getHelpText());
      return 0;
    }
    if (args.version) {
      stdout.write(`${getVersion()}\n`);
      return 0;
    }

    if (args.project === undefined) {
      throw new ConfigurationError('A project name is required', 'project');
    }

    const config = resolveTriggerConfiguration(args, options.env);
    const logger = getLogger({ level: resolveLogLevel(config) });
    logger.trace('Resolved configuration', {
      serverBaseUrl: config.serverBaseUrl,
      username: config.credentials.username,
      verbose: config.verbose,
    });

    const request = createBuildRequest({
      project: args.project,
      gitRepo: args.gitRepo ?? '',
      branch: args.branch,
      platformFlavor: args.platformFlavor,
      serverBaseUrl: config.serverBaseUrl,
    });
    logger.trace('Resolved build request', { url: request.url, payload: request.payload });

    const client = createClient({
      baseUrl: config.serverBaseUrl,
      credentials: config.credentials,
    });
    const result = await new BuildTriggerManager(client, logger).trigger(request);

    stdout.write(`Triggered ${result.url}\n`);
    if (result.queueUrl !== undefined) {
      stdout.write(`Queued as ${result.queueUrl}\n`);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderr.write(`Error: ${message}\n`);
    if (error instanceof ConfigurationError) {
      stderr.write(`\n${getHelpText()}`);
    }
    return getExitCode(error);
  }
}
