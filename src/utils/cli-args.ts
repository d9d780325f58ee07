/**
 * CLI argument parser
 *
 * Short getopt-style flags; a flag's value is always the next argument.
 */
import { readFileSync } from 'fs';
import { join } from 'path';

import { ConfigurationError } from '@/jenkins/errors';

/**
 * Parsed CLI arguments
 */
export interface CliArgs {
  /** Project to build (positional) */
  project?: string;
  /** Jenkins server URL (-H) */
  url?: string;
  /** Branch to build (-b) */
  branch?: string;
  /** Platform build flavor (-F) */
  platformFlavor?: string;
  /** `<user>:<token>` credentials (-u) */
  auth?: string;
  /** Git repository name (-g) */
  gitRepo?: string;
  /** Path to .env format config file (-c, --config) */
  config?: string;
  /** Log HTTP traffic (-v) */
  verbose: boolean;
  /** Show help and exit */
  help: boolean;
  /** Show version and exit */
  version: boolean;
}

type ValueFlag = 'url' | 'branch' | 'platformFlavor' | 'auth' | 'gitRepo' | 'config';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-H': 'url',
  '-b': 'branch',
  '-F': 'platformFlavor',
  '-u': 'auth',
  '-g': 'gitRepo',
  '-c': 'config',
  '--config': 'config',
};

/**
 * Parse CLI arguments from argv array
 *
 * @param argv - Command line arguments (typically process.argv.slice(2))
 * @throws ConfigurationError on an unknown flag, a missing flag value or an extra argument
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }
    if (arg === '--version' || arg === '-V') {
      result.version = true;
      continue;
    }
    if (arg === '-v') {
      result.verbose = true;
      continue;
    }

    if (arg.startsWith('--config=')) {
      result.config = arg.slice('--config='.length);
      continue;
    }

    const key = VALUE_FLAGS[arg];
    if (key !== undefined) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new ConfigurationError(`Option ${arg} requires a value`, key);
      }
      result[key] = value;
      i++;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }

    if (result.project !== undefined) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`, 'project');
    }
    result.project = arg;
  }

  return result;
}

/**
 * Get package version from package.json
 */
export function getVersion(): string {
  // bundled: dist/ -> package.json; source: src/utils/ -> package.json
  const possiblePaths = [join(__dirname, '../package.json'), join(__dirname, '../../package.json')];

  for (const packagePath of possiblePaths) {
    try {
      const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version?: string };
      if (packageJson.version) {
        return packageJson.version;
      }
    } catch {
      // Try next path
    }
  }
  return 'unknown';
}

/**
 * Get help text for CLI usage
 */
export function getHelpText(): string {
  const version = getVersion();
  return `jenkins-build-trigger v${version}
Trigger a Jenkins build for a project

USAGE:
  jenkins-build-trigger [OPTIONS] -g GITREPO PROJECT

OPTIONS:
  -H <url>            Jenkins server URL (default: https://jenkins.joyent.us)
  -b <branch>         Branch to build
  -F <flavor>         Platform build flavor: triton, smartos or triton-and-smartos
                      (platform and platform-debug only)
  -u <user:token>     Jenkins credentials
  -g <gitrepo>        Git repository name (required)
  -c, --config <path> Path to .env format configuration file
  -v                  Log the HTTP requests made

  -h, --help          Show this help message
  -V, --version       Show version number

ENVIRONMENT:
  JENKINS_URL         Jenkins server URL, overridden by -H
  JENKINS_AUTH        Jenkins credentials, <user>:<token>, overridden by -u
  TRACE               Trace each step of the run
  LOG_LEVEL           Log level (default: warn)

CONFIGURATION PRECEDENCE (highest to lowest):
  1. CLI arguments (-H, -u)
  2. Config file (--config)
  3. Environment variables
  4. .env file in current directory

EXAMPLES:
  # Build a branch of a repository's multibranch job
  jenkins-build-trigger -g sdc-imgapi -b my-feature sdc-imgapi

  # Build the smartos platform from a branch
  jenkins-build-trigger -g smartos-live -b my-feature -F smartos platform

  # Build the headnode image from a release branch
  jenkins-build-trigger -g sdc-headnode -b release-20240101 headnode
`;
}
