/**
 * Build request builder
 *
 * Maps a project name and its options onto the Jenkins job URL to POST to and
 * the parameter payload that goes with it. Pure: nothing here touches the
 * network.
 */
import { ConfigurationError, ValidationError } from './errors';

export const DEFAULT_JENKINS_URL = 'https://jenkins.joyent.us';

export const MULTIBRANCH_ORG = 'joyent-org';

export const PLATFORM_FLAVORS = ['triton', 'smartos', 'triton-and-smartos'] as const;

export type PlatformFlavor = (typeof PLATFORM_FLAVORS)[number];

/**
 * Repositories pinned to the requested branch for platform builds
 */
export const PLATFORM_CONFIGURE_PROJECTS = [
  'illumos-extra',
  'illumos',
  'local/kbmd',
  'local/kvm-cmd',
  'local/kvm',
  'local/mdata-client',
  'local/ur-agent',
] as const;

/**
 * Projects with special handling; anything else is built from its repository's
 * multibranch job.
 */
export type BuildProject =
  | { kind: 'platform' }
  | { kind: 'platform-debug' }
  | { kind: 'headnode' }
  | { kind: 'headnode-debug' }
  | { kind: 'other'; name: string };

export interface BuildParameter {
  name: string;
  value: string;
}

export interface BuildParameterPayload {
  parameter: BuildParameter[];
}

export interface BuildRequestOptions {
  project: string;
  gitRepo: string;
  branch?: string;
  platformFlavor?: string;
  serverBaseUrl?: string;
}

/**
 * Fully resolved request, ready for the transport
 */
export interface BuildRequest {
  project: BuildProject;
  gitRepo: string;
  branch?: string;
  platformFlavor?: PlatformFlavor;
  serverBaseUrl: string;
  url: string;
  payload: string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled build project: ${JSON.stringify(value)}`);
}

export function classifyProject(project: string): BuildProject {
  switch (project) {
    case 'platform':
      return { kind: 'platform' };
    case 'platform-debug':
      return { kind: 'platform-debug' };
    case 'headnode':
      return { kind: 'headnode' };
    case 'headnode-debug':
      return { kind: 'headnode-debug' };
    default:
      return { kind: 'other', name: project };
  }
}

export function projectName(project: BuildProject): string {
  return project.kind === 'other' ? project.name : project.kind;
}

export function isPlatformProject(project: BuildProject): boolean {
  return project.kind === 'platform' || project.kind === 'platform-debug';
}

/**
 * Whether the project has a top-level job of its own rather than a
 * per-repository multibranch job
 */
export function hasDedicatedJob(project: BuildProject): boolean {
  switch (project.kind) {
    case 'platform':
    case 'headnode':
    case 'headnode-debug':
      return true;
    case 'platform-debug':
    case 'other':
      return false;
    default:
      return assertNever(project);
  }
}

export function isPlatformFlavor(value: string): value is PlatformFlavor {
  return (PLATFORM_FLAVORS as readonly string[]).includes(value);
}

export function normalizeServerUrl(serverBaseUrl: string): string {
  return serverBaseUrl.replace(/\/+$/, '');
}

/**
 * Resolve the URL the build trigger is POSTed to
 */
export function resolveBuildUrl(
  project: BuildProject,
  gitRepo: string,
  branch: string | undefined,
  serverBaseUrl: string = DEFAULT_JENKINS_URL
): string {
  const base = normalizeServerUrl(serverBaseUrl);

  if (hasDedicatedJob(project)) {
    return `${base}/job/${projectName(project)}/build`;
  }
  return `${base}/job/${MULTIBRANCH_ORG}/job/${gitRepo}/job/${branch ?? ''}/build`;
}

export function configureProjectsValue(branch: string): string {
  return PLATFORM_CONFIGURE_PROJECTS.map((repo) => `${repo}: ${branch}: origin`).join('\n');
}

/**
 * Resolve the build parameters, in the order Jenkins shows them
 */
export function resolveBuildParameters(
  project: BuildProject,
  branch?: string,
  platformFlavor?: PlatformFlavor
): BuildParameter[] {
  const parameters: BuildParameter[] = [];

  if (branch !== undefined && hasDedicatedJob(project)) {
    parameters.push({ name: 'BRANCH', value: branch });
  }

  switch (project.kind) {
    case 'platform':
    case 'platform-debug':
      if (branch !== undefined) {
        parameters.push({ name: 'CONFIGURE_PROJECTS', value: configureProjectsValue(branch) });
      }
      if (platformFlavor !== undefined) {
        parameters.push({ name: 'PLATFORM_BUILD_FLAVOR', value: platformFlavor });
      }
      break;
    case 'headnode':
    case 'headnode-debug':
      if (branch !== undefined) {
        parameters.push({ name: 'CONFIGURE_BRANCHES', value: `bits-branch: ${branch}` });
      }
      break;
    case 'other':
      break;
    default:
      assertNever(project);
  }

  return parameters;
}

export function serializeParameters(parameters: BuildParameter[]): string {
  const payload: BuildParameterPayload = { parameter: parameters };
  return JSON.stringify(payload);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Validate the options and resolve them into a {@link BuildRequest}
 *
 * @throws ConfigurationError on missing input or a flavor given for a non-platform project
 * @throws ValidationError on an unknown platform flavor
 */
export function createBuildRequest(options: BuildRequestOptions): BuildRequest {
  if (options.project.length === 0) {
    throw new ConfigurationError('A project name is required', 'project');
  }
  if (options.gitRepo.length === 0) {
    throw new ConfigurationError('A git repository is required (-g GITREPO)', 'gitRepo');
  }

  const project = classifyProject(options.project);
  const branch = nonEmpty(options.branch);
  const flavor = nonEmpty(options.platformFlavor);

  let platformFlavor: PlatformFlavor | undefined;
  if (flavor !== undefined) {
    if (!isPlatformProject(project)) {
      throw new ConfigurationError(
        `A platform flavor can only be given for platform or platform-debug, not '${options.project}'`,
        'platformFlavor'
      );
    }
    if (!isPlatformFlavor(flavor)) {
      throw new ValidationError(
        `Unknown platform flavor '${flavor}'. Valid values are ${PLATFORM_FLAVORS.join(', ')}`,
        'platformFlavor',
        PLATFORM_FLAVORS
      );
    }
    platformFlavor = flavor;
  }

  const serverBaseUrl = normalizeServerUrl(options.serverBaseUrl ?? DEFAULT_JENKINS_URL);

  return {
    project,
    gitRepo: options.gitRepo,
    branch,
    platformFlavor,
    serverBaseUrl,
    url: resolveBuildUrl(project, options.gitRepo, branch, serverBaseUrl),
    payload: serializeParameters(resolveBuildParameters(project, branch, platformFlavor)),
  };
}
