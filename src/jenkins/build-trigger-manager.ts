/**
 * BuildTriggerManager - queues a Jenkins build for a resolved build request
 */
import { type ILogger, getLogger } from '@/utils/logger/index';

import { type BuildRequest, projectName } from './build-request';
import type { JenkinsClientAdapter } from './client';

export interface BuildTriggerResult {
  url: string;
  payload: string;
  status: number;
  queueUrl?: string;
}

export class BuildTriggerManager {
  private readonly logger: ILogger;

  constructor(
    private readonly client: JenkinsClientAdapter,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Fetch a crumb, then POST the build. Either failure ends the trigger.
   */
  async trigger(request: BuildRequest): Promise<BuildTriggerResult> {
    const log = this.logger.child({
      project: projectName(request.project),
      branch: request.branch,
    });

    log.debug('Fetching CSRF crumb', { serverBaseUrl: request.serverBaseUrl });
    const crumb = await this.client.fetchCrumb();
    log.debug('Received CSRF crumb', { field: crumb.field });

    log.debug('Triggering build', { url: request.url, payload: request.payload });
    const result = await this.client.postBuild(request.url, request.payload, crumb);

    log.info('Build triggered', { url: request.url, status: result.status, queueUrl: result.queueUrl });

    return {
      url: request.url,
      payload: request.payload,
      status: result.status,
      queueUrl: result.queueUrl,
    };
  }
}
