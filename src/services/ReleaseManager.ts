/**
 * Job release
 * @module services/ReleaseManager
 */

import type { GridClient } from '../client/index.js';
import { armDeadline, requireDuration } from '../client/resilience.js';
import { TimedOutError, isAlreadyTerminated } from '../errors.js';
import type { Logger } from '../observability/index.js';
import type { Job } from '../types/job.js';
import { JobService } from './JobService.js';

export interface ReleaseOptions {
  signal?: AbortSignal;
}

export interface ReleaseAllOptions {
  /** Owner of the jobs; defaults to the client's user */
  user?: string;
  /** Bound on the whole operation. Default 20 seconds. */
  deadlineMs?: number;
}

export interface ReleaseSummary {
  released: string[];
  /** Jobs the service reported as already killed */
  alreadyTerminated: string[];
}

export class ReleaseManager {
  private readonly logger: Logger;

  constructor(
    private readonly client: GridClient,
    private readonly jobs: JobService = new JobService(client)
  ) {
    this.logger = client.logger.child({ service: 'release' });
  }

  /**
   * Deletes a job. A job the service reports as already killed counts as
   * released.
   *
   * @returns false when the job had already ended
   */
  async release(job: Job, options: ReleaseOptions = {}): Promise<boolean> {
    try {
      await this.client.delete(job.selfLink(), { signal: options.signal });
    } catch (error) {
      if (isAlreadyTerminated(error)) {
        this.logger.info('Job already killed', { site: job.site, job: job.uid });
        return false;
      }
      throw error;
    }

    this.logger.info('Released job', { site: job.site, job: job.uid });
    return true;
  }

  /**
   * Releases every running job of a user on a site.
   *
   * @throws {TimedOutError} when the deadline passes; jobs already deleted stay deleted.
   * @throws {ConfigurationError} for a non-finite or non-positive deadline.
   */
  async releaseAll(site: string, options: ReleaseAllOptions = {}): Promise<ReleaseSummary> {
    const user = options.user ?? this.client.getUser();
    const deadlineMs = requireDuration(options.deadlineMs ?? 20_000, 'deadlineMs');
    const subject = `release of ${user}'s jobs on ${site}`;

    const controller = new AbortController();
    const cancelDeadline = armDeadline(deadlineMs, () => controller.abort());
    const summary: ReleaseSummary = { released: [], alreadyTerminated: [] };

    try {
      const running = await this.jobs.list(site, { user, state: 'running', signal: controller.signal });
      for (const job of running) {
        if (controller.signal.aborted) {
          throw new TimedOutError(subject, deadlineMs);
        }
        const deleted = await this.release(job, { signal: controller.signal });
        (deleted ? summary.released : summary.alreadyTerminated).push(job.uid);
      }
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof TimedOutError)) {
        throw new TimedOutError(subject, deadlineMs);
      }
      throw error;
    } finally {
      cancelDeadline();
    }

    this.logger.info('Released all jobs', {
      site,
      user,
      released: summary.released.length,
      alreadyTerminated: summary.alreadyTerminated.length,
    });
    return summary;
  }
}
