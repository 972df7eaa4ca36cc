/**
 * Job lifecycle: submission, waiting and the reserve workflow
 * @module services/JobService
 */

import { z } from 'zod';
import type { GridClient } from '../client/index.js';
import { buildSubmission, compile } from '../compiler/index.js';
import { DeserializationError, JobFailedError } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { Poller } from '../monitoring/Poller.js';
import { ReservationStateMachine } from '../monitoring/StateMachine.js';
import { LinkSchema, UidSchema, collectionOf, findLink, parseRecord } from '../types/common.js';
import type { DeploymentOutcome } from '../types/deployment.js';
import { Job, JobRecordSchema, JobState } from '../types/job.js';
import type { JobSubmission, ReservationRequest } from '../types/request.js';
import { DeploymentService, type DeploymentWaitOptions } from './DeploymentService.js';
import { SiteService } from './SiteService.js';

const JobCollectionSchema = collectionOf(JobRecordSchema);

// The creation response only needs to tell us where the job lives.
const CreatedJobSchema = z.object({
  uid: UidSchema.optional(),
  links: z.array(LinkSchema).default([]),
});

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface ListJobsOptions {
  /** Only jobs owned by this user */
  user?: string;
  /** Only jobs in this state, e.g. `running` */
  state?: string;
  signal?: AbortSignal;
}

export interface WaitOptions {
  /** Default 10 hours */
  timeoutMs?: number;
  /** Default 5 seconds */
  pollIntervalMs?: number;
  signal?: AbortSignal;
  /** Called with every polled job */
  onProgress?: (job: Job) => void;
}

export interface ReserveOptions extends WaitOptions {
  /** Wait settings for the deployment, when the request names an environment */
  deployment?: DeploymentWaitOptions;
}

export interface ReservationResult {
  job: Job;
  /** Present when an environment was deployed */
  deployment?: DeploymentOutcome;
}

export class JobService {
  private readonly logger: Logger;

  constructor(
    private readonly client: GridClient,
    private readonly sites: SiteService = new SiteService(client),
    private readonly deployments: DeploymentService = new DeploymentService(client)
  ) {
    this.logger = client.logger.child({ service: 'jobs' });
  }

  /**
   * Submits a job and returns it as re-read from its self link. Never retried.
   */
  async submit(
    site: string,
    request: ReservationRequest | JobSubmission,
    options: SubmitOptions = {}
  ): Promise<Job> {
    const submission = isJobSubmission(request) ? request : buildSubmission(request);

    this.logger.info('Reserving resources', {
      site,
      resources: submission.resources,
      types: submission.types,
    });
    if (submission.reservation !== undefined) {
      this.logger.info('Starting this reservation later', {
        site,
        startAt: new Date(submission.reservation * 1000).toISOString(),
      });
    }

    const response = await this.client.post(
      this.client.apiPath(`sites/${site}/jobs`),
      submission,
      { signal: options.signal }
    );

    const created = parseRecord(CreatedJobSchema, response.data, 'job creation response');
    const self = findLink(created.links, 'self')
      ?? (created.uid !== undefined ? this.client.apiPath(`sites/${site}/jobs/${created.uid}`) : undefined);
    if (!self) {
      throw new DeserializationError('Job creation response has neither a self link nor a uid');
    }

    const fetched = await this.client.get(self, { signal: options.signal });
    return Job.fromRecord(site, fetched.data);
  }

  async get(site: string, uid: string | number): Promise<Job> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/jobs/${uid}`));
    return Job.fromRecord(site, response.data);
  }

  async list(site: string, options: ListJobsOptions = {}): Promise<Job[]> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/jobs`), {
      query: { state: options.state, user: options.user },
      signal: options.signal,
    });
    const collection = parseRecord(JobCollectionSchema, response.data, 'job collection');
    return collection.items.map((record) => new Job(site, record));
  }

  /**
   * Jobs of the configured user on a site.
   */
  async myJobs(site: string, state: string = JobState.Running): Promise<Job[]> {
    return this.list(site, { user: this.client.getUser(), state });
  }

  /**
   * Polls a job until it runs.
   *
   * @throws {JobFailedError} as soon as the job reaches error, finishing or terminated.
   * @throws {TimedOutError} when the deadline passes. The job is left in place.
   * @throws {ConfigurationError} for a non-finite or non-positive timeout or interval.
   */
  async waitUntilRunning(job: Job, options: WaitOptions = {}): Promise<Job> {
    const logger = this.logger.child({ site: job.site, job: job.uid });
    const machine = new ReservationStateMachine();
    const poller = new Poller({
      intervalMs: options.pollIntervalMs ?? 5000,
      timeoutMs: options.timeoutMs ?? 36_000_000,
    });

    logger.info('Waiting for reservation');

    const ready = await poller.poll(
      {
        subject: job.toString(),
        fetch: (signal) => job.refresh(this.client, { signal }),
        stateOf: (current) => current.state,
        isDone: (current) => {
          if (current.isRunning()) return true;
          if (current.hasFailed()) {
            throw new JobFailedError(current.uid, current.state);
          }
          return false;
        },
        onUpdate: (current) => {
          if (machine.observe(current.state)) {
            logger.debug('Reservation state changed', { state: current.state });
          }
          if (current.scheduledAt && !current.isRunning()) {
            logger.info('Reservation scheduled', {
              scheduledAt: current.scheduledAt.toISOString(),
              secondsUntilStart: current.secondsUntilStart(),
            });
          }
          options.onProgress?.(current);
        },
      },
      options.signal
    );

    logger.info('Reservation ready', { nodes: ready.assignedNodes.length });
    return ready;
  }

  /**
   * Compiles, submits and, unless the request is async, waits for the job to
   * run and deploys the requested environment.
   */
  async reserve(site: string, request: ReservationRequest, options: ReserveOptions = {}): Promise<ReservationResult> {
    // Validates the whole request before anything goes over the wire.
    let submission = buildSubmission(request);

    if (request.ignoreDead && request.hosts) {
      const dead = await this.sites.deadNodes(site);
      const aliases = new Set(dead.flatMap((node) => [node, node.split('.')[0]]));
      const deadHosts = request.hosts.filter((host) => aliases.has(host));
      if (deadHosts.length > 0) {
        this.logger.info('Ignored nodes', { site, nodes: deadHosts });
        submission = buildSubmission(request, compile(request, { deadHosts }));
      }
    }

    const job = await this.submit(site, submission, { signal: options.signal });
    if (request.async) {
      return { job };
    }

    const running = await this.waitUntilRunning(job, options);
    if (request.environment === undefined) {
      return { job: running };
    }

    const deployment = await this.deployments.deploy(running, {
      ...options.deployment,
      environment: request.environment,
      sshKey: request.sshKey,
      vlan: running.vlans.at(0),
      signal: options.deployment?.signal ?? options.signal,
    });
    return { job: running, deployment };
  }
}

function isJobSubmission(value: ReservationRequest | JobSubmission): value is JobSubmission {
  return 'resources' in value && typeof value.resources === 'string';
}
