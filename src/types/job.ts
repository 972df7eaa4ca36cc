/**
 * Job records.
 *
 * @module types/job
 */

import { z } from 'zod';
import type { GridClient } from '../client/index.js';
import { DeserializationError } from '../errors.js';
import { LinkSchema, UidSchema, findLink, parseRecord, type Link } from './common.js';
import { DeploymentRecordSchema, type DeploymentRecord } from './deployment.js';

/**
 * Job states reported by the resource manager. Other values may appear and are
 * carried through as plain strings.
 */
export enum JobState {
  Waiting = 'waiting',
  Launching = 'launching',
  Running = 'running',
  Error = 'error',
  Finishing = 'finishing',
  Terminated = 'terminated',
}

/**
 * States after which a job can never reach `running`.
 */
export const FAILED_JOB_STATES: readonly string[] = [
  JobState.Error,
  JobState.Finishing,
  JobState.Terminated,
];

/**
 * Wire shape of a job.
 */
export const JobRecordSchema = z.object({
  uid: UidSchema,
  state: z.string(),
  scheduled_at: z.number().nullish(),
  assigned_nodes: z.array(z.string()).default([]),
  types: z.array(z.string()).default([]),
  user_uid: z.string().optional(),
  user: z.string().optional(),
  name: z.string().nullish(),
  resources_by_type: z.object({
    vlans: z.array(z.union([z.string(), z.number()]).transform((vlan) => String(vlan))).default([]),
    subnets: z.array(z.string()).default([]),
  }).nullish(),
  deploy: z.array(DeploymentRecordSchema).default([]),
  links: z.array(LinkSchema).default([]),
});

export type JobRecord = z.infer<typeof JobRecordSchema>;

/**
 * Options for a refresh.
 */
export interface RefreshOptions {
  signal?: AbortSignal;
}

/**
 * A job as last read from the service. Instances are never mutated; `refresh`
 * returns a new one.
 */
export class Job {
  readonly site: string;
  readonly uid: string;
  readonly state: string;
  readonly scheduledAt?: Date;
  readonly assignedNodes: readonly string[];
  readonly types: readonly string[];
  readonly user?: string;
  readonly name?: string;
  readonly vlans: readonly string[];
  readonly subnets: readonly string[];
  /** Deployment attempts recorded on the job, when the service reports them */
  readonly deployments: readonly DeploymentRecord[];
  readonly links: readonly Link[];

  constructor(site: string, record: JobRecord) {
    this.site = site;
    this.uid = record.uid;
    this.state = record.state;
    this.scheduledAt = typeof record.scheduled_at === 'number'
      ? new Date(record.scheduled_at * 1000)
      : undefined;
    this.assignedNodes = record.assigned_nodes;
    this.types = record.types;
    this.user = record.user_uid ?? record.user;
    this.name = record.name ?? undefined;
    this.vlans = record.resources_by_type?.vlans ?? [];
    this.subnets = record.resources_by_type?.subnets ?? [];
    this.deployments = record.deploy;
    this.links = record.links;
  }

  /**
   * Parses a job from a response body.
   */
  static fromRecord(site: string, data: unknown): Job {
    return new Job(site, parseRecord(JobRecordSchema, data, 'job'));
  }

  /**
   * Returns the href of a link relation.
   * @throws {DeserializationError} if the job carries no such link.
   */
  rel(rel: string): string {
    const href = findLink(this.links, rel);
    if (!href) {
      throw new DeserializationError(`Job ${this.uid} has no '${rel}' link`);
    }
    return href;
  }

  /**
   * Canonical location of this job, used for refresh and deletion.
   */
  selfLink(): string {
    return this.rel('self');
  }

  /**
   * Re-reads the job from the service.
   */
  async refresh(client: GridClient, options: RefreshOptions = {}): Promise<Job> {
    const response = await client.get(this.selfLink(), { signal: options.signal });
    return Job.fromRecord(this.site, response.data);
  }

  isRunning(): boolean {
    return this.state === JobState.Running;
  }

  /**
   * True once the job can no longer reach `running`.
   */
  hasFailed(): boolean {
    return FAILED_JOB_STATES.includes(this.state);
  }

  /**
   * Seconds until the scheduled start, or undefined when none is known.
   */
  secondsUntilStart(now: Date = new Date()): number | undefined {
    if (!this.scheduledAt) return undefined;
    return Math.max(0, Math.floor((this.scheduledAt.getTime() - now.getTime()) / 1000));
  }

  toString(): string {
    return `${this.site}/${this.uid}`;
  }
}
