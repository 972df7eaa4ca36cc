/**
 * OS deployment records.
 *
 * @module types/deployment
 */

import { z } from 'zod';
import { LinkSchema, UidSchema, findLink, parseRecord, type Link } from './common.js';
import { DeserializationError } from '../errors.js';

/**
 * Deployment statuses reported by the deployment service.
 */
export enum DeploymentStatus {
  Processing = 'processing',
  Terminated = 'terminated',
  Error = 'error',
  Canceled = 'canceled',
}

/**
 * State given to a requested node the result leaves out.
 */
export const MISSING_RESULT = 'missing';

/**
 * Per-node result entry.
 */
export const NodeResultSchema = z.object({
  state: z.string(),
});

/**
 * Wire shape of a deployment.
 */
export const DeploymentRecordSchema = z.object({
  uid: UidSchema,
  status: z.string(),
  nodes: z.array(z.string()).default([]),
  environment: z.string().optional(),
  result: z.record(NodeResultSchema).default({}),
  links: z.array(LinkSchema).default([]),
});

export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>;

/**
 * Node identifier to deployment result.
 */
export type DeploymentOutcome = Record<string, 'OK' | 'error'>;

/**
 * Request body for a new deployment.
 */
export interface DeploymentSubmission {
  nodes: string[];
  environment: string;
  key?: string;
  vlan?: string;
}

/**
 * A deployment as last read from the service.
 */
export class Deployment {
  readonly site: string;
  readonly uid: string;
  readonly status: string;
  readonly nodes: readonly string[];
  readonly environment?: string;
  /** Node identifier to the state the service reported for it */
  readonly result: Readonly<Record<string, string>>;
  readonly links: readonly Link[];

  constructor(site: string, record: DeploymentRecord) {
    this.site = site;
    this.uid = record.uid;
    this.status = record.status;
    this.nodes = record.nodes;
    this.environment = record.environment;
    this.result = Object.fromEntries(
      Object.entries(record.result).map(([node, entry]) => [node, entry.state])
    );
    this.links = record.links;
  }

  static fromRecord(site: string, data: unknown): Deployment {
    return new Deployment(site, parseRecord(DeploymentRecordSchema, data, 'deployment'));
  }

  selfLink(): string {
    const href = findLink(this.links, 'self');
    if (!href) {
      throw new DeserializationError(`Deployment ${this.uid} has no 'self' link`);
    }
    return href;
  }

  isProcessing(): boolean {
    return this.status === DeploymentStatus.Processing;
  }

  /**
   * Requested nodes and nodes with a result, sorted.
   */
  allNodes(): string[] {
    return [...new Set([...this.nodes, ...Object.keys(this.result)])].sort();
  }

  /**
   * Nodes whose result is anything but OK, with the reported state. A
   * requested node without a result is reported as `missing`.
   */
  failedNodes(): Record<string, string> {
    const failures: Record<string, string> = {};
    for (const node of this.allNodes()) {
      const state = this.result[node] ?? MISSING_RESULT;
      if (state !== 'OK') failures[node] = state;
    }
    return failures;
  }

  /**
   * Collapses the per-node result into OK / error.
   */
  outcome(): DeploymentOutcome {
    const outcome: DeploymentOutcome = {};
    for (const node of this.allNodes()) {
      outcome[node] = this.result[node] === 'OK' ? 'OK' : 'error';
    }
    return outcome;
  }
}
