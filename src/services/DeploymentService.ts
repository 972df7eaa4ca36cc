/**
 * OS deployment on reserved nodes
 * @module services/DeploymentService
 */

import type { GridClient } from '../client/index.js';
import { ConfigurationError, DeploymentFailedError } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { DeploymentStateMachine } from '../monitoring/StateMachine.js';
import { Poller } from '../monitoring/Poller.js';
import { collectionOf, parseRecord } from '../types/common.js';
import {
  Deployment,
  DeploymentRecordSchema,
  DeploymentStatus,
  type DeploymentOutcome,
  type DeploymentSubmission,
} from '../types/deployment.js';
import type { Job } from '../types/job.js';

const DeploymentCollectionSchema = collectionOf(DeploymentRecordSchema);

export interface DeploymentWaitOptions {
  /** Default 1 hour */
  timeoutMs?: number;
  /** Default 5 seconds */
  pollIntervalMs?: number;
  signal?: AbortSignal;
  onProgress?: (deployment: Deployment) => void;
}

export interface DeployOptions extends DeploymentWaitOptions {
  environment: string;
  /** Defaults to the job's assigned nodes */
  nodes?: string[];
  sshKey?: string;
  /** VLAN the nodes are moved into after deployment */
  vlan?: string;
}

export class DeploymentService {
  private readonly logger: Logger;

  constructor(private readonly client: GridClient) {
    this.logger = client.logger.child({ service: 'deployments' });
  }

  /**
   * Deploys an environment on the job's nodes and waits for the result.
   *
   * @throws {DeploymentFailedError} unless every node reports OK.
   */
  async deploy(job: Job, options: DeployOptions): Promise<DeploymentOutcome> {
    const started = await this.trigger(job, options);
    const finished = await this.waitForDeployment(started, options);

    const failures = finished.failedNodes();
    if (finished.status !== DeploymentStatus.Terminated || Object.keys(failures).length > 0) {
      throw new DeploymentFailedError(finished.uid, finished.status, failures);
    }

    return finished.outcome();
  }

  /**
   * Starts a deployment without waiting for it.
   */
  async trigger(job: Job, options: DeployOptions): Promise<Deployment> {
    // Records that omit the types list are taken at their word.
    if (job.types.length > 0 && !job.types.includes('deploy')) {
      throw new ConfigurationError(`Job ${job.uid} was not reserved with type deploy`, 'type');
    }

    const nodes = options.nodes ?? [...job.assignedNodes];
    if (nodes.length === 0) {
      throw new ConfigurationError(`Job ${job.uid} has no nodes to deploy`, 'nodes');
    }

    const body: DeploymentSubmission = { nodes, environment: options.environment };
    if (options.sshKey) body.key = options.sshKey;
    if (options.vlan) body.vlan = options.vlan;

    this.logger.info('Deploying environment', {
      site: job.site,
      job: job.uid,
      environment: options.environment,
      nodes: nodes.length,
    });

    const response = await this.client.post(
      this.client.apiPath(`sites/${job.site}/deployments`),
      body,
      { signal: options.signal }
    );
    return Deployment.fromRecord(job.site, response.data);
  }

  /**
   * Polls a deployment until it leaves the processing status.
   */
  async waitForDeployment(deployment: Deployment, options: DeploymentWaitOptions = {}): Promise<Deployment> {
    const logger = this.logger.child({ site: deployment.site, deployment: deployment.uid });
    const machine = new DeploymentStateMachine();
    const poller = new Poller({
      intervalMs: options.pollIntervalMs ?? 5000,
      timeoutMs: options.timeoutMs ?? 3_600_000,
    });

    const finished = await poller.poll(
      {
        subject: `deployment ${deployment.site}/${deployment.uid}`,
        fetch: async (signal) => {
          const response = await this.client.get(deployment.selfLink(), { signal });
          return Deployment.fromRecord(deployment.site, response.data);
        },
        stateOf: (current) => current.status,
        isDone: (current) => !current.isProcessing(),
        onUpdate: (current) => {
          const failed = Object.keys(current.failedNodes()).length > 0;
          if (machine.observe(current.status, failed && !current.isProcessing())) {
            logger.debug('Deployment phase changed', { phase: machine.getState() });
          }
          options.onProgress?.(current);
        },
      },
      options.signal
    );

    logger.info('Deployment finished', { status: finished.status, phase: machine.getState() });
    return finished;
  }

  async get(site: string, uid: string): Promise<Deployment> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/deployments/${uid}`));
    return Deployment.fromRecord(site, response.data);
  }

  async list(site: string): Promise<Deployment[]> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/deployments`));
    const collection = parseRecord(DeploymentCollectionSchema, response.data, 'deployment collection');
    return collection.items.map((record) => new Deployment(site, record));
  }
}
