/**
 * VLAN naming helpers
 * @module services/vlan
 */

import { ConfigurationError } from '../errors.js';
import type { Job } from '../types/job.js';

/**
 * Name a node answers to inside a KaVLAN: the first label gets a
 * `-kavlan-<vlan>` suffix, e.g. `paravance-1-kavlan-4.rennes.grid5000.fr`.
 */
export function vlanHostname(node: string, vlan: string): string {
  const dot = node.indexOf('.');
  return dot === -1
    ? `${node}-kavlan-${vlan}`
    : `${node.slice(0, dot)}-kavlan-${vlan}${node.slice(dot)}`;
}

/**
 * Assigned nodes of a job renamed into its VLAN.
 *
 * @param vlan - Defaults to the job's first VLAN
 * @throws {ConfigurationError} when the job holds no VLAN.
 */
export function vlanNodes(job: Job, vlan?: string): string[] {
  const selected = vlan ?? job.vlans.at(0);
  if (selected === undefined) {
    throw new ConfigurationError(`Job ${job.uid} holds no VLAN`, 'vlan');
  }
  return job.assignedNodes.map((node) => vlanHostname(node, selected));
}
