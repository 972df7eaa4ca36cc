/**
 * Resource grammar compiler.
 *
 * Turns a declarative ReservationRequest into the resource manager's
 * resource-selection string and properties filter. Everything here is pure.
 *
 * @module compiler
 */

import type {
  CompiledResourceSpec,
  JobSubmission,
  ReservationRequest,
  VlanOption,
} from '../types/request.js';
import {
  DEFAULT_WALLTIME_SECONDS,
  formatWalltime,
  parseStartAt,
  parseWalltime,
  validateRequest,
} from './request.js';

export {
  DEFAULT_WALLTIME_SECONDS,
  ReservationRequestSchema,
  formatWalltime,
  parseStartAt,
  parseWalltime,
  validateRequest,
} from './request.js';

/** Job name used when the request gives none. */
export const DEFAULT_JOB_NAME = 'grid-reservations job';

/**
 * Predefined subnet widths, in priority order.
 */
const PREDEFINED_SLASHES = [
  { option: 'slash22', bits: 22 },
  { option: 'slash18', bits: 18 },
] as const;

/**
 * Resource selector per VLAN option. `isolated` takes a site-local kavlan;
 * `routed` is mapped to a `kavlan-global` VLAN, which is reachable from every
 * site. This mapping is a choice of this library, not a server default.
 */
const VLAN_SELECTORS: Record<VlanOption, string | undefined> = {
  none: undefined,
  isolated: "{type='kavlan'}/vlan=1",
  routed: "{type='kavlan-global'}/vlan=1",
};

export interface CompileOptions {
  /** Hosts to drop from `request.hosts` */
  deadHosts?: Iterable<string>;
}

/**
 * Subnet clause for the request, if any. An explicit bit count wins over the
 * predefined widths.
 */
export function slashClause(request: ReservationRequest): string | undefined {
  if (request.slash !== undefined) {
    return `slash_${request.slash}=1`;
  }

  for (const { option, bits } of PREDEFINED_SLASHES) {
    const count = request[option];
    if (count !== undefined) {
      return `slash_${bits}=${count}`;
    }
  }

  return undefined;
}

/**
 * Properties filter restricting the job to `hosts`, sorted for determinism.
 */
export function hostFilter(hosts: readonly string[]): string {
  const quoted = hosts.map((host) => `'${host}'`).sort();
  return `host in (${quoted.join(',')})`;
}

/**
 * Compiles a request into a resource specification.
 * @throws {ConfigurationError} before any network call when the request is invalid.
 */
export function compile(request: ReservationRequest, options: CompileOptions = {}): CompiledResourceSpec {
  validateRequest(request);

  const walltimeSeconds = parseWalltime(request.walltime ?? DEFAULT_WALLTIME_SECONDS);
  let nodeCount = request.nodes ?? 1;
  let properties: string | undefined;

  if (request.hosts !== undefined) {
    const dead = new Set(options.deadHosts ?? []);
    const alive = request.hosts.filter((host) => !dead.has(host));
    properties = hostFilter(alive);
    nodeCount = alive.length;
  }

  let resources = `/nodes=${nodeCount},walltime=${formatWalltime(walltimeSeconds)}`;

  if (request.switches !== undefined) {
    resources = `/switch=${request.switches}${resources}`;
  }

  if (request.cluster !== undefined) {
    resources = `{cluster='${request.cluster}'}${resources}`;
  }

  const vlan = VLAN_SELECTORS[request.vlan ?? 'none'];
  if (vlan !== undefined) {
    resources = `${vlan}+${resources}`;
  }

  const slash = slashClause(request);
  if (slash !== undefined) {
    resources = `${slash}+${resources}`;
  }

  return properties === undefined
    ? { resources, nodeCount, walltimeSeconds }
    : { resources, properties, nodeCount, walltimeSeconds };
}

/**
 * Builds the job submission body for a request.
 */
export function buildSubmission(
  request: ReservationRequest,
  compiled: CompiledResourceSpec = compile(request)
): JobSubmission {
  const submission: JobSubmission = {
    resources: compiled.resources,
    name: request.name ?? DEFAULT_JOB_NAME,
    command: request.command ?? `sleep ${compiled.walltimeSeconds}`,
    types: request.type === 'deploy' ? ['deploy'] : ['allow_classic_ssh'],
  };

  if (compiled.properties !== undefined) {
    submission.properties = compiled.properties;
  }

  if (request.startAt !== undefined) {
    submission.reservation = parseStartAt(request.startAt);
  }

  return submission;
}
