/**
 * Reservation request types.
 *
 * @module types/request
 */

/**
 * Allocation mode. `deploy` grants nodes that can be reimaged; `normal`
 * grants nodes reachable over plain SSH.
 */
export type ReservationType = 'normal' | 'deploy';

/**
 * Network isolation requested alongside the nodes.
 */
export type VlanOption = 'none' | 'routed' | 'isolated';

/**
 * Declarative description of a reservation.
 */
export interface ReservationRequest {
  /** Node count. Mutually exclusive with `hosts`. Defaults to 1. */
  nodes?: number;
  /** Explicit host names. Mutually exclusive with `nodes`. */
  hosts?: string[];
  cluster?: string;
  /** Walltime as `H:MM:SS`, `H:MM`, or a number of seconds. Defaults to one hour. */
  walltime?: string | number;
  /** Earliest start: a Date, epoch seconds, or an ISO-8601 string. */
  startAt?: Date | number | string;
  type?: ReservationType;
  vlan?: VlanOption;
  /** Explicit subnet width in bits; reserves one subnet of that width. */
  slash?: number;
  /** Number of /22 subnets. */
  slash22?: number;
  /** Number of /18 subnets. */
  slash18?: number;
  /** Number of switches the nodes must span. */
  switches?: number;
  /** Command run once resources are granted. Defaults to sleeping for the walltime. */
  command?: string;
  name?: string;
  /** Return right after submission instead of waiting for the job to run. */
  async?: boolean;
  /** Drop hosts the site reports as dead before compiling. */
  ignoreDead?: boolean;
  /** Environment to deploy once the job runs. Requires `type: 'deploy'`. */
  environment?: string;
  /** Public key installed by the deployment. */
  sshKey?: string;
}

/**
 * Output of the resource grammar compiler.
 */
export interface CompiledResourceSpec {
  /** Resource-selector string, e.g. `{cluster='x'}/nodes=2,walltime=1:00:00` */
  resources: string;
  /** OAR properties filter, present when hosts were named */
  properties?: string;
  /** Node count after host filtering */
  nodeCount: number;
  walltimeSeconds: number;
}

/**
 * Body of a job submission.
 */
export interface JobSubmission {
  resources: string;
  name: string;
  command: string;
  properties?: string;
  types: ['deploy'] | ['allow_classic_ssh'];
  /** Earliest start, in epoch seconds */
  reservation?: number;
}
