/**
 * Grid services
 * @module services
 */

export {
  JobService,
  type SubmitOptions,
  type ListJobsOptions,
  type WaitOptions,
  type ReserveOptions,
  type ReservationResult,
} from './JobService.js';
export {
  DeploymentService,
  type DeployOptions,
  type DeploymentWaitOptions,
} from './DeploymentService.js';
export {
  ReleaseManager,
  type ReleaseOptions,
  type ReleaseAllOptions,
  type ReleaseSummary,
} from './ReleaseManager.js';
export { SiteService } from './SiteService.js';
export { vlanHostname, vlanNodes } from './vlan.js';
