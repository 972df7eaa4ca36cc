/**
 * Grid reservations
 *
 * Client for OAR-based grid scheduling REST APIs with:
 * - A compiler from declarative reservation requests to the resource grammar
 * - Job submission and polling until the job runs
 * - OS deployment on reserved nodes
 * - Idempotent job release
 * - Site catalogue queries (clusters, node status, switches, environments)
 *
 * @example
 * ```typescript
 * import { createClientFromEnv, JobService, ReleaseManager } from 'grid-reservations';
 *
 * const client = createClientFromEnv();
 * const jobs = new JobService(client);
 *
 * const { job } = await jobs.reserve('nancy', {
 *   cluster: 'grisou',
 *   nodes: 2,
 *   walltime: '0:30',
 * });
 * console.log(job.assignedNodes);
 *
 * await new ReleaseManager(client).release(job);
 * await client.close();
 * ```
 *
 * @module grid-reservations
 */

// Core modules
export * from './config.js';
export * from './errors.js';
export * from './client/index.js';
export * from './observability/index.js';

// Types
export * from './types/index.js';

// Resource grammar
export * from './compiler/index.js';

// Services
export * from './services/index.js';

// Monitoring
export * from './monitoring/index.js';
