/**
 * Record and request types.
 *
 * @module types
 */

export * from './common.js';
export * from './request.js';
export * from './job.js';
export * from './deployment.js';
export * from './site.js';
