/**
 * Validation helpers for reservation requests.
 *
 * @module compiler/request
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { ReservationRequest } from '../types/request.js';

/** Default walltime in seconds (one hour). */
export const DEFAULT_WALLTIME_SECONDS = 3600;

// Names end up single-quoted inside the resource grammar.
const GRAMMAR_TOKEN = /^[^'\s,(){}]+$/;

/**
 * Zod schema for a reservation request. Unknown options are rejected.
 */
export const ReservationRequestSchema = z.object({
  nodes: z.number().int().positive('Nodes must be a positive integer').optional(),
  hosts: z.array(z.string().regex(GRAMMAR_TOKEN, 'Invalid host name')).min(1, 'Host list must not be empty').optional(),
  cluster: z.string().regex(GRAMMAR_TOKEN, 'Invalid cluster name').optional(),
  walltime: z.union([z.string(), z.number()]).optional(),
  startAt: z.union([z.date(), z.number(), z.string()]).optional(),
  type: z.enum(['normal', 'deploy'], {
    errorMap: () => ({ message: 'Type must be either deploy or normal' }),
  }).optional(),
  vlan: z.enum(['none', 'routed', 'isolated'], {
    errorMap: () => ({ message: 'Option for vlan not recognized' }),
  }).optional(),
  slash: z.number().int().min(1).max(32).optional(),
  slash22: z.number().int().positive().optional(),
  slash18: z.number().int().positive().optional(),
  switches: z.number().int().positive().optional(),
  command: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  async: z.boolean().optional(),
  ignoreDead: z.boolean().optional(),
  environment: z.string().min(1).optional(),
  sshKey: z.string().min(1).optional(),
}).strict().superRefine((request, ctx) => {
  if (request.nodes !== undefined && request.hosts !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['hosts'],
      message: 'Nodes and hosts are mutually exclusive',
    });
  }

  const hasSlash = request.slash !== undefined || request.slash22 !== undefined || request.slash18 !== undefined;
  if (request.vlan !== undefined && request.vlan !== 'none' && hasSlash) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['vlan'],
      message: 'VLAN isolation cannot be combined with a slash subnet option',
    });
  }

  if (request.environment !== undefined && request.type !== 'deploy') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['environment'],
      message: 'Deploying an environment requires type deploy',
    });
  }
});

/**
 * Checks a request before anything is compiled or sent.
 * @throws {ConfigurationError} identifying the first bad option.
 */
export function validateRequest(request: ReservationRequest): void {
  const result = ReservationRequestSchema.safeParse(request);
  if (result.success) return;

  const issue = result.error.issues[0];
  if (!issue) {
    throw new ConfigurationError('Invalid reservation request');
  }

  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const key = issue.keys[0];
    throw new ConfigurationError(`Unknown option '${key}'`, key);
  }

  const option = issue.path.length > 0 ? String(issue.path[0]) : undefined;
  throw new ConfigurationError(
    option ? `Invalid option '${option}': ${issue.message}` : issue.message,
    option
  );
}

/**
 * Parses a walltime into seconds. Accepts `H:MM:SS`, `H:MM`, a digit string,
 * or a number of seconds.
 */
export function parseWalltime(walltime: string | number): number {
  if (typeof walltime === 'number') {
    if (!Number.isInteger(walltime) || walltime <= 0) {
      throw new ConfigurationError(`Walltime must be a positive number of seconds, got ${walltime}`, 'walltime');
    }
    return walltime;
  }

  const text = walltime.trim();
  if (/^\d+$/.test(text)) {
    return parseWalltime(Number(text));
  }

  const match = /^(\d+):(\d{1,2})(?::(\d{1,2}))?$/.exec(text);
  if (!match) {
    throw new ConfigurationError(`Walltime '${walltime}' is not in H:MM:SS format`, 'walltime');
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (minutes > 59 || seconds > 59) {
    throw new ConfigurationError(`Walltime '${walltime}' has out-of-range minutes or seconds`, 'walltime');
  }

  return parseWalltime(hours * 3600 + minutes * 60 + seconds);
}

/**
 * Formats seconds in the resource grammar's walltime form, e.g. `0:30:00`.
 */
export function formatWalltime(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Converts an earliest-start value into epoch seconds.
 */
export function parseStartAt(startAt: Date | number | string): number {
  let millis: number;
  if (startAt instanceof Date) {
    millis = startAt.getTime();
  } else if (typeof startAt === 'number') {
    millis = startAt * 1000;
  } else {
    millis = Date.parse(startAt);
  }

  if (!Number.isFinite(millis) || millis < 0) {
    throw new ConfigurationError(`Start time '${String(startAt)}' is not a valid date`, 'startAt');
  }
  return Math.floor(millis / 1000);
}
