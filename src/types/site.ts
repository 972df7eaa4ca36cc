/**
 * Site catalogue records.
 *
 * @module types/site
 */

import { z } from 'zod';
import { LinkSchema } from './common.js';

export const SiteSchema = z.object({
  uid: z.string(),
  name: z.string().optional(),
  description: z.string().optional(),
  links: z.array(LinkSchema).default([]),
});

export type Site = z.infer<typeof SiteSchema>;

export const ClusterSchema = z.object({
  uid: z.string(),
  model: z.string().optional(),
  links: z.array(LinkSchema).default([]),
});

export type Cluster = z.infer<typeof ClusterSchema>;

export const EnvironmentSchema = z.object({
  uid: z.string(),
  name: z.string().optional(),
  version: z.union([z.number(), z.string()]).optional(),
  description: z.string().optional(),
  links: z.array(LinkSchema).default([]),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Site status: node name to its soft/hard state.
 */
export const SiteStatusSchema = z.object({
  nodes: z.record(z.object({
    soft: z.string(),
    hard: z.string().optional(),
  })).default({}),
});

export type SiteStatus = z.infer<typeof SiteStatusSchema>;

/**
 * Node status map: node name to soft state (free, busy, ...).
 */
export type NodesStatus = Record<string, string>;

const PortSchema = z.object({
  uid: z.string().optional(),
});

const LinecardSchema = z.object({
  kind: z.string().optional(),
  ports: z.array(PortSchema).default([]),
});

export const NetworkEquipmentSchema = z.object({
  uid: z.string(),
  kind: z.string(),
  linecards: z.array(LinecardSchema).default([]),
});

export type NetworkEquipment = z.infer<typeof NetworkEquipmentSchema>;

/**
 * A switch together with the fully qualified names of the nodes wired to it.
 */
export interface SwitchInfo {
  uid: string;
  nodes: string[];
}
