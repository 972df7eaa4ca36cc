/**
 * Site catalogue
 * @module services/SiteService
 */

import type { GridClient } from '../client/index.js';
import { NotFoundError } from '../errors.js';
import { collectionOf, parseRecord } from '../types/common.js';
import {
  ClusterSchema,
  EnvironmentSchema,
  NetworkEquipmentSchema,
  SiteSchema,
  SiteStatusSchema,
  type Cluster,
  type Environment,
  type NodesStatus,
  type Site,
  type SiteStatus,
  type SwitchInfo,
} from '../types/site.js';

const SiteCollectionSchema = collectionOf(SiteSchema);
const ClusterCollectionSchema = collectionOf(ClusterSchema);
const EnvironmentCollectionSchema = collectionOf(EnvironmentSchema);
const NetworkEquipmentCollectionSchema = collectionOf(NetworkEquipmentSchema);

/** Hard states of a node that cannot run jobs */
const DEAD_HARD_STATES = new Set(['dead', 'absent', 'suspected']);

export class SiteService {
  constructor(private readonly client: GridClient) {}

  async sites(): Promise<Site[]> {
    const response = await this.client.get(this.client.apiPath('sites'));
    return parseRecord(SiteCollectionSchema, response.data, 'site collection').items;
  }

  async siteUids(): Promise<string[]> {
    return (await this.sites()).map((site) => site.uid);
  }

  async clusters(site: string): Promise<Cluster[]> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/clusters`));
    return parseRecord(ClusterCollectionSchema, response.data, 'cluster collection').items;
  }

  async clusterUids(site: string): Promise<string[]> {
    return (await this.clusters(site)).map((cluster) => cluster.uid);
  }

  /** Full status document of a site */
  async status(site: string): Promise<SiteStatus> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/status`));
    return parseRecord(SiteStatusSchema, response.data, 'site status');
  }

  /**
   * Node name to soft state (free, busy, besteffort, unknown).
   */
  async nodesStatus(site: string): Promise<NodesStatus> {
    const status = await this.status(site);
    return Object.fromEntries(
      Object.entries(status.nodes).map(([node, entry]) => [node, entry.soft])
    );
  }

  /**
   * Nodes whose hard state rules them out, or whose soft state is unknown.
   */
  async deadNodes(site: string): Promise<string[]> {
    const status = await this.status(site);
    return Object.entries(status.nodes)
      .filter(([, entry]) => entry.soft === 'unknown' || (entry.hard !== undefined && DEAD_HARD_STATES.has(entry.hard)))
      .map(([node]) => node)
      .sort();
  }

  /**
   * Switches of a site with the nodes wired to them. Switches without a node
   * linecard (InfiniBand fabric, for instance) are left out.
   */
  async switches(site: string): Promise<SwitchInfo[]> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/network_equipments`));
    const equipment = parseRecord(NetworkEquipmentCollectionSchema, response.data, 'network equipment collection').items;

    const result: SwitchInfo[] = [];
    for (const item of equipment) {
      if (item.kind !== 'switch') continue;

      const linecard = item.linecards.find((card) => card.kind === 'node');
      if (!linecard) continue;

      const nodes = linecard.ports
        .flatMap((port) => (port.uid ? [port.uid] : []))
        .map((uid) => `${uid}.${site}.${this.client.config.nodeDomain}`);
      result.push({ uid: item.uid, nodes });
    }
    return result;
  }

  /**
   * @throws {NotFoundError} when the site has no switch called `name`.
   */
  async switch(site: string, name: string): Promise<SwitchInfo> {
    const found = (await this.switches(site)).find((item) => item.uid === name);
    if (!found) {
      throw new NotFoundError(`Unknown switch '${name}'`, name);
    }
    return found;
  }

  async environments(site: string): Promise<Environment[]> {
    const response = await this.client.get(this.client.apiPath(`sites/${site}/environments`));
    return parseRecord(EnvironmentCollectionSchema, response.data, 'environment collection').items;
  }

  async environmentUids(site: string): Promise<string[]> {
    return (await this.environments(site)).map((environment) => environment.uid);
  }
}
