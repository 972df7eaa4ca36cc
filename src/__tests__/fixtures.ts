/**
 * Shared test fixtures.
 */

import { GridClient } from '../client/index.js';
import { MockTransport } from '../mocks/index.js';
import { InMemoryLogger } from '../observability/index.js';

export const SITE = 'nancy';

export function jobPath(uid: number | string): string {
  return `/sid/sites/${SITE}/jobs/${uid}`;
}

export function jobRecord(uid: number, state: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    uid,
    state,
    user_uid: 'test-user',
    types: ['allow_classic_ssh'],
    assigned_nodes: [],
    links: [{ rel: 'self', href: jobPath(uid) }],
    ...extra,
  };
}

export function deploymentRecord(
  uid: string,
  status: string,
  result: Record<string, string> = {},
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    uid,
    status,
    nodes: Object.keys(result),
    result: Object.fromEntries(Object.entries(result).map(([node, state]) => [node, { state }])),
    links: [{ rel: 'self', href: `/sid/sites/${SITE}/deployments/${uid}` }],
    ...extra,
  };
}

export interface TestHarness {
  client: GridClient;
  transport: MockTransport;
  logger: InMemoryLogger;
}

export function createHarness(): TestHarness {
  const transport = new MockTransport();
  const logger = new InMemoryLogger();
  const client = new GridClient({
    transport,
    logger,
    config: {
      user: 'test-user',
      retry: { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 1, multiplier: 1 },
    },
  });
  return { client, transport, logger };
}
