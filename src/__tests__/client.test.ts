/**
 * Tests for the REST client adapter.
 */

import { describe, it, expect } from 'vitest';
import { GridClient, connect } from '../client/index.js';
import {
  AuthenticationError,
  ConfigurationError,
  DeserializationError,
  NotFoundError,
  RequestFailedError,
  ReservationErrorKind,
  TransportError,
} from '../errors.js';
import { MockTransport } from '../mocks/index.js';
import { InMemoryLogger, LogLevel } from '../observability/index.js';
import { createHarness } from './fixtures.js';

describe('GridClient', () => {
  describe('apiPath', () => {
    it('should prefix the API version without doubling slashes', () => {
      const { client } = createHarness();
      expect(client.apiPath('/sites/nancy/jobs')).toBe('/sid/sites/nancy/jobs');
      expect(client.apiPath('sites')).toBe('/sid/sites');
      expect(client.apiPath('')).toBe('/sid/');
    });

    it('should follow the configured version', () => {
      const client = new GridClient({ transport: new MockTransport(), config: { apiVersion: 'stable' } });
      expect(client.apiPath('sites')).toBe('/stable/sites');
    });
  });

  describe('requests', () => {
    it('should parse JSON bodies', async () => {
      const { client, transport } = createHarness();
      transport.onGet('/sid/sites', { items: [{ uid: 'nancy' }] });

      const response = await client.get('/sid/sites');

      expect(response.status).toBe(200);
      expect(response.data).toEqual({ items: [{ uid: 'nancy' }] });
      expect(transport.getCalls()[0].url).toBe('https://api.grid5000.fr/sid/sites');
    });

    it('should send query parameters and skip undefined ones', async () => {
      const { client, transport } = createHarness();
      transport.onGet('/sid/sites/nancy/jobs', { items: [] });

      await client.get('/sid/sites/nancy/jobs', { query: { state: 'running', user: undefined } });

      expect(transport.getCalls()[0].query).toEqual({ state: 'running' });
    });

    it('should follow absolute links', async () => {
      const { client, transport } = createHarness();
      transport.onGet('/sid/sites/nancy/jobs/7', { uid: 7 });

      await client.get('https://api.grid5000.fr/sid/sites/nancy/jobs/7');

      expect(transport.getCallsTo('GET', '/sid/sites/nancy/jobs/7')).toHaveLength(1);
    });

    it('should send JSON bodies with a content type', async () => {
      const { client, transport } = createHarness();
      transport.onPost('/sid/sites/nancy/jobs', { uid: 1 });

      await client.post('/sid/sites/nancy/jobs', { resources: '/nodes=1' });

      const call = transport.getCalls()[0];
      expect(call.body).toEqual({ resources: '/nodes=1' });
      expect(call.headers['Content-Type']).toBe('application/json');
      expect(call.headers['Accept']).toBe('application/json');
      expect(call.headers['User-Agent']).toBe('grid-reservations/0.1.0');
    });

    it('should send basic credentials when configured', async () => {
      const transport = new MockTransport().onGet('/sid/', {});
      const client = new GridClient({
        transport,
        logger: new InMemoryLogger(),
        config: { auth: { username: 'test-user', password: 'test-secret' } },
      });

      await client.get(client.apiPath(''));

      const expected = `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`;
      expect(transport.getCalls()[0].headers['Authorization']).toBe(expected);
    });

    it('should return undefined for empty bodies', async () => {
      const { client, transport } = createHarness();
      transport.onDelete('/sid/sites/nancy/jobs/1', { status: 202 });

      const response = await client.delete('/sid/sites/nancy/jobs/1');

      expect(response.status).toBe(202);
      expect(response.data).toBeUndefined();
    });

    it('should reject malformed JSON', async () => {
      const { client, transport } = createHarness();
      transport.mock({ method: 'GET', path: '/sid/sites' }, { body: '{"items": [' });

      await expect(client.get('/sid/sites')).rejects.toBeInstanceOf(DeserializationError);
    });
  });

  describe('error mapping', () => {
    it('should map 401 to AuthenticationError', async () => {
      const { client, transport } = createHarness();
      transport.mock({ path: '/sid/sites' }, { status: 401, body: { message: 'Bad credentials' } });

      const error = await client.get('/sid/sites').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('message', 'Bad credentials');
    });

    it('should map 404 to NotFoundError', async () => {
      const { client } = createHarness();

      const error = await client.get('/sid/sites/atlantis').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', 'Resource not found: https://api.grid5000.fr/sid/sites/atlantis');
    });

    it('should keep the body of server errors', async () => {
      const { client, transport } = createHarness();
      transport.onDelete('/sid/sites/nancy/jobs/9', { status: 500, body: 'Job 9 already killed' });

      const error = await client.delete('/sid/sites/nancy/jobs/9').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailedError);
      if (!(error instanceof RequestFailedError)) return;
      expect(error.kind).toBe(ReservationErrorKind.ServerError);
      expect(error.statusCode).toBe(500);
      expect(error.body).toBe('Job 9 already killed');
      expect(error.message).toBe('Job 9 already killed');
    });

    it('should map other client errors by status', async () => {
      const { client, transport } = createHarness();
      transport.onPost('/sid/sites/nancy/jobs', { message: 'Invalid resources' }, 400);

      const error = await client.post('/sid/sites/nancy/jobs', {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toHaveProperty('kind', ReservationErrorKind.BadRequest);
      expect(error).toHaveProperty('message', 'Invalid resources');
    });
  });

  describe('retries', () => {
    it('should retry GET timeouts and log each retry', async () => {
      const { client, transport, logger } = createHarness();
      transport.mock(
        { method: 'GET', path: '/sid/sites' },
        { timeout: true },
        { timeout: true },
        { body: { items: [] } }
      );

      const response = await client.get('/sid/sites');

      expect(response.data).toEqual({ items: [] });
      expect(transport.getCalls()).toHaveLength(3);
      expect(logger.getLogsByLevel(LogLevel.Warn).map((log) => log.message)).toEqual([
        'Request timed out, retrying',
        'Request timed out, retrying',
      ]);
    });

    it('should give up after the configured retries', async () => {
      const { client, transport } = createHarness();
      transport.mock({ method: 'GET', path: '/sid/sites' }, { timeout: true });

      const error = await client.get('/sid/sites').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('timeout', true);
      expect(transport.getCalls()).toHaveLength(4);
    });

    it('should never retry a submission', async () => {
      const { client, transport } = createHarness();
      transport.mock({ method: 'POST', path: '/sid/sites/nancy/jobs' }, { timeout: true });

      await expect(client.post('/sid/sites/nancy/jobs', {})).rejects.toBeInstanceOf(TransportError);
      expect(transport.getCalls()).toHaveLength(1);
    });

    it('should not retry server errors', async () => {
      const { client, transport } = createHarness();
      transport.mock({ method: 'GET', path: '/sid/sites' }, { status: 503, body: 'maintenance' });

      await expect(client.get('/sid/sites')).rejects.toBeInstanceOf(RequestFailedError);
      expect(transport.getCalls()).toHaveLength(1);
    });
  });

  describe('getUser', () => {
    it('should prefer the configured user', () => {
      const client = new GridClient({
        transport: new MockTransport(),
        config: { user: 'alice', auth: { username: 'bob', password: 'test-secret' } },
      });
      expect(client.getUser()).toBe('alice');
    });

    it('should fall back to the credentials', () => {
      const client = new GridClient({
        transport: new MockTransport(),
        config: { auth: { username: 'bob', password: 'test-secret' } },
      });
      expect(client.getUser()).toBe('bob');
    });

    it('should fail without either', () => {
      const client = new GridClient({ transport: new MockTransport() });
      expect(() => client.getUser()).toThrow(ConfigurationError);
    });
  });

  describe('connect', () => {
    it('should verify the connection', async () => {
      const transport = new MockTransport().onGet('/sid/', { links: [] });

      const client = await connect({ transport, logger: new InMemoryLogger() });

      expect(client).toBeInstanceOf(GridClient);
      expect(transport.isClosed()).toBe(false);
    });

    it('should report unrecognized credentials and close the client', async () => {
      const transport = new MockTransport().mock({ path: '/sid/' }, { status: 401, body: 'Unauthorized' });

      const error = await connect({ transport, logger: new InMemoryLogger() }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('message', 'Your platform credentials are not recognized');
      expect(transport.isClosed()).toBe(true);
    });
  });

  it('should close its transport', async () => {
    const { client, transport } = createHarness();
    await client.close();
    expect(transport.isClosed()).toBe(true);
  });
});
