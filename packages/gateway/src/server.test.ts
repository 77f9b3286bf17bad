/**
 * GatewayServer integration tests.
 *
 * Starts a real server on an ephemeral port over an engine backed by the
 * in-memory relay and exercises each route with fetch.
 */

import { vi } from 'vitest';
import type { IObserver } from '@bandshare/core';
import { MemoryRelay } from '@bandshare/relay';
import { createEngine } from '@bandshare/orchestrator';
import type { Engine } from '@bandshare/orchestrator';
import { GatewayServer } from './server.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeObserver(): IObserver {
  return {
    onConnectionTransition: vi.fn(),
    onUsage: vi.fn(),
    onRelayEvent: vi.fn(),
    onAlert: vi.fn(),
    onDailyReset: vi.fn(),
    onConnectionReport: vi.fn(),
    onError: vi.fn(),
  };
}

describe('GatewayServer', () => {
  let engine: Engine;
  let observer: IObserver;
  let server: GatewayServer;
  let baseUrl: string;

  function call(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    observer = makeObserver();
    engine = createEngine({
      relay: new MemoryRelay(),
      observer,
      publicHost: 'relay.example.test',
      sharers: [
        { sharerId: 'sharer-a', dailyLimitBytes: 1000, qualityScore: 0.9 },
        { sharerId: 'sharer-b', dailyLimitBytes: 1000, qualityScore: 0.4 },
      ],
    });
    server = new GatewayServer({ port: 0, service: engine.service, observer });
    await server.start();
    const address = server.address;
    if (!address) throw new Error('server did not bind');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  it('GET /health reports ok', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  describe('connections', () => {
    it('POST /connections creates a PENDING connection', async () => {
      const res = await call('POST', '/connections', { clientId: 'client-1' });

      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ state: 'PENDING' });
      expect(engine.registry.findByClient('client-1')).toHaveLength(1);
    });

    it('POST /connections returns the existing live connection', async () => {
      const first = await (await call('POST', '/connections', { clientId: 'client-1' })).json();
      const second = await (await call('POST', '/connections', { clientId: 'client-1' })).json();

      expect(second).toEqual(first);
      expect(engine.registry.findByClient('client-1')).toHaveLength(1);
    });

    it('POST /connections rejects a missing clientId', async () => {
      const res = await call('POST', '/connections', {});

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'clientId must be a non-empty string', field: 'clientId' });
    });

    it('rejects a malformed JSON body', async () => {
      const res = await fetch(`${baseUrl}/connections`, { method: 'POST', body: '{not json' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
    });

    it('DELETE /connections/:id ends a pending connection', async () => {
      const conn = engine.service.requestConnection('client-1');

      const res = await call('DELETE', `/connections/${conn.id}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ connectionId: conn.id, state: 'EXPIRED' });
    });

    it('DELETE /connections/:id returns 404 for unknown ids', async () => {
      const res = await call('DELETE', '/connections/does-not-exist');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Unknown connection does-not-exist' });
    });
  });

  describe('status', () => {
    it('GET /status returns proxy details once the tunnel is up', async () => {
      const conn = engine.service.requestConnection('client-1');
      await engine.orchestrator.tick();
      const live = engine.registry.require(conn.id);

      const res = await call('GET', '/status?clientId=client-1');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        connectionId: conn.id,
        state: 'ACTIVE',
        bytesTransferred: 0,
        relayEndpoint: `relay.example.test:${live.relayPort}`,
        proxy: {
          type: 'socks5',
          host: 'relay.example.test',
          port: live.relayPort,
          username: live.credentials?.username,
          password: live.credentials?.password,
        },
      });
    });

    it('GET /status finds a connection by sharer', async () => {
      const conn = engine.service.requestConnection('client-1');
      await engine.orchestrator.tick();

      const res = await call('GET', '/status?sharerId=sharer-a');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ connectionId: conn.id, state: 'ACTIVE' });
    });

    it('GET /status returns 404 when the party has no connection', async () => {
      const res = await call('GET', '/status?clientId=nobody');
      expect(res.status).toBe(404);
    });

    it('GET /status requires a query', async () => {
      const res = await call('GET', '/status');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'clientId or sharerId is required', field: 'clientId' });
    });
  });

  describe('sharers', () => {
    it('GET /sharers/available lists ranked sharers', async () => {
      const res = await call('GET', '/sharers/available');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        sharers: [
          { sharerId: 'sharer-a', availableBytes: 1000, qualityScore: 0.9 },
          { sharerId: 'sharer-b', availableBytes: 1000, qualityScore: 0.4 },
        ],
      });
    });

    it('PUT /sharers/:id creates a profile', async () => {
      const res = await call('PUT', '/sharers/sharer-c', { dailyLimitBytes: 5000, qualityScore: 0.7 });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        sharerId: 'sharer-c',
        sharingEnabled: true,
        dailyLimitBytes: 5000,
        usedBytesToday: 0,
        qualityScore: 0.7,
      });
    });

    it('PUT /sharers/:id validates the limit', async () => {
      const res = await call('PUT', '/sharers/sharer-c', { dailyLimitBytes: -1 });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'dailyLimitBytes must be a positive integer',
        field: 'dailyLimitBytes',
      });
    });

    it('PUT /sharers/:id/sharing toggles sharing', async () => {
      const res = await call('PUT', '/sharers/sharer-b/sharing', { enabled: false });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ sharerId: 'sharer-b', sharingEnabled: false });
      expect(engine.service.listAvailableSharers().map((s) => s.sharerId)).toEqual(['sharer-a']);
    });

    it('GET /sharers/:id/quota returns 404 for an unknown sharer', async () => {
      const res = await call('GET', '/sharers/ghost/quota');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Unknown sharer ghost' });
    });

    it('GET /sharers/:id/quota returns the ledger entry', async () => {
      const res = await call('GET', '/sharers/sharer-a/quota');

      expect(await res.json()).toEqual({
        sharerId: 'sharer-a',
        dailyLimitBytes: 1000,
        usedBytesToday: 0,
        availableBytes: 1000,
        utilization: 0,
        reserved: false,
      });
    });
  });

  it('answers 404 for unknown routes and 405 for wrong methods', async () => {
    expect((await call('GET', '/nope')).status).toBe(404);
    expect((await call('POST', '/health')).status).toBe(405);
  });

  it('maps unexpected errors to 500 and reports them', async () => {
    vi.spyOn(engine.service, 'listAvailableSharers').mockImplementation(() => {
      throw new Error('ledger corrupted');
    });

    const res = await call('GET', '/sharers/available');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
    expect(observer.onError).toHaveBeenCalledWith(new Error('ledger corrupted'), {
      phase: 'gateway',
      method: 'GET',
      path: '/sharers/available',
    });
  });
});
