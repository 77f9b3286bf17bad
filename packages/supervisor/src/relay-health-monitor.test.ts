import { vi } from 'vitest';
import type { IObserver, IRelayProcess } from '@bandshare/core';
import { MemoryRelay } from '@bandshare/relay';
import { ConnectionRegistry } from '@bandshare/orchestrator';
import { RelayHealthMonitor } from './relay-health-monitor.js';

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

async function activeConnection(registry: ConnectionRegistry, relay: MemoryRelay, sharerId: string) {
  const conn = registry.create({ clientId: `client-of-${sharerId}` });
  registry.attachSharer(conn.id, sharerId);
  registry.transition(conn.id, 'MATCHED');
  const reg = await relay.registerTunnel(sharerId);
  registry.assignTunnel(conn.id, reg.relayPort, reg.credentials);
  registry.transition(conn.id, 'ACTIVE');
  return { id: conn.id, port: reg.relayPort };
}

describe('RelayHealthMonitor', () => {
  let relay: MemoryRelay;
  let registry: ConnectionRegistry;
  let observer: IObserver;
  let monitor: RelayHealthMonitor;

  function createMonitor(process: IRelayProcess | null): RelayHealthMonitor {
    monitor = new RelayHealthMonitor({
      relay,
      registry,
      process,
      observer,
      config: { maxRestartAttempts: 3, restartBackoffBaseMs: 1, restartBackoffMaxMs: 2 },
    });
    return monitor;
  }

  beforeEach(() => {
    relay = new MemoryRelay();
    registry = new ConnectionRegistry();
    observer = makeObserver();
  });

  afterEach(() => {
    monitor.dispose();
  });

  describe('relay reachable', () => {
    it('leaves connections with a live tunnel alone', async () => {
      const { id } = await activeConnection(registry, relay, 'sharer-a');
      const before = registry.require(id).lastHeartbeatAt;

      const result = await createMonitor(null).check();

      expect(result).toEqual({ reachable: true, stale: [], restartAttempts: 0, recovered: false });
      expect(registry.require(id).lastHeartbeatAt).toEqual(before);
    });

    it('marks connections whose tunnel the relay lost as stale', async () => {
      const kept = await activeConnection(registry, relay, 'sharer-a');
      const lost = await activeConnection(registry, relay, 'sharer-b');
      await relay.deregisterTunnel(lost.port);

      const result = await createMonitor(null).check();

      expect(result.stale).toEqual([lost.id]);
      expect(registry.require(lost.id).lastHeartbeatAt.getTime()).toBe(0);
      expect(registry.require(kept.id).lastHeartbeatAt.getTime()).not.toBe(0);
      expect(registry.require(lost.id).state).toBe('ACTIVE');
    });

    it('ignores tunnels provisioned while the listing is in flight', async () => {
      const listing = await relay.listTunnels();
      let release: () => void = () => {};
      const list = vi.spyOn(relay, 'listTunnels').mockImplementation(
        () =>
          new Promise((resolve) => {
            release = () => resolve(listing);
          }),
      );

      const pending = createMonitor(null).check();
      await vi.waitFor(() => {
        expect(list).toHaveBeenCalled();
      });
      const fresh = await activeConnection(registry, relay, 'sharer-a');
      release();
      const result = await pending;

      expect(result.stale).toEqual([]);
      expect(registry.require(fresh.id).lastHeartbeatAt.getTime()).not.toBe(0);
    });

    it('skips a connection whose port changed during the listing', async () => {
      const { id, port } = await activeConnection(registry, relay, 'sharer-a');
      let release: () => void = () => {};
      const list = vi.spyOn(relay, 'listTunnels').mockImplementation(
        () =>
          new Promise((resolve) => {
            release = () => resolve([]);
          }),
      );

      const pending = createMonitor(null).check();
      await vi.waitFor(() => {
        expect(list).toHaveBeenCalled();
      });
      const reg = await relay.registerTunnel('sharer-a');
      registry.assignTunnel(id, reg.relayPort, reg.credentials);
      await relay.deregisterTunnel(port);
      release();
      const result = await pending;

      expect(result.stale).toEqual([]);
      expect(registry.require(id).lastHeartbeatAt.getTime()).not.toBe(0);
    });
  });

  describe('relay unreachable', () => {
    it('marks every ACTIVE connection stale and restarts the relay', async () => {
      const { id } = await activeConnection(registry, relay, 'sharer-a');
      relay.setReachable(false);
      const m = createMonitor(relay.processHandle());
      const recovered = vi.fn();
      m.on('recovered', recovered);

      const result = await m.check();

      expect(result).toEqual({ reachable: true, stale: [id], restartAttempts: 1, recovered: true });
      expect(relay.restarts).toBe(1);
      expect(recovered).toHaveBeenCalledWith(1);
      const types = vi.mocked(observer.onRelayEvent).mock.calls.map(([e]) => e.type);
      expect(types).toEqual(['unreachable', 'restarting', 'recovered']);
    });

    it('raises a fatal alert after the restart budget and stops restarting', async () => {
      relay.setReachable(false);
      const restart = vi.fn(async () => {});
      const m = createMonitor({ managed: true, restart, stop: vi.fn(async () => {}) });

      const first = await m.check();
      expect(first).toEqual({ reachable: false, stale: [], restartAttempts: 3, recovered: false });
      expect(restart).toHaveBeenCalledTimes(3);
      expect(m.exhausted).toBe(true);
      expect(observer.onAlert).toHaveBeenCalledTimes(1);
      expect(vi.mocked(observer.onAlert).mock.calls[0]?.[0]).toMatchObject({
        severity: 'fatal',
        message: 'Relay did not come back after 3 restart attempts',
      });

      await m.check();
      expect(restart).toHaveBeenCalledTimes(3);

      relay.setReachable(true);
      await m.check();
      expect(m.exhausted).toBe(false);

      relay.setReachable(false);
      await m.check();
      expect(restart).toHaveBeenCalledTimes(6);
    });

    it('reports restart errors and keeps trying', async () => {
      relay.setReachable(false);
      const restart = vi
        .fn<[], Promise<void>>()
        .mockRejectedValueOnce(new Error('spawn failed'))
        .mockImplementation(async () => {
          relay.setReachable(true);
        });
      const m = createMonitor({ managed: true, restart, stop: vi.fn(async () => {}) });

      const result = await m.check();

      expect(result.restartAttempts).toBe(2);
      expect(result.recovered).toBe(true);
      expect(observer.onError).toHaveBeenCalledWith(new Error('spawn failed'), {
        phase: 'relay-restart',
        attempt: 1,
      });
    });

    it('only marks connections stale when the relay is managed elsewhere', async () => {
      const { id } = await activeConnection(registry, relay, 'sharer-a');
      relay.setReachable(false);

      const result = await createMonitor(null).check();

      expect(result).toEqual({ reachable: false, stale: [id], restartAttempts: 0, recovered: false });
      expect(relay.restarts).toBe(0);
    });
  });
});
