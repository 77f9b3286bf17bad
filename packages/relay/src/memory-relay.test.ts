import { RelayUnavailableError, TunnelNotFoundError } from '@bandshare/core';
import { MemoryRelay } from './memory-relay.js';

describe('MemoryRelay', () => {
  let relay: MemoryRelay;

  beforeEach(() => {
    relay = new MemoryRelay({ portRange: { start: 9100, end: 9101 } });
  });

  it('registers tunnels on the lowest free port', async () => {
    const a = await relay.registerTunnel('sharer-a');
    const b = await relay.registerTunnel('sharer-b');
    expect(a.relayPort).toBe(9100);
    expect(b.relayPort).toBe(9101);
    expect(await relay.listTunnels()).toEqual([
      { relayPort: 9100, sharerId: 'sharer-a', bytes: 0 },
      { relayPort: 9101, sharerId: 'sharer-b', bytes: 0 },
    ]);
  });

  it('reports usage deltas from injected traffic', async () => {
    const { relayPort } = await relay.registerTunnel('sharer-a');
    relay.addTraffic(relayPort, 400);
    expect(await relay.pollUsage(relayPort)).toBe(400);
    expect(await relay.pollUsage(relayPort)).toBe(0);
    relay.addTraffic(relayPort, 50);
    expect(await relay.pollUsage(relayPort)).toBe(50);
  });

  it('deregisters idempotently', async () => {
    const { relayPort } = await relay.registerTunnel('sharer-a');
    await relay.deregisterTunnel(relayPort);
    await relay.deregisterTunnel(relayPort);
    expect(relay.hasTunnel(relayPort)).toBe(false);
    await expect(relay.pollUsage(relayPort)).rejects.toBeInstanceOf(TunnelNotFoundError);
  });

  it('fails every call while unreachable', async () => {
    relay.setReachable(false);
    expect(await relay.ping()).toBe(false);
    await expect(relay.registerTunnel('sharer-a')).rejects.toBeInstanceOf(RelayUnavailableError);
    await expect(relay.listTunnels()).rejects.toBeInstanceOf(RelayUnavailableError);
  });

  it('fails the requested number of registrations', async () => {
    relay.failNextRegistrations(1);
    await expect(relay.registerTunnel('sharer-a')).rejects.toBeInstanceOf(RelayUnavailableError);
    const reg = await relay.registerTunnel('sharer-a');
    expect(reg.relayPort).toBe(9100);
  });

  it('loses all mappings on restart through its process handle', async () => {
    const { relayPort } = await relay.registerTunnel('sharer-a');
    relay.setReachable(false);
    await relay.processHandle().restart();
    expect(await relay.ping()).toBe(true);
    expect(relay.hasTunnel(relayPort)).toBe(false);
    expect(relay.restarts).toBe(1);
  });
});
