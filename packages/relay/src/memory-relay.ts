/**
 * MemoryRelay — an in-process relay implementing the same control contract
 * as HttpRelayClient.
 *
 * Used for local development (relay.mode = "memory") and as the stand-in for
 * the relay process in tests. Traffic is injected with addTraffic(); outages
 * and relay restarts are simulated with setReachable() and simulateRestart().
 */

import { RelayUnavailableError, TunnelNotFoundError } from '@bandshare/core';
import type {
  IRelayClient,
  IRelayProcess,
  RelayTunnelInfo,
  TunnelRegistration,
} from '@bandshare/core';
import { PortAllocator } from './port-allocator.js';
import { UsageCounter } from './usage-counter.js';
import { generateCredentials } from './credentials.js';

export interface MemoryRelayOptions {
  portRange?: { start: number; end: number };
}

interface MemoryTunnel {
  sharerId: string;
  bytes: number;
}

export class MemoryRelay implements IRelayClient {
  readonly id = 'memory';

  private readonly tunnels = new Map<number, MemoryTunnel>();
  private readonly ports: PortAllocator;
  private readonly counters = new UsageCounter();
  private reachable = true;
  private failRegistrations = 0;

  /** Number of restarts performed through the process handle. */
  restarts = 0;

  constructor(options: MemoryRelayOptions = {}) {
    const range = options.portRange ?? { start: 9000, end: 9999 };
    this.ports = new PortAllocator(range.start, range.end);
  }

  // -----------------------------------------------------------------------
  // IRelayClient implementation
  // -----------------------------------------------------------------------

  async registerTunnel(sharerId: string): Promise<TunnelRegistration> {
    this.assertReachable('register');
    if (this.failRegistrations > 0) {
      this.failRegistrations -= 1;
      throw new RelayUnavailableError('Relay register failed after 3 attempts: simulated failure', {
        operation: 'register',
      });
    }

    const relayPort = this.ports.allocate();
    this.tunnels.set(relayPort, { sharerId, bytes: 0 });
    this.counters.track(relayPort);
    return { relayPort, sharerId, credentials: generateCredentials() };
  }

  async deregisterTunnel(relayPort: number): Promise<void> {
    this.assertReachable('deregister');
    this.tunnels.delete(relayPort);
    this.ports.release(relayPort);
    this.counters.forget(relayPort);
  }

  async pollUsage(relayPort: number): Promise<number> {
    this.assertReachable('usage');
    const tunnel = this.tunnels.get(relayPort);
    if (!tunnel) throw new TunnelNotFoundError(relayPort);
    return this.counters.observe(relayPort, tunnel.bytes);
  }

  async listTunnels(): Promise<RelayTunnelInfo[]> {
    this.assertReachable('list');
    return [...this.tunnels].map(([relayPort, t]) => ({
      relayPort,
      sharerId: t.sharerId,
      bytes: t.bytes,
    }));
  }

  async ping(): Promise<boolean> {
    return this.reachable;
  }

  // -----------------------------------------------------------------------
  // Simulation controls
  // -----------------------------------------------------------------------

  /** Add forwarded bytes to a tunnel's cumulative counter. */
  addTraffic(relayPort: number, bytes: number): void {
    const tunnel = this.tunnels.get(relayPort);
    if (!tunnel) throw new TunnelNotFoundError(relayPort);
    tunnel.bytes += bytes;
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  /** Make the next `count` registerTunnel calls fail as if retries ran out. */
  failNextRegistrations(count: number): void {
    this.failRegistrations = count;
  }

  /** Drop every mapping, as a relay restart would. Port bookkeeping is kept. */
  simulateRestart(): void {
    this.tunnels.clear();
    this.reachable = true;
    this.restarts += 1;
  }

  hasTunnel(relayPort: number): boolean {
    return this.tunnels.has(relayPort);
  }

  /** Process handle whose restart() brings this relay back empty. */
  processHandle(): IRelayProcess {
    return {
      managed: true,
      restart: async () => {
        this.simulateRestart();
      },
      stop: async () => {
        this.reachable = false;
      },
    };
  }

  private assertReachable(operation: string): void {
    if (!this.reachable) {
      throw new RelayUnavailableError(`Relay ${operation} failed: relay unreachable`, { operation });
    }
  }
}
