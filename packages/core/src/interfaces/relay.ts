/**
 * IRelayClient — control-channel contract for the reverse-proxy relay.
 *
 * The relay itself is an external process; implementations only register and
 * deregister port mappings and read per-tunnel traffic counters.
 */

import type { ProxyCredentials } from '../types/connection.js';

export interface TunnelRegistration {
  relayPort: number;
  sharerId: string;
  credentials: ProxyCredentials;
}

export interface RelayTunnelInfo {
  relayPort: number;
  sharerId: string;
  /** Cumulative bytes the relay has forwarded for this mapping. */
  bytes: number;
}

export interface IRelayClient {
  readonly id: string;

  /** Throws RelayUnavailableError or PortExhaustedError. */
  registerTunnel(sharerId: string): Promise<TunnelRegistration>;
  /** Idempotent: deregistering an absent tunnel resolves normally. */
  deregisterTunnel(relayPort: number): Promise<void>;
  /** Bytes forwarded since the previous poll of this port. Never negative. */
  pollUsage(relayPort: number): Promise<number>;
  listTunnels(): Promise<RelayTunnelInfo[]>;
  /** Single liveness probe, no retries. */
  ping(): Promise<boolean>;
}

/** Handle on the relay process, for restarts by the Health Monitor. */
export interface IRelayProcess {
  readonly managed: boolean;
  restart(): Promise<void>;
  stop(): Promise<void>;
}
