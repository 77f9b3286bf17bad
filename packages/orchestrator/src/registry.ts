/**
 * ConnectionRegistry — the single table of who is connected to whom.
 *
 * Every method is synchronous, so each call is an atomic critical section on
 * the event loop. Reads hand out copies; callers never hold a live reference
 * to a registry entry.
 */

import {
  BandshareError,
  ConnectionNotFoundError,
  InvalidTransitionError,
  NotTerminalError,
  generateId,
  isTerminalState,
} from '@bandshare/core';
import type { Connection, ConnectionState, ProxyCredentials } from '@bandshare/core';
import { canTransition } from './state-machine.js';

export interface CreateConnectionInput {
  clientId?: string | null;
  sharerId?: string | null;
}

export interface TransitionResult {
  from: ConnectionState;
  connection: Connection;
}

function clone(conn: Connection): Connection {
  return {
    ...conn,
    credentials: conn.credentials ? { ...conn.credentials } : null,
    createdAt: new Date(conn.createdAt),
    lastHeartbeatAt: new Date(conn.lastHeartbeatAt),
    endedAt: conn.endedAt ? new Date(conn.endedAt) : null,
  };
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();

  constructor(private readonly clock: () => number = Date.now) {}

  // ── Creation ─────────────────────────────────────────────────────────

  create(input: CreateConnectionInput = {}): Connection {
    const now = new Date(this.clock());
    const conn: Connection = {
      id: generateId(),
      sharerId: input.sharerId ?? null,
      clientId: input.clientId ?? null,
      relayPort: null,
      credentials: null,
      state: 'PENDING',
      bytesTransferred: 0,
      createdAt: now,
      lastHeartbeatAt: now,
      endedAt: null,
    };
    this.connections.set(conn.id, conn);
    return clone(conn);
  }

  /** Re-insert a connection from a snapshot, keeping its id and state. */
  restore(conn: Connection): void {
    this.connections.set(conn.id, clone(conn));
  }

  attachClient(connectionId: string, clientId: string): Connection {
    const conn = this.pending(connectionId);
    if (conn.clientId !== null && conn.clientId !== clientId) {
      throw new BandshareError(`Connection ${connectionId} already has a client`, 'ALREADY_ATTACHED', {
        connectionId,
      });
    }
    conn.clientId = clientId;
    return clone(conn);
  }

  attachSharer(connectionId: string, sharerId: string): Connection {
    const conn = this.pending(connectionId);
    if (conn.sharerId !== null && conn.sharerId !== sharerId) {
      throw new BandshareError(`Connection ${connectionId} already has a sharer`, 'ALREADY_ATTACHED', {
        connectionId,
      });
    }
    conn.sharerId = sharerId;
    return clone(conn);
  }

  // ── State ────────────────────────────────────────────────────────────

  /**
   * Move a connection along an edge of the state machine. Any other change
   * throws InvalidTransitionError and leaves the connection untouched.
   */
  transition(connectionId: string, to: ConnectionState): TransitionResult {
    const conn = this.entry(connectionId);
    const from = conn.state;

    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(connectionId, from, to);
    }
    if (to === 'MATCHED' && (conn.sharerId === null || conn.clientId === null)) {
      throw new InvalidTransitionError(connectionId, from, to);
    }

    conn.state = to;
    if (isTerminalState(to)) {
      conn.endedAt = new Date(this.clock());
    }
    return { from, connection: clone(conn) };
  }

  // ── Relay-reported fields ────────────────────────────────────────────

  assignTunnel(connectionId: string, relayPort: number, credentials: ProxyCredentials): void {
    const conn = this.live(connectionId);
    conn.relayPort = relayPort;
    conn.credentials = { ...credentials };
  }

  clearTunnel(connectionId: string): void {
    const conn = this.live(connectionId);
    conn.relayPort = null;
    conn.credentials = null;
  }

  addBytes(connectionId: string, deltaBytes: number): void {
    if (deltaBytes <= 0) return;
    this.live(connectionId).bytesTransferred += deltaBytes;
  }

  touchHeartbeat(connectionId: string, at: Date = new Date(this.clock())): void {
    this.live(connectionId).lastHeartbeatAt = new Date(at);
  }

  /**
   * Push an ACTIVE connection's heartbeat into the past so the next
   * orchestrator tick sees it as silent. Returns false for any other state.
   */
  markStale(connectionId: string, expectedPort?: number): boolean {
    const conn = this.connections.get(connectionId);
    if (!conn || conn.state !== 'ACTIVE') return false;
    if (expectedPort !== undefined && conn.relayPort !== expectedPort) return false;
    conn.lastHeartbeatAt = new Date(0);
    return true;
  }

  // ── Queries ──────────────────────────────────────────────────────────

  get(connectionId: string): Connection | undefined {
    const conn = this.connections.get(connectionId);
    return conn ? clone(conn) : undefined;
  }

  require(connectionId: string): Connection {
    return clone(this.entry(connectionId));
  }

  /** All connections in creation order. */
  list(): Connection[] {
    return [...this.connections.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(clone);
  }

  listByState(...states: ConnectionState[]): Connection[] {
    return this.list().filter((c) => states.includes(c.state));
  }

  findByClient(clientId: string): Connection[] {
    return this.list().filter((c) => c.clientId === clientId);
  }

  findBySharer(sharerId: string): Connection[] {
    return this.list().filter((c) => c.sharerId === sharerId);
  }

  get size(): number {
    return this.connections.size;
  }

  // ── Removal ──────────────────────────────────────────────────────────

  /** Remove a terminal connection. Throws NotTerminalError for live ones. */
  remove(connectionId: string): void {
    const conn = this.entry(connectionId);
    if (!isTerminalState(conn.state)) {
      throw new NotTerminalError(connectionId, conn.state);
    }
    this.connections.delete(connectionId);
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private entry(connectionId: string): Connection {
    const conn = this.connections.get(connectionId);
    if (!conn) throw new ConnectionNotFoundError(connectionId);
    return conn;
  }

  private live(connectionId: string): Connection {
    const conn = this.entry(connectionId);
    if (isTerminalState(conn.state)) {
      throw new BandshareError(`Connection ${connectionId} is ${conn.state} and read-only`, 'CONNECTION_TERMINAL', {
        connectionId,
        state: conn.state,
      });
    }
    return conn;
  }

  private pending(connectionId: string): Connection {
    const conn = this.entry(connectionId);
    if (conn.state !== 'PENDING') {
      throw new BandshareError(
        `Connection ${connectionId} is ${conn.state}; parties can only be attached while PENDING`,
        'NOT_PENDING',
        { connectionId, state: conn.state },
      );
    }
    return conn;
  }
}
