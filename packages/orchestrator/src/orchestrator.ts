/**
 * Orchestrator — the control loop and the only caller of transition().
 *
 * One tick runs these phases in order:
 *
 *   0. daily reset when a UTC midnight has passed
 *   1. PENDING    expire after matchTimeoutMs, otherwise match and provision
 *   2. UNHEALTHY  deregister, close and requeue the client elsewhere
 *   3. ACTIVE     close if sharing is off, flag missed heartbeats, poll usage
 *   4. THROTTLED  close if sharing is off, resume after a reset
 *   5. drain      report and remove terminal connections past retention
 *   6. persist    snapshot to the store
 *
 * Work on one connection runs under that connection's lock, so a disconnect
 * intent waits for an in-flight provision and is applied once it settles.
 * A failure on one connection is reported to the observer and never aborts
 * the rest of the tick.
 */

import {
  RelayUnavailableError,
  TunnelNotFoundError,
  isTerminalState,
} from '@bandshare/core';
import type {
  Connection,
  ConnectionState,
  EngineSnapshot,
  IObserver,
  IRelayClient,
  ISnapshotStore,
  OrchestratorConfig,
  SharerProfile,
} from '@bandshare/core';
import { ConnectionRegistry } from './registry.js';
import type { TransitionResult } from './registry.js';
import { QuotaLedger } from './quota-ledger.js';
import { Matcher } from './matcher.js';
import { KeyedMutex } from './keyed-mutex.js';
import { RESERVING_STATES, canTransition } from './state-machine.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface OrchestratorDeps {
  registry: ConnectionRegistry;
  ledger: QuotaLedger;
  matcher: Matcher;
  relay: IRelayClient;
  observer: IObserver;
  store?: ISnapshotStore | null;
  config: OrchestratorConfig;
  clock?: () => number;
}

export interface TickSummary {
  /** Whether this tick performed the daily reset. */
  reset: boolean;
  /** Number of connections that entered each state during the tick. */
  transitions: Partial<Record<ConnectionState, number>>;
  polled: number;
  drained: number;
  errors: number;
}

export interface RecoverySummary {
  restored: number;
  reregistered: number;
  failed: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  tickIntervalMs: 5_000,
  matchTimeoutMs: 60_000,
  missedHeartbeatThreshold: 3,
  terminalRetentionMs: 60_000,
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Sharing on and still under today's limit; ignores reservations. */
function canServe(profile: SharerProfile | undefined): boolean {
  return profile !== undefined && profile.sharingEnabled && profile.usedBytesToday < profile.dailyLimitBytes;
}

function emptySummary(): TickSummary {
  return { reset: false, transitions: {}, polled: 0, drained: 0, errors: 0 };
}

// ── Orchestrator ─────────────────────────────────────────────────────────

export class Orchestrator {
  private readonly registry: ConnectionRegistry;
  private readonly ledger: QuotaLedger;
  private readonly matcher: Matcher;
  private readonly relay: IRelayClient;
  private readonly observer: IObserver;
  private readonly store: ISnapshotStore | null;
  private readonly config: OrchestratorConfig;
  private readonly clock: () => number;
  private readonly locks = new KeyedMutex();

  /** When each THROTTLED connection was throttled; it resumes after a later reset. */
  private readonly throttledAt = new Map<string, number>();

  /** Sharers a PENDING failover connection must not be matched with. */
  private readonly avoid = new Map<string, Set<string>>();

  private inflight: Promise<TickSummary> | null = null;
  private summary: TickSummary | null = null;

  constructor(deps: OrchestratorDeps) {
    this.registry = deps.registry;
    this.ledger = deps.ledger;
    this.matcher = deps.matcher;
    this.relay = deps.relay;
    this.observer = deps.observer;
    this.store = deps.store ?? null;
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.clock = deps.clock ?? Date.now;
  }

  // ── Tick ─────────────────────────────────────────────────────────────

  /** Run one control-loop pass. Concurrent callers share the pass in flight. */
  tick(): Promise<TickSummary> {
    if (this.inflight) return this.inflight;
    this.inflight = this.runTick().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async runTick(): Promise<TickSummary> {
    const summary = emptySummary();
    this.summary = summary;

    try {
      if (this.ledger.resetIfDue()) {
        summary.reset = true;
        this.observer.onDailyReset({
          sharers: this.ledger.list().length,
          timestamp: new Date(this.clock()),
        });
      }

      for (const conn of this.registry.listByState('PENDING')) {
        await this.guarded(conn, 'PENDING', 'match', () => this.handlePending(conn.id));
      }
      for (const conn of this.registry.listByState('UNHEALTHY')) {
        await this.guarded(conn, 'UNHEALTHY', 'teardown', () => this.failover(conn.id));
      }
      for (const conn of this.registry.listByState('ACTIVE')) {
        await this.guarded(conn, 'ACTIVE', 'poll', () => this.handleActive(conn.id));
      }
      for (const conn of this.registry.listByState('THROTTLED')) {
        await this.guarded(conn, 'THROTTLED', 'resume', () => this.handleThrottled(conn.id));
      }

      this.drain(summary);
      this.persist();
      return summary;
    } finally {
      this.summary = null;
    }
  }

  /**
   * Run `fn` under the connection's lock if the connection is still in the
   * state it was listed in. Errors are counted and reported, not thrown.
   */
  private async guarded(
    conn: Connection,
    expected: ConnectionState,
    phase: string,
    fn: () => Promise<void>,
  ): Promise<void> {
    try {
      await this.locks.runExclusive(conn.id, async () => {
        if (this.registry.get(conn.id)?.state !== expected) return;
        await fn();
      });
    } catch (err) {
      if (this.summary) this.summary.errors += 1;
      this.observer.onError(toError(err), { connectionId: conn.id, sharerId: conn.sharerId, phase });
    }
  }

  // ── Phase handlers ───────────────────────────────────────────────────

  private async handlePending(id: string): Promise<void> {
    const conn = this.registry.require(id);

    if (this.clock() - conn.createdAt.getTime() >= this.config.matchTimeoutMs) {
      this.transition(id, 'EXPIRED', 'no sharer matched before timeout');
      return;
    }

    // Opened from the sharer side; waits for a client to attach.
    if (conn.clientId === null) return;

    let sharerId = conn.sharerId;
    if (sharerId === null) {
      const candidate = this.matcher.findCandidate(this.avoid.get(id));
      if (candidate.kind === 'none-available') return;
      sharerId = candidate.sharerId;
    } else if (!this.ledger.isEligible(sharerId)) {
      return;
    }
    if (this.ledger.reserve(sharerId) === 'denied') return;

    this.registry.attachSharer(id, sharerId);
    this.transition(id, 'MATCHED', 'sharer selected');
    await this.provision(id);
  }

  private async handleActive(id: string): Promise<void> {
    const conn = this.registry.require(id);
    const sharerId = conn.sharerId;

    if (sharerId === null || !this.ledger.get(sharerId)?.sharingEnabled) {
      await this.close(id, 'sharing disabled');
      return;
    }

    const missed = Math.floor(
      (this.clock() - conn.lastHeartbeatAt.getTime()) / this.config.tickIntervalMs,
    );
    if (missed >= this.config.missedHeartbeatThreshold) {
      this.transition(id, 'UNHEALTHY', `missed ${missed} heartbeats`);
      return;
    }

    if (conn.relayPort === null) {
      this.transition(id, 'UNHEALTHY', 'no tunnel registered');
      return;
    }

    let delta: number;
    try {
      delta = await this.relay.pollUsage(conn.relayPort);
    } catch (err) {
      if (err instanceof RelayUnavailableError) {
        this.transition(id, 'UNHEALTHY', 'relay unavailable');
        return;
      }
      // Mapping gone from the relay; leave the heartbeat to go stale.
      if (err instanceof TunnelNotFoundError) return;
      throw err;
    }

    if (this.summary) this.summary.polled += 1;
    this.registry.addBytes(id, delta);
    const result = this.ledger.recordUsage(sharerId, delta);
    this.registry.touchHeartbeat(id);

    if (delta > 0) {
      const profile = this.ledger.get(sharerId);
      this.observer.onUsage({
        connectionId: id,
        sharerId,
        deltaBytes: delta,
        usedBytesToday: result.usedBytesToday,
        dailyLimitBytes: profile?.dailyLimitBytes ?? result.usedBytesToday,
        exceeded: result.status === 'exceeded',
        timestamp: new Date(this.clock()),
      });
    }

    if (result.status === 'exceeded') {
      await this.throttle(id);
    }
  }

  private async handleThrottled(id: string): Promise<void> {
    const conn = this.registry.require(id);
    const sharerId = conn.sharerId;
    const profile = sharerId === null ? undefined : this.ledger.get(sharerId);

    if (sharerId === null || !profile?.sharingEnabled) {
      await this.close(id, 'sharing disabled');
      return;
    }

    // A deregistration that failed at throttle time is retried first.
    if (conn.relayPort !== null) {
      await this.relay.deregisterTunnel(conn.relayPort);
      this.registry.clearTunnel(id);
    }

    const since = this.throttledAt.get(id) ?? this.clock();
    if (this.ledger.getLastResetAt().getTime() <= since || !canServe(profile)) return;

    try {
      const reg = await this.relay.registerTunnel(sharerId);
      this.registry.assignTunnel(id, reg.relayPort, reg.credentials);
    } catch (err) {
      this.observer.onError(toError(err), { connectionId: id, sharerId, phase: 'resume' });
      await this.close(id, 'tunnel re-registration failed');
      return;
    }

    this.registry.touchHeartbeat(id);
    this.transition(id, 'ACTIVE', 'quota reset');
  }

  private drain(summary: TickSummary): void {
    const now = this.clock();
    for (const conn of this.registry.list()) {
      if (!isTerminalState(conn.state) || conn.endedAt === null) continue;
      if (now - conn.endedAt.getTime() < this.config.terminalRetentionMs) continue;
      if (this.locks.isLocked(conn.id)) continue;

      this.observer.onConnectionReport({
        connectionId: conn.id,
        sharerId: conn.sharerId,
        clientId: conn.clientId,
        finalState: conn.state,
        bytesTransferred: conn.bytesTransferred,
        createdAt: conn.createdAt,
        endedAt: conn.endedAt,
      });
      this.registry.remove(conn.id);
      summary.drained += 1;
    }
  }

  // ── Provision / teardown ─────────────────────────────────────────────

  /** MATCHED -> ACTIVE, or FAILED when the relay cannot register a tunnel. */
  private async provision(id: string): Promise<void> {
    const conn = this.registry.require(id);
    if (conn.state !== 'MATCHED' || conn.sharerId === null) return;

    try {
      const reg = await this.relay.registerTunnel(conn.sharerId);
      this.registry.assignTunnel(id, reg.relayPort, reg.credentials);
    } catch (err) {
      this.observer.onError(toError(err), { connectionId: id, sharerId: conn.sharerId, phase: 'provision' });
      this.transition(id, 'FAILED', `tunnel registration failed: ${toError(err).message}`);
      return;
    }

    this.registry.touchHeartbeat(id);
    this.transition(id, 'ACTIVE', 'tunnel registered');
  }

  /**
   * Close an UNHEALTHY connection and queue its client for the best other
   * sharer. The replacement is a new PENDING connection that skips the
   * sharer that failed.
   */
  private async failover(id: string): Promise<void> {
    await this.close(id, 'unhealthy');
    const closed = this.registry.require(id);
    if (closed.state !== 'CLOSED' || closed.clientId === null || closed.sharerId === null) return;
    if (this.registry.findByClient(closed.clientId).some((c) => !isTerminalState(c.state))) return;

    const replacement = this.registry.create({ clientId: closed.clientId });
    this.avoid.set(replacement.id, new Set([closed.sharerId]));
    this.observer.onAlert({
      severity: 'warning',
      message: 'Switching client away from unhealthy sharer',
      details: { clientId: closed.clientId, from: closed.sharerId, connectionId: replacement.id, replaces: id },
      timestamp: new Date(this.clock()),
    });
  }

  /** ACTIVE -> THROTTLED, then remove the tunnel from the relay. */
  private async throttle(id: string): Promise<void> {
    const { connection } = this.transition(id, 'THROTTLED', 'daily quota exceeded');
    if (connection.relayPort === null) return;

    try {
      await this.relay.deregisterTunnel(connection.relayPort);
      this.registry.clearTunnel(id);
    } catch (err) {
      this.observer.onError(toError(err), { connectionId: id, phase: 'throttle' });
    }
  }

  /** Deregister whatever tunnel the connection holds, then close it. */
  private async close(id: string, reason: string): Promise<void> {
    const conn = this.registry.require(id);
    if (!canTransition(conn.state, 'CLOSED')) return;

    if (conn.relayPort !== null) {
      try {
        await this.relay.deregisterTunnel(conn.relayPort);
      } catch (err) {
        this.observer.onError(toError(err), { connectionId: id, relayPort: conn.relayPort, phase: 'teardown' });
      }
      this.registry.clearTunnel(id);
    }
    this.transition(id, 'CLOSED', reason);
  }

  private transition(id: string, to: ConnectionState, reason: string): TransitionResult {
    const result = this.registry.transition(id, to);
    const { from, connection } = result;

    if (connection.sharerId !== null && RESERVING_STATES.has(from) && isTerminalState(to)) {
      this.ledger.release(connection.sharerId);
    }
    if (to === 'THROTTLED') {
      this.throttledAt.set(id, this.clock());
    } else if (from === 'THROTTLED') {
      this.throttledAt.delete(id);
    }
    if (from === 'PENDING') {
      this.avoid.delete(id);
    }
    if (this.summary) {
      this.summary.transitions[to] = (this.summary.transitions[to] ?? 0) + 1;
    }

    this.observer.onConnectionTransition({
      connectionId: id,
      sharerId: connection.sharerId,
      clientId: connection.clientId,
      from,
      to,
      reason,
      timestamp: new Date(this.clock()),
    });
    return result;
  }

  // ── Disconnect intents ───────────────────────────────────────────────

  /**
   * Apply a disconnect intent. Waits for any in-flight work on the
   * connection. Returns the connection afterwards, or undefined when it is
   * unknown; repeating the call returns the same terminal connection.
   */
  async disconnect(id: string): Promise<Connection | undefined> {
    const result = await this.locks.runExclusive(id, async () => {
      const conn = this.registry.get(id);
      if (!conn || isTerminalState(conn.state)) return { conn, changed: false };

      switch (conn.state) {
        case 'PENDING':
          this.transition(id, 'EXPIRED', 'disconnect requested');
          break;
        case 'MATCHED':
          await this.provision(id);
          await this.close(id, 'disconnect requested');
          break;
        default:
          await this.close(id, 'disconnect requested');
      }
      return { conn: this.registry.get(id), changed: true };
    });

    if (result.changed) this.persist();
    return result.conn;
  }

  // ── Snapshots ────────────────────────────────────────────────────────

  snapshot(): EngineSnapshot {
    return {
      connections: this.registry.list().filter((c) => !isTerminalState(c.state)),
      sharers: this.ledger.list(),
      lastResetAt: this.ledger.getLastResetAt(),
      savedAt: new Date(this.clock()),
    };
  }

  /**
   * Rebuild Registry and Ledger from a snapshot. Relay mappings are never
   * trusted across restarts: every tunnel is registered fresh.
   */
  async recover(snapshot: EngineSnapshot): Promise<RecoverySummary> {
    const summary: RecoverySummary = { restored: 0, reregistered: 0, failed: 0 };
    this.ledger.restore(snapshot.sharers, snapshot.lastResetAt);
    this.throttledAt.clear();
    this.avoid.clear();

    const live = snapshot.connections.filter((c) => !isTerminalState(c.state));
    for (const conn of live) {
      this.registry.restore({ ...conn, relayPort: null, credentials: null, endedAt: null });
      summary.restored += 1;

      if (conn.sharerId !== null && RESERVING_STATES.has(conn.state)) {
        if (this.ledger.reserve(conn.sharerId) === 'denied') {
          this.observer.onAlert({
            severity: 'warning',
            message: 'Snapshot holds more than one live connection for a sharer',
            details: { connectionId: conn.id, sharerId: conn.sharerId },
            timestamp: new Date(this.clock()),
          });
        }
      }
      if (conn.state === 'THROTTLED') {
        this.throttledAt.set(conn.id, snapshot.lastResetAt.getTime());
      }
    }

    for (const conn of live) {
      if (conn.state !== 'ACTIVE' && conn.state !== 'MATCHED') continue;

      await this.locks.runExclusive(conn.id, async () => {
        if (conn.state === 'MATCHED') {
          await this.provision(conn.id);
        } else {
          await this.reregister(conn.id);
        }
      });

      if (this.registry.get(conn.id)?.state === 'ACTIVE') {
        summary.reregistered += 1;
      } else {
        summary.failed += 1;
      }
    }

    return summary;
  }

  private async reregister(id: string): Promise<void> {
    const conn = this.registry.require(id);
    if (conn.sharerId === null) {
      this.transition(id, 'UNHEALTHY', 'restored without a sharer');
      return;
    }
    try {
      const reg = await this.relay.registerTunnel(conn.sharerId);
      this.registry.assignTunnel(id, reg.relayPort, reg.credentials);
      this.registry.touchHeartbeat(id);
    } catch (err) {
      this.observer.onError(toError(err), { connectionId: id, sharerId: conn.sharerId, phase: 'recover' });
      this.transition(id, 'UNHEALTHY', 'tunnel re-registration failed after restart');
    }
  }

  private persist(): void {
    if (!this.store) return;
    try {
      this.store.save(this.snapshot());
    } catch (err) {
      this.observer.onError(toError(err), { phase: 'persist', store: this.store.id });
    }
  }
}
