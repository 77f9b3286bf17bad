/**
 * RelayHealthMonitor — watches the relay process and its tunnels.
 *
 * Each check pings the relay. While it answers, ACTIVE connections whose
 * port the relay no longer lists are marked stale. While it does not, every
 * ACTIVE connection is marked stale and the relay is restarted up to
 * `maxRestartAttempts` times with exponential backoff; after that a fatal
 * alert is raised and restarts stop until the relay is seen alive again.
 *
 * The monitor never changes connection state. Stale heartbeats are picked up
 * by the orchestrator's next tick.
 */

import { EventEmitter } from 'node:events';
import { backoffDelay, sleep } from '@bandshare/core';
import type {
  Connection,
  ConnectionState,
  HealthConfig,
  IObserver,
  IRelayClient,
  IRelayProcess,
} from '@bandshare/core';

// ── Types ────────────────────────────────────────────────────────────────

/** The slice of the connection registry the monitor needs. */
export interface HeartbeatTarget {
  listByState(...states: ConnectionState[]): Connection[];
  /** With `expectedPort`, only a connection still on that port is marked. */
  markStale(connectionId: string, expectedPort?: number): boolean;
}

export interface RelayHealthMonitorOptions {
  relay: IRelayClient;
  registry: HeartbeatTarget;
  /** Null when the relay is managed outside this process. */
  process?: IRelayProcess | null;
  observer: IObserver;
  config?: Partial<HealthConfig>;
}

export interface HealthCheckResult {
  reachable: boolean;
  /** Connections marked stale by this check. */
  stale: string[];
  restartAttempts: number;
  recovered: boolean;
}

export interface RelayHealthEvents {
  unreachable: [];
  restarting: [attempt: number];
  recovered: [attempts: number];
  fatal: [attempts: number];
  stale: [connectionId: string];
}

// ── Defaults ─────────────────────────────────────────────────────────────

export const DEFAULT_HEALTH_CONFIG: HealthConfig = {
  intervalMs: 15_000,
  maxRestartAttempts: 3,
  restartBackoffBaseMs: 1_000,
  restartBackoffMaxMs: 10_000,
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ── RelayHealthMonitor ───────────────────────────────────────────────────

export class RelayHealthMonitor extends EventEmitter<RelayHealthEvents> {
  private readonly relay: IRelayClient;
  private readonly registry: HeartbeatTarget;
  private readonly process: IRelayProcess | null;
  private readonly observer: IObserver;
  private readonly config: HealthConfig;

  /** Set after the restart budget ran out; cleared once the relay answers. */
  private gaveUp = false;

  /** Cancels backoff sleeps on dispose(). */
  private readonly shutdown = new AbortController();

  constructor(options: RelayHealthMonitorOptions) {
    super();
    this.relay = options.relay;
    this.registry = options.registry;
    this.process = options.process ?? null;
    this.observer = options.observer;
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...options.config };
  }

  get intervalMs(): number {
    return this.config.intervalMs;
  }

  get exhausted(): boolean {
    return this.gaveUp;
  }

  /** Abort any backoff sleep in progress. */
  dispose(): void {
    this.shutdown.abort();
    this.removeAllListeners();
  }

  async check(): Promise<HealthCheckResult> {
    if (await this.relay.ping()) {
      this.gaveUp = false;
      return { reachable: true, stale: await this.markMissingTunnels(), restartAttempts: 0, recovered: false };
    }

    const stale = this.markAllActiveStale();
    this.emit('unreachable');
    this.observer.onRelayEvent({
      type: 'unreachable',
      details: { staleConnections: stale.length },
      timestamp: new Date(),
    });

    if (this.gaveUp || !this.process?.managed) {
      return { reachable: false, stale, restartAttempts: 0, recovered: false };
    }

    const { attempts, recovered } = await this.restartRelay(this.process);
    return { reachable: recovered, stale, restartAttempts: attempts, recovered };
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async markMissingTunnels(): Promise<string[]> {
    // Taken before the relay call: a tunnel provisioned while it is in
    // flight cannot appear in the listing and must not be judged by it.
    const candidates = this.registry
      .listByState('ACTIVE')
      .flatMap((conn) => (conn.relayPort === null ? [] : [{ id: conn.id, relayPort: conn.relayPort }]));

    let ports: Set<number>;
    try {
      ports = new Set((await this.relay.listTunnels()).map((t) => t.relayPort));
    } catch (err) {
      this.observer.onError(toError(err), { phase: 'health-list' });
      return [];
    }

    const stale: string[] = [];
    for (const { id, relayPort } of candidates) {
      if (ports.has(relayPort)) continue;
      if (this.registry.markStale(id, relayPort)) {
        stale.push(id);
        this.emit('stale', id);
      }
    }
    return stale;
  }

  private markAllActiveStale(): string[] {
    const stale: string[] = [];
    for (const conn of this.registry.listByState('ACTIVE')) {
      if (this.registry.markStale(conn.id)) {
        stale.push(conn.id);
        this.emit('stale', conn.id);
      }
    }
    return stale;
  }

  private async restartRelay(proc: IRelayProcess): Promise<{ attempts: number; recovered: boolean }> {
    const max = this.config.maxRestartAttempts;

    for (let attempt = 1; attempt <= max; attempt++) {
      this.emit('restarting', attempt);
      this.observer.onRelayEvent({
        type: 'restarting',
        details: { attempt, maxAttempts: max },
        timestamp: new Date(),
      });

      try {
        await proc.restart();
        if (await this.relay.ping()) {
          this.emit('recovered', attempt);
          this.observer.onRelayEvent({
            type: 'recovered',
            details: { attempts: attempt },
            timestamp: new Date(),
          });
          return { attempts: attempt, recovered: true };
        }
      } catch (err) {
        this.observer.onError(toError(err), { phase: 'relay-restart', attempt });
      }

      if (attempt < max) {
        const delay = backoffDelay(
          attempt - 1,
          this.config.restartBackoffBaseMs,
          this.config.restartBackoffMaxMs,
        );
        try {
          await sleep(delay, this.shutdown.signal);
        } catch {
          // Disposed during backoff.
          return { attempts: attempt, recovered: false };
        }
      }
    }

    this.gaveUp = true;
    this.emit('fatal', max);
    this.observer.onAlert({
      severity: 'fatal',
      message: `Relay did not come back after ${max} restart attempts`,
      details: { attempts: max },
      timestamp: new Date(),
    });
    return { attempts: max, recovered: false };
  }
}
