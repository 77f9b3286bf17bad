/**
 * HttpRelayClient — talks to the relay's JSON control API.
 *
 * Routes:
 *   GET    /api/health                 - liveness probe
 *   GET    /api/tunnels                - list port mappings
 *   POST   /api/tunnels                - register { port, sharerId, username, password }
 *   DELETE /api/tunnels/:port          - deregister (404 means already gone)
 *   GET    /api/tunnels/:port/traffic  - cumulative byte counter { bytes }
 *
 * Every call is bounded by a per-request timeout. Network failures, timeouts
 * and 5xx responses are retried with exponential backoff; once the attempts
 * are spent the call fails with RelayUnavailableError.
 *
 * Uses the global fetch() only.
 */

import {
  backoffDelay,
  sleep,
  RelayUnavailableError,
  TunnelNotFoundError,
} from '@bandshare/core';
import type {
  IObserver,
  IRelayClient,
  RelayTunnelInfo,
  RetryConfig,
  TunnelRegistration,
} from '@bandshare/core';
import { PortAllocator } from './port-allocator.js';
import { UsageCounter } from './usage-counter.js';
import { generateCredentials } from './credentials.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface HttpRelayClientOptions {
  /** Base URL of the relay control API, e.g. http://127.0.0.1:7500. */
  controlUrl: string;
  /** Sent as a bearer token when set. */
  authToken?: string;
  portRange: { start: number; end: number };
  /** Per-request timeout. Default: 2000 ms. */
  requestTimeoutMs?: number;
  retry?: Partial<RetryConfig>;
  observer?: IObserver;
}

const DEFAULT_RETRY: RetryConfig = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// HttpRelayClient
// ---------------------------------------------------------------------------

export class HttpRelayClient implements IRelayClient {
  readonly id = 'http';

  private readonly baseUrl: string;
  private readonly authToken: string | undefined;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly observer: IObserver | undefined;
  private readonly ports: PortAllocator;
  private readonly counters = new UsageCounter();

  constructor(options: HttpRelayClientOptions) {
    this.baseUrl = options.controlUrl.replace(/\/+$/, '');
    this.authToken = options.authToken || undefined;
    this.timeoutMs = options.requestTimeoutMs ?? 2_000;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.observer = options.observer;
    this.ports = new PortAllocator(options.portRange.start, options.portRange.end);
  }

  // -----------------------------------------------------------------------
  // IRelayClient implementation
  // -----------------------------------------------------------------------

  async registerTunnel(sharerId: string): Promise<TunnelRegistration> {
    const credentials = generateCredentials();

    // A 409 means something else holds the port on the relay side. Skip it
    // for this registration only; the relay may free it later.
    const conflicted: number[] = [];
    try {
      for (;;) {
        const port = this.ports.allocate();

        let res: Response;
        try {
          res = await this.request('POST', '/api/tunnels', 'register', {
            port,
            sharerId,
            username: credentials.username,
            password: credentials.password,
          });
        } catch (err) {
          this.ports.release(port);
          throw err;
        }

        if (res.status === 409) {
          await res.body?.cancel();
          conflicted.push(port);
          continue;
        }

        if (!res.ok) {
          await res.body?.cancel();
          this.ports.release(port);
          throw new RelayUnavailableError(`Relay rejected tunnel registration (HTTP ${res.status})`, {
            operation: 'register',
            status: res.status,
            sharerId,
          });
        }

        await res.body?.cancel();
        this.counters.track(port);
        this.observer?.onRelayEvent({
          type: 'tunnel_registered',
          details: { relayPort: port, sharerId },
          timestamp: new Date(),
        });
        return { relayPort: port, sharerId, credentials };
      }
    } finally {
      for (const port of conflicted) this.ports.release(port);
    }
  }

  async deregisterTunnel(relayPort: number): Promise<void> {
    const res = await this.request('DELETE', `/api/tunnels/${relayPort}`, 'deregister');
    await res.body?.cancel();

    if (!res.ok && res.status !== 404) {
      throw new RelayUnavailableError(`Relay rejected tunnel removal (HTTP ${res.status})`, {
        operation: 'deregister',
        status: res.status,
        relayPort,
      });
    }

    this.ports.release(relayPort);
    this.counters.forget(relayPort);

    if (res.ok) {
      this.observer?.onRelayEvent({
        type: 'tunnel_deregistered',
        details: { relayPort },
        timestamp: new Date(),
      });
    }
  }

  async pollUsage(relayPort: number): Promise<number> {
    const res = await this.request('GET', `/api/tunnels/${relayPort}/traffic`, 'usage');

    if (res.status === 404) {
      throw new TunnelNotFoundError(relayPort);
    }
    if (!res.ok) {
      throw new RelayUnavailableError(`Relay usage query failed (HTTP ${res.status})`, {
        operation: 'usage',
        status: res.status,
        relayPort,
      });
    }

    const data: unknown = await res.json();
    if (!isRecord(data) || typeof data['bytes'] !== 'number') {
      throw new RelayUnavailableError('Relay returned a malformed usage payload', {
        operation: 'usage',
        relayPort,
      });
    }

    return this.counters.observe(relayPort, data['bytes']);
  }

  async listTunnels(): Promise<RelayTunnelInfo[]> {
    const res = await this.request('GET', '/api/tunnels', 'list');
    if (!res.ok) {
      throw new RelayUnavailableError(`Relay tunnel listing failed (HTTP ${res.status})`, {
        operation: 'list',
        status: res.status,
      });
    }

    const data: unknown = await res.json();
    const tunnels = isRecord(data) && Array.isArray(data['tunnels']) ? data['tunnels'] : [];

    const result: RelayTunnelInfo[] = [];
    for (const entry of tunnels) {
      if (!isRecord(entry)) continue;
      const { port, sharerId, bytes } = entry;
      if (typeof port !== 'number' || typeof sharerId !== 'string') continue;
      result.push({ relayPort: port, sharerId, bytes: typeof bytes === 'number' ? bytes : 0 });
    }
    return result;
  }

  async ping(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/health`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await res.body?.cancel();
      return res.ok;
    } catch {
      return false;
    }
  }

  // -----------------------------------------------------------------------
  // Private: bounded request with retries
  // -----------------------------------------------------------------------

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.authToken) {
      headers['Authorization'] = `Bearer ${this.authToken}`;
    }
    return headers;
  }

  private async request(
    method: string,
    path: string,
    operation: string,
    body?: Record<string, unknown>,
  ): Promise<Response> {
    let lastError: unknown;

    for (let attempt = 0; attempt < this.retry.attempts; attempt++) {
      if (attempt > 0) {
        const delayMs = backoffDelay(attempt - 1, this.retry.baseDelayMs, this.retry.maxDelayMs);
        this.observer?.onRelayEvent({
          type: 'retry',
          details: { operation, attempt, delayMs, error: errorMessage(lastError) },
          timestamp: new Date(),
        });
        await sleep(delayMs);
      }

      try {
        const res = await fetch(`${this.baseUrl}${path}`, {
          method,
          headers: this.headers(),
          body: body ? JSON.stringify(body) : undefined,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (res.status >= 500) {
          await res.body?.cancel();
          lastError = new Error(`HTTP ${res.status}`);
          continue;
        }
        return res;
      } catch (err) {
        lastError = err;
      }
    }

    this.observer?.onRelayEvent({
      type: 'unreachable',
      details: { operation, attempts: this.retry.attempts, error: errorMessage(lastError) },
      timestamp: new Date(),
    });
    throw new RelayUnavailableError(
      `Relay ${operation} failed after ${this.retry.attempts} attempts: ${errorMessage(lastError)}`,
      { operation, attempts: this.retry.attempts },
    );
  }
}
