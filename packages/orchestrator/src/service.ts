/**
 * BandshareService — the intents the application layer may issue.
 *
 * Connect and disconnect requests only record intent; the Orchestrator does
 * the matching, provisioning and teardown. Status reads are copies taken
 * from the Registry.
 */

import { ValidationError, isTerminalState } from '@bandshare/core';
import type {
  Connection,
  ConnectionState,
  QuotaLedgerEntry,
  SharerProfile,
} from '@bandshare/core';
import type { ConnectionRegistry } from './registry.js';
import type { QuotaLedger, SharerProfileInput } from './quota-ledger.js';
import type { Matcher } from './matcher.js';
import type { Orchestrator } from './orchestrator.js';

export interface ProxyEndpoint {
  type: 'socks5';
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface ConnectionStatus {
  connectionId: string;
  state: ConnectionState;
  bytesTransferred: number;
  /** `host:port` while a tunnel is registered. */
  relayEndpoint: string | null;
  proxy: ProxyEndpoint | null;
}

export interface AvailableSharer {
  sharerId: string;
  availableBytes: number;
  qualityScore: number;
}

export type StatusQuery = { clientId: string } | { sharerId: string };

export interface BandshareServiceDeps {
  registry: ConnectionRegistry;
  ledger: QuotaLedger;
  matcher: Matcher;
  orchestrator: Orchestrator;
  /** Host clients dial to reach a tunnel's public port. */
  publicHost: string;
}

function requireId(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

export class BandshareService {
  constructor(private readonly deps: BandshareServiceDeps) {}

  /**
   * Create a PENDING connection for the client. A client that already has
   * a live connection gets that one back.
   */
  requestConnection(clientId: string): Connection {
    const id = requireId(clientId, 'clientId');
    const existing = this.deps.registry.findByClient(id).find((c) => !isTerminalState(c.state));
    if (existing) return existing;
    return this.deps.registry.create({ clientId: id });
  }

  disconnect(connectionId: string): Promise<Connection | undefined> {
    return this.deps.orchestrator.disconnect(requireId(connectionId, 'connectionId'));
  }

  /**
   * Status of the newest live connection for the party, falling back to the
   * newest finished one. Null when the party has none.
   */
  getStatus(query: StatusQuery): ConnectionStatus | null {
    const matches =
      'clientId' in query
        ? this.deps.registry.findByClient(requireId(query.clientId, 'clientId'))
        : this.deps.registry.findBySharer(requireId(query.sharerId, 'sharerId'));

    const newestFirst = [...matches].reverse();
    const conn = newestFirst.find((c) => !isTerminalState(c.state)) ?? newestFirst[0];
    return conn ? this.toStatus(conn) : null;
  }

  listAvailableSharers(): AvailableSharer[] {
    return this.deps.matcher.rank().map(({ sharerId, availableBytes, qualityScore }) => ({
      sharerId,
      availableBytes,
      qualityScore,
    }));
  }

  // ── Settings collaborator ─────────────────────────────────────────────

  upsertSharer(input: SharerProfileInput): SharerProfile {
    return this.deps.ledger.upsert(input);
  }

  setSharingEnabled(sharerId: string, enabled: boolean): SharerProfile {
    return this.deps.ledger.setSharingEnabled(requireId(sharerId, 'sharerId'), enabled);
  }

  getQuota(sharerId: string): QuotaLedgerEntry {
    return this.deps.ledger.entry(requireId(sharerId, 'sharerId'));
  }

  private toStatus(conn: Connection): ConnectionStatus {
    const { publicHost } = this.deps;
    const port = conn.relayPort;
    return {
      connectionId: conn.id,
      state: conn.state,
      bytesTransferred: conn.bytesTransferred,
      relayEndpoint: port === null ? null : `${publicHost}:${port}`,
      proxy:
        port === null || conn.credentials === null
          ? null
          : {
              type: 'socks5',
              host: publicHost,
              port,
              username: conn.credentials.username,
              password: conn.credentials.password,
            },
    };
  }
}
