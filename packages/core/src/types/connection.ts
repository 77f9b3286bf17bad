/**
 * Connection and sharer data model.
 *
 * A Connection is one tunnel instance between a client and a sharer, brokered
 * by the relay. A SharerProfile is the per-subscriber record the Quota Ledger
 * enforces against.
 */

export type ConnectionState =
  | 'PENDING'
  | 'MATCHED'
  | 'ACTIVE'
  | 'THROTTLED'
  | 'UNHEALTHY'
  | 'EXPIRED'
  | 'FAILED'
  | 'CLOSED';

export const CONNECTION_STATES: readonly ConnectionState[] = [
  'PENDING',
  'MATCHED',
  'ACTIVE',
  'THROTTLED',
  'UNHEALTHY',
  'EXPIRED',
  'FAILED',
  'CLOSED',
];

export const TERMINAL_STATES: ReadonlySet<ConnectionState> = new Set<ConnectionState>([
  'EXPIRED',
  'FAILED',
  'CLOSED',
]);

export function isTerminalState(state: ConnectionState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface ProxyCredentials {
  username: string;
  password: string;
}

export interface Connection {
  id: string;
  /** Null until the Matcher assigns a sharer. */
  sharerId: string | null;
  /** Null for connections opened from the sharer side before a client attaches. */
  clientId: string | null;
  /** Public relay port; null whenever no tunnel is registered. */
  relayPort: number | null;
  credentials: ProxyCredentials | null;
  state: ConnectionState;
  bytesTransferred: number;
  createdAt: Date;
  lastHeartbeatAt: Date;
  /** Set when the connection enters a terminal state. */
  endedAt: Date | null;
}

export interface SharerProfile {
  sharerId: string;
  sharingEnabled: boolean;
  dailyLimitBytes: number;
  usedBytesToday: number;
  /** Signal / link quality in [0, 1]. */
  qualityScore: number;
}

export interface QuotaLedgerEntry {
  sharerId: string;
  dailyLimitBytes: number;
  usedBytesToday: number;
  availableBytes: number;
  /** usedBytesToday / dailyLimitBytes, in [0, 1]. */
  utilization: number;
  reserved: boolean;
}

export type UsageResult =
  | { status: 'ok'; usedBytesToday: number }
  | { status: 'exceeded'; usedBytesToday: number };

export type ReservationResult = 'granted' | 'denied';

/** Persisted engine state, enough to rebuild the Registry and Ledger. */
export interface EngineSnapshot {
  connections: Connection[];
  sharers: SharerProfile[];
  lastResetAt: Date;
  savedAt: Date;
}
