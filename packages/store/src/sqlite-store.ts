/**
 * SQLite snapshot store.
 *
 * Persists the live connection table, sharer profiles and the last quota
 * reset time so the engine can recover after a restart. Every save replaces
 * the previous snapshot inside a single transaction.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { CONNECTION_STATES, StoreError } from '@bandshare/core';
import type {
  Connection,
  ConnectionState,
  EngineSnapshot,
  ISnapshotStore,
  SharerProfile,
} from '@bandshare/core';

export interface SQLiteSnapshotStoreOpts {
  /** Path to the SQLite database file, or ':memory:'. */
  dbPath: string;
}

interface ConnectionRow {
  id: string;
  sharer_id: string | null;
  client_id: string | null;
  relay_port: number | null;
  username: string | null;
  password: string | null;
  state: string;
  bytes_transferred: number;
  created_at: string;
  last_heartbeat_at: string;
  ended_at: string | null;
}

interface SharerRow {
  sharer_id: string;
  sharing_enabled: number;
  daily_limit_bytes: number;
  used_bytes_today: number;
  quality_score: number;
}

interface MetaRow {
  key: string;
  value: string;
}

function isConnectionState(value: string): value is ConnectionState {
  return CONNECTION_STATES.some((state) => state === value);
}

export class SQLiteSnapshotStore implements ISnapshotStore {
  readonly id = 'sqlite';

  private readonly db: Database.Database;
  private closed = false;

  constructor(opts: SQLiteSnapshotStoreOpts) {
    mkdirSync(dirname(opts.dbPath), { recursive: true });

    this.db = new Database(opts.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initSchema();
  }

  save(snapshot: EngineSnapshot): void {
    this.assertOpen();

    const insertConnection = this.db.prepare<ConnectionRow>(`
      INSERT INTO connections (
        id, sharer_id, client_id, relay_port, username, password, state,
        bytes_transferred, created_at, last_heartbeat_at, ended_at
      ) VALUES (
        @id, @sharer_id, @client_id, @relay_port, @username, @password, @state,
        @bytes_transferred, @created_at, @last_heartbeat_at, @ended_at
      )
    `);
    const insertSharer = this.db.prepare<SharerRow>(`
      INSERT INTO sharers (sharer_id, sharing_enabled, daily_limit_bytes, used_bytes_today, quality_score)
      VALUES (@sharer_id, @sharing_enabled, @daily_limit_bytes, @used_bytes_today, @quality_score)
    `);
    const upsertMeta = this.db.prepare<[string, string]>(`
      INSERT INTO meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);

    const tx = this.db.transaction(() => {
      this.db.exec('DELETE FROM connections; DELETE FROM sharers;');
      for (const conn of snapshot.connections) {
        insertConnection.run(toConnectionRow(conn));
      }
      for (const sharer of snapshot.sharers) {
        insertSharer.run(toSharerRow(sharer));
      }
      upsertMeta.run('last_reset_at', snapshot.lastResetAt.toISOString());
      upsertMeta.run('saved_at', snapshot.savedAt.toISOString());
    });

    try {
      tx();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StoreError(`Failed to save snapshot: ${message}`);
    }
  }

  load(): EngineSnapshot | null {
    this.assertOpen();

    const meta = new Map(
      this.db
        .prepare<[], MetaRow>('SELECT key, value FROM meta')
        .all()
        .map((row) => [row.key, row.value] as const),
    );
    const savedAt = meta.get('saved_at');
    const lastResetAt = meta.get('last_reset_at');
    if (savedAt === undefined || lastResetAt === undefined) return null;

    const connections = this.db
      .prepare<[], ConnectionRow>('SELECT * FROM connections ORDER BY created_at, id')
      .all()
      .map(fromConnectionRow);
    const sharers = this.db
      .prepare<[], SharerRow>('SELECT * FROM sharers ORDER BY sharer_id')
      .all()
      .map(fromSharerRow);

    return {
      connections,
      sharers,
      lastResetAt: new Date(lastResetAt),
      savedAt: new Date(savedAt),
    };
  }

  close(): void {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS connections (
        id TEXT PRIMARY KEY,
        sharer_id TEXT,
        client_id TEXT,
        relay_port INTEGER,
        username TEXT,
        password TEXT,
        state TEXT NOT NULL,
        bytes_transferred INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        last_heartbeat_at TEXT NOT NULL,
        ended_at TEXT
      );

      CREATE TABLE IF NOT EXISTS sharers (
        sharer_id TEXT PRIMARY KEY,
        sharing_enabled INTEGER NOT NULL,
        daily_limit_bytes INTEGER NOT NULL,
        used_bytes_today INTEGER NOT NULL,
        quality_score REAL NOT NULL
      );

      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_connections_sharer ON connections(sharer_id);
    `);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('SQLite snapshot store is closed');
    }
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toConnectionRow(conn: Connection): ConnectionRow {
  return {
    id: conn.id,
    sharer_id: conn.sharerId,
    client_id: conn.clientId,
    relay_port: conn.relayPort,
    username: conn.credentials?.username ?? null,
    password: conn.credentials?.password ?? null,
    state: conn.state,
    bytes_transferred: conn.bytesTransferred,
    created_at: conn.createdAt.toISOString(),
    last_heartbeat_at: conn.lastHeartbeatAt.toISOString(),
    ended_at: conn.endedAt?.toISOString() ?? null,
  };
}

function fromConnectionRow(row: ConnectionRow): Connection {
  if (!isConnectionState(row.state)) {
    throw new StoreError(`Unknown connection state "${row.state}" in snapshot`, { connectionId: row.id });
  }
  return {
    id: row.id,
    sharerId: row.sharer_id,
    clientId: row.client_id,
    relayPort: row.relay_port,
    credentials:
      row.username !== null && row.password !== null
        ? { username: row.username, password: row.password }
        : null,
    state: row.state,
    bytesTransferred: row.bytes_transferred,
    createdAt: new Date(row.created_at),
    lastHeartbeatAt: new Date(row.last_heartbeat_at),
    endedAt: row.ended_at === null ? null : new Date(row.ended_at),
  };
}

function toSharerRow(sharer: SharerProfile): SharerRow {
  return {
    sharer_id: sharer.sharerId,
    sharing_enabled: sharer.sharingEnabled ? 1 : 0,
    daily_limit_bytes: sharer.dailyLimitBytes,
    used_bytes_today: sharer.usedBytesToday,
    quality_score: sharer.qualityScore,
  };
}

function fromSharerRow(row: SharerRow): SharerProfile {
  return {
    sharerId: row.sharer_id,
    sharingEnabled: row.sharing_enabled === 1,
    dailyLimitBytes: row.daily_limit_bytes,
    usedBytesToday: row.used_bytes_today,
    qualityScore: row.quality_score,
  };
}
