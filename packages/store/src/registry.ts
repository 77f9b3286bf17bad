/**
 * Snapshot store factory.
 *
 * Returns the SQLite store when persistence is enabled, otherwise a no-op.
 */

import type { ISnapshotStore, PersistenceConfig } from '@bandshare/core';
import { NoopSnapshotStore } from './noop-store.js';
import { SQLiteSnapshotStore } from './sqlite-store.js';

export function createSnapshotStore(config: PersistenceConfig): ISnapshotStore {
  if (!config.enabled) {
    return new NoopSnapshotStore();
  }
  return new SQLiteSnapshotStore({ dbPath: config.dbPath });
}
