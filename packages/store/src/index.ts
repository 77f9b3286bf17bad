/**
 * @bandshare/store — durable engine snapshots on SQLite.
 */

export { SQLiteSnapshotStore } from './sqlite-store.js';
export type { SQLiteSnapshotStoreOpts } from './sqlite-store.js';
export { NoopSnapshotStore } from './noop-store.js';
export { createSnapshotStore } from './registry.js';
