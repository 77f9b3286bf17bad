/**
 * ISnapshotStore — durability contract for engine state.
 */

import type { EngineSnapshot } from '../types/connection.js';

export interface ISnapshotStore {
  readonly id: string;

  save(snapshot: EngineSnapshot): void;
  /** Returns null when nothing has been saved yet. */
  load(): EngineSnapshot | null;
  close(): void;
}
