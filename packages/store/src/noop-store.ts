/**
 * No-op snapshot store.
 *
 * Used when persistence is disabled in configuration. Nothing survives a
 * restart.
 */

import type { EngineSnapshot, ISnapshotStore } from '@bandshare/core';

export class NoopSnapshotStore implements ISnapshotStore {
  readonly id = 'noop';

  save(_snapshot: EngineSnapshot): void {
    // No-op
  }

  load(): EngineSnapshot | null {
    return null;
  }

  close(): void {
    // No-op
  }
}
