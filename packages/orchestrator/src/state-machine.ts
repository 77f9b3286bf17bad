/**
 * Connection state machine.
 *
 *   PENDING   --match-->            MATCHED
 *   PENDING   --timeout/cancel-->   EXPIRED   (terminal)
 *   MATCHED   --provisioned-->      ACTIVE
 *   MATCHED   --provision failed--> FAILED    (terminal)
 *   ACTIVE    --quota exceeded-->   THROTTLED
 *   ACTIVE    --heartbeats missed-> UNHEALTHY
 *   ACTIVE    --disconnect-->       CLOSED    (terminal)
 *   THROTTLED --teardown-->         CLOSED
 *   THROTTLED --quota reset-->      ACTIVE
 *   UNHEALTHY --teardown-->         CLOSED
 */

import type { ConnectionState } from '@bandshare/core';

export const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  PENDING: ['MATCHED', 'EXPIRED'],
  MATCHED: ['ACTIVE', 'FAILED'],
  ACTIVE: ['THROTTLED', 'UNHEALTHY', 'CLOSED'],
  THROTTLED: ['CLOSED', 'ACTIVE'],
  UNHEALTHY: ['CLOSED'],
  EXPIRED: [],
  FAILED: [],
  CLOSED: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** States that hold a sharer reservation. */
export const RESERVING_STATES: ReadonlySet<ConnectionState> = new Set<ConnectionState>([
  'MATCHED',
  'ACTIVE',
  'THROTTLED',
  'UNHEALTHY',
]);
