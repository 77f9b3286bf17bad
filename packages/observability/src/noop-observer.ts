/**
 * NoopObserver — silent observer that discards all events.
 *
 * Used when observability is explicitly disabled.
 */

import type {
  AlertEvent,
  ConnectionReport,
  ConnectionTransitionEvent,
  DailyResetEvent,
  IObserver,
  RelayEvent,
  UsageEvent,
} from '@bandshare/core';

export class NoopObserver implements IObserver {
  onConnectionTransition(_event: ConnectionTransitionEvent): void {
    // intentionally empty
  }

  onUsage(_event: UsageEvent): void {
    // intentionally empty
  }

  onRelayEvent(_event: RelayEvent): void {
    // intentionally empty
  }

  onAlert(_event: AlertEvent): void {
    // intentionally empty
  }

  onDailyReset(_event: DailyResetEvent): void {
    // intentionally empty
  }

  onConnectionReport(_report: ConnectionReport): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
