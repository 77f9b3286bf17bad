/**
 * MultiObserver — fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken observer never takes down the pipeline.
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

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onConnectionTransition(event: ConnectionTransitionEvent): void {
    this.safely((c) => c.onConnectionTransition(event));
  }

  onUsage(event: UsageEvent): void {
    this.safely((c) => c.onUsage(event));
  }

  onRelayEvent(event: RelayEvent): void {
    this.safely((c) => c.onRelayEvent(event));
  }

  onAlert(event: AlertEvent): void {
    this.safely((c) => c.onAlert(event));
  }

  onDailyReset(event: DailyResetEvent): void {
    this.safely((c) => c.onDailyReset(event));
  }

  onConnectionReport(report: ConnectionReport): void {
    this.safely((c) => c.onConnectionReport(report));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
