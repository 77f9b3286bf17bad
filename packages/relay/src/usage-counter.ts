/**
 * UsageCounter — turns the relay's cumulative per-tunnel byte counters into
 * per-poll deltas.
 *
 * A reading lower than the previous one means the relay's counter restarted;
 * the delta is then the new reading itself. Deltas are never negative.
 */

export class UsageCounter {
  private readonly last = new Map<number, number>();

  /** Start tracking a freshly registered tunnel from zero. */
  track(relayPort: number): void {
    this.last.set(relayPort, 0);
  }

  forget(relayPort: number): void {
    this.last.delete(relayPort);
  }

  observe(relayPort: number, cumulative: number): number {
    const reading = Number.isFinite(cumulative) && cumulative > 0 ? Math.floor(cumulative) : 0;
    const previous = this.last.get(relayPort) ?? 0;
    this.last.set(relayPort, reading);
    if (reading < previous) return reading;
    return reading - previous;
  }
}
