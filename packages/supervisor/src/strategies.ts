/**
 * Restart budget for the relay process.
 *
 * Restarts are counted inside a sliding window; once the window holds
 * `maxRestarts` entries further restarts are refused until old ones age out.
 */

export interface RestartPolicy {
  maxRestarts: number;       // max restarts within the window
  windowMs: number;          // time window for counting restarts
  backoffBaseMs: number;     // base delay for exponential backoff
  backoffMaxMs: number;      // max delay cap
}

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  maxRestarts: 5,
  windowMs: 60_000,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
};

/** Drop timestamps that fell out of the window. */
export function pruneRestarts(timestamps: readonly number[], now: number, windowMs: number): number[] {
  return timestamps.filter((ts) => now - ts < windowMs);
}

/** Whether another restart fits in the policy's window. */
export function canRestart(timestamps: readonly number[], now: number, policy: RestartPolicy): boolean {
  return pruneRestarts(timestamps, now, policy.windowMs).length < policy.maxRestarts;
}
