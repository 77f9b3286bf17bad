/**
 * Exponential backoff helpers shared by the relay client and the supervisor.
 */

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, capped at
 * `maxMs`. `jitter` is a ratio in [0, 1] of the delay that is randomised away.
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, jitter = 0): number {
  const exp = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt));
  if (jitter <= 0) return exp;
  const spread = exp * Math.min(1, jitter);
  return Math.round(exp - spread * Math.random());
}

/**
 * Resolve after `ms` milliseconds. Rejects with the signal's reason if the
 * signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
