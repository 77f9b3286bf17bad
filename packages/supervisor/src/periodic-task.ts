/**
 * PeriodicTask — runs an async job on a fixed interval.
 *
 * A run is skipped while the previous one is still in flight, so a slow
 * relay never stacks up ticks. Failures are reported to the observer and
 * the schedule carries on. The timer is unref'd.
 */

import type { IObserver } from '@bandshare/core';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  observer?: IObserver;
  /** Run once straight away on start(). Default false. */
  runImmediately?: boolean;
}

export class PeriodicTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<void> | null = null;
  private runCount = 0;
  private skipCount = 0;

  constructor(private readonly options: PeriodicTaskOptions) {}

  get isStarted(): boolean {
    return this.timer !== null;
  }

  get runs(): number {
    return this.runCount;
  }

  get skipped(): number {
    return this.skipCount;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.trigger();
    }, this.options.intervalMs);
    this.timer.unref();
    if (this.options.runImmediately) this.trigger();
  }

  /** Stop scheduling and wait for a run in flight to finish. */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inflight) await this.inflight;
  }

  /** Run now unless a run is already in flight; resolves when that run ends. */
  runOnce(): Promise<void> {
    if (this.inflight) {
      this.skipCount += 1;
      return this.inflight;
    }
    this.inflight = this.execute().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private trigger(): void {
    this.runOnce().catch((err: unknown) => {
      this.report(err);
    });
  }

  private async execute(): Promise<void> {
    this.runCount += 1;
    try {
      await this.options.run();
    } catch (err) {
      this.report(err);
    }
  }

  private report(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.options.observer?.onError(error, { task: this.options.name });
  }
}
