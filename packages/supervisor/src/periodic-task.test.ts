import { vi } from 'vitest';
import type { IObserver } from '@bandshare/core';
import { PeriodicTask } from './periodic-task.js';

function makeObserver(): IObserver {
  return {
    onConnectionTransition: vi.fn(),
    onUsage: vi.fn(),
    onRelayEvent: vi.fn(),
    onAlert: vi.fn(),
    onDailyReset: vi.fn(),
    onConnectionReport: vi.fn(),
    onError: vi.fn(),
  };
}

describe('PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on every interval', async () => {
    const run = vi.fn(async () => {});
    const task = new PeriodicTask({ name: 'tick', intervalMs: 100, run });
    task.start();

    await vi.advanceTimersByTimeAsync(350);
    expect(run).toHaveBeenCalledTimes(3);

    await task.stop();
    await vi.advanceTimersByTimeAsync(500);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('runs immediately when asked to', async () => {
    const run = vi.fn(async () => {});
    const task = new PeriodicTask({ name: 'tick', intervalMs: 100, run, runImmediately: true });
    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);
    await task.stop();
  });

  it('skips a run while the previous one is in flight', async () => {
    let finish: () => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const task = new PeriodicTask({ name: 'slow', intervalMs: 100, run });
    task.start();

    await vi.advanceTimersByTimeAsync(300);
    expect(run).toHaveBeenCalledTimes(1);
    expect(task.skipped).toBe(2);

    finish();
    await vi.advanceTimersByTimeAsync(100);
    expect(run).toHaveBeenCalledTimes(2);

    finish();
    await task.stop();
  });

  it('reports failures and keeps the schedule', async () => {
    const observer = makeObserver();
    const run = vi.fn(async () => {
      throw new Error('tick failed');
    });
    const task = new PeriodicTask({ name: 'tick', intervalMs: 100, run, observer });
    task.start();

    await vi.advanceTimersByTimeAsync(200);
    expect(run).toHaveBeenCalledTimes(2);
    expect(observer.onError).toHaveBeenCalledWith(new Error('tick failed'), { task: 'tick' });
    expect(task.runs).toBe(2);
    await task.stop();
  });

  it('waits for the run in flight on stop', async () => {
    let finish: () => void = () => {};
    const task = new PeriodicTask({
      name: 'slow',
      intervalMs: 100,
      run: () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    });
    task.start();
    await vi.advanceTimersByTimeAsync(100);

    let stopped = false;
    const stopping = task.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finish();
    await stopping;
    expect(stopped).toBe(true);
    expect(task.isStarted).toBe(false);
  });
});
