/**
 * Observer registry — factory that builds observers from config.
 *
 * Reads the `observability` section of BandshareConfig and returns a ready-to-use
 * IObserver (potentially a MultiObserver wrapping several children).
 */

import type { IObserver, ObservabilityConfig } from '@bandshare/core';

import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import type { FileObserverOptions } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export type { ObservabilityConfig };

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build an IObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: Partial<ObservabilityConfig> & Pick<ObservabilityConfig, 'observers'>): IObserver {
  const { observers, logLevel = 'info', logPath, maxLogSize } = config;

  if (!observers || observers.length === 0) {
    return new NoopObserver();
  }

  const children: IObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver(logLevel));
        break;
      case 'file': {
        const fileOpts: FileObserverOptions = {};
        if (logPath) fileOpts.filePath = logPath;
        if (maxLogSize) fileOpts.maxBytes = maxLogSize;
        children.push(new FileObserver(fileOpts));
        break;
      }
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        // Unknown observer name — warn but do not crash.
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [first, ...rest] = children;
  if (first === undefined) {
    return new NoopObserver();
  }

  if (rest.length === 0) {
    return first;
  }

  return new MultiObserver(children);
}
