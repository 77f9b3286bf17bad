/**
 * @bandshare/observability — structured logging for the bandshare engine.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver, formatBytes } from './console-observer.js';
export type { LogLevel } from './console-observer.js';

export { FileObserver, defaultLogPath, DEFAULT_MAX_LOG_BYTES } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
