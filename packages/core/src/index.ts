/**
 * @bandshare/core — shared data model, contracts, errors and utilities.
 */

export * from './types/connection.js';
export * from './types/config.js';
export type * from './interfaces/relay.js';
export type * from './interfaces/observer.js';
export type * from './interfaces/store.js';
export * from './errors/index.js';
export * from './utils/index.js';
