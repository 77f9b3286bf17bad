/**
 * @bandshare/supervisor — relay health monitoring, relay process
 * supervision and periodic task scheduling.
 */

export * from './strategies.js';
export * from './periodic-task.js';
export * from './relay-health-monitor.js';
export * from './relay-process.js';
