/**
 * Error taxonomy.
 *
 * Every error carries a stable `code` and optional structured `context` so
 * observers can serialise it without string parsing.
 */

import type { ConnectionState } from '../types/connection.js';

export class BandshareError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BandshareError';
  }
}

/** A state change the connection state machine does not permit. */
export class InvalidTransitionError extends BandshareError {
  constructor(
    public readonly connectionId: string,
    public readonly from: ConnectionState,
    public readonly to: ConnectionState,
  ) {
    super(`Invalid transition ${from} -> ${to} for connection ${connectionId}`, 'INVALID_TRANSITION', {
      connectionId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class NotTerminalError extends BandshareError {
  constructor(
    public readonly connectionId: string,
    public readonly state: ConnectionState,
  ) {
    super(`Connection ${connectionId} is still ${state} and cannot be removed`, 'NOT_TERMINAL', {
      connectionId,
      state,
    });
    this.name = 'NotTerminalError';
  }
}

export class ConnectionNotFoundError extends BandshareError {
  constructor(public readonly connectionId: string) {
    super(`Unknown connection ${connectionId}`, 'CONNECTION_NOT_FOUND', { connectionId });
    this.name = 'ConnectionNotFoundError';
  }
}

export class SharerNotFoundError extends BandshareError {
  constructor(public readonly sharerId: string) {
    super(`Unknown sharer ${sharerId}`, 'SHARER_NOT_FOUND', { sharerId });
    this.name = 'SharerNotFoundError';
  }
}

/** Relay could not be reached after the retry budget was spent. */
export class RelayUnavailableError extends BandshareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RELAY_UNAVAILABLE', context);
    this.name = 'RelayUnavailableError';
  }
}

export class PortExhaustedError extends BandshareError {
  constructor(start: number, end: number) {
    super(`No relay port available in range ${start}-${end}`, 'PORT_EXHAUSTED', { start, end });
    this.name = 'PortExhaustedError';
  }
}

/** The relay no longer knows the mapping for this port. */
export class TunnelNotFoundError extends BandshareError {
  constructor(public readonly relayPort: number) {
    super(`Relay has no tunnel on port ${relayPort}`, 'TUNNEL_NOT_FOUND', { relayPort });
    this.name = 'TunnelNotFoundError';
  }
}

export class ValidationError extends BandshareError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message, 'VALIDATION_ERROR', { field });
    this.name = 'ValidationError';
  }
}

export class ConfigError extends BandshareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

export class StoreError extends BandshareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', context);
    this.name = 'StoreError';
  }
}
