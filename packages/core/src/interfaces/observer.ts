/**
 * IObserver — observability contract
 *
 * Structured events for every subsystem: connection lifecycle, usage
 * accounting, relay control traffic, health alerts and errors.
 */

import type { ConnectionState } from '../types/connection.js';

export interface ConnectionTransitionEvent {
  connectionId: string;
  sharerId: string | null;
  clientId: string | null;
  from: ConnectionState;
  to: ConnectionState;
  reason: string;
  timestamp: Date;
}

export interface UsageEvent {
  connectionId: string;
  sharerId: string;
  deltaBytes: number;
  usedBytesToday: number;
  dailyLimitBytes: number;
  exceeded: boolean;
  timestamp: Date;
}

export interface RelayEvent {
  type:
    | 'tunnel_registered'
    | 'tunnel_deregistered'
    | 'retry'
    | 'unreachable'
    | 'restarting'
    | 'recovered';
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface AlertEvent {
  severity: 'warning' | 'fatal';
  message: string;
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface DailyResetEvent {
  sharers: number;
  timestamp: Date;
}

/** Final summary emitted just before a terminal connection is removed. */
export interface ConnectionReport {
  connectionId: string;
  sharerId: string | null;
  clientId: string | null;
  finalState: ConnectionState;
  bytesTransferred: number;
  createdAt: Date;
  endedAt: Date;
}

export interface IObserver {
  onConnectionTransition(event: ConnectionTransitionEvent): void;
  onUsage(event: UsageEvent): void;
  onRelayEvent(event: RelayEvent): void;
  onAlert(event: AlertEvent): void;
  onDailyReset(event: DailyResetEvent): void;
  onConnectionReport(report: ConnectionReport): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
