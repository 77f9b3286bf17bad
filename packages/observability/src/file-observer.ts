/**
 * FileObserver — append-only JSONL log with size-based rotation.
 *
 * Each event becomes one JSON line `{ ts, level, kind, ...payload }`. When the
 * file grows past `maxBytes` it is renamed to `<file>.1` (replacing any
 * previous rotation) and a fresh file is started.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import type {
  AlertEvent,
  ConnectionReport,
  ConnectionTransitionEvent,
  DailyResetEvent,
  IObserver,
  LogLevel,
  RelayEvent,
  UsageEvent,
} from '@bandshare/core';

export interface FileObserverOptions {
  /** Defaults to ~/.bandshare/logs/bandshare.jsonl */
  filePath?: string;
  /** Rotation threshold in bytes. Defaults to 10 MiB. */
  maxBytes?: number;
}

export const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export function defaultLogPath(): string {
  return join(homedir(), '.bandshare', 'logs', 'bandshare.jsonl');
}

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;
  private size: number;

  constructor(opts: FileObserverOptions = {}) {
    this.filePath = opts.filePath ?? defaultLogPath();
    this.maxBytes = opts.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.size = existsSync(this.filePath) ? statSync(this.filePath).size : 0;
  }

  // ---- helpers ------------------------------------------------------------

  private write(level: LogLevel, kind: string, timestamp: Date, payload: Record<string, unknown>): void {
    const line = JSON.stringify({ ts: timestamp.toISOString(), level, kind, ...payload }) + '\n';
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      this.rotate();
    }
    appendFileSync(this.filePath, line, 'utf8');
    this.size += bytes;
  }

  private rotate(): void {
    renameSync(this.filePath, `${this.filePath}.1`);
    this.size = 0;
  }

  // ---- IObserver ----------------------------------------------------------

  onConnectionTransition(event: ConnectionTransitionEvent): void {
    const { timestamp, ...rest } = event;
    const level: LogLevel = event.to === 'UNHEALTHY' || event.to === 'FAILED' ? 'warn' : 'info';
    this.write(level, 'connection_transition', timestamp, rest);
  }

  onUsage(event: UsageEvent): void {
    const { timestamp, ...rest } = event;
    this.write(event.exceeded ? 'warn' : 'debug', 'usage', timestamp, rest);
  }

  onRelayEvent(event: RelayEvent): void {
    const level: LogLevel = event.type === 'unreachable' || event.type === 'restarting' ? 'warn' : 'info';
    this.write(level, `relay_${event.type}`, event.timestamp, { details: event.details });
  }

  onAlert(event: AlertEvent): void {
    const { timestamp, ...rest } = event;
    this.write(event.severity === 'fatal' ? 'error' : 'warn', 'alert', timestamp, rest);
  }

  onDailyReset(event: DailyResetEvent): void {
    this.write('info', 'daily_reset', event.timestamp, { sharers: event.sharers });
  }

  onConnectionReport(report: ConnectionReport): void {
    this.write('info', 'connection_report', report.endedAt, {
      connectionId: report.connectionId,
      sharerId: report.sharerId,
      clientId: report.clientId,
      finalState: report.finalState,
      bytesTransferred: report.bytesTransferred,
      createdAt: report.createdAt.toISOString(),
      durationMs: report.endedAt.getTime() - report.createdAt.getTime(),
    });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', 'error', new Date(), {
      name: error.name,
      message: error.message,
      context,
    });
  }

  async flush(): Promise<void> {
    // Writes are synchronous.
  }
}
