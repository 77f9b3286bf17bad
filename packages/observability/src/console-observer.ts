/**
 * ConsoleObserver — structured console logging with ANSI color coding.
 *
 * Formats engine events as human-readable console output, respecting the
 * configured log level. Routine traffic (usage deltas, tunnel bookkeeping,
 * retries) logs at debug; lifecycle changes at info; degraded states and
 * relay outages at warn; errors and fatal alerts at error.
 */

import type {
  AlertEvent,
  ConnectionReport,
  ConnectionState,
  ConnectionTransitionEvent,
  DailyResetEvent,
  IObserver,
  LogLevel,
  RelayEvent,
  UsageEvent,
} from '@bandshare/core';

export type { LogLevel };

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Event level and color mapping
// ---------------------------------------------------------------------------

const STATE_COLOR: Record<ConnectionState, string> = {
  PENDING: FG.gray,
  MATCHED: FG.cyan,
  ACTIVE: FG.green,
  THROTTLED: FG.yellow,
  UNHEALTHY: FG.red,
  EXPIRED: FG.gray,
  FAILED: FG.red,
  CLOSED: FG.white,
};

const RELAY_LEVEL: Record<RelayEvent['type'], LogLevel> = {
  tunnel_registered: 'debug',
  tunnel_deregistered: 'debug',
  retry: 'debug',
  unreachable: 'warn',
  restarting: 'warn',
  recovered: 'info',
};

function transitionLevel(to: ConnectionState): LogLevel {
  return to === 'UNHEALTHY' || to === 'FAILED' ? 'warn' : 'info';
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KiB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}MiB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)}GiB`;
}

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private write(level: LogLevel, timestamp: Date, line: string): void {
    const out = `${DIM}${timestamp.toISOString()}${RESET} ${line}`;
    if (level === 'error') console.error(out);
    else if (level === 'warn') console.warn(out);
    else console.log(out);
  }

  private short(id: string | null): string {
    return id === null ? '-' : id.slice(0, 8);
  }

  // ---- IObserver ----------------------------------------------------------

  onConnectionTransition(event: ConnectionTransitionEvent): void {
    const level = transitionLevel(event.to);
    if (!this.shouldLog(level)) return;
    this.write(
      level,
      event.timestamp,
      `${this.tag('CONN', FG.cyan)} ${STATE_COLOR[event.from]}${event.from}${RESET}` +
        ` -> ${STATE_COLOR[event.to]}${BOLD}${event.to}${RESET}` +
        ` ${DIM}id=${RESET}${this.short(event.connectionId)}` +
        ` ${DIM}sharer=${RESET}${event.sharerId ?? '-'}` +
        ` ${DIM}client=${RESET}${event.clientId ?? '-'}` +
        ` ${DIM}reason=${RESET}${event.reason}`,
    );
  }

  onUsage(event: UsageEvent): void {
    const level: LogLevel = event.exceeded ? 'warn' : 'debug';
    if (!this.shouldLog(level)) return;
    const pct = ((event.usedBytesToday / event.dailyLimitBytes) * 100).toFixed(1);
    const status = event.exceeded ? `${FG.yellow}EXCEEDED${RESET}` : `${FG.green}+${formatBytes(event.deltaBytes)}${RESET}`;
    this.write(
      level,
      event.timestamp,
      `${this.tag('USAGE', FG.blue)} ${status}` +
        ` ${DIM}sharer=${RESET}${event.sharerId}` +
        ` ${DIM}used=${RESET}${formatBytes(event.usedBytesToday)}/${formatBytes(event.dailyLimitBytes)} (${pct}%)` +
        ` ${DIM}id=${RESET}${this.short(event.connectionId)}`,
    );
  }

  onRelayEvent(event: RelayEvent): void {
    const level = RELAY_LEVEL[event.type];
    if (!this.shouldLog(level)) return;
    const color = level === 'warn' ? FG.yellow : level === 'info' ? FG.green : FG.gray;
    this.write(
      level,
      event.timestamp,
      `${this.tag('RELAY', FG.magenta)} ${color}${event.type}${RESET}` +
        ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`,
    );
  }

  onAlert(event: AlertEvent): void {
    const level: LogLevel = event.severity === 'fatal' ? 'error' : 'warn';
    if (!this.shouldLog(level)) return;
    const color = event.severity === 'fatal' ? `${BOLD}${FG.red}` : FG.yellow;
    this.write(
      level,
      event.timestamp,
      `${this.tag('ALERT', FG.red)} ${color}[${event.severity.toUpperCase()}]${RESET}` +
        ` ${event.message}` +
        ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`,
    );
  }

  onDailyReset(event: DailyResetEvent): void {
    if (!this.shouldLog('info')) return;
    this.write(
      'info',
      event.timestamp,
      `${this.tag('QUOTA', FG.blue)} ${FG.green}daily reset${RESET} ${DIM}sharers=${RESET}${event.sharers}`,
    );
  }

  onConnectionReport(report: ConnectionReport): void {
    if (!this.shouldLog('info')) return;
    const duration = Math.round((report.endedAt.getTime() - report.createdAt.getTime()) / 1000);
    this.write(
      'info',
      report.endedAt,
      `${this.tag('REPORT', FG.white)} ${STATE_COLOR[report.finalState]}${report.finalState}${RESET}` +
        ` ${DIM}id=${RESET}${this.short(report.connectionId)}` +
        ` ${DIM}sharer=${RESET}${report.sharerId ?? '-'}` +
        ` ${DIM}client=${RESET}${report.clientId ?? '-'}` +
        ` ${DIM}bytes=${RESET}${formatBytes(report.bytesTransferred)}` +
        ` ${DIM}duration=${RESET}${duration}s`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    this.write(
      'error',
      new Date(),
      `${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
