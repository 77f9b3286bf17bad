import { vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConsoleObserver, formatBytes } from './console-observer.js';
import type {
  AlertEvent,
  ConnectionReport,
  ConnectionTransitionEvent,
  UsageEvent,
} from '@bandshare/core';

const TS = new Date('2026-03-01T12:00:00.000Z');

function plain(spy: MockInstance, call = 0): string {
  const line = spy.mock.calls[call]?.[0];
  return typeof line === 'string' ? line.replace(/\x1b\[[0-9;]*m/g, '') : '';
}

function transition(overrides: Partial<ConnectionTransitionEvent> = {}): ConnectionTransitionEvent {
  return {
    connectionId: 'abcdef123456',
    sharerId: 'sharer-a',
    clientId: 'client-1',
    from: 'PENDING',
    to: 'MATCHED',
    reason: 'sharer selected',
    timestamp: TS,
    ...overrides,
  };
}

function usage(overrides: Partial<UsageEvent> = {}): UsageEvent {
  return {
    connectionId: 'abcdef123456',
    sharerId: 'sharer-a',
    deltaBytes: 2048,
    usedBytesToday: 512 * 1024,
    dailyLimitBytes: 1024 * 1024,
    exceeded: false,
    timestamp: TS,
    ...overrides,
  };
}

describe('ConsoleObserver', () => {
  let consoleSpy: {
    log: MockInstance;
    error: MockInstance;
    warn: MockInstance;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log level filtering', () => {
    it('logs info and above at "info" level', () => {
      new ConsoleObserver('info').onConnectionTransition(transition());
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });

    it('suppresses info at "warn" level', () => {
      new ConsoleObserver('warn').onConnectionTransition(transition());
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('suppresses usage deltas unless at "debug" level', () => {
      new ConsoleObserver('info').onUsage(usage());
      expect(consoleSpy.log).not.toHaveBeenCalled();

      new ConsoleObserver('debug').onUsage(usage());
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });

    it('still logs errors at "error" level', () => {
      new ConsoleObserver('error').onError(new Error('boom'), {});
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('onConnectionTransition', () => {
    it('prints the transition with a shortened id', () => {
      new ConsoleObserver('info').onConnectionTransition(transition());
      expect(plain(consoleSpy.log)).toBe(
        '2026-03-01T12:00:00.000Z [CONN] PENDING -> MATCHED id=abcdef12 sharer=sharer-a client=client-1 reason=sharer selected',
      );
    });

    it('routes degraded states to console.warn', () => {
      new ConsoleObserver('info').onConnectionTransition(
        transition({ from: 'ACTIVE', to: 'UNHEALTHY', reason: 'missed 3 heartbeats' }),
      );
      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(plain(consoleSpy.warn)).toContain('ACTIVE -> UNHEALTHY');
    });

    it('prints a dash for a missing sharer', () => {
      new ConsoleObserver('info').onConnectionTransition(
        transition({ sharerId: null, to: 'EXPIRED', reason: 'match timeout' }),
      );
      expect(plain(consoleSpy.log)).toContain('sharer=- client=client-1');
    });
  });

  describe('onUsage', () => {
    it('shows the delta and daily utilisation', () => {
      new ConsoleObserver('debug').onUsage(usage());
      expect(plain(consoleSpy.log)).toBe(
        '2026-03-01T12:00:00.000Z [USAGE] +2.0KiB sharer=sharer-a used=512.0KiB/1.0MiB (50.0%) id=abcdef12',
      );
    });

    it('warns when the quota is exceeded', () => {
      new ConsoleObserver('info').onUsage(usage({ usedBytesToday: 1024 * 1024, exceeded: true }));
      expect(plain(consoleSpy.warn)).toContain('[USAGE] EXCEEDED sharer=sharer-a used=1.0MiB/1.0MiB (100.0%)');
    });
  });

  describe('onRelayEvent', () => {
    it('logs tunnel bookkeeping at debug only', () => {
      const event = { type: 'tunnel_registered' as const, details: { port: 40001 }, timestamp: TS };
      new ConsoleObserver('info').onRelayEvent(event);
      expect(consoleSpy.log).not.toHaveBeenCalled();

      new ConsoleObserver('debug').onRelayEvent(event);
      expect(plain(consoleSpy.log)).toBe('2026-03-01T12:00:00.000Z [RELAY] tunnel_registered details={"port":40001}');
    });

    it('warns when the relay is unreachable', () => {
      new ConsoleObserver('info').onRelayEvent({ type: 'unreachable', details: {}, timestamp: TS });
      expect(plain(consoleSpy.warn)).toBe('2026-03-01T12:00:00.000Z [RELAY] unreachable details={}');
    });
  });

  describe('onAlert', () => {
    const alert: AlertEvent = {
      severity: 'warning',
      message: 'sharer reserved twice',
      details: { sharerId: 'sharer-a' },
      timestamp: TS,
    };

    it('warns for warnings', () => {
      new ConsoleObserver('info').onAlert(alert);
      expect(plain(consoleSpy.warn)).toBe(
        '2026-03-01T12:00:00.000Z [ALERT] [WARNING] sharer reserved twice details={"sharerId":"sharer-a"}',
      );
    });

    it('uses console.error for fatal alerts', () => {
      new ConsoleObserver('info').onAlert({ ...alert, severity: 'fatal', message: 'relay gone' });
      expect(plain(consoleSpy.error)).toContain('[ALERT] [FATAL] relay gone');
    });
  });

  describe('onDailyReset', () => {
    it('logs the number of sharers reset', () => {
      new ConsoleObserver('info').onDailyReset({ sharers: 4, timestamp: TS });
      expect(plain(consoleSpy.log)).toBe('2026-03-01T12:00:00.000Z [QUOTA] daily reset sharers=4');
    });
  });

  describe('onConnectionReport', () => {
    it('summarises the connection', () => {
      const report: ConnectionReport = {
        connectionId: 'abcdef123456',
        sharerId: 'sharer-a',
        clientId: 'client-1',
        finalState: 'CLOSED',
        bytesTransferred: 3 * 1024 * 1024,
        createdAt: new Date('2026-03-01T11:59:00.000Z'),
        endedAt: TS,
      };
      new ConsoleObserver('info').onConnectionReport(report);
      expect(plain(consoleSpy.log)).toBe(
        '2026-03-01T12:00:00.000Z [REPORT] CLOSED id=abcdef12 sharer=sharer-a client=client-1 bytes=3.0MiB duration=60s',
      );
    });
  });

  describe('onError', () => {
    it('includes the context when present', () => {
      new ConsoleObserver('info').onError(new Error('relay refused'), { phase: 'provision' });
      expect(plain(consoleSpy.error)).toMatch(/\[ERROR\] Error: relay refused ctx=\{"phase":"provision"\}$/);
    });

    it('omits an empty context', () => {
      new ConsoleObserver('info').onError(new Error('relay refused'), {});
      expect(plain(consoleSpy.error)).toMatch(/\[ERROR\] Error: relay refused$/);
    });
  });

  it('flush resolves', async () => {
    await expect(new ConsoleObserver().flush()).resolves.toBeUndefined();
  });
});

describe('formatBytes', () => {
  it.each([
    [512, '512B'],
    [1536, '1.5KiB'],
    [5 * 1024 * 1024, '5.0MiB'],
    [3 * 1024 * 1024 * 1024, '3.00GiB'],
  ])('formats %i as %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});
