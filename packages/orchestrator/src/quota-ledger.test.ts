import { SharerNotFoundError, ValidationError } from '@bandshare/core';
import { QuotaLedger, utcDayStart } from './quota-ledger.js';
import { Matcher } from './matcher.js';

describe('QuotaLedger', () => {
  let now: number;
  let ledger: QuotaLedger;

  beforeEach(() => {
    now = Date.UTC(2026, 2, 1, 22, 0, 0);
    ledger = new QuotaLedger({ clock: () => now });
    ledger.upsert({ sharerId: 'sharer-s', dailyLimitBytes: 1_000_000, qualityScore: 0.8 });
  });

  describe('upsert', () => {
    it('applies defaults', () => {
      expect(ledger.get('sharer-s')).toEqual({
        sharerId: 'sharer-s',
        sharingEnabled: true,
        dailyLimitBytes: 1_000_000,
        usedBytesToday: 0,
        qualityScore: 0.8,
      });
    });

    it('keeps existing values that the update omits', () => {
      ledger.recordUsage('sharer-s', 500);
      ledger.setSharingEnabled('sharer-s', false);
      const updated = ledger.upsert({ sharerId: 'sharer-s', dailyLimitBytes: 2_000_000 });
      expect(updated.usedBytesToday).toBe(500);
      expect(updated.sharingEnabled).toBe(false);
      expect(updated.qualityScore).toBe(0.8);
    });

    it('never lowers usage already recorded today', () => {
      ledger.recordUsage('sharer-s', 1_000);
      const updated = ledger.upsert({ sharerId: 'sharer-s', dailyLimitBytes: 1_000_000, usedBytesToday: 0 });
      expect(updated.usedBytesToday).toBe(1_000);
      expect(ledger.upsert({ sharerId: 'sharer-s', dailyLimitBytes: 1_000_000, usedBytesToday: 3_000 }).usedBytesToday).toBe(3_000);
    });

    it('clamps pre-existing usage to a lowered limit', () => {
      ledger.upsert({ sharerId: 'sharer-t', dailyLimitBytes: 100, usedBytesToday: 250 });
      expect(ledger.get('sharer-t')?.usedBytesToday).toBe(100);
    });

    it.each([
      [{ sharerId: '', dailyLimitBytes: 10 }, 'sharerId'],
      [{ sharerId: 'x', dailyLimitBytes: 0 }, 'dailyLimitBytes'],
      [{ sharerId: 'x', dailyLimitBytes: 1.5 }, 'dailyLimitBytes'],
      [{ sharerId: 'x', dailyLimitBytes: 10, usedBytesToday: -1 }, 'usedBytesToday'],
      [{ sharerId: 'x', dailyLimitBytes: 10, qualityScore: 1.2 }, 'qualityScore'],
    ])('rejects %o', (input, field) => {
      try {
        ledger.upsert(input);
        expect.unreachable('upsert should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ field });
      }
    });
  });

  describe('recordUsage', () => {
    it('clamps at the limit and reports exceeded on the crossing call', () => {
      expect(ledger.recordUsage('sharer-s', 400_000)).toEqual({ status: 'ok', usedBytesToday: 400_000 });
      expect(ledger.recordUsage('sharer-s', 400_000)).toEqual({ status: 'ok', usedBytesToday: 800_000 });
      expect(ledger.recordUsage('sharer-s', 300_000)).toEqual({
        status: 'exceeded',
        usedBytesToday: 1_000_000,
      });
      expect(ledger.get('sharer-s')?.usedBytesToday).toBe(1_000_000);
    });

    it('never exceeds the limit for any sequence of deltas', () => {
      const deltas = [1, 999_998, 0, 5, 7_000_000, 3];
      for (const d of deltas) {
        ledger.recordUsage('sharer-s', d);
        expect(ledger.get('sharer-s')?.usedBytesToday).toBeLessThanOrEqual(1_000_000);
      }
    });

    it('reports exceeded when landing exactly on the limit', () => {
      expect(ledger.recordUsage('sharer-s', 1_000_000).status).toBe('exceeded');
    });

    it('ignores negative deltas', () => {
      ledger.recordUsage('sharer-s', 100);
      expect(ledger.recordUsage('sharer-s', -50)).toEqual({ status: 'ok', usedBytesToday: 100 });
    });

    it('throws for an unknown sharer', () => {
      expect(() => ledger.recordUsage('nobody', 1)).toThrow(SharerNotFoundError);
    });
  });

  describe('daily reset', () => {
    it('is not due before UTC midnight', () => {
      now += 60 * 60 * 1000;
      expect(ledger.resetIfDue()).toBe(false);
    });

    it('zeroes usage once a UTC midnight has passed', () => {
      ledger.recordUsage('sharer-s', 1_000_000);
      now += 3 * 60 * 60 * 1000;
      expect(ledger.resetIfDue()).toBe(true);
      expect(ledger.get('sharer-s')?.usedBytesToday).toBe(0);
      expect(ledger.getLastResetAt().getTime()).toBe(now);
      expect(ledger.resetIfDue()).toBe(false);
    });

    it('makes an exhausted sharer selectable again', () => {
      const matcher = new Matcher(ledger);
      ledger.recordUsage('sharer-s', 1_000_000);
      expect(matcher.findCandidate()).toEqual({ kind: 'none-available' });

      ledger.resetDaily();
      expect(matcher.findCandidate()).toEqual({ kind: 'match', sharerId: 'sharer-s' });
      expect(ledger.get('sharer-s')?.usedBytesToday).toBe(0);
    });

    it('measures days from UTC midnight', () => {
      expect(utcDayStart(now)).toBe(Date.UTC(2026, 2, 1));
    });
  });

  describe('reservations', () => {
    it('grants one reservation per sharer', () => {
      expect(ledger.reserve('sharer-s')).toBe('granted');
      expect(ledger.reserve('sharer-s')).toBe('denied');
      expect(ledger.isEligible('sharer-s')).toBe(false);
      ledger.release('sharer-s');
      expect(ledger.reserve('sharer-s')).toBe('granted');
    });

    it('denies unknown sharers', () => {
      expect(ledger.reserve('nobody')).toBe('denied');
    });
  });

  it('derives a ledger entry', () => {
    ledger.recordUsage('sharer-s', 250_000);
    ledger.reserve('sharer-s');
    expect(ledger.entry('sharer-s')).toEqual({
      sharerId: 'sharer-s',
      dailyLimitBytes: 1_000_000,
      usedBytesToday: 250_000,
      availableBytes: 750_000,
      utilization: 0.25,
      reserved: true,
    });
  });

  it('restores profiles and the last reset time, dropping reservations', () => {
    ledger.reserve('sharer-s');
    const resetAt = new Date(Date.UTC(2026, 1, 28));
    ledger.restore(
      [{ sharerId: 'sharer-r', sharingEnabled: true, dailyLimitBytes: 10, usedBytesToday: 4, qualityScore: 0.1 }],
      resetAt,
    );
    expect(ledger.list().map((p) => p.sharerId)).toEqual(['sharer-r', 'sharer-s']);
    expect(ledger.getLastResetAt()).toEqual(resetAt);
    expect(ledger.entry('sharer-s').reserved).toBe(false);
  });

  it('lets the snapshot win over a profile it already knows', () => {
    ledger.restore(
      [{ sharerId: 'sharer-s', sharingEnabled: false, dailyLimitBytes: 500, usedBytesToday: 200, qualityScore: 0.3 }],
      new Date(now),
    );
    expect(ledger.get('sharer-s')).toEqual({
      sharerId: 'sharer-s',
      sharingEnabled: false,
      dailyLimitBytes: 500,
      usedBytesToday: 200,
      qualityScore: 0.3,
    });
  });
});

describe('Matcher', () => {
  let ledger: QuotaLedger;
  let matcher: Matcher;

  beforeEach(() => {
    ledger = new QuotaLedger();
    matcher = new Matcher(ledger);
    ledger.upsert({ sharerId: 'A', dailyLimitBytes: 1_000, usedBytesToday: 100, qualityScore: 0.9 });
    ledger.upsert({ sharerId: 'B', dailyLimitBytes: 1_000, usedBytesToday: 500, qualityScore: 0.9 });
    ledger.upsert({ sharerId: 'C', dailyLimitBytes: 1_000, usedBytesToday: 0, qualityScore: 0.5 });
  });

  it('breaks a quality tie by lower utilisation', () => {
    expect(matcher.findCandidate()).toEqual({ kind: 'match', sharerId: 'A' });
    expect(matcher.rank().map((s) => s.sharerId)).toEqual(['A', 'B', 'C']);
  });

  it('falls back to sharer id for full ties', () => {
    ledger.upsert({ sharerId: 'AA', dailyLimitBytes: 2_000, usedBytesToday: 200, qualityScore: 0.9 });
    expect(matcher.rank().map((s) => s.sharerId)).toEqual(['A', 'AA', 'B', 'C']);
  });

  it('skips disabled, exhausted, reserved and excluded sharers', () => {
    ledger.setSharingEnabled('A', false);
    ledger.recordUsage('B', 1_000);
    expect(matcher.findCandidate()).toEqual({ kind: 'match', sharerId: 'C' });

    ledger.reserve('C');
    expect(matcher.findCandidate()).toEqual({ kind: 'none-available' });

    ledger.release('C');
    expect(matcher.findCandidate(new Set(['C']))).toEqual({ kind: 'none-available' });
  });

  it('reports available bytes in ranked order', () => {
    expect(matcher.rank()[1]).toEqual({
      sharerId: 'B',
      availableBytes: 500,
      qualityScore: 0.9,
      utilization: 0.5,
    });
  });
});
