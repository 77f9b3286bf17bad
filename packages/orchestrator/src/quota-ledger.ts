/**
 * QuotaLedger — daily byte allowance per sharer, and the one-connection-per-
 * sharer reservation table.
 *
 * usedBytesToday only grows through recordUsage() and only shrinks through
 * the daily reset at UTC midnight. Usage is clamped at the sharer's limit;
 * the call that reaches the limit reports `exceeded`.
 */

import { SharerNotFoundError, ValidationError } from '@bandshare/core';
import type {
  QuotaLedgerEntry,
  ReservationResult,
  SharerProfile,
  UsageResult,
} from '@bandshare/core';

export interface SharerProfileInput {
  sharerId: string;
  sharingEnabled?: boolean;
  dailyLimitBytes: number;
  /** Usage that happened outside this engine today. Can raise recorded usage, never lower it. */
  usedBytesToday?: number;
  qualityScore?: number;
}

export interface QuotaLedgerOptions {
  clock?: () => number;
}

const DAY_MS = 86_400_000;

/** Start of the UTC day containing `ms`. */
export function utcDayStart(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

function validateProfile(input: SharerProfileInput): void {
  if (typeof input.sharerId !== 'string' || input.sharerId.trim() === '') {
    throw new ValidationError('sharerId must be a non-empty string', 'sharerId');
  }
  if (!Number.isSafeInteger(input.dailyLimitBytes) || input.dailyLimitBytes <= 0) {
    throw new ValidationError('dailyLimitBytes must be a positive integer', 'dailyLimitBytes');
  }
  if (
    input.usedBytesToday !== undefined &&
    (!Number.isSafeInteger(input.usedBytesToday) || input.usedBytesToday < 0)
  ) {
    throw new ValidationError('usedBytesToday must be a non-negative integer', 'usedBytesToday');
  }
  if (
    input.qualityScore !== undefined &&
    (!Number.isFinite(input.qualityScore) || input.qualityScore < 0 || input.qualityScore > 1)
  ) {
    throw new ValidationError('qualityScore must be between 0 and 1', 'qualityScore');
  }
}

export class QuotaLedger {
  private readonly profiles = new Map<string, SharerProfile>();
  private readonly reservations = new Set<string>();
  private readonly clock: () => number;
  private lastResetAt: number;

  constructor(options: QuotaLedgerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.lastResetAt = this.clock();
  }

  // ── Profiles ─────────────────────────────────────────────────────────

  /** Create or update a sharer profile. */
  upsert(input: SharerProfileInput): SharerProfile {
    validateProfile(input);
    const existing = this.profiles.get(input.sharerId);

    const dailyLimitBytes = input.dailyLimitBytes;
    const used = Math.max(existing?.usedBytesToday ?? 0, input.usedBytesToday ?? 0);

    const profile: SharerProfile = {
      sharerId: input.sharerId,
      sharingEnabled: input.sharingEnabled ?? existing?.sharingEnabled ?? true,
      dailyLimitBytes,
      usedBytesToday: Math.min(used, dailyLimitBytes),
      qualityScore: input.qualityScore ?? existing?.qualityScore ?? 0.5,
    };
    this.profiles.set(profile.sharerId, profile);
    return { ...profile };
  }

  setSharingEnabled(sharerId: string, enabled: boolean): SharerProfile {
    const profile = this.profileOrThrow(sharerId);
    profile.sharingEnabled = enabled;
    return { ...profile };
  }

  get(sharerId: string): SharerProfile | undefined {
    const profile = this.profiles.get(sharerId);
    return profile ? { ...profile } : undefined;
  }

  /** All profiles ordered by sharer id. */
  list(): SharerProfile[] {
    return [...this.profiles.values()]
      .sort((a, b) => (a.sharerId < b.sharerId ? -1 : a.sharerId > b.sharerId ? 1 : 0))
      .map((p) => ({ ...p }));
  }

  /** Quota view for one sharer, with derived availability. */
  entry(sharerId: string): QuotaLedgerEntry {
    const p = this.profileOrThrow(sharerId);
    return {
      sharerId: p.sharerId,
      dailyLimitBytes: p.dailyLimitBytes,
      usedBytesToday: p.usedBytesToday,
      availableBytes: p.dailyLimitBytes - p.usedBytesToday,
      utilization: p.usedBytesToday / p.dailyLimitBytes,
      reserved: this.reservations.has(sharerId),
    };
  }

  // ── Usage ────────────────────────────────────────────────────────────

  /**
   * Add usage for a sharer. Non-positive deltas add nothing. Returns
   * `exceeded` whenever the clamped total has reached the limit.
   */
  recordUsage(sharerId: string, deltaBytes: number): UsageResult {
    const profile = this.profileOrThrow(sharerId);
    const delta = Number.isFinite(deltaBytes) && deltaBytes > 0 ? deltaBytes : 0;

    profile.usedBytesToday = Math.min(profile.dailyLimitBytes, profile.usedBytesToday + delta);

    if (profile.usedBytesToday >= profile.dailyLimitBytes) {
      return { status: 'exceeded', usedBytesToday: profile.usedBytesToday };
    }
    return { status: 'ok', usedBytesToday: profile.usedBytesToday };
  }

  /** Zero every sharer's usage in one sweep. Returns the number of profiles reset. */
  resetDaily(): number {
    for (const profile of this.profiles.values()) {
      profile.usedBytesToday = 0;
    }
    this.lastResetAt = this.clock();
    return this.profiles.size;
  }

  /** Reset when a UTC midnight has passed since the last reset. */
  resetIfDue(): boolean {
    if (utcDayStart(this.clock()) <= utcDayStart(this.lastResetAt)) return false;
    this.resetDaily();
    return true;
  }

  getLastResetAt(): Date {
    return new Date(this.lastResetAt);
  }

  // ── Reservations ─────────────────────────────────────────────────────

  /**
   * Claim the sharer for one connection. Must succeed before a connection
   * leaves PENDING; denied while another connection holds the claim.
   */
  reserve(sharerId: string): ReservationResult {
    if (!this.profiles.has(sharerId) || this.reservations.has(sharerId)) return 'denied';
    this.reservations.add(sharerId);
    return 'granted';
  }

  release(sharerId: string): void {
    this.reservations.delete(sharerId);
  }

  /** Sharing on, under the limit and not already serving a connection. */
  isEligible(sharerId: string): boolean {
    const p = this.profiles.get(sharerId);
    if (!p) return false;
    return p.sharingEnabled && p.usedBytesToday < p.dailyLimitBytes && !this.reservations.has(sharerId);
  }

  // ── Snapshots ────────────────────────────────────────────────────────

  /**
   * Lay snapshot profiles over the current ones. Sharers the snapshot does
   * not know (seeded since it was taken) are kept as they are.
   */
  restore(profiles: SharerProfile[], lastResetAt: Date): void {
    this.reservations.clear();
    for (const p of profiles) {
      this.profiles.set(p.sharerId, {
        ...p,
        usedBytesToday: Math.min(p.usedBytesToday, p.dailyLimitBytes),
      });
    }
    this.lastResetAt = lastResetAt.getTime();
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private profileOrThrow(sharerId: string): SharerProfile {
    const profile = this.profiles.get(sharerId);
    if (!profile) throw new SharerNotFoundError(sharerId);
    return profile;
  }
}
