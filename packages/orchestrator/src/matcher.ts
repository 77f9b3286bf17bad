/**
 * Matcher — picks the sharer that should serve the next client.
 *
 * Ranking: qualityScore descending, then utilisation ascending, then sharer
 * id ascending so the choice is deterministic.
 */

import type { SharerProfile } from '@bandshare/core';
import type { QuotaLedger } from './quota-ledger.js';

export type MatchResult = { kind: 'match'; sharerId: string } | { kind: 'none-available' };

export interface RankedSharer {
  sharerId: string;
  availableBytes: number;
  qualityScore: number;
  utilization: number;
}

function compare(a: RankedSharer, b: RankedSharer): number {
  if (a.qualityScore !== b.qualityScore) return b.qualityScore - a.qualityScore;
  if (a.utilization !== b.utilization) return a.utilization - b.utilization;
  return a.sharerId < b.sharerId ? -1 : a.sharerId > b.sharerId ? 1 : 0;
}

function toRanked(p: SharerProfile): RankedSharer {
  return {
    sharerId: p.sharerId,
    availableBytes: p.dailyLimitBytes - p.usedBytesToday,
    qualityScore: p.qualityScore,
    utilization: p.usedBytesToday / p.dailyLimitBytes,
  };
}

export class Matcher {
  constructor(private readonly ledger: QuotaLedger) {}

  /** Every eligible sharer, best first. */
  rank(excluding: ReadonlySet<string> = new Set()): RankedSharer[] {
    return this.ledger
      .list()
      .filter((p) => !excluding.has(p.sharerId) && this.ledger.isEligible(p.sharerId))
      .map(toRanked)
      .sort(compare);
  }

  findCandidate(excluding: ReadonlySet<string> = new Set()): MatchResult {
    const best = this.rank(excluding)[0];
    return best ? { kind: 'match', sharerId: best.sharerId } : { kind: 'none-available' };
  }
}
