import { MAX_IN_VALUES } from '../store/types';
import { PreconditionError } from './errors';
import { LedgerStore } from './ledger';
import { LeaderboardEntry, RankedEntry } from './types';
import { assertPeriodKey } from './window';

export type RankScope =
  | { kind: 'global'; limit: number }
  | { kind: 'friends'; userIds: readonly string[] };

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
};

/**
 * More XP first; on equal XP whoever reached it first (earlier lastUpdated),
 * then user id so the order never depends on how the store returned rows.
 */
export const compareEntries = (a: LeaderboardEntry, b: LeaderboardEntry): number =>
  b.currentXP - a.currentXP ||
  a.lastUpdated.getTime() - b.lastUpdated.getTime() ||
  (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0);

export const assignRanks = (entries: readonly LeaderboardEntry[]): RankedEntry[] =>
  [...entries].sort(compareEntries).map((entry, index) => ({ rank: index + 1, entry }));

/** 1-based rank of `userId`, or 0 when the user is not on the board. */
export const rankOf = (ranking: readonly RankedEntry[], userId: string): number =>
  ranking.find(({ entry }) => entry.userId === userId)?.rank ?? 0;

export class LeaderboardRanker {
  constructor(private readonly ledger: LedgerStore) {}

  async rank(periodKey: string, scope: RankScope): Promise<RankedEntry[]> {
    assertPeriodKey(periodKey);
    if (scope.kind === 'global') return this.global(periodKey, scope.limit);
    return this.friends(periodKey, scope.userIds);
  }

  private async global(periodKey: string, limit: number): Promise<RankedEntry[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new PreconditionError(`Leaderboard limit must be a non-negative integer, got ${limit}`, 'limit');
    }
    if (limit === 0) return [];
    const entries = await this.ledger.entriesForPeriod(periodKey, limit);
    return assignRanks(entries);
  }

  private async friends(periodKey: string, userIds: readonly string[]): Promise<RankedEntry[]> {
    const unique = [...new Set(userIds.filter((id) => id.length > 0))];
    if (unique.length === 0) return [];

    const batches = await Promise.all(
      chunk(unique, MAX_IN_VALUES).map((batch) => this.ledger.entriesForIds(periodKey, batch)),
    );
    return assignRanks(batches.flat());
  }
}
