import { LEADERBOARD, leaderboardId, leaderboardPath, userPath } from '../store/paths';
import { DOCUMENT_ID, DocumentStore, MAX_IN_VALUES, StoredDocument, SubscriptionHandle } from '../store/types';
import { decodeEntry, decodeLedger, encodeEntry, encodeLedger } from './codec';
import { StoreQueryError, describeError } from './errors';
import { LeaderboardEntry, UserProfile, UserXPState, zeroState } from './types';

export interface LedgerSnapshot {
  userId: string;
  state: UserXPState;
  profile: UserProfile;
  /** 0 while the document does not exist. */
  version: number;
  exists: boolean;
  repaired: boolean;
}

export type EntryWrite = 'written' | 'stale' | 'conflict';

const EMPTY_PROFILE: UserProfile = { displayName: '' };

export const projectEntry = (
  snapshot: Pick<LedgerSnapshot, 'userId' | 'state' | 'profile'>,
  periodKey: string,
  now: Date,
): LeaderboardEntry => ({
  userId: snapshot.userId,
  displayName: snapshot.profile.displayName,
  currentXP: snapshot.state.currentXP,
  level: snapshot.state.level,
  ...(snapshot.profile.avatarRef ? { avatarRef: snapshot.profile.avatarRef } : {}),
  lastUpdated: now,
  periodKey,
});

export class LedgerStore {
  constructor(private readonly store: DocumentStore) {}

  async read(userId: string, now: Date): Promise<LedgerSnapshot> {
    const doc = await this.store.get(userPath(userId));
    return this.toSnapshot(userId, doc, now);
  }

  /** Conditional write of the ledger fields; false when someone else wrote first. */
  async commit(userId: string, state: UserXPState, expectedVersion: number): Promise<boolean> {
    return this.store.updateIfVersion(userPath(userId), encodeLedger(state), expectedVersion);
  }

  /** Creates the zero ledger unless a document is already there. */
  async initialize(userId: string, now: Date): Promise<boolean> {
    return this.store.updateIfVersion(userPath(userId), { displayName: '', ...encodeLedger(zeroState(now)) }, 0);
  }

  /**
   * Writes the entry unless the stored one already carries at least as much
   * XP. `conflict` means another writer got in between the read and the write.
   */
  async writeEntry(entry: LeaderboardEntry): Promise<EntryWrite> {
    const path = leaderboardPath(entry.periodKey, entry.userId);
    const doc = await this.store.get(path);
    if (doc && decodeEntry(doc).currentXP >= entry.currentXP) return 'stale';
    const written = await this.store.updateIfVersion(path, encodeEntry(entry), doc ? doc.version : 0);
    return written ? 'written' : 'conflict';
  }

  async entriesForPeriod(periodKey: string, limit: number): Promise<LeaderboardEntry[]> {
    // same order as the ranker, so a tie at the cut-off keeps whoever got there first
    const docs = await this.store.query(LEADERBOARD, [{ field: 'monthYear', op: '==', value: periodKey }], {
      orderBy: [
        { field: 'xp', direction: 'desc' },
        { field: 'lastUpdated', direction: 'asc' },
        { field: DOCUMENT_ID, direction: 'asc' },
      ],
      limit,
    });
    return docs.map(decodeEntry);
  }

  async entriesForIds(periodKey: string, userIds: readonly string[]): Promise<LeaderboardEntry[]> {
    if (userIds.length === 0) return [];
    if (userIds.length > MAX_IN_VALUES) {
      throw new StoreQueryError(`At most ${MAX_IN_VALUES} users per lookup, got ${userIds.length}`);
    }
    const ids = userIds.map((userId) => leaderboardId(periodKey, userId));
    const docs = await this.store.query(LEADERBOARD, [{ field: DOCUMENT_ID, op: 'in', value: ids }]);
    return docs.map(decodeEntry);
  }

  watch(
    userId: string,
    clock: () => Date,
    onSnapshot: (snapshot: LedgerSnapshot) => void,
    onError: (error: Error) => void,
  ): SubscriptionHandle {
    return this.store.subscribe(
      userPath(userId),
      (doc) => {
        let snapshot: LedgerSnapshot;
        try {
          snapshot = this.toSnapshot(userId, doc, clock());
        } catch (error) {
          onError(error instanceof Error ? error : new Error(describeError(error)));
          return;
        }
        onSnapshot(snapshot);
      },
      onError,
    );
  }

  private toSnapshot(userId: string, doc: StoredDocument | null, now: Date): LedgerSnapshot {
    if (!doc) {
      return { userId, state: zeroState(now), profile: EMPTY_PROFILE, version: 0, exists: false, repaired: false };
    }
    const { state, profile, repaired } = decodeLedger(doc, now);
    if (repaired) {
      console.warn(`🩹 Ledger ${doc.path}: stored level disagreed with ${state.currentXP} XP, recomputed as ${state.level}`);
    }
    return { userId, state, profile, version: doc.version, exists: true, repaired };
  }
}
