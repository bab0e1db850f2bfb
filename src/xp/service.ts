import { v4 as uuidv4 } from 'uuid';
import { DocumentStore } from '../store/types';
import { DEFAULT_ENGINE_OPTIONS, XPEngineOptions } from './context';
import { describeError, isXPError } from './errors';
import { LedgerStore } from './ledger';
import { LeaderboardRanker } from './ranker';
import { ProjectionReconciler } from './reconciler';
import { withRetry } from './retry';
import { XPSession } from './session';
import { XPSignals } from './signals';
import { AwardInput, AwardResult, Clock, RankedEntry, UserXPState, systemClock, zeroState } from './types';

export interface XPServiceDeps {
  store: DocumentStore;
  signals?: XPSignals;
  clock?: Clock;
  options?: Partial<XPEngineOptions>;
}

export type AwardOptions = Pick<AwardInput, 'subjectRef' | 'details' | 'eventId' | 'signal'>;

/**
 * Entry point for UI and social collaborators. Holds one session per user
 * instead of ambient singletons; `close()` tears every subscription down.
 */
export class XPService {
  readonly ledger: LedgerStore;
  readonly reconciler: ProjectionReconciler;
  readonly ranker: LeaderboardRanker;
  readonly signals: XPSignals;
  readonly clock: Clock;
  private readonly options: XPEngineOptions;
  private sessions = new Map<string, XPSession>();
  private idleTimers = new Map<string, NodeJS.Timeout>();

  constructor(deps: XPServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.signals = deps.signals ?? new XPSignals();
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...deps.options };
    this.ledger = new LedgerStore(deps.store);
    this.reconciler = new ProjectionReconciler(this.ledger, this.clock);
    this.ranker = new LeaderboardRanker(this.ledger);
  }

  get sessionCount() {
    return this.sessions.size;
  }

  session(userId: string): XPSession {
    let session = this.sessions.get(userId);
    if (!session) {
      session = new XPSession(
        {
          ...this.options,
          userId,
          ledger: this.ledger,
          signals: this.signals,
          reconciler: this.reconciler,
          clock: this.clock,
        },
        (idle) => this.scheduleEviction(idle),
      );
      this.sessions.set(userId, session);
      this.scheduleEviction(session);
    }
    return session;
  }

  /** Keeps the user's live sync running until the returned release is called. */
  watch(userId: string): () => void {
    return this.session(userId).acquire();
  }

  endSession(userId: string) {
    this.clearIdleTimer(userId);
    this.sessions.get(userId)?.close();
    this.sessions.delete(userId);
  }

  award(userId: string, input: AwardInput): Promise<AwardResult> {
    return this.session(userId).award(input);
  }

  /**
   * Fire-and-forget award. The returned event id identifies the outcome on the
   * `awardOutcome` signal and can be passed back as `eventId` to retry safely.
   */
  awardXP(userId: string, amount: number, eventKind: string, options: AwardOptions = {}): string {
    const eventId = options.eventId ?? uuidv4();
    const base = { userId, eventId, amount, eventKind };

    this.award(userId, { ...options, amount, eventKind, eventId })
      .then((result) =>
        this.signals.publish('awardOutcome', userId, {
          ...base,
          recorded: true,
          duplicate: result.duplicate,
          currentXP: result.currentXP,
        }),
      )
      .catch((error: unknown) => {
        console.error(`❌ Award ${eventId} for ${userId} failed:`, describeError(error));
        return this.signals.publish('awardOutcome', userId, {
          ...base,
          recorded: false,
          code: isXPError(error) ? error.code : 'INTERNAL',
          message: describeError(error),
        });
      })
      .catch((error: unknown) => console.error('❌ Publishing award outcome failed:', describeError(error)));

    return eventId;
  }

  /** Last snapshot the user's live sync saw; zero state before the first one. */
  currentState(userId: string): UserXPState {
    return this.sessions.get(userId)?.current() ?? zeroState(this.clock());
  }

  async fetchState(userId: string): Promise<UserXPState> {
    const snapshot = await withRetry(() => this.ledger.read(userId, this.clock()), this.options.retry);
    return snapshot.state;
  }

  globalLeaderboard(periodKey: string, limit: number): Promise<RankedEntry[]> {
    return withRetry(() => this.ranker.rank(periodKey, { kind: 'global', limit }), this.options.retry);
  }

  friendsLeaderboard(periodKey: string, friendIds: readonly string[]): Promise<RankedEntry[]> {
    return withRetry(() => this.ranker.rank(periodKey, { kind: 'friends', userIds: friendIds }), this.options.retry);
  }

  async close(): Promise<void> {
    for (const userId of [...this.idleTimers.keys()]) this.clearIdleTimer(userId);
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    this.reconciler.stop();
    for (const session of sessions) session.close();
    await Promise.all(sessions.map((session) => session.drain()));
  }

  /** Drops the session once it has stayed idle for `sessionIdleMs`; any activity in between keeps it. */
  private scheduleEviction(session: XPSession) {
    const { userId } = session;
    this.clearIdleTimer(userId);
    const timer = setTimeout(() => {
      this.idleTimers.delete(userId);
      if (this.sessions.get(userId) === session && session.idle) this.endSession(userId);
    }, this.options.sessionIdleMs);
    timer.unref();
    this.idleTimers.set(userId, timer);
  }

  private clearIdleTimer(userId: string) {
    const timer = this.idleTimers.get(userId);
    if (timer) clearTimeout(timer);
    this.idleTimers.delete(userId);
  }
}
