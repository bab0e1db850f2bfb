import { SubscriptionHandle } from '../store/types';
import { XPSessionContext } from './context';
import { describeError } from './errors';
import { LedgerSnapshot } from './ledger';
import { withRetry } from './retry';
import { UserXPState, zeroState } from './types';

export type SyncStatus = 'unsubscribed' | 'subscribed';

const freeze = (state: UserXPState): UserXPState =>
  Object.freeze({ ...state, history: Object.freeze(state.history.map((event) => Object.freeze({ ...event }))) });

/**
 * Mirrors one user's ledger document. Every notification replaces the local
 * state wholesale, so the last write to reach the document wins locally too.
 */
export class LiveSyncController {
  private handle: SubscriptionHandle | null = null;
  private state: UserXPState;
  private initializing: Promise<void> | null = null;
  private lastError: Error | null = null;

  constructor(private readonly ctx: XPSessionContext) {
    this.state = freeze(zeroState(ctx.clock()));
  }

  get status(): SyncStatus {
    return this.handle ? 'subscribed' : 'unsubscribed';
  }

  get error(): Error | null {
    return this.lastError;
  }

  current(): UserXPState {
    return this.state;
  }

  start() {
    if (this.handle) return;
    this.handle = this.ctx.ledger.watch(
      this.ctx.userId,
      this.ctx.clock,
      (snapshot) => this.apply(snapshot),
      (error) => {
        this.lastError = error;
        console.error(`❌ XP listener for ${this.ctx.userId}:`, error.message);
      },
    );
  }

  stop() {
    if (!this.handle) return;
    this.handle.unsubscribe();
    this.handle = null;
  }

  /** Snapshots published after this call, until the iterator is returned. */
  snapshots(): AsyncIterableIterator<UserXPState> {
    const source = this.ctx.signals.iterate('xpState', this.ctx.userId);
    const next = async (): Promise<IteratorResult<UserXPState>> => {
      const step = await source.next();
      return step.done ? { done: true, value: undefined } : { done: false, value: step.value.state };
    };
    return {
      next,
      return: async () => {
        await source.return?.();
        return { done: true, value: undefined };
      },
      [Symbol.asyncIterator]() {
        return this;
      },
    };
  }

  /**
   * Takes a state this process just committed. A later notification from the
   * store replaces it like any other snapshot.
   */
  adopt(state: UserXPState) {
    this.state = freeze(state);
    this.publish();
  }

  /** Resolves once a running zero-state initialisation (if any) has finished. */
  async idle(): Promise<void> {
    await this.initializing;
  }

  private apply(snapshot: LedgerSnapshot) {
    if (!this.handle) return;
    if (!snapshot.exists) {
      this.initialize();
      return;
    }
    this.lastError = null;
    this.state = freeze(snapshot.state);
    this.publish();
  }

  private publish() {
    this.ctx.signals
      .publish('xpState', this.ctx.userId, { userId: this.ctx.userId, state: this.state })
      .catch((error: unknown) => console.error('❌ Publishing XP state failed:', describeError(error)));
  }

  private initialize() {
    if (this.initializing) return;
    const { ledger, userId, clock, retry } = this.ctx;
    this.initializing = withRetry(() => ledger.initialize(userId, clock()), retry)
      .then((created) => {
        if (created) console.log(`🆕 Initialized XP ledger for ${userId}`);
      })
      .catch((error: unknown) => {
        this.lastError = error instanceof Error ? error : new Error(describeError(error));
        console.error(`❌ Initializing XP for ${userId} failed:`, describeError(error));
      })
      .finally(() => {
        this.initializing = null;
      });
  }
}
