import { v4 as uuidv4 } from 'uuid';
import { userPath } from '../store/paths';
import { XPSessionContext } from './context';
import { AwardCancelledError, ConflictError, PreconditionError, describeError } from './errors';
import { LedgerSnapshot, projectEntry } from './ledger';
import { levelFor } from './level';
import { detectMilestones } from './rewards';
import { withRetry } from './retry';
import { AwardInput, AwardResult, UserXPState, XPEvent } from './types';
import { periodKeyFor, weeklyXP } from './window';

type Attempt =
  | { status: 'committed'; before: LedgerSnapshot; after: UserXPState; event: XPEvent }
  | { status: 'duplicate'; before: LedgerSnapshot }
  | { status: 'conflict' };

export const validateAward = (input: AwardInput) => {
  if (!Number.isInteger(input.amount) || input.amount <= 0) {
    throw new PreconditionError(`XP amount must be a positive integer, got ${input.amount}`, 'amount');
  }
  if (!input.eventKind.trim()) {
    throw new PreconditionError('Event kind cannot be empty', 'eventKind');
  }
  if (input.eventId !== undefined && !input.eventId.trim()) {
    throw new PreconditionError('Event id cannot be empty', 'eventId');
  }
};

export const appendEvent = (state: UserXPState, event: XPEvent, now: Date): UserXPState => {
  const history = [event, ...state.history];
  const currentXP = state.currentXP + event.xpAmount;
  return {
    currentXP,
    level: levelFor(currentXP),
    history,
    weeklyXP: weeklyXP(history, now),
    lastUpdate: now,
  };
};

/**
 * The write path. Ledger read, append and write form one compare-and-set
 * loop; the leaderboard projection and the signals follow the commit.
 */
export class AwardCoordinator {
  constructor(
    private readonly ctx: XPSessionContext,
    /** Receives the ledger state the award read or wrote, as soon as it is known. */
    private readonly onLedgerState: (state: UserXPState) => void = () => undefined,
  ) {}

  async award(input: AwardInput): Promise<AwardResult> {
    validateAward(input);
    const eventId = input.eventId ?? uuidv4();
    const outcome = await this.commit(eventId, input);

    if (outcome.status === 'duplicate') {
      const { state } = outcome.before;
      this.onLedgerState(state);
      return this.result(eventId, input, state, state, periodKeyFor(this.ctx.clock()), true, 'synced');
    }

    const { before, after, event } = outcome;
    this.onLedgerState(after);
    const periodKey = periodKeyFor(event.timestamp);
    const projection = await this.project({ ...before, state: after }, periodKey, event.timestamp);
    const result = this.result(eventId, input, before.state, after, periodKey, false, projection);

    console.log(`✅ ${this.ctx.userId} +${input.amount} XP for ${input.eventKind} (${after.currentXP} XP, level ${after.level})`);
    await this.announce(result, before.state, after);
    return result;
  }

  private async commit(eventId: string, input: AwardInput): Promise<Attempt & { status: 'committed' | 'duplicate' }> {
    const { maxConflictRetries, retry } = this.ctx;
    // a write that failed ambiguously may still have landed; the next read finds it by id
    let prepared: { after: UserXPState; event: XPEvent } | null = null;

    for (let conflicts = 0; ; conflicts++) {
      const outcome = await withRetry(async () => {
        if (!prepared) this.ensureNotAborted(input, eventId);
        const before = await this.ctx.ledger.read(this.ctx.userId, this.ctx.clock());

        if (before.state.history.some((event) => event.id === eventId)) {
          if (prepared && prepared.event.id === eventId) {
            return { status: 'committed', before: { ...before, state: this.previous(before.state, prepared.event) }, ...prepared } as const;
          }
          return { status: 'duplicate', before } as const;
        }

        this.ensureNotAborted(input, eventId);
        const now = this.ctx.clock();
        const event: XPEvent = {
          id: eventId,
          eventKind: input.eventKind,
          xpAmount: input.amount,
          timestamp: now,
          ...(input.subjectRef ? { subjectRef: input.subjectRef } : {}),
          ...(input.details ? { details: input.details } : {}),
        };
        const after = appendEvent(before.state, event, now);
        prepared = { after, event };

        const committed = await this.ctx.ledger.commit(this.ctx.userId, after, before.version);
        return committed ? ({ status: 'committed', before, after, event } as const) : ({ status: 'conflict' } as const);
      }, retry);

      if (outcome.status !== 'conflict') return outcome;
      prepared = null;
      if (conflicts >= maxConflictRetries) throw new ConflictError(userPath(this.ctx.userId), conflicts + 1);
      console.warn(`⚔️ ${userPath(this.ctx.userId)} changed underneath award ${eventId}, re-reading`);
    }
  }

  private previous(state: UserXPState, event: XPEvent): UserXPState {
    const currentXP = state.currentXP - event.xpAmount;
    const history = state.history.filter((item) => item.id !== event.id);
    return { ...state, currentXP, level: levelFor(currentXP), history, weeklyXP: weeklyXP(history, event.timestamp) };
  }

  private ensureNotAborted(input: AwardInput, eventId: string) {
    if (input.signal?.aborted) throw new AwardCancelledError(eventId);
  }

  private async project(snapshot: LedgerSnapshot, periodKey: string, now: Date): Promise<AwardResult['projection']> {
    const { ledger, reconciler, retry, userId } = this.ctx;
    try {
      const outcome = await withRetry(() => ledger.writeEntry(projectEntry(snapshot, periodKey, now)), retry);
      if (outcome === 'conflict') {
        reconciler.enqueue(userId, periodKey, 'leaderboard entry changed during the write');
        return 'pending';
      }
      reconciler.settle(userId, periodKey);
      return 'synced';
    } catch (error) {
      reconciler.enqueue(userId, periodKey, describeError(error));
      return 'pending';
    }
  }

  private async announce(result: AwardResult, before: UserXPState, after: UserXPState) {
    const { signals, userId } = this.ctx;
    try {
      if (result.leveledUp) {
        console.log(`🎉 ${userId} reached level ${result.level}`);
        await signals.publish('levelUp', userId, { userId, newLevel: result.level });
      }
      await signals.publish('xpGained', userId, {
        userId,
        amount: result.amount,
        eventKind: result.eventKind,
        eventId: result.eventId,
      });
      for (const milestone of detectMilestones(before, after)) {
        await signals.publish('milestone', userId, { userId, ...milestone });
      }
      await signals.publish('leaderboardUpdated', result.periodKey, { periodKey: result.periodKey, userId });
    } catch (error) {
      console.error(`❌ Signals for award ${result.eventId} failed:`, describeError(error));
    }
  }

  private result(
    eventId: string,
    input: AwardInput,
    before: UserXPState,
    after: UserXPState,
    periodKey: string,
    duplicate: boolean,
    projection: AwardResult['projection'],
  ): AwardResult {
    return {
      eventId,
      userId: this.ctx.userId,
      amount: input.amount,
      eventKind: input.eventKind,
      previousXP: before.currentXP,
      currentXP: after.currentXP,
      previousLevel: before.level,
      level: after.level,
      leveledUp: after.level > before.level,
      weeklyXP: after.weeklyXP,
      periodKey,
      duplicate,
      projection,
    };
  }
}
