import { GraphQLError } from 'graphql';
import { validateAward } from '../xp/award';
import { describeError, isXPError } from '../xp/errors';
import { progressToNextLevel, xpToNextLevel } from '../xp/level';
import { XP_REWARDS, missionCompletionAward, placeVisitAward } from '../xp/rewards';
import { XPService } from '../xp/service';
import {
  AwardOutcomeSignal,
  LevelUpSignal,
  MilestoneSignal,
  XPGainedSignal,
} from '../xp/signals';
import { RankedEntry, UserXPState, XPEvent } from '../xp/types';
import { assertPeriodKey, periodKeyFor, recentEvents } from '../xp/window';

export interface ResolverContext {
  xp: XPService;
  leaderboardLimit: number;
}

interface XPStatePayload {
  userId: string;
  state: UserXPState;
}

interface UserArgs {
  userId: string;
}

interface AwardArgs extends UserArgs {
  amount: number;
  eventKind: string;
  subjectRef?: string | null;
  details?: string | null;
  eventId?: string | null;
}

interface VisitArgs extends UserArgs {
  placeId: string;
  placeName: string;
  firstVisit?: boolean | null;
}

interface MissionArgs extends UserArgs {
  missionId: string;
  title: string;
  xpReward: number;
}

const toGraphQLError = (error: unknown): GraphQLError => {
  if (error instanceof GraphQLError) return error;
  if (isXPError(error)) return new GraphQLError(error.message, { extensions: { code: error.code } });
  console.error('❌ Unexpected resolver error:', describeError(error));
  return new GraphQLError('Internal server error', { extensions: { code: 'INTERNAL_SERVER_ERROR' } });
};

const guarded = async <T>(work: () => T | Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    throw toGraphQLError(error);
  }
};

const periodOf = (xp: XPService, periodKey?: string | null) =>
  periodKey ? assertPeriodKey(periodKey) : periodKeyFor(xp.clock());

const toEvent = (event: XPEvent) => ({
  id: event.id,
  eventKind: event.eventKind,
  xpAmount: event.xpAmount,
  timestamp: event.timestamp.toISOString(),
  subjectRef: event.subjectRef ?? null,
  details: event.details ?? null,
});

const toLeaderboardEntry = ({ rank, entry }: RankedEntry) => ({
  rank,
  userId: entry.userId,
  displayName: entry.displayName,
  currentXP: entry.currentXP,
  level: entry.level,
  avatarRef: entry.avatarRef ?? null,
  lastUpdated: entry.lastUpdated.toISOString(),
  periodKey: entry.periodKey,
});

/** Runs `teardown` once the client stops listening, whichever way it stops. */
const withTeardown = <T>(source: AsyncIterableIterator<T>, teardown: () => void): AsyncIterableIterator<T> => {
  let finished = false;
  const finish = () => {
    if (finished) return;
    finished = true;
    teardown();
  };
  return {
    next: () => source.next(),
    return: async (value?: unknown) => {
      finish();
      return source.return ? source.return(value) : { done: true, value: undefined };
    },
    throw: async (error?: unknown) => {
      finish();
      if (source.throw) return source.throw(error);
      throw error;
    },
    [Symbol.asyncIterator]() {
      return this;
    },
  };
};

export const resolvers = {
  Query: {
    xpState: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext): Promise<XPStatePayload> =>
      guarded(async () => ({ userId, state: await xp.fetchState(userId) })),

    globalLeaderboard: (
      _: unknown,
      { periodKey, limit }: { periodKey?: string | null; limit?: number | null },
      { xp, leaderboardLimit }: ResolverContext,
    ) =>
      guarded(async () => {
        const ranking = await xp.globalLeaderboard(periodOf(xp, periodKey), limit ?? leaderboardLimit);
        return ranking.map(toLeaderboardEntry);
      }),

    friendsLeaderboard: (
      _: unknown,
      { periodKey, friendIds }: { periodKey?: string | null; friendIds: string[] },
      { xp }: ResolverContext,
    ) =>
      guarded(async () => {
        const ranking = await xp.friendsLeaderboard(periodOf(xp, periodKey), friendIds);
        return ranking.map(toLeaderboardEntry);
      }),

    currentPeriod: (_: unknown, __: unknown, { xp }: ResolverContext) => periodKeyFor(xp.clock()),

    xpRewards: () => Object.entries(XP_REWARDS).map(([name, amount]) => ({ name, amount })),
  },

  Mutation: {
    awardXP: (_: unknown, args: AwardArgs, { xp }: ResolverContext) =>
      guarded(() => {
        const input = {
          amount: args.amount,
          eventKind: args.eventKind.trim(),
          ...(args.subjectRef ? { subjectRef: args.subjectRef } : {}),
          ...(args.details ? { details: args.details } : {}),
          ...(args.eventId ? { eventId: args.eventId } : {}),
        };
        validateAward(input);
        const { amount, eventKind, ...options } = input;
        return { eventId: xp.awardXP(args.userId, amount, eventKind, options) };
      }),

    visitPlace: (_: unknown, { userId, placeId, placeName, firstVisit }: VisitArgs, { xp }: ResolverContext) =>
      guarded(() => {
        const { amount, eventKind, ...options } = placeVisitAward(placeId, placeName.trim(), firstVisit ?? false);
        return { eventId: xp.awardXP(userId, amount, eventKind, options) };
      }),

    completeMission: (_: unknown, { userId, missionId, title, xpReward }: MissionArgs, { xp }: ResolverContext) =>
      guarded(() => {
        const award = missionCompletionAward({ id: missionId, title: title.trim(), xpReward });
        validateAward(award);
        const { amount, eventKind, ...options } = award;
        return { eventId: xp.awardXP(userId, amount, eventKind, options) };
      }),

    reconcileLeaderboard: (_: unknown, __: unknown, { xp }: ResolverContext) => guarded(() => xp.reconciler.reconcile()),
  },

  Subscription: {
    levelUp: {
      subscribe: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext) => xp.signals.iterate('levelUp', userId),
      resolve: (payload: LevelUpSignal) => payload,
    },
    xpGained: {
      subscribe: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext) => xp.signals.iterate('xpGained', userId),
      resolve: (payload: XPGainedSignal) => payload,
    },
    awardOutcome: {
      subscribe: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext) =>
        xp.signals.iterate('awardOutcome', userId),
      resolve: (payload: AwardOutcomeSignal) => payload,
    },
    milestoneReached: {
      subscribe: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext) => xp.signals.iterate('milestone', userId),
      resolve: (payload: MilestoneSignal) => payload,
    },
    xpState: {
      // keeps the user's ledger listener alive for as long as this client listens
      subscribe: (_: unknown, { userId }: UserArgs, { xp }: ResolverContext) => {
        const release = xp.watch(userId);
        return withTeardown(xp.session(userId).sync.snapshots(), release);
      },
      resolve: (state: UserXPState, { userId }: UserArgs): XPStatePayload => ({ userId, state }),
    },
    leaderboardUpdated: {
      subscribe: (_: unknown, { periodKey }: { periodKey?: string | null }, { xp }: ResolverContext) =>
        guarded(() => xp.signals.iterate('leaderboardUpdated', periodOf(xp, periodKey))),
      resolve: () => true, // триггер для refetch
    },
  },

  XPState: {
    currentXP: ({ state }: XPStatePayload) => state.currentXP,
    level: ({ state }: XPStatePayload) => state.level,
    xpToNextLevel: ({ state }: XPStatePayload) => xpToNextLevel(state.currentXP, state.level),
    progressToNextLevel: ({ state }: XPStatePayload) => progressToNextLevel(state.currentXP, state.level),
    weeklyXP: ({ state }: XPStatePayload) => state.weeklyXP,
    lastUpdate: ({ state }: XPStatePayload) => state.lastUpdate.toISOString(),
    history: ({ state }: XPStatePayload, { limit }: { limit?: number | null }) =>
      recentEvents(state.history, limit ?? state.history.length).map(toEvent),
  },
};
