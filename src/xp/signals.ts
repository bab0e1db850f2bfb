import { PubSub } from 'graphql-subscriptions';
import { pubsub, topics } from '../pubsub';
import { XPErrorCode, describeError } from './errors';
import { MilestoneKind } from './rewards';
import { UserXPState } from './types';

export interface LevelUpSignal {
  userId: string;
  newLevel: number;
}

export interface XPGainedSignal {
  userId: string;
  amount: number;
  eventKind: string;
  eventId: string;
}

/** Tells the caller whether an award was recorded; a rejected award carries the error code. */
export interface AwardOutcomeSignal {
  userId: string;
  eventId: string;
  amount: number;
  eventKind: string;
  recorded: boolean;
  duplicate?: boolean;
  currentXP?: number;
  code?: XPErrorCode | 'INTERNAL';
  message?: string;
}

export interface MilestoneSignal {
  userId: string;
  kind: MilestoneKind;
  value: number;
}

export interface XPStateSignal {
  userId: string;
  state: UserXPState;
}

export interface LeaderboardUpdatedSignal {
  periodKey: string;
  userId: string;
}

export interface XPSignalMap {
  levelUp: LevelUpSignal;
  xpGained: XPGainedSignal;
  awardOutcome: AwardOutcomeSignal;
  milestone: MilestoneSignal;
  xpState: XPStateSignal;
  leaderboardUpdated: LeaderboardUpdatedSignal;
}

export type XPSignalName = keyof XPSignalMap;

/**
 * Discrete XP events for toast/animation collaborators and GraphQL
 * subscriptions. Topics are scoped per user (per period for the leaderboard).
 */
export class XPSignals {
  constructor(private readonly bus: PubSub = pubsub) {}

  publish<K extends XPSignalName>(name: K, key: string, payload: XPSignalMap[K]): Promise<void> {
    return this.bus.publish(topics[name](key), payload);
  }

  async on<K extends XPSignalName>(
    name: K,
    key: string,
    handler: (payload: XPSignalMap[K]) => void,
  ): Promise<() => void> {
    const id = await this.bus.subscribe(topics[name](key), (payload: XPSignalMap[K]) => {
      try {
        handler(payload);
      } catch (error) {
        console.error(`❌ ${name} handler failed:`, describeError(error));
      }
    });
    return () => this.bus.unsubscribe(id);
  }

  iterate<K extends XPSignalName>(name: K, key: string): AsyncIterableIterator<XPSignalMap[K]> {
    return this.bus.asyncIterableIterator<XPSignalMap[K]>(topics[name](key));
  }
}
