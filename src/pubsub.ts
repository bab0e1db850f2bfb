import { PubSub } from 'graphql-subscriptions';

export const pubsub = new PubSub();

export const topics = {
  levelUp: (userId: string) => `LEVEL_UP_${userId}`,
  xpGained: (userId: string) => `XP_GAINED_${userId}`,
  awardOutcome: (userId: string) => `AWARD_OUTCOME_${userId}`,
  milestone: (userId: string) => `MILESTONE_${userId}`,
  xpState: (userId: string) => `XP_STATE_${userId}`,
  leaderboardUpdated: (periodKey: string) => `LEADERBOARD_UPDATE_${periodKey}`,
};
