import { AwardInput } from './types';

export const XP_REWARDS = {
  visitPlace: 50,
  completeMission: 200,
  addReview: 30,
  sharePlace: 25,
  checkIn: 15,
  firstVisit: 75,
  weeklyStreak: 100,
  monthlyBonus: 500,
} as const;

export type RewardName = keyof typeof XP_REWARDS;

export const XP_MILESTONES = [100, 500, 1000, 2500, 5000, 10000] as const;
export const WEEKLY_MILESTONE = 1000;
export const LEVEL_MILESTONE_STEP = 5;

export type MilestoneKind = 'level' | 'xp' | 'weekly';

export interface Milestone {
  kind: MilestoneKind;
  value: number;
}

export interface ProgressPoint {
  currentXP: number;
  level: number;
  weeklyXP: number;
}

export interface MissionRef {
  id: string;
  title: string;
  xpReward: number;
}

export const rewardAward = (name: RewardName, details?: string): AwardInput => ({
  amount: XP_REWARDS[name],
  eventKind: name,
  ...(details ? { details } : {}),
});

export const placeVisitAward = (placeId: string, placeName: string, isFirstVisit = false): AwardInput => ({
  amount: isFirstVisit ? XP_REWARDS.firstVisit : XP_REWARDS.visitPlace,
  eventKind: isFirstVisit ? 'first-visit' : 'visit',
  subjectRef: placeId,
  details: placeName,
});

export const missionCompletionAward = (mission: MissionRef): AwardInput => ({
  amount: mission.xpReward > 0 ? mission.xpReward : XP_REWARDS.completeMission,
  eventKind: 'mission-complete',
  subjectRef: mission.id,
  details: mission.title,
});

/** Milestones crossed going from `before` to `after`; ones already behind `before` are not repeated. */
export const detectMilestones = (before: ProgressPoint, after: ProgressPoint): Milestone[] => {
  const reached: Milestone[] = [];

  for (let level = before.level + 1; level <= after.level; level++) {
    if (level % LEVEL_MILESTONE_STEP === 0) reached.push({ kind: 'level', value: level });
  }
  for (const mark of XP_MILESTONES) {
    if (before.currentXP < mark && after.currentXP >= mark) reached.push({ kind: 'xp', value: mark });
  }
  if (before.weeklyXP < WEEKLY_MILESTONE && after.weeklyXP >= WEEKLY_MILESTONE) {
    reached.push({ kind: 'weekly', value: WEEKLY_MILESTONE });
  }

  return reached;
};
