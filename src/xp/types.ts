export interface XPEvent {
  readonly id: string;
  readonly eventKind: string;
  readonly xpAmount: number;
  readonly timestamp: Date;
  readonly subjectRef?: string;
  readonly details?: string;
}

export interface UserXPState {
  readonly currentXP: number;
  readonly level: number;
  /** Newest first. */
  readonly history: readonly XPEvent[];
  readonly weeklyXP: number;
  readonly lastUpdate: Date;
}

export interface UserProfile {
  displayName: string;
  avatarRef?: string;
}

export interface LeaderboardEntry {
  userId: string;
  displayName: string;
  currentXP: number;
  level: number;
  avatarRef?: string;
  lastUpdated: Date;
  periodKey: string;
}

export interface RankedEntry {
  rank: number;
  entry: LeaderboardEntry;
}

export interface AwardInput {
  amount: number;
  eventKind: string;
  subjectRef?: string;
  details?: string;
  /** Reusing the id of an earlier award makes the call a no-op once that award has committed. */
  eventId?: string;
  signal?: AbortSignal;
}

export interface AwardResult {
  eventId: string;
  userId: string;
  amount: number;
  eventKind: string;
  previousXP: number;
  currentXP: number;
  previousLevel: number;
  level: number;
  leveledUp: boolean;
  weeklyXP: number;
  periodKey: string;
  duplicate: boolean;
  projection: 'synced' | 'pending';
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const zeroState = (now: Date): UserXPState => ({
  currentXP: 0,
  level: 1,
  history: [],
  weeklyXP: 0,
  lastUpdate: now,
});
