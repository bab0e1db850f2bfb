import { PreconditionError } from './errors';
import { XPEvent } from './types';

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const PERIOD_KEY = /^\d{4}-(0[1-9]|1[0-2])$/;

/** Sum of amounts strictly inside the trailing seven days; an event exactly a week old has aged out. */
export const weeklyXP = (history: readonly XPEvent[], now: Date): number => {
  const cutoff = now.getTime() - WEEK_MS;
  return history
    .filter((event) => event.timestamp.getTime() > cutoff)
    .reduce((sum, event) => sum + event.xpAmount, 0);
};

/**
 * Leaderboard segment for an instant, always in UTC so that every client
 * files the same award under the same month.
 */
export const periodKeyFor = (now: Date): string => now.toISOString().slice(0, 7);

export const assertPeriodKey = (key: string): string => {
  if (!PERIOD_KEY.test(key)) {
    throw new PreconditionError(`Period key must look like YYYY-MM, got "${key}"`, 'periodKey');
  }
  return key;
};

export const monthlyXP = (history: readonly XPEvent[], periodKey: string): number =>
  history
    .filter((event) => periodKeyFor(event.timestamp) === periodKey)
    .reduce((sum, event) => sum + event.xpAmount, 0);

export const recentEvents = (history: readonly XPEvent[], count = 10): XPEvent[] =>
  [...history]
    .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
    .slice(0, count);
