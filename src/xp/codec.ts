import { z } from 'zod';
import { DocumentFields, StoredDocument } from '../store/types';
import { CorruptDocumentError } from './errors';
import { levelFor } from './level';
import { LeaderboardEntry, UserProfile, UserXPState, XPEvent } from './types';
import { weeklyXP } from './window';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

const xpEventDoc = z.object({
  id: z.string().min(1),
  event: z.string(),
  xp: z.number().int(),
  timestamp: z.coerce.date(),
  subjectRef: optionalText,
  details: optionalText,
});

const ledgerDoc = z.object({
  displayName: z.string().nullish(),
  avatar: optionalText,
  xp: z.number().int().nonnegative().default(0),
  level: z.number().int().nullish(),
  xpHistory: z.array(xpEventDoc).default([]),
  lastXPUpdate: z.coerce.date().nullish(),
});

const leaderboardDoc = z.object({
  userId: z.string().min(1),
  displayName: z.string().nullish(),
  xp: z.number().int().nonnegative(),
  level: z.number().int().nullish(),
  avatarURL: optionalText,
  lastUpdated: z.coerce.date(),
  monthYear: z.string(),
});

export interface DecodedLedger {
  state: UserXPState;
  profile: UserProfile;
  /** The stored level disagreed with the stored XP and was recomputed. */
  repaired: boolean;
}

const issues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const byNewest = (a: XPEvent, b: XPEvent) => b.timestamp.getTime() - a.timestamp.getTime();

/**
 * Reads a `users/{id}` document. XP and history are trusted; level and the
 * weekly total are always derived again.
 */
export const decodeLedger = (doc: StoredDocument, now: Date): DecodedLedger => {
  const parsed = ledgerDoc.safeParse(doc.fields);
  if (!parsed.success) throw new CorruptDocumentError(doc.path, issues(parsed.error));

  const { xp, level: storedLevel, xpHistory, lastXPUpdate, displayName, avatar } = parsed.data;
  const history: XPEvent[] = xpHistory
    .map((event) => ({
      id: event.id,
      eventKind: event.event,
      xpAmount: event.xp,
      timestamp: event.timestamp,
      ...(event.subjectRef ? { subjectRef: event.subjectRef } : {}),
      ...(event.details ? { details: event.details } : {}),
    }))
    .sort(byNewest);
  const level = levelFor(xp);

  return {
    state: {
      currentXP: xp,
      level,
      history,
      weeklyXP: weeklyXP(history, now),
      lastUpdate: lastXPUpdate ?? now,
    },
    profile: {
      displayName: displayName ?? '',
      ...(avatar ? { avatarRef: avatar } : {}),
    },
    repaired: storedLevel !== null && storedLevel !== undefined && storedLevel !== level,
  };
};

const encodeEvent = (event: XPEvent): DocumentFields => ({
  id: event.id,
  event: event.eventKind,
  xp: event.xpAmount,
  timestamp: event.timestamp,
  ...(event.subjectRef ? { subjectRef: event.subjectRef } : {}),
  ...(event.details ? { details: event.details } : {}),
});

/** Only the ledger's own fields; the profile belongs to other writers. */
export const encodeLedger = (state: UserXPState): DocumentFields => ({
  xp: state.currentXP,
  level: state.level,
  xpHistory: state.history.map(encodeEvent),
  weeklyXP: state.weeklyXP,
  lastXPUpdate: state.lastUpdate,
});

export const decodeEntry = (doc: StoredDocument): LeaderboardEntry => {
  const parsed = leaderboardDoc.safeParse(doc.fields);
  if (!parsed.success) throw new CorruptDocumentError(doc.path, issues(parsed.error));

  const { userId, displayName, xp, avatarURL, lastUpdated, monthYear } = parsed.data;
  return {
    userId,
    displayName: displayName ?? '',
    currentXP: xp,
    level: levelFor(xp),
    ...(avatarURL ? { avatarRef: avatarURL } : {}),
    lastUpdated,
    periodKey: monthYear,
  };
};

export const encodeEntry = (entry: LeaderboardEntry): DocumentFields => ({
  userId: entry.userId,
  displayName: entry.displayName,
  xp: entry.currentXP,
  level: entry.level,
  ...(entry.avatarRef ? { avatarURL: entry.avatarRef } : {}),
  lastUpdated: entry.lastUpdated,
  monthYear: entry.periodKey,
});
