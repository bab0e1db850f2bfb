import { PubSub } from 'graphql-subscriptions';
import { DocumentStore } from '@/store/types';
import { XPSessionContext } from '@/xp/context';
import { LedgerStore } from '@/xp/ledger';
import { ProjectionReconciler } from '@/xp/reconciler';
import { XPSignals } from '@/xp/signals';
import { XPEvent } from '@/xp/types';

export const NO_WAIT_RETRY = { attempts: 3, baseDelayMs: 0 };

/** Lets queued microtasks (store notifications, chained promises) run. */
export const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

export const fixedClock = (iso: string) => {
  let now = new Date(iso);
  const clock = () => new Date(now.getTime());
  const set = (next: string) => {
    now = new Date(next);
  };
  return { clock, set };
};

export const sessionContext = (
  store: DocumentStore,
  userId: string,
  clock: () => Date,
  overrides: Partial<XPSessionContext> = {},
): XPSessionContext => {
  const ledger = new LedgerStore(store);
  return {
    userId,
    ledger,
    signals: new XPSignals(new PubSub()),
    reconciler: new ProjectionReconciler(ledger, clock),
    clock,
    retry: NO_WAIT_RETRY,
    maxConflictRetries: 5,
    sessionIdleMs: 60_000,
    ...overrides,
  };
};

export const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve: () => resolve() };
};

export const event = (id: string, xpAmount: number, timestamp: string, eventKind = 'visit'): XPEvent => ({
  id,
  eventKind,
  xpAmount,
  timestamp: new Date(timestamp),
});
