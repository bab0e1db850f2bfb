import { LedgerStore } from './ledger';
import { ProjectionReconciler } from './reconciler';
import { DEFAULT_RETRY, RetryOptions } from './retry';
import { XPSignals } from './signals';
import { Clock } from './types';

export interface XPEngineOptions {
  retry: RetryOptions;
  /** Re-reads allowed after losing a compare-and-set race. */
  maxConflictRetries: number;
  /** How long a session with no watchers and no queued awards is kept; 0 drops it at once. */
  sessionIdleMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: XPEngineOptions = {
  retry: DEFAULT_RETRY,
  maxConflictRetries: 5,
  sessionIdleMs: 60_000,
};

/** Everything one user's coordinator and live sync share, passed in explicitly. */
export interface XPSessionContext extends XPEngineOptions {
  userId: string;
  ledger: LedgerStore;
  signals: XPSignals;
  reconciler: ProjectionReconciler;
  clock: Clock;
}
