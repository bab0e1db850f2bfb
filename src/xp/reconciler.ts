import { describeError } from './errors';
import { LedgerStore, projectEntry } from './ledger';
import { Clock, systemClock } from './types';

export interface DriftRecord {
  userId: string;
  periodKey: string;
  cause: string;
  attempts: number;
  since: Date;
}

export interface ReconcileReport {
  repaired: number;
  failed: number;
  pending: number;
}

const key = (userId: string, periodKey: string) => `${periodKey}_${userId}`;

/**
 * Leaderboard entries whose write failed after the ledger committed. Each pass
 * rebuilds them from the ledger; an entry that fails again stays queued.
 */
export class ProjectionReconciler {
  private pending = new Map<string, DriftRecord>();
  private running: Promise<ReconcileReport> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly ledger: LedgerStore,
    private readonly clock: Clock = systemClock,
  ) {}

  get size() {
    return this.pending.size;
  }

  drift(): DriftRecord[] {
    return [...this.pending.values()].map((record) => ({ ...record }));
  }

  enqueue(userId: string, periodKey: string, cause: string) {
    const existing = this.pending.get(key(userId, periodKey));
    if (existing) {
      existing.cause = cause;
      return;
    }
    this.pending.set(key(userId, periodKey), { userId, periodKey, cause, attempts: 0, since: this.clock() });
    console.warn(`⏳ Leaderboard ${key(userId, periodKey)} queued for reconciliation: ${cause}`);
  }

  /** A later write already brought the entry up to date. */
  settle(userId: string, periodKey: string) {
    this.pending.delete(key(userId, periodKey));
  }

  reconcile(): Promise<ReconcileReport> {
    if (!this.running) {
      this.running = this.pass().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  start(intervalMs: number) {
    if (intervalMs <= 0 || this.timer) return;
    this.timer = setInterval(() => {
      if (this.pending.size === 0) return;
      this.reconcile().catch((error: unknown) => console.error('❌ Reconciliation pass failed:', describeError(error)));
    }, intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  private async pass(): Promise<ReconcileReport> {
    let repaired = 0;
    let failed = 0;

    for (const [id, record] of [...this.pending]) {
      try {
        const now = this.clock();
        const snapshot = await this.ledger.read(record.userId, now);
        // XP only grows, so an entry at or above the ledger is already newer than this repair
        const outcome = await this.ledger.writeEntry(projectEntry(snapshot, record.periodKey, now));
        if (outcome === 'conflict') throw new Error('entry changed during the write');
        this.pending.delete(id);
        repaired++;
      } catch (error) {
        record.attempts++;
        failed++;
        console.error(`❌ Reconciling ${id} failed (attempt ${record.attempts}):`, describeError(error));
      }
    }

    if (repaired > 0) console.log(`🔧 Reconciled ${repaired} leaderboard entr${repaired === 1 ? 'y' : 'ies'}`);
    return { repaired, failed, pending: this.pending.size };
  }
}
