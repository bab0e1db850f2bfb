import { AwardCoordinator } from './award';
import { XPSessionContext } from './context';
import { LiveSyncController } from './sync';
import { AwardInput, AwardResult, UserXPState } from './types';

/**
 * One user's slice of the engine: awards run strictly in call order and the
 * live sync subscription stays open while at least one lease is held.
 */
export class XPSession {
  readonly coordinator: AwardCoordinator;
  readonly sync: LiveSyncController;
  private queue: Promise<unknown> = Promise.resolve();
  private leases = 0;
  private inFlight = 0;

  constructor(
    readonly ctx: XPSessionContext,
    /** Called whenever the session is left with no leases and no queued awards. */
    private readonly onIdle: (session: XPSession) => void = () => undefined,
  ) {
    this.sync = new LiveSyncController(ctx);
    this.coordinator = new AwardCoordinator(ctx, (state) => this.sync.adopt(state));
  }

  get userId() {
    return this.ctx.userId;
  }

  get watchers() {
    return this.leases;
  }

  get idle() {
    return this.leases === 0 && this.inFlight === 0;
  }

  award(input: AwardInput): Promise<AwardResult> {
    this.inFlight++;
    const run = this.queue
      .then(() => this.coordinator.award(input))
      .finally(() => {
        this.inFlight--;
        this.notifyIfIdle();
      });
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Waits for every award queued so far. */
  async drain(): Promise<void> {
    await this.queue;
  }

  current(): UserXPState {
    return this.sync.current();
  }

  acquire(): () => void {
    this.leases++;
    this.sync.start();
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.leases--;
      if (this.leases === 0) {
        this.sync.stop();
        this.notifyIfIdle();
      }
    };
  }

  close() {
    this.leases = 0;
    this.sync.stop();
  }

  private notifyIfIdle() {
    if (this.idle) this.onIdle(this);
  }
}
