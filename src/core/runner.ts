export interface Clock {
  now(): number;
}

export interface Scheduler {
  /** Runs `fn` once after `ms`; the returned function cancels it. */
  schedule(fn: () => void, ms: number): () => void;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

export const systemScheduler: Scheduler = {
  schedule: (fn, ms) => {
    const handle = setTimeout(fn, ms);
    return () => clearTimeout(handle);
  },
};

export interface GravityTimerOptions {
  periodMs: number;
  scheduler?: Scheduler;
  /**
   * Checked before every tick and before rescheduling; the chain ends as
   * soon as it returns false.
   */
  isRunning: () => boolean;
  onTick: () => void;
}

/**
 * Self-rescheduling periodic tick. Only one chain is ever pending, and
 * nothing fires after `stop()` returns.
 */
export class GravityTimer {
  private cancel: (() => void) | null = null;
  private active = false;
  private periodMs: number;
  private readonly scheduler: Scheduler;

  constructor(private options: GravityTimerOptions) {
    this.periodMs = options.periodMs;
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  get running(): boolean {
    return this.active;
  }

  setPeriod(periodMs: number): void {
    this.periodMs = periodMs;
  }

  /** (Re)starts the chain; the first tick runs as soon as possible. */
  start(): void {
    this.cancelPending();
    this.active = true;
    this.schedule(0);
  }

  stop(): void {
    this.active = false;
    this.cancelPending();
  }

  private schedule(ms: number): void {
    this.cancel = this.scheduler.schedule(() => this.fire(), ms);
  }

  private fire(): void {
    this.cancel = null;
    if (!this.active || !this.options.isRunning()) {
      this.active = false;
      return;
    }
    this.options.onTick();
    if (this.active && this.cancel === null && this.options.isRunning()) {
      this.schedule(this.periodMs);
    } else if (this.cancel === null) {
      this.active = false;
    }
  }

  private cancelPending(): void {
    if (this.cancel !== null) {
      this.cancel();
      this.cancel = null;
    }
  }
}
