/**
 * Debouncer — Single-Slot Cancellable Timer
 *
 * Holds at most one pending task. Scheduling a new task cancels the old
 * one and restarts the quantum, so a burst of keystrokes collapses into one
 * call after input settles. There is no backlog.
 *
 * Time comes from a TimerScheduler so callers (and tests) can supply their
 * own clock; `systemScheduler` wraps the Node/browser timers.
 */
import { SEARCH_DEBOUNCE_MS } from '@shared/constants';

export type CancelTimer = () => void;

export interface TimerScheduler {
  /** Arrange for `callback` to run after `delayMs`; the returned function disarms it. */
  schedule(callback: () => void, delayMs: number): CancelTimer;
}

export const systemScheduler: TimerScheduler = {
  schedule: (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};

export class Debouncer {
  private cancelTimer: CancelTimer | null = null;
  private task: (() => void) | null = null;

  constructor(
    private readonly delayMs: number = SEARCH_DEBOUNCE_MS,
    private readonly scheduler: TimerScheduler = systemScheduler,
  ) {}

  get pending(): boolean {
    return this.task !== null;
  }

  schedule(task: () => void): void {
    this.cancel();
    this.task = task;
    this.cancelTimer = this.scheduler.schedule(() => this.fire(), this.delayMs);
  }

  cancel(): void {
    this.cancelTimer?.();
    this.cancelTimer = null;
    this.task = null;
  }

  /** Run the pending task now, if any. */
  flush(): void {
    if (this.task === null) return;
    this.cancelTimer?.();
    this.fire();
  }

  private fire(): void {
    const task = this.task;
    this.cancelTimer = null;
    this.task = null;
    task?.();
  }
}
