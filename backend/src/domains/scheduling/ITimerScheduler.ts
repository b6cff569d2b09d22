/**
 * Timer Scheduler
 *
 * Thin seam over setTimeout so debounce logic can be driven by fake timers
 * or a manual scheduler in tests.
 *
 * @module domains/scheduling/ITimerScheduler
 */

export interface TimerHandle {
  cancel(): void;
}

export interface ITimerScheduler {
  schedule(delayMs: number, callback: () => void): TimerHandle;
}

export class SystemTimerScheduler implements ITimerScheduler {
  schedule(delayMs: number, callback: () => void): TimerHandle {
    const timer = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timer),
    };
  }
}

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
