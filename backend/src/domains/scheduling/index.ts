/**
 * Scheduling primitives
 * @module domains/scheduling
 */

export { SystemTimerScheduler, sleep, type ITimerScheduler, type TimerHandle } from './ITimerScheduler';
export {
  DebouncedBatcher,
  type AddResult,
  type BatchContext,
  type DebouncedBatcherOptions,
  type FlushHandler,
} from './DebouncedBatcher';
