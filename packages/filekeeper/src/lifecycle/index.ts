export {
  LifecycleManager,
  normalizeTags,
  type AgingSweepResult,
  type ArchiveSweepResult,
  type LifecycleManagerDeps,
  type SweepError,
  type SweepOptions,
} from './manager.js';
export { PathLocks } from './path-locks.js';
export {
  SweepScheduler,
  type SchedulerConfig,
  type SweepRound,
  type SweepRunner,
  type WatchOptions,
} from './scheduler.js';
export { SweepGuard, type Guarded, type SweepKind } from './sweep-guard.js';
export {
  agingThresholdDays,
  archiveThresholdDays,
  dueTransition,
  estimateNextTransition,
  isProtected,
  isValidTransition,
  type LifecycleThresholds,
} from './transitions.js';
