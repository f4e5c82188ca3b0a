export {
  QueueManager,
  BASE_WAIT_MINUTES,
  LONG_WAIT_THRESHOLD_MINUTES,
  MINUTES_PER_PATIENT_AHEAD,
  compareEntries,
  computeWaitTime,
} from './QueueManager.js';
export type { QueueManagerOptions } from './QueueManager.js';
export type {
  EnqueueInput,
  LongWaitFinding,
  QueueChangeListener,
  QueueSnapshot,
  QueueStatistics,
  SeverityUpdate,
} from './types.js';
