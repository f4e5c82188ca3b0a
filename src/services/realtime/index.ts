export { RealtimeHub } from './RealtimeHub.js';
export type {
  BroadcastReport,
  RealtimeChannel,
  RealtimeEvent,
  RealtimeHubOptions,
  RealtimeListener,
  SnapshotSource,
} from './RealtimeHub.js';
export { LongWaitSweeper } from './LongWaitSweeper.js';
export type { LongWaitSweeperOptions, SweepReport } from './LongWaitSweeper.js';
export { SSE_HEARTBEAT_MS, SseListener, formatSseEvent } from './sse.js';
export type { SseResponse } from './sse.js';
