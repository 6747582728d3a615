import type { SyncProgress, SyncStats, SyncType } from './sync.js';

export type SyncEvent =
  | { type: 'started'; jobId: string; providerId: string; syncType: SyncType }
  | { type: 'progress'; jobId: string; providerId: string; progress: SyncProgress }
  | {
      type: 'completed';
      jobId: string;
      providerId: string;
      stats: SyncStats;
      durationMs: number | null;
    }
  | { type: 'failed'; jobId: string; providerId: string; error: string }
  | { type: 'cancelled'; jobId: string; providerId: string; stats: SyncStats | null }
  | { type: 'conflict'; contentHash: string; trackIds: string[] };

export type SyncEventType = SyncEvent['type'];

/**
 * Fire-and-forget notifications. Implementations must not block;
 * anything they throw is logged and dropped by the engine.
 */
export interface EventSink {
  emit(event: SyncEvent): void;
}
