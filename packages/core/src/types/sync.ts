export type SyncType = 'full' | 'incremental';

export type SyncStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const SYNC_TYPES = ['full', 'incremental'] as const satisfies readonly SyncType[];

export const SYNC_STATUSES = [
  'pending',
  'running',
  'completed',
  'failed',
  'cancelled',
] as const satisfies readonly SyncStatus[];

export const TERMINAL_STATUSES: readonly SyncStatus[] = ['completed', 'failed', 'cancelled'];

export interface SyncProgress {
  itemsDiscovered: number;
  itemsProcessed: number;
  itemsFailed: number;
  /** 0-100, derived from processed / discovered */
  percent: number;
  /** Human-readable phase label, e.g. "Discovering files" */
  phase: string;
}

export interface SyncStats {
  itemsAdded: number;
  itemsUpdated: number;
  itemsDeleted: number;
  itemsFailed: number;
}

/**
 * One synchronization run for one provider profile.
 * Values are immutable; transitions in `job/state-machine.ts` return a new job.
 */
export interface SyncJob {
  id: string;
  providerId: string;
  syncType: SyncType;
  status: SyncStatus;
  progress: SyncProgress;
  /** Opaque provider continuation token. Written only once discovery has completed. */
  cursor: string | null;
  /** Finalized when the job completes (or is cancelled with partial work). */
  stats: SyncStats | null;
  errorMessage: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  /** Set together with `cursor`; a running job with this set can resume processing. */
  discoveredAt: string | null;
}

export interface SyncHandle {
  jobId: string;
  /** Resolves with the job in its terminal state. Never rejects. */
  done: Promise<SyncJob>;
}
