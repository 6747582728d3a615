import { InvalidStateTransitionError } from '../errors.js';
import { TERMINAL_STATUSES } from '../types/sync.js';
import type { SyncJob, SyncProgress, SyncStats, SyncStatus, SyncType } from '../types/sync.js';

const ALLOWED_TRANSITIONS: Record<SyncStatus, readonly SyncStatus[]> = {
  pending: ['running', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: SyncStatus, to: SyncStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: SyncStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

function assertTransition(job: SyncJob, to: SyncStatus): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidStateTransitionError(job.status, to);
  }
}

function assertRunning(job: SyncJob): void {
  if (job.status !== 'running') {
    throw new InvalidStateTransitionError(job.status, 'running');
  }
}

/**
 * floor(processed / discovered * 100), capped at 100. Zero when nothing was discovered.
 */
export function computePercent(processed: number, discovered: number): number {
  if (discovered <= 0) return 0;
  return Math.min(100, Math.floor((processed / discovered) * 100));
}

export function emptyStats(): SyncStats {
  return { itemsAdded: 0, itemsUpdated: 0, itemsDeleted: 0, itemsFailed: 0 };
}

export function totalProcessed(stats: SyncStats): number {
  return stats.itemsAdded + stats.itemsUpdated + stats.itemsDeleted;
}

export function jobDurationMs(job: SyncJob): number | null {
  if (!job.startedAt || !job.completedAt) return null;
  return new Date(job.completedAt).getTime() - new Date(job.startedAt).getTime();
}

export interface CreateSyncJobOptions {
  id?: string;
  now?: string;
}

export function createSyncJob(
  providerId: string,
  syncType: SyncType,
  options?: CreateSyncJobOptions,
): SyncJob {
  return {
    id: options?.id ?? crypto.randomUUID(),
    providerId,
    syncType,
    status: 'pending',
    progress: {
      itemsDiscovered: 0,
      itemsProcessed: 0,
      itemsFailed: 0,
      percent: 0,
      phase: 'Pending',
    },
    cursor: null,
    stats: null,
    errorMessage: null,
    createdAt: options?.now ?? new Date().toISOString(),
    startedAt: null,
    completedAt: null,
    discoveredAt: null,
  };
}

// ============================================
// Transitions
// ============================================

export function startJob(job: SyncJob, now: string = new Date().toISOString()): SyncJob {
  assertTransition(job, 'running');
  return {
    ...job,
    status: 'running',
    startedAt: now,
    progress: { ...job.progress, phase: 'Starting sync' },
  };
}

export function completeJob(
  job: SyncJob,
  stats: SyncStats,
  now: string = new Date().toISOString(),
): SyncJob {
  assertTransition(job, 'completed');
  return {
    ...job,
    status: 'completed',
    stats: { ...stats },
    completedAt: now,
    progress: { ...job.progress, itemsFailed: stats.itemsFailed, percent: 100, phase: 'Completed' },
  };
}

export function failJob(
  job: SyncJob,
  reason: string,
  now: string = new Date().toISOString(),
): SyncJob {
  assertTransition(job, 'failed');
  return {
    ...job,
    status: 'failed',
    errorMessage: reason,
    completedAt: now,
    progress: { ...job.progress, phase: 'Failed' },
  };
}

/**
 * Cancel from pending or running. Stats, when given, reflect fully completed work only.
 */
export function cancelJob(
  job: SyncJob,
  stats: SyncStats | null = null,
  now: string = new Date().toISOString(),
): SyncJob {
  assertTransition(job, 'cancelled');
  return {
    ...job,
    status: 'cancelled',
    stats: stats ? { ...stats } : null,
    completedAt: now,
    progress: { ...job.progress, phase: 'Cancelled' },
  };
}

// ============================================
// Running-only updates
// ============================================

export type ProgressUpdate = Partial<Omit<SyncProgress, 'percent'>>;

export function updateJobProgress(job: SyncJob, update: ProgressUpdate): SyncJob {
  assertRunning(job);
  const progress = { ...job.progress, ...update };
  progress.percent = computePercent(progress.itemsProcessed, progress.itemsDiscovered);
  return { ...job, progress };
}

export function updateJobCursor(job: SyncJob, cursor: string | null): SyncJob {
  assertRunning(job);
  return { ...job, cursor };
}

/**
 * Record the outcome of a finished discovery phase. Callers persist the
 * cursor only through this.
 */
export function recordDiscovery(
  job: SyncJob,
  cursor: string | null,
  itemsDiscovered: number,
  now: string = new Date().toISOString(),
): SyncJob {
  assertRunning(job);
  return {
    ...updateJobCursor(updateJobProgress(job, { itemsDiscovered, phase: 'Processing files' }), cursor),
    discoveredAt: now,
  };
}
