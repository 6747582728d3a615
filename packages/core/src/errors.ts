import type { SyncStatus } from './types/sync.js';

/**
 * Base class for every error the engine raises on purpose.
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Remote storage failure (network, auth, rate limit).
 */
export class ProviderError extends SyncError {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    public readonly statusCode?: number,
  ) {
    super(message, 'PROVIDER_ERROR');
    this.name = 'ProviderError';
  }
}

/** Per-file metadata extraction failure. Never fatal to a run. */
export class ExtractionError extends SyncError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, 'EXTRACTION_ERROR');
    this.name = 'ExtractionError';
  }
}

export class PersistenceError extends SyncError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

export class InvalidStateTransitionError extends SyncError {
  constructor(
    public readonly from: SyncStatus,
    public readonly to: SyncStatus,
  ) {
    super(`Invalid state transition from ${from} to ${to}`, 'INVALID_STATE_TRANSITION');
    this.name = 'InvalidStateTransitionError';
  }
}

/** Incremental sync requested without a stored cursor. Handled by escalating to a full sync. */
export class CursorMissingError extends SyncError {
  constructor(public readonly providerId: string) {
    super(`No sync cursor stored for provider ${providerId}`, 'CURSOR_MISSING');
    this.name = 'CursorMissingError';
  }
}

export class SyncInProgressError extends SyncError {
  constructor(
    public readonly providerId: string,
    public readonly jobId: string | null,
  ) {
    super(
      `Sync already in progress for provider ${providerId}${jobId ? ` (job ${jobId})` : ''}`,
      'SYNC_IN_PROGRESS',
    );
    this.name = 'SyncInProgressError';
  }
}

export class JobNotFoundError extends SyncError {
  constructor(public readonly jobId: string) {
    super(`Sync job not found: ${jobId}`, 'JOB_NOT_FOUND');
    this.name = 'JobNotFoundError';
  }
}

export class WorkItemNotFoundError extends SyncError {
  constructor(public readonly itemId: string) {
    super(`Work item not found: ${itemId}`, 'WORK_ITEM_NOT_FOUND');
    this.name = 'WorkItemNotFoundError';
  }
}

export class NetworkConstraintError extends SyncError {
  constructor(message: string) {
    super(message, 'NETWORK_CONSTRAINT');
    this.name = 'NetworkConstraintError';
  }
}

export class SyncTimeoutError extends SyncError {
  constructor(public readonly timeoutMs: number) {
    super(`Sync timed out after ${timeoutMs}ms`, 'SYNC_TIMEOUT');
    this.name = 'SyncTimeoutError';
  }
}

/** Used as the abort reason when a job is cancelled on request. */
export class SyncCancelledError extends SyncError {
  constructor(public readonly jobId: string) {
    super(`Sync job ${jobId} was cancelled`, 'SYNC_CANCELLED');
    this.name = 'SyncCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
