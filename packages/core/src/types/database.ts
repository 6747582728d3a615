import type { SyncJob } from './sync.js';
import type {
  NewWorkItem,
  QueueScope,
  WorkItem,
  WorkItemCounts,
  WorkItemRefresh,
  WorkItemStatus,
  WorkItemUpdate,
} from './queue.js';
import type { LibraryStore } from './library.js';

/**
 * Persistence contract for sync jobs.
 */
export interface JobRepository {
  /** Insert or replace the job record */
  saveJob(job: SyncJob): Promise<void>;

  getJob(jobId: string): Promise<SyncJob | null>;

  /** Most recently created job for the provider, any status */
  findLatestJob(providerId: string): Promise<SyncJob | null>;

  /** Most recent pending or running job for the provider */
  findActiveJob(providerId: string): Promise<SyncJob | null>;

  /** Cursor of the most recent job that finished discovery */
  findLatestCursor(providerId: string): Promise<string | null>;

  listJobs(providerId: string, limit?: number): Promise<SyncJob[]>;
}

/**
 * Storage contract behind `WorkItemQueue`. Every call is a synchronous,
 * durable write; `claimNextWorkItem` is a single transaction.
 */
export interface WorkItemRepository {
  insertWorkItem(item: NewWorkItem): Promise<WorkItem>;

  getWorkItem(itemId: string): Promise<WorkItem | null>;

  /**
   * Atomically pick the highest-priority, oldest eligible pending item
   * (retryAt null or <= now) and mark it processing.
   */
  claimNextWorkItem(scope: QueueScope, now: string): Promise<WorkItem | null>;

  updateWorkItem(itemId: string, update: WorkItemUpdate): Promise<WorkItem | null>;

  countWorkItems(scope: QueueScope): Promise<WorkItemCounts>;

  listWorkItems(scope: QueueScope, status?: WorkItemStatus): Promise<WorkItem[]>;

  /** Earliest retryAt among pending items, null when none is backed off */
  findEarliestRetryAt(scope: QueueScope): Promise<string | null>;

  /** Oldest pending or processing item for the provider file */
  findActiveWorkItem(providerId: string, remoteFileId: string): Promise<WorkItem | null>;

  /** Overwrite listing fields of an item still pending. Null when it is not pending. */
  refreshPendingWorkItem(itemId: string, refresh: WorkItemRefresh): Promise<WorkItem | null>;

  /** Drop pending items for a file that no longer exists remotely */
  deletePendingWorkItems(providerId: string, remoteFileId: string): Promise<number>;

  /** Put items left in processing by a dead process back to pending */
  resetProcessingWorkItems(scope: QueueScope): Promise<number>;

  deleteWorkItems(scope: QueueScope, status: WorkItemStatus): Promise<number>;
}

/**
 * Database-agnostic adapter interface.
 * `SQLiteAdapter` (via Drizzle) ships with the package.
 */
export interface DatabaseAdapter extends JobRepository, WorkItemRepository, LibraryStore {
  /** Create tables and indexes if they do not exist */
  migrate(): Promise<void>;

  close(): void;
}
