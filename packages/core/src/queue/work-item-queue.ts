import type { WorkItemRepository } from '../types/database.js';
import { PRIORITY_RANK } from '../types/queue.js';
import type {
  NewWorkItem,
  QueueScope,
  QueueStats,
  WorkItem,
  WorkItemPriority,
  WorkItemUpdate,
} from '../types/queue.js';
import { WorkItemNotFoundError, errorMessage } from '../errors.js';
import { Semaphore } from '../utils/semaphore.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

export const DEFAULT_MAX_CONCURRENT = 4;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 100;
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

export interface WorkItemQueueOptions {
  /** Admission limit: items that may be in `processing` at once */
  maxConcurrent?: number;
  /** Retry ceiling; an item failing this many times is permanently failed */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  logger?: Logger;
}

/**
 * Durable, priority-ordered work queue with bounded admission.
 *
 * A permit is taken in `dequeue()` and held until the item is settled with
 * `markComplete()` or `markFailed()`, so at most `maxConcurrent` items handed
 * out by this queue are in `processing` at any moment. All state lives in the
 * repository; the permits are the only in-memory state.
 */
export class WorkItemQueue {
  private readonly repository: WorkItemRepository;
  private readonly logger: Logger;
  private readonly semaphore: Semaphore;
  private readonly permits = new Map<string, () => void>();
  readonly maxConcurrent: number;
  readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;

  constructor(repository: WorkItemRepository, options?: WorkItemQueueOptions) {
    this.repository = repository;
    this.logger = options?.logger ?? noopLogger;
    this.maxConcurrent = options?.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    this.maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options?.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.retryMaxDelayMs = options?.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
    this.semaphore = new Semaphore(this.maxConcurrent);
  }

  async enqueue(item: NewWorkItem): Promise<string> {
    const created = await this.repository.insertWorkItem(item);
    this.logger.debug('Work item enqueued', {
      itemId: created.id,
      remoteFileId: created.remoteFileId,
      priority: created.priority,
    });
    return created.id;
  }

  /**
   * Claim the highest-priority, oldest eligible pending item. Suspends while
   * every admission slot is held. Returns null when nothing is eligible, or
   * when `signal` aborted while waiting for a slot.
   */
  async dequeue(scope: QueueScope = {}, signal?: AbortSignal): Promise<WorkItem | null> {
    const release = await this.semaphore.acquire();
    if (signal?.aborted) {
      release();
      return null;
    }
    try {
      const item = await this.repository.claimNextWorkItem(scope, new Date().toISOString());
      if (!item) {
        release();
        return null;
      }
      this.permits.set(item.id, release);
      return item;
    } catch (error) {
      release();
      throw error;
    }
  }

  async markComplete(itemId: string): Promise<WorkItem> {
    try {
      const updated = await this.repository.updateWorkItem(itemId, {
        status: 'completed',
        lastError: null,
        retryAt: null,
      });
      if (!updated) throw new WorkItemNotFoundError(itemId);
      return updated;
    } finally {
      this.releasePermit(itemId);
    }
  }

  /**
   * Record a failed attempt. Below the retry ceiling the item goes back to
   * pending with an exponential backoff; at the ceiling it is permanently failed.
   */
  async markFailed(itemId: string, error: unknown): Promise<WorkItem> {
    try {
      const item = await this.repository.getWorkItem(itemId);
      if (!item) throw new WorkItemNotFoundError(itemId);

      const retryCount = item.retryCount + 1;
      const lastError = errorMessage(error);

      if (retryCount >= this.maxRetries) {
        this.logger.warn('Work item permanently failed', {
          itemId,
          path: item.path,
          retryCount,
          error: lastError,
        });
        return await this.update(itemId, {
          status: 'failed',
          retryCount,
          lastError,
          retryAt: null,
        });
      }

      const delayMs = this.retryDelay(retryCount);
      this.logger.debug('Work item scheduled for retry', { itemId, retryCount, delayMs });
      return await this.update(itemId, {
        status: 'pending',
        retryCount,
        lastError,
        retryAt: new Date(Date.now() + delayMs).toISOString(),
        processingStartedAt: null,
      });
    } finally {
      this.releasePermit(itemId);
    }
  }

  /** base * 2^retryCount, capped */
  retryDelay(retryCount: number): number {
    return Math.min(this.retryBaseDelayMs * 2 ** retryCount, this.retryMaxDelayMs);
  }

  async stats(scope: QueueScope = {}): Promise<QueueStats> {
    const counts = await this.repository.countWorkItems(scope);
    return {
      ...counts,
      availableSlots: this.semaphore.available,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /** Remove completed items. Returns how many were deleted. */
  async cleanupCompleted(scope: QueueScope = {}): Promise<number> {
    const removed = await this.repository.deleteWorkItems(scope, 'completed');
    if (removed > 0) {
      this.logger.debug('Cleaned up completed work items', { removed });
    }
    return removed;
  }

  /**
   * Return items stranded in `processing` by a previous process to `pending`.
   * Only call while no worker of this queue is processing the scope.
   */
  async recoverInterrupted(scope: QueueScope = {}): Promise<number> {
    const recovered = await this.repository.resetProcessingWorkItems(scope);
    if (recovered > 0) {
      this.logger.info('Recovered interrupted work items', { recovered });
    }
    return recovered;
  }

  async getFailedItems(scope: QueueScope = {}): Promise<WorkItem[]> {
    return this.repository.listWorkItems(scope, 'failed');
  }

  async getPendingItems(scope: QueueScope = {}): Promise<WorkItem[]> {
    return this.repository.listWorkItems(scope, 'pending');
  }

  /** Earliest time a backed-off item becomes eligible, or null */
  async nextRetryAt(scope: QueueScope = {}): Promise<Date | null> {
    const retryAt = await this.repository.findEarliestRetryAt(scope);
    return retryAt ? new Date(retryAt) : null;
  }

  async findActiveItem(providerId: string, remoteFileId: string): Promise<WorkItem | null> {
    return this.repository.findActiveWorkItem(providerId, remoteFileId);
  }

  /**
   * Point a pending item at the latest listing of its file. Priority only
   * ever goes up. Returns null when the item is no longer pending.
   */
  async refreshPending(
    item: WorkItem,
    file: Pick<WorkItem, 'path' | 'size' | 'mimeType' | 'providerModifiedAt'>,
    priority: WorkItemPriority,
  ): Promise<WorkItem | null> {
    const raised = PRIORITY_RANK[priority] > PRIORITY_RANK[item.priority] ? priority : item.priority;
    const refreshed = await this.repository.refreshPendingWorkItem(item.id, {
      path: file.path,
      size: file.size,
      mimeType: file.mimeType,
      providerModifiedAt: file.providerModifiedAt,
      priority: raised,
    });
    if (refreshed) {
      this.logger.debug('Work item refreshed', {
        itemId: item.id,
        remoteFileId: item.remoteFileId,
        priority: refreshed.priority,
      });
    }
    return refreshed;
  }

  /** Remove pending items for a file deleted remotely. In-flight items are left to settle. */
  async discardPending(providerId: string, remoteFileId: string): Promise<number> {
    const removed = await this.repository.deletePendingWorkItems(providerId, remoteFileId);
    if (removed > 0) {
      this.logger.debug('Discarded work items for deleted file', { remoteFileId, removed });
    }
    return removed;
  }

  private async update(
    itemId: string,
    update: WorkItemUpdate,
  ): Promise<WorkItem> {
    const updated = await this.repository.updateWorkItem(itemId, update);
    if (!updated) throw new WorkItemNotFoundError(itemId);
    return updated;
  }

  private releasePermit(itemId: string): void {
    const release = this.permits.get(itemId);
    if (release) {
      this.permits.delete(itemId);
      release();
    }
  }
}
