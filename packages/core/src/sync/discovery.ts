import type { StorageProvider, RemoteFile } from '../types/storage.js';
import type { SyncJob, SyncType } from '../types/sync.js';
import type { WorkItemPriority } from '../types/queue.js';

type EnqueueOutcome = 'enqueued' | 'refreshed' | 'skipped';

function emptyCounts(): Record<EnqueueOutcome, number> {
  return { enqueued: 0, refreshed: 0, skipped: 0 };
}
import type { WorkItemQueue } from '../queue/work-item-queue.js';
import type { ConflictResolver } from '../conflict/resolver.js';
import type { AudioFilter } from './audio-filter.js';
import { CursorMissingError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

export interface DiscoveryResult {
  /** Algorithm actually run; differs from the job's type after an escalation */
  mode: SyncType;
  escalated: boolean;
  /** New baseline to persist once the phase has returned */
  cursor: string | null;
  enqueued: number;
  /** Pending items updated in place from a fresher listing of their file */
  refreshed: number;
  /** Non-audio files and files already being processed */
  skipped: number;
  /** Tracks removed for provider-side deletions */
  deleted: number;
  /** Every file id a full listing returned; null for incremental runs */
  seenFileIds: Set<string> | null;
}

export interface DiscoveryPhaseOptions {
  isAudioFile: AudioFilter;
  logger?: Logger;
}

/**
 * Produces the work items for a job, either from a full listing or from
 * the provider's change feed since the previous cursor.
 */
export class DiscoveryPhase {
  private readonly queue: WorkItemQueue;
  private readonly resolver: ConflictResolver;
  private readonly isAudioFile: AudioFilter;
  private readonly logger: Logger;

  constructor(queue: WorkItemQueue, resolver: ConflictResolver, options: DiscoveryPhaseOptions) {
    this.queue = queue;
    this.resolver = resolver;
    this.isAudioFile = options.isAudioFile;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Run discovery for `job`. An incremental job without a baseline cursor
   * escalates to a full listing.
   */
  async run(
    provider: StorageProvider,
    job: SyncJob,
    baselineCursor: string | null,
    signal: AbortSignal,
  ): Promise<DiscoveryResult> {
    if (job.syncType === 'full') {
      return this.discoverFull(provider, job, signal);
    }

    try {
      return await this.discoverIncremental(provider, job, baselineCursor, signal);
    } catch (error) {
      if (!(error instanceof CursorMissingError)) throw error;
      this.logger.warn('No sync cursor stored, escalating to full sync', {
        jobId: job.id,
        providerId: job.providerId,
      });
      const result = await this.discoverFull(provider, job, signal);
      return { ...result, escalated: true };
    }
  }

  private async discoverFull(
    provider: StorageProvider,
    job: SyncJob,
    signal: AbortSignal,
  ): Promise<DiscoveryResult> {
    const seenFileIds = new Set<string>();
    const counts = emptyCounts();
    let changeCursor: string | null = null;
    let pageCursor: string | null = null;
    let pages = 0;

    do {
      signal.throwIfAborted();
      const page = await provider.listMedia(pageCursor);
      pages++;

      for (const file of page.files) {
        if (!file.isFolder) seenFileIds.add(file.id);
        counts[await this.enqueueFile(job, file, 'normal')]++;
      }

      if (page.changeCursor) changeCursor = page.changeCursor;

      if (page.nextCursor !== null && page.nextCursor === pageCursor) {
        this.logger.warn('Provider returned the same page cursor twice, stopping listing', {
          cursor: pageCursor,
        });
        break;
      }
      pageCursor = page.nextCursor;
    } while (pageCursor !== null);

    this.logger.info('Full discovery complete', { jobId: job.id, pages, ...counts });

    return {
      mode: 'full',
      escalated: false,
      cursor: changeCursor,
      ...counts,
      deleted: 0,
      seenFileIds,
    };
  }

  private async discoverIncremental(
    provider: StorageProvider,
    job: SyncJob,
    baselineCursor: string | null,
    signal: AbortSignal,
  ): Promise<DiscoveryResult> {
    if (baselineCursor === null) {
      throw new CursorMissingError(job.providerId);
    }

    let cursor = baselineCursor;
    const counts = emptyCounts();
    let deleted = 0;

    for (;;) {
      signal.throwIfAborted();
      const changes = await provider.getChanges(cursor);

      for (const file of changes.changed) {
        counts[await this.enqueueFile(job, file, 'high')]++;
      }

      // Deletions are applied now, not queued
      for (const remoteFileId of changes.deleted) {
        try {
          await this.queue.discardPending(job.providerId, remoteFileId);
          const result = await this.resolver.handleDeletion(job.providerId, remoteFileId);
          if (result) deleted++;
        } catch (error) {
          this.logger.warn('Failed to apply remote deletion', {
            remoteFileId,
            error: errorMessage(error),
          });
        }
      }

      if (changes.nextCursor) cursor = changes.nextCursor;
      if (!changes.hasMore || !changes.nextCursor) break;
    }

    this.logger.info('Incremental discovery complete', { jobId: job.id, ...counts, deleted });

    return {
      mode: 'incremental',
      escalated: false,
      cursor,
      ...counts,
      deleted,
      seenFileIds: null,
    };
  }

  private async enqueueFile(
    job: SyncJob,
    file: RemoteFile,
    priority: WorkItemPriority,
  ): Promise<EnqueueOutcome> {
    if (!this.isAudioFile(file)) return 'skipped';

    const active = await this.queue.findActiveItem(job.providerId, file.id);
    if (active) {
      // A processing item already has its listing; a pending one takes the newer one
      if (active.status !== 'pending') return 'skipped';
      const refreshed = await this.queue.refreshPending(
        active,
        {
          path: file.path,
          size: file.size,
          mimeType: file.mimeType,
          providerModifiedAt: file.modifiedAt,
        },
        priority,
      );
      return refreshed ? 'refreshed' : 'skipped';
    }

    await this.queue.enqueue({
      syncJobId: job.id,
      providerId: job.providerId,
      remoteFileId: file.id,
      path: file.path,
      size: file.size,
      mimeType: file.mimeType,
      providerModifiedAt: file.modifiedAt,
      priority,
    });
    return 'enqueued';
  }
}
