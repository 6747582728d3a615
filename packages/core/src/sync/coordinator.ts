import type { JobRepository, WorkItemRepository } from '../types/database.js';
import type { LibraryStore } from '../types/library.js';
import type { SessionManager } from '../types/storage.js';
import type { MetadataExtractor } from '../types/extractor.js';
import type { NetworkMonitor } from '../types/network.js';
import type { EventSink } from '../types/events.js';
import type { SyncHandle, SyncJob, SyncStats, SyncType } from '../types/sync.js';
import type { WorkItem } from '../types/queue.js';
import { loadSyncConfig } from '../config.js';
import type { SyncConfig, SyncConfigInput } from '../config.js';
import {
  cancelJob,
  completeJob,
  createSyncJob,
  emptyStats,
  failJob,
  isTerminal,
  jobDurationMs,
  recordDiscovery,
  startJob,
  updateJobProgress,
} from '../job/state-machine.js';
import { WorkItemQueue } from '../queue/work-item-queue.js';
import { ConflictResolver, totalDeleted } from '../conflict/resolver.js';
import { MetadataProcessor } from './metadata-processor.js';
import { DiscoveryPhase } from './discovery.js';
import type { DiscoveryResult } from './discovery.js';
import { runProcessingPhase } from './processing.js';
import type { ProcessingStats } from './processing.js';
import { createAudioFilter } from './audio-filter.js';
import { noopEventSink, safeEmit } from '../events.js';
import {
  JobNotFoundError,
  NetworkConstraintError,
  SyncCancelledError,
  SyncInProgressError,
  SyncTimeoutError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, withLogContext } from '../utils/logger.js';

/** Everything the coordinator persists through */
export type SyncStore = JobRepository & WorkItemRepository & LibraryStore;

export interface SyncCoordinatorOptions {
  extractor: MetadataExtractor;
  config?: SyncConfigInput;
  /** Consulted before discovery; without one, network checks are skipped */
  network?: NetworkMonitor;
  events?: EventSink;
  logger?: Logger;
}

interface ActiveRun {
  /** Null until the job record has been loaded or created */
  jobId: string | null;
  controller: AbortController;
}

interface PreparedJob {
  job: SyncJob;
  /** Running job whose discovery had completed; processing picks up where it stopped */
  resumed: boolean;
}

function applyProcessingStats(stats: SyncStats, processing: ProcessingStats): void {
  stats.itemsAdded = processing.added;
  stats.itemsUpdated = processing.updated;
  stats.itemsFailed = processing.failed;
}

/**
 * Runs sync jobs end to end: discovery, processing, conflict sweep and the
 * job lifecycle around them. At most one run per provider at a time.
 */
export class SyncCoordinator {
  readonly config: SyncConfig;
  readonly queue: WorkItemQueue;
  readonly resolver: ConflictResolver;
  private readonly store: SyncStore;
  private readonly sessions: SessionManager;
  private readonly processor: MetadataProcessor;
  private readonly discovery: DiscoveryPhase;
  private readonly network: NetworkMonitor | null;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly active = new Map<string, ActiveRun>();

  constructor(store: SyncStore, sessions: SessionManager, options: SyncCoordinatorOptions) {
    const config = loadSyncConfig(options.config);
    const logger = options.logger ?? noopLogger;
    const events = options.events ?? noopEventSink;

    this.config = config;
    this.store = store;
    this.sessions = sessions;
    this.network = options.network ?? null;
    this.events = events;
    this.logger = logger;

    this.queue = new WorkItemQueue(store, {
      maxConcurrent: config.maxConcurrentDownloads,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
      logger,
    });
    this.resolver = new ConflictResolver(store, {
      policy: config.conflictPolicy,
      hardDelete: config.hardDelete,
      events,
      logger,
    });
    this.processor = new MetadataProcessor(store, options.extractor, this.resolver, {
      headerOnlyDownload: config.headerOnlyDownload,
      headerSizeBytes: config.headerSizeBytes,
      downloadTimeoutMs: config.downloadTimeoutMs,
      downloadRetryAttempts: config.downloadRetryAttempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
      logger,
    });
    this.discovery = new DiscoveryPhase(this.queue, this.resolver, {
      isAudioFile: createAudioFilter(config),
      logger,
    });
  }

  // ============================================
  // Public API
  // ============================================

  /**
   * Start a run for the provider and return once its job record exists.
   * Rejects with SyncInProgressError while another run for the provider is active.
   */
  async startSync(providerId: string, syncType: SyncType): Promise<SyncHandle> {
    const current = this.active.get(providerId);
    if (current) {
      throw new SyncInProgressError(providerId, current.jobId);
    }

    // Reserve the slot before the first await
    const run: ActiveRun = { jobId: null, controller: new AbortController() };
    this.active.set(providerId, run);

    let prepared: PreparedJob;
    try {
      prepared = await this.prepareJob(providerId, syncType);
    } catch (error) {
      this.active.delete(providerId);
      throw error;
    }

    run.jobId = prepared.job.id;
    const done = this.execute(prepared, run.controller).finally(() => {
      this.active.delete(providerId);
    });
    return { jobId: prepared.job.id, done };
  }

  /** Start a run and wait for its terminal job state. */
  async runSync(providerId: string, syncType: SyncType): Promise<SyncJob> {
    const handle = await this.startSync(providerId, syncType);
    return handle.done;
  }

  /**
   * Request cancellation. An active run stops dequeuing right away and
   * finishes the items already in flight. A stored job that is not running
   * here is cancelled directly. Returns false when the job is already terminal.
   */
  async cancelSync(jobId: string): Promise<boolean> {
    for (const run of this.active.values()) {
      if (run.jobId !== jobId) continue;
      if (run.controller.signal.aborted) return false;
      run.controller.abort(new SyncCancelledError(jobId));
      return true;
    }

    const job = await this.store.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (isTerminal(job.status)) return false;

    const cancelled = cancelJob(job);
    await this.store.saveJob(cancelled);
    safeEmit(
      this.events,
      { type: 'cancelled', jobId, providerId: job.providerId, stats: null },
      this.logger,
    );
    return true;
  }

  async getStatus(jobId: string): Promise<SyncJob> {
    const job = await this.store.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  async listHistory(providerId: string, limit = 20): Promise<SyncJob[]> {
    return this.store.listJobs(providerId, limit);
  }

  isSyncActive(providerId: string): boolean {
    return this.active.has(providerId);
  }

  /** Permanently failed work items with their last error */
  async getFailedItems(providerId: string): Promise<WorkItem[]> {
    return this.queue.getFailedItems({ providerId });
  }

  // ============================================
  // Run
  // ============================================

  private async prepareJob(providerId: string, syncType: SyncType): Promise<PreparedJob> {
    const interrupted = await this.store.findActiveJob(providerId);

    if (interrupted) {
      if (interrupted.status === 'running' && interrupted.discoveredAt) {
        this.logger.info('Resuming interrupted sync job', {
          jobId: interrupted.id,
          providerId,
        });
        return { job: interrupted, resumed: true };
      }

      await this.store.saveJob(failJob(interrupted, 'Interrupted before discovery completed'));
      this.logger.warn('Failed interrupted sync job', { jobId: interrupted.id, providerId });
    }

    const job = createSyncJob(providerId, syncType);
    await this.store.saveJob(job);
    return { job, resumed: false };
  }

  /**
   * Drive one job to a terminal state. Never rejects.
   */
  private async execute(prepared: PreparedJob, controller: AbortController): Promise<SyncJob> {
    const { resumed } = prepared;
    const { signal } = controller;
    const { providerId } = prepared.job;
    const logger = withLogContext(this.logger, { jobId: prepared.job.id, providerId });
    const timeoutMs = this.config.syncTimeoutMs;
    const timer = setTimeout(() => controller.abort(new SyncTimeoutError(timeoutMs)), timeoutMs);

    let job = prepared.job;
    const stats = emptyStats();

    try {
      const provider = await this.sessions.acquire(providerId);
      await this.checkNetwork();

      if (!resumed) {
        job = startJob(job);
        await this.store.saveJob(job);
      }
      safeEmit(
        this.events,
        { type: 'started', jobId: job.id, providerId, syncType: job.syncType },
        logger,
      );

      await this.queue.recoverInterrupted({ providerId });

      let discovery: DiscoveryResult | null = null;
      if (!resumed) {
        const baseline = await this.store.findLatestCursor(providerId);
        discovery = await this.discovery.run(provider, job, baseline, signal);
        stats.itemsDeleted += discovery.deleted;

        const { pending } = await this.queue.stats({ providerId });
        job = recordDiscovery(job, discovery.cursor, pending);
        await this.store.saveJob(job);
        logger.info('Discovery persisted', {
          mode: discovery.mode,
          escalated: discovery.escalated,
          enqueued: discovery.enqueued,
          refreshed: discovery.refreshed,
          pending,
        });
      }

      const baseProcessed = job.progress.itemsProcessed;
      const baseFailed = job.progress.itemsFailed;
      const withProcessing = (current: SyncJob, processing: ProcessingStats): SyncJob =>
        updateJobProgress(current, {
          itemsProcessed: baseProcessed + processing.processed,
          itemsFailed: baseFailed + processing.failed,
        });

      const processing = await runProcessingPhase(this.queue, this.processor, provider, {
        providerId,
        signal,
        concurrency: this.config.maxConcurrentDownloads,
        progressInterval: this.config.progressInterval,
        logger,
        onProgress: async (snapshot) => {
          applyProcessingStats(stats, snapshot);
          job = withProcessing(job, snapshot);
          await this.store.saveJob(job);
          safeEmit(
            this.events,
            { type: 'progress', jobId: job.id, providerId, progress: { ...job.progress } },
            logger,
          );
        },
      });
      applyProcessingStats(stats, processing);
      job = withProcessing(job, processing);
      if (signal.aborted) throw signal.reason;

      job = updateJobProgress(job, { phase: 'Resolving conflicts' });
      await this.store.saveJob(job);
      safeEmit(
        this.events,
        { type: 'progress', jobId: job.id, providerId, progress: { ...job.progress } },
        logger,
      );

      const sweep = await this.resolver.sweep({
        providerId,
        seenFileIds: discovery?.seenFileIds ?? undefined,
      });
      stats.itemsDeleted += totalDeleted(sweep);
      logger.info('Conflict sweep finished', { ...sweep });

      const completed = completeJob(job, stats);
      await this.store.saveJob(completed);
      job = completed;

      if (this.config.cleanupCompleted) {
        await this.cleanup(providerId, logger);
      }

      const durationMs = jobDurationMs(job);
      logger.info('Sync completed', { ...stats, durationMs });
      safeEmit(
        this.events,
        { type: 'completed', jobId: job.id, providerId, stats: { ...stats }, durationMs },
        logger,
      );
      return job;
    } catch (error) {
      const reason: unknown = signal.aborted ? signal.reason : error;
      return this.finishWithError(job, reason, stats, logger);
    } finally {
      clearTimeout(timer);
    }
  }

  private async finishWithError(
    job: SyncJob,
    reason: unknown,
    stats: SyncStats,
    logger: Logger,
  ): Promise<SyncJob> {
    if (isTerminal(job.status)) {
      logger.error('Error after job reached a terminal state', {
        status: job.status,
        error: errorMessage(reason),
      });
      return job;
    }

    if (reason instanceof SyncCancelledError) {
      const cancelled = cancelJob(job, stats);
      await this.persistTerminal(cancelled, logger);
      logger.info('Sync cancelled', { ...stats });
      safeEmit(
        this.events,
        { type: 'cancelled', jobId: job.id, providerId: job.providerId, stats: { ...stats } },
        logger,
      );
      return cancelled;
    }

    const message = errorMessage(reason);
    const failed = failJob(job, message);
    await this.persistTerminal(failed, logger);
    logger.error('Sync failed', { error: message });
    safeEmit(
      this.events,
      { type: 'failed', jobId: job.id, providerId: job.providerId, error: message },
      logger,
    );
    return failed;
  }

  private async persistTerminal(job: SyncJob, logger: Logger): Promise<void> {
    try {
      await this.store.saveJob(job);
    } catch (error) {
      logger.error('Failed to persist terminal job state', {
        status: job.status,
        error: errorMessage(error),
      });
    }
  }

  private async cleanup(providerId: string, logger: Logger): Promise<void> {
    try {
      await this.queue.cleanupCompleted({ providerId });
    } catch (error) {
      logger.warn('Failed to clean up completed work items', { error: errorMessage(error) });
    }
  }

  private async checkNetwork(): Promise<void> {
    if (!this.network) return;

    const info = await this.network.getNetworkInfo();
    if (!info.connected) {
      throw new NetworkConstraintError('No network connection');
    }
    if (this.config.wifiOnly && (info.type !== 'wifi' || info.metered)) {
      throw new NetworkConstraintError(
        `Wi-Fi only sync requires an unmetered Wi-Fi connection (current: ${info.type}${info.metered ? ', metered' : ''})`,
      );
    }
  }
}
