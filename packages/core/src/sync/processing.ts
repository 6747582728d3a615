import type { StorageProvider } from '../types/storage.js';
import type { WorkItem } from '../types/queue.js';
import type { WorkItemQueue } from '../queue/work-item-queue.js';
import type { MetadataProcessor, ProcessOutcome } from './metadata-processor.js';
import { errorMessage } from '../errors.js';
import { pause } from '../utils/sleep.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

export interface ProcessingStats {
  added: number;
  updated: number;
  unchanged: number;
  /** Permanently failed items */
  failed: number;
  /** Items settled for good: completed or permanently failed */
  processed: number;
}

export interface ProcessingPhaseOptions {
  providerId: string;
  signal: AbortSignal;
  /** Worker count; the queue's admission limit still bounds in-flight items */
  concurrency: number;
  /** Report progress every N settled items */
  progressInterval: number;
  onProgress?: (stats: ProcessingStats) => Promise<void>;
  logger?: Logger;
}

export function emptyProcessingStats(): ProcessingStats {
  return { added: 0, updated: 0, unchanged: 0, failed: 0, processed: 0 };
}

function record(stats: ProcessingStats, outcome: ProcessOutcome): void {
  switch (outcome) {
    case 'added':
      stats.added++;
      break;
    case 'updated':
    case 'renamed':
      stats.updated++;
      break;
    case 'unchanged':
      stats.unchanged++;
      break;
  }
}

/**
 * Drain the provider's pending work items with a pool of workers.
 *
 * Cancellation is checked before every dequeue and again once an admission
 * slot is granted; items already in flight run to completion. A failing item
 * goes back to the queue (or is failed for good at the retry ceiling) and
 * never stops the other workers. Returns once the queue holds no eligible or
 * backed-off items for the provider, or once the signal aborts.
 */
export async function runProcessingPhase(
  queue: WorkItemQueue,
  processor: MetadataProcessor,
  provider: StorageProvider,
  options: ProcessingPhaseOptions,
): Promise<ProcessingStats> {
  const logger = options.logger ?? noopLogger;
  const { providerId, signal } = options;
  const stats = emptyProcessingStats();
  let lastReported = 0;

  const settle = async (item: WorkItem): Promise<void> => {
    try {
      const result = await processor.process(item, provider);
      await queue.markComplete(item.id);
      record(stats, result.outcome);
      stats.processed++;
    } catch (error) {
      const failed = await queue.markFailed(item.id, error);
      if (failed.status === 'failed') {
        stats.failed++;
        stats.processed++;
      } else {
        logger.debug('Item failed, will retry', {
          path: item.path,
          retryCount: failed.retryCount,
          error: errorMessage(error),
        });
      }
    }

    if (options.onProgress && stats.processed - lastReported >= options.progressInterval) {
      lastReported = stats.processed;
      await options.onProgress({ ...stats });
    }
  };

  const worker = async (): Promise<void> => {
    while (!signal.aborted) {
      const item = await queue.dequeue({ providerId }, signal);
      if (item) {
        await settle(item);
        continue;
      }
      if (signal.aborted) return;

      // Nothing eligible: wait for the earliest backed-off item, or stop
      const nextRetryAt = await queue.nextRetryAt({ providerId });
      if (!nextRetryAt) return;
      await pause(Math.max(0, nextRetryAt.getTime() - Date.now()), signal);
    }
  };

  const workers = Array.from({ length: Math.max(1, options.concurrency) }, () => worker());
  const results = await Promise.allSettled(workers);
  const crashed = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (crashed) throw crashed.reason;

  logger.info('Processing phase finished', {
    ...stats,
    cancelled: signal.aborted,
  });
  return stats;
}
