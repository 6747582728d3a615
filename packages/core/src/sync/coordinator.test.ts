import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SQLiteAdapter } from '../db/sqlite-adapter.js';
import { SyncCoordinator } from './coordinator.js';
import { ProviderRegistry } from '../providers/index.js';
import { EmitterEventSink } from '../events.js';
import { createSyncJob, recordDiscovery, startJob } from '../job/state-machine.js';
import { JobNotFoundError, SyncInProgressError } from '../errors.js';
import type { SyncConfigInput } from '../config.js';
import type { SyncEvent } from '../types/events.js';
import type { ChangeSet, MediaListing, RemoteFile } from '../types/storage.js';
import type { ExtractedMetadata, ExtractionHints, MetadataExtractor } from '../types/extractor.js';
import type { NetworkInfo } from '../types/network.js';

function makeFile(id: string, overrides?: Partial<RemoteFile>): RemoteFile {
  return {
    id,
    name: `${id}.mp3`,
    path: `/Music/${id}.mp3`,
    size: 4_000_000,
    mimeType: 'audio/mpeg',
    modifiedAt: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

/**
 * In-memory provider. `pages` answers listMedia by requesting cursor
 * ('' for the first page), `changes` answers getChanges.
 */
function createMockProvider(options: {
  pages?: Record<string, MediaListing>;
  changes?: Record<string, ChangeSet>;
}) {
  return {
    id: 'drive-1',
    listMedia: vi.fn(
      async (cursor: string | null): Promise<MediaListing> =>
        options.pages?.[cursor ?? ''] ?? { files: [], nextCursor: null },
    ),
    getChanges: vi.fn(
      async (cursor: string): Promise<ChangeSet> =>
        options.changes?.[cursor] ?? { changed: [], deleted: [], nextCursor: null },
    ),
    download: vi.fn(
      async (fileId: string): Promise<Uint8Array> => new TextEncoder().encode(`bytes:${fileId}`),
    ),
  };
}

function createMockExtractor() {
  return {
    extract: vi.fn(
      async (_bytes: Uint8Array, hints: ExtractionHints): Promise<ExtractedMetadata> => ({
        title: hints.fileName.replace(/\.mp3$/, ''),
        bitrate: 320,
      }),
    ),
  };
}

function singlePage(files: RemoteFile[], changeCursor: string | null = 'c1'): Record<string, MediaListing> {
  return { '': { files, nextCursor: null, changeCursor } };
}

describe('SyncCoordinator', () => {
  let adapter: SQLiteAdapter;
  let events: EmitterEventSink;
  let received: SyncEvent[];

  beforeEach(async () => {
    adapter = new SQLiteAdapter(':memory:');
    await adapter.migrate();
    events = new EmitterEventSink();
    received = [];
    events.onAny((event) => received.push(event));
  });

  function createCoordinator(options: {
    provider?: ReturnType<typeof createMockProvider>;
    extractor?: MetadataExtractor;
    config?: SyncConfigInput;
    network?: NetworkInfo;
  }): SyncCoordinator {
    const registry = new ProviderRegistry();
    const provider = options.provider;
    if (provider) registry.register('drive-1', () => provider);
    const network = options.network;

    return new SyncCoordinator(adapter, registry, {
      extractor: options.extractor ?? createMockExtractor(),
      config: { retryBaseDelayMs: 1, ...options.config },
      network: network ? { getNetworkInfo: async () => network } : undefined,
      events,
    });
  }

  describe('full sync', () => {
    it('adds every audio file and completes', async () => {
      const provider = createMockProvider({
        pages: singlePage([makeFile('f1'), makeFile('f2'), makeFile('f3')]),
      });
      const coordinator = createCoordinator({ provider });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('completed');
      expect(job.stats).toEqual({ itemsAdded: 3, itemsUpdated: 0, itemsDeleted: 0, itemsFailed: 0 });
      expect(job.progress).toEqual({
        itemsDiscovered: 3,
        itemsProcessed: 3,
        itemsFailed: 0,
        percent: 100,
        phase: 'Completed',
      });
      expect(job.cursor).toBe('c1');
      expect(job.startedAt).not.toBeNull();
      expect(job.completedAt).not.toBeNull();

      const tracks = await adapter.listTracks({ providerId: 'drive-1' });
      expect(tracks.map((track) => track.title)).toEqual(['f1', 'f2', 'f3']);
      expect(received.map((event) => event.type)).toEqual(['started', 'progress', 'completed']);
      expect(await coordinator.getStatus(job.id)).toEqual(job);
    });

    it('cleans up completed work items after a completed run', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({ provider });

      await coordinator.runSync('drive-1', 'full');

      const stats = await coordinator.queue.stats({ providerId: 'drive-1' });
      expect(stats.completed).toBe(0);
    });

    it('emits progress every progressInterval items and once at the end', async () => {
      const files = ['a', 'b', 'c', 'd', 'e'].map((id) => makeFile(id));
      const provider = createMockProvider({ pages: singlePage(files) });
      const coordinator = createCoordinator({
        provider,
        config: { progressInterval: 2, maxConcurrentDownloads: 1 },
      });

      await coordinator.runSync('drive-1', 'full');

      const progress = received.flatMap((event) =>
        event.type === 'progress' ? [event.progress.itemsProcessed] : [],
      );
      expect(progress).toEqual([2, 4, 5]);
    });

    it('keeps the highest-bitrate copy of duplicate files', async () => {
      const provider = createMockProvider({
        pages: singlePage([makeFile('low'), makeFile('high')]),
      });
      const extractor = createMockExtractor();
      extractor.extract.mockImplementation(async (_bytes, hints) => ({
        title: 'Same Song',
        contentHash: 'same-audio',
        bitrate: hints.fileName === 'high.mp3' ? 320 : 128,
      }));
      const coordinator = createCoordinator({ provider, extractor });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('completed');
      const visible = await adapter.listTracks({ providerId: 'drive-1' });
      expect(visible.map((track) => track.providerFileId)).toEqual(['high']);
      const all = await adapter.listTracks({ providerId: 'drive-1', includeHidden: true });
      expect(all).toHaveLength(2);
    });

    it('removes tracks the listing no longer contains', async () => {
      const first = createMockProvider({ pages: singlePage([makeFile('f1'), makeFile('f2')]) });
      await createCoordinator({ provider: first }).runSync('drive-1', 'full');

      const second = createMockProvider({ pages: singlePage([makeFile('f1')], 'c2') });
      const job = await createCoordinator({ provider: second }).runSync('drive-1', 'full');

      expect(job.stats).toEqual({ itemsAdded: 0, itemsUpdated: 0, itemsDeleted: 1, itemsFailed: 0 });
      const tracks = await adapter.listTracks({ providerId: 'drive-1', includeHidden: true });
      expect(tracks.map((track) => track.providerFileId).sort()).toEqual(['DELETED_f2', 'f1']);
    });

    it('records permanently failed items without failing the job', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('bad'), makeFile('good')]) });
      const extractor = createMockExtractor();
      extractor.extract.mockImplementation(async (_bytes, hints) => {
        if (hints.fileName === 'bad.mp3') throw new Error('unsupported codec');
        return { title: 'Good' };
      });
      const coordinator = createCoordinator({ provider, extractor, config: { maxRetries: 1 } });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('completed');
      expect(job.stats).toEqual({ itemsAdded: 1, itemsUpdated: 0, itemsDeleted: 0, itemsFailed: 1 });
      expect(job.progress.itemsFailed).toBe(1);
      const failed = await coordinator.getFailedItems('drive-1');
      expect(failed.map((item) => [item.remoteFileId, item.lastError])).toEqual([
        ['bad', 'Metadata extraction failed: unsupported codec'],
      ]);
    });
  });

  describe('incremental sync', () => {
    it('enqueues changes with high priority and deletes removed files during discovery', async () => {
      const initial = createMockProvider({ pages: singlePage([makeFile('f1'), makeFile('f2')]) });
      await createCoordinator({ provider: initial }).runSync('drive-1', 'full');
      const f2 = await adapter.findTrackByProviderFile('drive-1', 'f2');

      let cursorDuringDiscovery: string | null | undefined;
      let baselineDuringDiscovery: string | null | undefined;
      const provider = createMockProvider({});
      provider.getChanges.mockImplementationOnce(async (cursor) => {
        cursorDuringDiscovery = (await adapter.findActiveJob('drive-1'))?.cursor;
        baselineDuringDiscovery = await adapter.findLatestCursor('drive-1');
        return {
          changed: [makeFile('f1', { modifiedAt: '2024-06-01T10:00:00.000Z' })],
          deleted: [cursor === 'c1' ? 'f2' : 'unexpected'],
          nextCursor: 'c2',
        };
      });
      const coordinator = createCoordinator({ provider, config: { cleanupCompleted: false } });

      const job = await coordinator.runSync('drive-1', 'incremental');

      expect(job.status).toBe('completed');
      expect(job.cursor).toBe('c2');
      expect(job.stats).toEqual({ itemsAdded: 0, itemsUpdated: 1, itemsDeleted: 1, itemsFailed: 0 });
      expect(cursorDuringDiscovery).toBeNull();
      expect(baselineDuringDiscovery).toBe('c1');

      const items = await adapter.listWorkItems({ syncJobId: job.id });
      expect(items.map((item) => [item.remoteFileId, item.priority])).toEqual([['f1', 'high']]);

      const deleted = await adapter.getTrack(f2!.id);
      expect(deleted!.providerFileId).toBe('DELETED_f2');
      expect(deleted!.deletedAt).not.toBeNull();
    });

    it('escalates to a full sync without a stored cursor', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1'), makeFile('f2')]) });
      const coordinator = createCoordinator({ provider });

      const job = await coordinator.runSync('drive-1', 'incremental');

      expect(job.status).toBe('completed');
      expect(job.syncType).toBe('incremental');
      expect(job.cursor).toBe('c1');
      expect(job.stats!.itemsAdded).toBe(2);
      expect(provider.getChanges).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('stops after the in-flight item and leaves the rest pending', async () => {
      const files = Array.from({ length: 10 }, (_, i) => makeFile(`f${i}`));
      const provider = createMockProvider({ pages: singlePage(files) });
      const extractor = createMockExtractor();
      const coordinator = createCoordinator({
        provider,
        extractor,
        config: { maxConcurrentDownloads: 1 },
      });

      let jobId = '';
      events.on('started', (event) => {
        jobId = event.jobId;
      });
      let calls = 0;
      extractor.extract.mockImplementation(async (_bytes, hints) => {
        calls++;
        if (calls === 5) void coordinator.cancelSync(jobId);
        return { title: hints.fileName };
      });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('cancelled');
      expect(job.stats).toEqual({ itemsAdded: 5, itemsUpdated: 0, itemsDeleted: 0, itemsFailed: 0 });
      expect(job.completedAt).not.toBeNull();
      expect(await coordinator.queue.getPendingItems({ providerId: 'drive-1' })).toHaveLength(5);
      expect(received.map((event) => event.type)).toEqual(['started', 'cancelled']);
    });

    it('drains items left by a cancelled run on the next run', async () => {
      const files = Array.from({ length: 4 }, (_, i) => makeFile(`f${i}`));
      const provider = createMockProvider({ pages: singlePage(files) });
      const extractor = createMockExtractor();
      const coordinator = createCoordinator({
        provider,
        extractor,
        config: { maxConcurrentDownloads: 1 },
      });
      let jobId = '';
      events.on('started', (event) => {
        jobId = event.jobId;
      });
      let calls = 0;
      extractor.extract.mockImplementation(async (_bytes, hints) => {
        calls++;
        if (calls === 1) void coordinator.cancelSync(jobId);
        return { title: hints.fileName };
      });

      const cancelled = await coordinator.runSync('drive-1', 'full');
      const next = await coordinator.runSync('drive-1', 'incremental');

      expect(cancelled.stats!.itemsAdded).toBe(1);
      expect(next.status).toBe('completed');
      expect(next.stats!.itemsAdded).toBe(3);
      expect(provider.getChanges).toHaveBeenCalledWith('c1');
      expect(await adapter.listTracks({ providerId: 'drive-1' })).toHaveLength(4);
    });

    it('cancels a stored job that is not running in this process', async () => {
      const pending = createSyncJob('drive-1', 'full', { id: 'job-pending' });
      await adapter.saveJob(pending);
      const coordinator = createCoordinator({});

      expect(await coordinator.cancelSync('job-pending')).toBe(true);
      expect((await coordinator.getStatus('job-pending')).status).toBe('cancelled');
      expect(await coordinator.cancelSync('job-pending')).toBe(false);
    });

    it('throws JobNotFoundError for unknown jobs', async () => {
      const coordinator = createCoordinator({});

      await expect(coordinator.cancelSync('missing')).rejects.toBeInstanceOf(JobNotFoundError);
      await expect(coordinator.getStatus('missing')).rejects.toBeInstanceOf(JobNotFoundError);
    });
  });

  describe('resumption', () => {
    it('resumes processing of a job whose discovery completed', async () => {
      const crashed = recordDiscovery(
        startJob(createSyncJob('drive-1', 'full', { id: 'job-crashed' })),
        'c1',
        3,
      );
      await adapter.saveJob(crashed);
      for (const id of ['f1', 'f2', 'f3']) {
        const file = makeFile(id);
        await adapter.insertWorkItem({
          syncJobId: 'job-crashed',
          providerId: 'drive-1',
          remoteFileId: file.id,
          path: file.path,
          size: file.size,
          mimeType: file.mimeType,
          providerModifiedAt: file.modifiedAt,
        });
      }
      // One item was mid-flight when the process died
      await adapter.claimNextWorkItem({ providerId: 'drive-1' }, new Date().toISOString());

      const provider = createMockProvider({});
      const coordinator = createCoordinator({ provider });

      const job = await coordinator.runSync('drive-1', 'incremental');

      expect(job.id).toBe('job-crashed');
      expect(job.status).toBe('completed');
      expect(job.syncType).toBe('full');
      expect(job.cursor).toBe('c1');
      expect(job.stats!.itemsAdded).toBe(3);
      expect(provider.listMedia).not.toHaveBeenCalled();
      expect(provider.getChanges).not.toHaveBeenCalled();
    });

    it('fails a job interrupted before discovery completed and starts a new one', async () => {
      const interrupted = startJob(createSyncJob('drive-1', 'full', { id: 'job-interrupted' }));
      await adapter.saveJob(interrupted);
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({ provider });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.id).not.toBe('job-interrupted');
      expect(job.status).toBe('completed');
      const old = await coordinator.getStatus('job-interrupted');
      expect(old.status).toBe('failed');
      expect(old.errorMessage).toBe('Interrupted before discovery completed');
    });
  });

  describe('failures', () => {
    it('rejects a second start while a run is active', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({ provider });

      const handle = await coordinator.startSync('drive-1', 'full');

      expect(coordinator.isSyncActive('drive-1')).toBe(true);
      await expect(coordinator.startSync('drive-1', 'full')).rejects.toBeInstanceOf(SyncInProgressError);

      const job = await handle.done;
      expect(job.id).toBe(handle.jobId);
      expect(coordinator.isSyncActive('drive-1')).toBe(false);
      expect(await coordinator.listHistory('drive-1')).toHaveLength(1);
    });

    it('fails from pending when the provider session cannot be acquired', async () => {
      const coordinator = createCoordinator({});

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('failed');
      expect(job.startedAt).toBeNull();
      expect(job.errorMessage).toBe('Provider "drive-1" is not registered. Available: none');
      expect(received).toEqual([
        {
          type: 'failed',
          jobId: job.id,
          providerId: 'drive-1',
          error: 'Provider "drive-1" is not registered. Available: none',
        },
      ]);
    });

    it('fails without a network connection', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({
        provider,
        network: { connected: false, type: 'unknown', metered: false },
      });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('failed');
      expect(job.errorMessage).toBe('No network connection');
      expect(provider.listMedia).not.toHaveBeenCalled();
    });

    it('enforces Wi-Fi only mode', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({
        provider,
        config: { wifiOnly: true },
        network: { connected: true, type: 'cellular', metered: true },
      });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('failed');
      expect(job.errorMessage).toBe(
        'Wi-Fi only sync requires an unmetered Wi-Fi connection (current: cellular, metered)',
      );
    });

    it('syncs on unmetered Wi-Fi in Wi-Fi only mode', async () => {
      const provider = createMockProvider({ pages: singlePage([makeFile('f1')]) });
      const coordinator = createCoordinator({
        provider,
        config: { wifiOnly: true },
        network: { connected: true, type: 'wifi', metered: false },
      });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('completed');
    });

    it('fails the job when discovery fails and keeps the previous cursor', async () => {
      const provider = createMockProvider({});
      provider.listMedia.mockRejectedValue(new Error('listing unavailable'));
      const coordinator = createCoordinator({ provider });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('failed');
      expect(job.errorMessage).toBe('listing unavailable');
      expect(job.cursor).toBeNull();
      expect(job.discoveredAt).toBeNull();
      expect(received.map((event) => event.type)).toEqual(['started', 'failed']);
    });

    it('fails the job once the sync timeout elapses', async () => {
      const provider = createMockProvider({});
      provider.listMedia.mockImplementation(async () => {
        await new Promise((resolve) => setTimeout(resolve, 40));
        return { files: [makeFile('f1')], nextCursor: null, changeCursor: 'c1' };
      });
      const coordinator = createCoordinator({ provider, config: { syncTimeoutMs: 20 } });

      const job = await coordinator.runSync('drive-1', 'full');

      expect(job.status).toBe('failed');
      expect(job.errorMessage).toBe('Sync timed out after 20ms');
    });
  });
});
