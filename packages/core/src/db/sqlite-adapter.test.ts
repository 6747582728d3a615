import { describe, it, expect, beforeEach } from 'vitest';
import { SQLiteAdapter } from './sqlite-adapter.js';
import { cancelJob, createSyncJob, recordDiscovery, startJob } from '../job/state-machine.js';
import type { NewWorkItem } from '../types/queue.js';
import type { NewTrack } from '../types/library.js';

function makeItem(overrides?: Partial<NewWorkItem>): NewWorkItem {
  return {
    syncJobId: 'job-1',
    providerId: 'drive-1',
    remoteFileId: 'file-1',
    path: '/Music/track.mp3',
    size: 4_000_000,
    mimeType: 'audio/mpeg',
    providerModifiedAt: '2024-05-01T10:00:00.000Z',
    ...overrides,
  };
}

function makeTrack(overrides?: Partial<NewTrack>): NewTrack {
  return {
    providerId: 'drive-1',
    providerFileId: 'f1',
    path: '/Music/Blue Room.mp3',
    title: 'Blue Room',
    artistId: null,
    albumId: null,
    durationMs: 215_000,
    bitrate: 320,
    format: 'mp3',
    fileSize: 3_000_000,
    year: 2019,
    trackNumber: 1,
    genre: 'Synthpop',
    contentHash: 'hash-1',
    providerModifiedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('SQLiteAdapter', () => {
  let adapter: SQLiteAdapter;

  beforeEach(async () => {
    adapter = new SQLiteAdapter(':memory:');
    await adapter.migrate();
  });

  it('migrates idempotently', async () => {
    await expect(adapter.migrate()).resolves.toBeUndefined();
  });

  // ============================================
  // Jobs
  // ============================================

  describe('jobs', () => {
    it('saves and retrieves a job', async () => {
      const job = createSyncJob('drive-1', 'full', { id: 'job-1', now: '2024-05-01T00:00:00.000Z' });
      await adapter.saveJob(job);

      expect(await adapter.getJob('job-1')).toEqual(job);
      expect(await adapter.getJob('missing')).toBeNull();
    });

    it('overwrites an existing job on save', async () => {
      const job = createSyncJob('drive-1', 'full', { id: 'job-1' });
      await adapter.saveJob(job);
      const cancelled = cancelJob(job, { itemsAdded: 2, itemsUpdated: 1, itemsDeleted: 0, itemsFailed: 0 });
      await adapter.saveJob(cancelled);

      const stored = await adapter.getJob('job-1');
      expect(stored!.status).toBe('cancelled');
      expect(stored!.stats).toEqual({ itemsAdded: 2, itemsUpdated: 1, itemsDeleted: 0, itemsFailed: 0 });
      expect(await adapter.listJobs('drive-1')).toHaveLength(1);
    });

    it('finds the latest and the active job per provider', async () => {
      const older = createSyncJob('drive-1', 'full', { id: 'older', now: '2024-05-01T00:00:00.000Z' });
      const newer = createSyncJob('drive-1', 'incremental', { id: 'newer', now: '2024-05-02T00:00:00.000Z' });
      const other = createSyncJob('drive-2', 'full', { id: 'other', now: '2024-05-03T00:00:00.000Z' });
      await adapter.saveJob(startJob(older));
      await adapter.saveJob(cancelJob(newer));
      await adapter.saveJob(other);

      expect((await adapter.findLatestJob('drive-1'))!.id).toBe('newer');
      expect((await adapter.findActiveJob('drive-1'))!.id).toBe('older');
      expect(await adapter.findActiveJob('drive-3')).toBeNull();
    });

    it('returns the cursor of the latest job that finished discovery', async () => {
      const first = recordDiscovery(
        startJob(createSyncJob('drive-1', 'full', { id: 'first' })),
        'c1',
        3,
        '2024-05-01T00:00:00.000Z',
      );
      const second = startJob(createSyncJob('drive-1', 'incremental', { id: 'second' }));
      await adapter.saveJob(first);
      await adapter.saveJob(second);

      expect(await adapter.findLatestCursor('drive-1')).toBe('c1');
      expect(await adapter.findLatestCursor('drive-2')).toBeNull();

      await adapter.saveJob(recordDiscovery(second, 'c2', 1, '2024-05-02T00:00:00.000Z'));
      expect(await adapter.findLatestCursor('drive-1')).toBe('c2');
    });

    it('lists history newest first with a limit', async () => {
      for (let day = 1; day <= 3; day++) {
        await adapter.saveJob(
          createSyncJob('drive-1', 'full', { id: `job-${day}`, now: `2024-05-0${day}T00:00:00.000Z` }),
        );
      }

      const history = await adapter.listJobs('drive-1', 2);
      expect(history.map((job) => job.id)).toEqual(['job-3', 'job-2']);
    });
  });

  // ============================================
  // Work Items
  // ============================================

  describe('work items', () => {
    it('inserts a pending item with defaults', async () => {
      const item = await adapter.insertWorkItem(makeItem());

      expect(item).toMatchObject({
        priority: 'normal',
        status: 'pending',
        retryCount: 0,
        lastError: null,
        retryAt: null,
        processingStartedAt: null,
      });
      expect(await adapter.getWorkItem(item.id)).toEqual(item);
    });

    it('claims by priority then insertion order and marks processing', async () => {
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'low', priority: 'low' }));
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'normal' }));
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'high', priority: 'high' }));
      const now = '2024-05-02T00:00:00.000Z';

      const claimed = await adapter.claimNextWorkItem({}, now);

      expect(claimed).toMatchObject({ remoteFileId: 'high', status: 'processing', processingStartedAt: now });
      expect((await adapter.getWorkItem(claimed!.id))!.status).toBe('processing');
      expect((await adapter.claimNextWorkItem({}, now))!.remoteFileId).toBe('normal');
    });

    it('skips items whose retry time has not come', async () => {
      const item = await adapter.insertWorkItem(makeItem());
      await adapter.updateWorkItem(item.id, { retryAt: '2024-05-02T00:00:10.000Z' });

      expect(await adapter.claimNextWorkItem({}, '2024-05-02T00:00:00.000Z')).toBeNull();
      expect(await adapter.findEarliestRetryAt({})).toBe('2024-05-02T00:00:10.000Z');
      expect((await adapter.claimNextWorkItem({}, '2024-05-02T00:00:10.000Z'))!.id).toBe(item.id);
    });

    it('scopes claims and counts by provider and job', async () => {
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'a' }));
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'b', providerId: 'drive-2', syncJobId: 'job-2' }));

      const claimed = await adapter.claimNextWorkItem({ providerId: 'drive-2' }, new Date().toISOString());
      expect(claimed!.remoteFileId).toBe('b');

      expect(await adapter.countWorkItems({ providerId: 'drive-1' })).toEqual({
        pending: 1,
        processing: 0,
        completed: 0,
        failed: 0,
      });
      expect(await adapter.countWorkItems({ syncJobId: 'job-2' })).toEqual({
        pending: 0,
        processing: 1,
        completed: 0,
        failed: 0,
      });
    });

    it('finds the active item for a provider file', async () => {
      const item = await adapter.insertWorkItem(makeItem());

      expect((await adapter.findActiveWorkItem('drive-1', 'file-1'))!.id).toBe(item.id);
      await adapter.updateWorkItem(item.id, { status: 'completed' });
      expect(await adapter.findActiveWorkItem('drive-1', 'file-1')).toBeNull();
    });

    it('refreshes only pending items', async () => {
      const item = await adapter.insertWorkItem(makeItem());
      const refresh = {
        path: '/Music/renamed.mp3',
        size: 4_200_000,
        mimeType: 'audio/mpeg',
        providerModifiedAt: '2024-06-01T10:00:00.000Z',
        priority: 'high' as const,
      };

      expect(await adapter.refreshPendingWorkItem(item.id, refresh)).toMatchObject(refresh);

      await adapter.updateWorkItem(item.id, { status: 'processing' });
      expect(await adapter.refreshPendingWorkItem(item.id, { ...refresh, path: '/Music/other.mp3' })).toBeNull();
      expect((await adapter.getWorkItem(item.id))!.path).toBe('/Music/renamed.mp3');
    });

    it('deletes pending items of one file', async () => {
      await adapter.insertWorkItem(makeItem());
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'file-2' }));

      expect(await adapter.deletePendingWorkItems('drive-1', 'file-1')).toBe(1);
      expect((await adapter.listWorkItems({})).map((item) => item.remoteFileId)).toEqual(['file-2']);
    });

    it('resets processing items and deletes by status', async () => {
      await adapter.insertWorkItem(makeItem({ remoteFileId: 'a' }));
      const done = await adapter.insertWorkItem(makeItem({ remoteFileId: 'b' }));
      await adapter.claimNextWorkItem({}, new Date().toISOString());
      await adapter.updateWorkItem(done.id, { status: 'completed' });

      expect(await adapter.resetProcessingWorkItems({ providerId: 'drive-1' })).toBe(1);
      expect(await adapter.deleteWorkItems({ providerId: 'drive-1' }, 'completed')).toBe(1);

      const remaining = await adapter.listWorkItems({});
      expect(remaining.map((item) => [item.remoteFileId, item.status])).toEqual([['a', 'pending']]);
    });
  });

  // ============================================
  // Library
  // ============================================

  describe('tracks', () => {
    it('inserts, updates and deletes a track', async () => {
      const track = await adapter.insertTrack(makeTrack());
      expect(await adapter.getTrack(track.id)).toEqual(track);

      const updated = await adapter.updateTrack(track.id, { title: 'Blue Room (Live)' });
      expect(updated!.title).toBe('Blue Room (Live)');

      expect(await adapter.deleteTrack(track.id)).toBe(true);
      expect(await adapter.deleteTrack(track.id)).toBe(false);
      expect(await adapter.getTrack(track.id)).toBeNull();
    });

    it('only finds live tracks by provider file', async () => {
      const track = await adapter.insertTrack(makeTrack());
      expect((await adapter.findTrackByProviderFile('drive-1', 'f1'))!.id).toBe(track.id);

      await adapter.updateTrack(track.id, { deletedAt: '2024-05-01T00:00:00.000Z' });
      expect(await adapter.findTrackByProviderFile('drive-1', 'f1')).toBeNull();
      expect(await adapter.findTracksByContentHash('hash-1')).toEqual([]);
    });

    it('lists content hashes shared by unresolved live tracks', async () => {
      const primary = await adapter.insertTrack(makeTrack({ providerFileId: 'a' }));
      const copy = await adapter.insertTrack(makeTrack({ providerFileId: 'b' }));
      await adapter.insertTrack(makeTrack({ providerFileId: 'c', contentHash: 'hash-2' }));

      expect(await adapter.listDuplicateHashes()).toEqual(['hash-1']);

      await adapter.updateTrack(copy.id, { duplicateOf: primary.id });
      expect(await adapter.listDuplicateHashes()).toEqual([]);
      expect((await adapter.findDuplicatesOf(primary.id)).map((t) => t.id)).toEqual([copy.id]);
    });

    it('hides deleted and duplicate tracks unless asked', async () => {
      const a = await adapter.insertTrack(makeTrack({ providerFileId: 'a', path: '/Music/a.mp3' }));
      const b = await adapter.insertTrack(makeTrack({ providerFileId: 'b', path: '/Music/b.mp3' }));
      const c = await adapter.insertTrack(makeTrack({ providerFileId: 'c', path: '/Music/c.mp3' }));
      await adapter.updateTrack(b.id, { duplicateOf: a.id });
      await adapter.updateTrack(c.id, { deletedAt: '2024-05-01T00:00:00.000Z' });

      expect((await adapter.listTracks()).map((t) => t.id)).toEqual([a.id]);
      expect((await adapter.listTracks({ includeHidden: true })).map((t) => t.id)).toEqual([a.id, b.id, c.id]);
      expect((await adapter.listTracks({ includeHidden: true, limit: 1, offset: 1 })).map((t) => t.id)).toEqual([
        b.id,
      ]);
      expect((await adapter.listTrackFileRefs('drive-1')).map((ref) => ref.providerFileId)).toEqual(['a', 'b']);
    });

    it('resolves artists by normalized name', async () => {
      const first = await adapter.resolveArtist('The Lanterns');
      const second = await adapter.resolveArtist('  the   LANTERNS ');

      expect(second.id).toBe(first.id);
      expect(second.name).toBe('The Lanterns');
    });

    it('resolves albums per artist', async () => {
      const artist = await adapter.resolveArtist('The Lanterns');
      const album = await adapter.resolveAlbum('Night Drive', artist.id, 2019);

      expect((await adapter.resolveAlbum('night drive', artist.id)).id).toBe(album.id);
      expect((await adapter.resolveAlbum('Night Drive', null)).id).not.toBe(album.id);
      expect(album.year).toBe(2019);
    });
  });
});
