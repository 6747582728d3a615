import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq, and, or, sql, desc, asc, inArray, isNull, isNotNull, lte, type SQL } from 'drizzle-orm';
import type { DatabaseAdapter } from '../types/database.js';
import type { SyncJob } from '../types/sync.js';
import { priorityFromRank, PRIORITY_RANK } from '../types/queue.js';
import type {
  NewWorkItem,
  QueueScope,
  WorkItem,
  WorkItemCounts,
  WorkItemRefresh,
  WorkItemStatus,
  WorkItemUpdate,
} from '../types/queue.js';
import type {
  Album,
  Artist,
  ListTracksOptions,
  NewTrack,
  Track,
  TrackFileRef,
  TrackUpdate,
} from '../types/library.js';
import * as schema from './schema.js';

type JobRow = typeof schema.syncJobs.$inferSelect;
type WorkItemRow = typeof schema.workItems.$inferSelect;
type TrackRow = typeof schema.tracks.$inferSelect;

function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: BetterSQLite3Database<typeof schema>;
  private readonly sqlite: Database.Database | null;

  constructor(pathOrDb: string | BetterSQLite3Database<typeof schema>) {
    if (typeof pathOrDb === 'string') {
      const sqlite = new Database(pathOrDb);
      sqlite.pragma('journal_mode = WAL');
      sqlite.pragma('foreign_keys = ON');
      this.sqlite = sqlite;
      this.db = drizzle(sqlite, { schema });
    } else {
      this.sqlite = null;
      this.db = pathOrDb;
    }
  }

  async migrate(): Promise<void> {
    const statements = [
      `CREATE TABLE IF NOT EXISTS sync_jobs (
        id TEXT PRIMARY KEY,
        provider_id TEXT NOT NULL,
        sync_type TEXT NOT NULL,
        status TEXT NOT NULL,
        items_discovered INTEGER NOT NULL DEFAULT 0,
        items_processed INTEGER NOT NULL DEFAULT 0,
        items_failed INTEGER NOT NULL DEFAULT 0,
        percent INTEGER NOT NULL DEFAULT 0,
        phase TEXT NOT NULL,
        cursor TEXT,
        stats TEXT,
        error_message TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        discovered_at TEXT
      )`,
      `CREATE INDEX IF NOT EXISTS sync_jobs_provider ON sync_jobs (provider_id, created_at)`,
      `CREATE INDEX IF NOT EXISTS sync_jobs_provider_status ON sync_jobs (provider_id, status)`,
      `CREATE TABLE IF NOT EXISTS work_items (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL,
        sync_job_id TEXT NOT NULL,
        provider_id TEXT NOT NULL,
        remote_file_id TEXT NOT NULL,
        path TEXT NOT NULL,
        size INTEGER,
        mime_type TEXT,
        provider_modified_at TEXT,
        priority INTEGER NOT NULL,
        status TEXT NOT NULL,
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        retry_at TEXT,
        processing_started_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS work_items_id ON work_items (id)`,
      `CREATE INDEX IF NOT EXISTS work_items_dequeue ON work_items (provider_id, status, priority, seq)`,
      `CREATE INDEX IF NOT EXISTS work_items_job ON work_items (sync_job_id)`,
      `CREATE INDEX IF NOT EXISTS work_items_remote_file ON work_items (provider_id, remote_file_id)`,
      `CREATE TABLE IF NOT EXISTS artists (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        normalized_name TEXT NOT NULL,
        created_at TEXT NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS artists_normalized_name ON artists (normalized_name)`,
      `CREATE TABLE IF NOT EXISTS albums (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        normalized_title TEXT NOT NULL,
        artist_id TEXT,
        year INTEGER,
        created_at TEXT NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS albums_lookup ON albums (normalized_title, artist_id)`,
      `CREATE TABLE IF NOT EXISTS tracks (
        id TEXT PRIMARY KEY,
        provider_id TEXT NOT NULL,
        provider_file_id TEXT NOT NULL,
        path TEXT NOT NULL,
        title TEXT NOT NULL,
        artist_id TEXT,
        album_id TEXT,
        duration_ms INTEGER,
        bitrate INTEGER,
        format TEXT,
        file_size INTEGER,
        year INTEGER,
        track_number INTEGER,
        genre TEXT,
        content_hash TEXT,
        provider_modified_at TEXT,
        duplicate_of TEXT,
        deleted_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS tracks_provider_file ON tracks (provider_id, provider_file_id)`,
      `CREATE INDEX IF NOT EXISTS tracks_content_hash ON tracks (content_hash)`,
      `CREATE INDEX IF NOT EXISTS tracks_duplicate_of ON tracks (duplicate_of)`,
    ];

    for (const stmt of statements) {
      this.db.run(sql.raw(stmt));
    }
  }

  close(): void {
    this.sqlite?.close();
  }

  private transaction<T>(fn: () => T): T {
    // Execute in transaction if we have access to sqlite instance
    if (this.sqlite) {
      return this.sqlite.transaction(fn)();
    }
    return fn();
  }

  // ============================================
  // Sync Jobs
  // ============================================

  async saveJob(job: SyncJob): Promise<void> {
    const values = {
      providerId: job.providerId,
      syncType: job.syncType,
      status: job.status,
      itemsDiscovered: job.progress.itemsDiscovered,
      itemsProcessed: job.progress.itemsProcessed,
      itemsFailed: job.progress.itemsFailed,
      percent: job.progress.percent,
      phase: job.progress.phase,
      cursor: job.cursor,
      stats: job.stats,
      errorMessage: job.errorMessage,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      discoveredAt: job.discoveredAt,
    };

    this.db
      .insert(schema.syncJobs)
      .values({ id: job.id, ...values })
      .onConflictDoUpdate({ target: schema.syncJobs.id, set: values })
      .run();
  }

  async getJob(jobId: string): Promise<SyncJob | null> {
    const row = this.db
      .select()
      .from(schema.syncJobs)
      .where(eq(schema.syncJobs.id, jobId))
      .get();

    return row ? this.rowToJob(row) : null;
  }

  async findLatestJob(providerId: string): Promise<SyncJob | null> {
    const row = this.db
      .select()
      .from(schema.syncJobs)
      .where(eq(schema.syncJobs.providerId, providerId))
      .orderBy(desc(schema.syncJobs.createdAt), desc(sql`rowid`))
      .limit(1)
      .get();

    return row ? this.rowToJob(row) : null;
  }

  async findActiveJob(providerId: string): Promise<SyncJob | null> {
    const row = this.db
      .select()
      .from(schema.syncJobs)
      .where(
        and(
          eq(schema.syncJobs.providerId, providerId),
          inArray(schema.syncJobs.status, ['pending', 'running']),
        ),
      )
      .orderBy(desc(schema.syncJobs.createdAt), desc(sql`rowid`))
      .limit(1)
      .get();

    return row ? this.rowToJob(row) : null;
  }

  async findLatestCursor(providerId: string): Promise<string | null> {
    const row = this.db
      .select({ cursor: schema.syncJobs.cursor })
      .from(schema.syncJobs)
      .where(
        and(
          eq(schema.syncJobs.providerId, providerId),
          isNotNull(schema.syncJobs.discoveredAt),
        ),
      )
      .orderBy(desc(schema.syncJobs.discoveredAt), desc(sql`rowid`))
      .limit(1)
      .get();

    return row?.cursor ?? null;
  }

  async listJobs(providerId: string, limit = 20): Promise<SyncJob[]> {
    const rows = this.db
      .select()
      .from(schema.syncJobs)
      .where(eq(schema.syncJobs.providerId, providerId))
      .orderBy(desc(schema.syncJobs.createdAt), desc(sql`rowid`))
      .limit(limit)
      .all();

    return rows.map((row) => this.rowToJob(row));
  }

  // ============================================
  // Work Items
  // ============================================

  private workItemScope(scope: QueueScope): SQL[] {
    const conditions: SQL[] = [];
    if (scope.providerId) {
      conditions.push(eq(schema.workItems.providerId, scope.providerId));
    }
    if (scope.syncJobId) {
      conditions.push(eq(schema.workItems.syncJobId, scope.syncJobId));
    }
    return conditions;
  }

  async insertWorkItem(item: NewWorkItem): Promise<WorkItem> {
    const now = new Date().toISOString();
    const workItem: WorkItem = {
      id: crypto.randomUUID(),
      syncJobId: item.syncJobId,
      providerId: item.providerId,
      remoteFileId: item.remoteFileId,
      path: item.path,
      size: item.size,
      mimeType: item.mimeType,
      providerModifiedAt: item.providerModifiedAt,
      priority: item.priority ?? 'normal',
      status: 'pending',
      retryCount: 0,
      lastError: null,
      retryAt: null,
      processingStartedAt: null,
      createdAt: now,
      updatedAt: now,
    };

    this.db
      .insert(schema.workItems)
      .values({ ...workItem, priority: PRIORITY_RANK[workItem.priority] })
      .run();

    return workItem;
  }

  async getWorkItem(itemId: string): Promise<WorkItem | null> {
    const row = this.db
      .select()
      .from(schema.workItems)
      .where(eq(schema.workItems.id, itemId))
      .get();

    return row ? this.rowToWorkItem(row) : null;
  }

  async claimNextWorkItem(scope: QueueScope, now: string): Promise<WorkItem | null> {
    const claimFn = (): WorkItem | null => {
      const row = this.db
        .select()
        .from(schema.workItems)
        .where(
          and(
            ...this.workItemScope(scope),
            eq(schema.workItems.status, 'pending'),
            or(isNull(schema.workItems.retryAt), lte(schema.workItems.retryAt, now)),
          ),
        )
        .orderBy(desc(schema.workItems.priority), asc(schema.workItems.seq))
        .limit(1)
        .get();

      if (!row) return null;

      this.db
        .update(schema.workItems)
        .set({ status: 'processing', processingStartedAt: now, updatedAt: now })
        .where(eq(schema.workItems.seq, row.seq))
        .run();

      return this.rowToWorkItem({
        ...row,
        status: 'processing',
        processingStartedAt: now,
        updatedAt: now,
      });
    };

    return this.transaction(claimFn);
  }

  async updateWorkItem(itemId: string, update: WorkItemUpdate): Promise<WorkItem | null> {
    this.db
      .update(schema.workItems)
      .set({ ...update, updatedAt: new Date().toISOString() })
      .where(eq(schema.workItems.id, itemId))
      .run();

    return this.getWorkItem(itemId);
  }

  async countWorkItems(scope: QueueScope): Promise<WorkItemCounts> {
    const rows = this.db
      .select({ status: schema.workItems.status, count: sql<number>`count(*)` })
      .from(schema.workItems)
      .where(and(...this.workItemScope(scope)))
      .groupBy(schema.workItems.status)
      .all();

    const counts: WorkItemCounts = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  async listWorkItems(scope: QueueScope, status?: WorkItemStatus): Promise<WorkItem[]> {
    const conditions = this.workItemScope(scope);
    if (status) {
      conditions.push(eq(schema.workItems.status, status));
    }

    const rows = this.db
      .select()
      .from(schema.workItems)
      .where(and(...conditions))
      .orderBy(desc(schema.workItems.priority), asc(schema.workItems.seq))
      .all();

    return rows.map((row) => this.rowToWorkItem(row));
  }

  async findEarliestRetryAt(scope: QueueScope): Promise<string | null> {
    const result = this.db
      .select({ retryAt: sql<string | null>`min(${schema.workItems.retryAt})` })
      .from(schema.workItems)
      .where(
        and(
          ...this.workItemScope(scope),
          eq(schema.workItems.status, 'pending'),
          isNotNull(schema.workItems.retryAt),
        ),
      )
      .get();

    return result?.retryAt ?? null;
  }

  async findActiveWorkItem(providerId: string, remoteFileId: string): Promise<WorkItem | null> {
    const row = this.db
      .select()
      .from(schema.workItems)
      .where(
        and(
          eq(schema.workItems.providerId, providerId),
          eq(schema.workItems.remoteFileId, remoteFileId),
          inArray(schema.workItems.status, ['pending', 'processing']),
        ),
      )
      .orderBy(asc(schema.workItems.seq))
      .limit(1)
      .get();

    return row ? this.rowToWorkItem(row) : null;
  }

  async refreshPendingWorkItem(itemId: string, refresh: WorkItemRefresh): Promise<WorkItem | null> {
    const result = this.db
      .update(schema.workItems)
      .set({
        path: refresh.path,
        size: refresh.size,
        mimeType: refresh.mimeType,
        providerModifiedAt: refresh.providerModifiedAt,
        priority: PRIORITY_RANK[refresh.priority],
        updatedAt: new Date().toISOString(),
      })
      .where(and(eq(schema.workItems.id, itemId), eq(schema.workItems.status, 'pending')))
      .run();

    return result.changes > 0 ? this.getWorkItem(itemId) : null;
  }

  async deletePendingWorkItems(providerId: string, remoteFileId: string): Promise<number> {
    const result = this.db
      .delete(schema.workItems)
      .where(
        and(
          eq(schema.workItems.providerId, providerId),
          eq(schema.workItems.remoteFileId, remoteFileId),
          eq(schema.workItems.status, 'pending'),
        ),
      )
      .run();

    return result.changes;
  }

  async resetProcessingWorkItems(scope: QueueScope): Promise<number> {
    const result = this.db
      .update(schema.workItems)
      .set({
        status: 'pending',
        processingStartedAt: null,
        updatedAt: new Date().toISOString(),
      })
      .where(and(...this.workItemScope(scope), eq(schema.workItems.status, 'processing')))
      .run();

    return result.changes;
  }

  async deleteWorkItems(scope: QueueScope, status: WorkItemStatus): Promise<number> {
    const result = this.db
      .delete(schema.workItems)
      .where(and(...this.workItemScope(scope), eq(schema.workItems.status, status)))
      .run();

    return result.changes;
  }

  // ============================================
  // Tracks
  // ============================================

  async insertTrack(track: NewTrack): Promise<Track> {
    const now = new Date().toISOString();
    const record: Track = {
      ...track,
      id: crypto.randomUUID(),
      duplicateOf: null,
      deletedAt: null,
      createdAt: now,
      updatedAt: now,
    };

    this.db.insert(schema.tracks).values(record).run();
    return record;
  }

  async updateTrack(id: string, update: TrackUpdate): Promise<Track | null> {
    this.db
      .update(schema.tracks)
      .set({ ...update, updatedAt: new Date().toISOString() })
      .where(eq(schema.tracks.id, id))
      .run();

    return this.getTrack(id);
  }

  async deleteTrack(id: string): Promise<boolean> {
    const result = this.db.delete(schema.tracks).where(eq(schema.tracks.id, id)).run();
    return result.changes > 0;
  }

  async getTrack(id: string): Promise<Track | null> {
    const row = this.db.select().from(schema.tracks).where(eq(schema.tracks.id, id)).get();
    return row ? this.rowToTrack(row) : null;
  }

  async findTrackByProviderFile(providerId: string, providerFileId: string): Promise<Track | null> {
    const row = this.db
      .select()
      .from(schema.tracks)
      .where(
        and(
          eq(schema.tracks.providerId, providerId),
          eq(schema.tracks.providerFileId, providerFileId),
          isNull(schema.tracks.deletedAt),
        ),
      )
      .orderBy(asc(schema.tracks.createdAt), asc(schema.tracks.id))
      .limit(1)
      .get();

    return row ? this.rowToTrack(row) : null;
  }

  async findTracksByContentHash(contentHash: string): Promise<Track[]> {
    const rows = this.db
      .select()
      .from(schema.tracks)
      .where(and(eq(schema.tracks.contentHash, contentHash), isNull(schema.tracks.deletedAt)))
      .orderBy(asc(schema.tracks.createdAt), asc(schema.tracks.id))
      .all();

    return rows.map((row) => this.rowToTrack(row));
  }

  async listDuplicateHashes(): Promise<string[]> {
    const rows = this.db
      .select({ contentHash: schema.tracks.contentHash })
      .from(schema.tracks)
      .where(
        and(
          isNotNull(schema.tracks.contentHash),
          isNull(schema.tracks.deletedAt),
          isNull(schema.tracks.duplicateOf),
        ),
      )
      .groupBy(schema.tracks.contentHash)
      .having(sql`count(*) > 1`)
      .orderBy(asc(schema.tracks.contentHash))
      .all();

    return rows.flatMap((row) => (row.contentHash === null ? [] : [row.contentHash]));
  }

  async findDuplicatesOf(trackId: string): Promise<Track[]> {
    const rows = this.db
      .select()
      .from(schema.tracks)
      .where(and(eq(schema.tracks.duplicateOf, trackId), isNull(schema.tracks.deletedAt)))
      .orderBy(asc(schema.tracks.createdAt), asc(schema.tracks.id))
      .all();

    return rows.map((row) => this.rowToTrack(row));
  }

  async listTrackFileRefs(providerId: string): Promise<TrackFileRef[]> {
    return this.db
      .select({ id: schema.tracks.id, providerFileId: schema.tracks.providerFileId })
      .from(schema.tracks)
      .where(and(eq(schema.tracks.providerId, providerId), isNull(schema.tracks.deletedAt)))
      .orderBy(asc(schema.tracks.path))
      .all();
  }

  async listTracks(options?: ListTracksOptions): Promise<Track[]> {
    const conditions: SQL[] = [];
    if (options?.providerId) {
      conditions.push(eq(schema.tracks.providerId, options.providerId));
    }
    if (!options?.includeHidden) {
      conditions.push(isNull(schema.tracks.deletedAt), isNull(schema.tracks.duplicateOf));
    }

    const rows = this.db
      .select()
      .from(schema.tracks)
      .where(and(...conditions))
      .orderBy(asc(schema.tracks.path), asc(schema.tracks.id))
      .limit(options?.limit ?? -1)
      .offset(options?.offset ?? 0)
      .all();

    return rows.map((row) => this.rowToTrack(row));
  }

  // ============================================
  // Artists & Albums
  // ============================================

  async resolveArtist(name: string): Promise<Artist> {
    const normalizedName = normalizeName(name);

    const resolveFn = (): Artist => {
      const existing = this.db
        .select()
        .from(schema.artists)
        .where(eq(schema.artists.normalizedName, normalizedName))
        .get();

      if (existing) {
        return { id: existing.id, name: existing.name, createdAt: existing.createdAt };
      }

      const artist: Artist = {
        id: crypto.randomUUID(),
        name: name.trim(),
        createdAt: new Date().toISOString(),
      };
      this.db.insert(schema.artists).values({ ...artist, normalizedName }).run();
      return artist;
    };

    return this.transaction(resolveFn);
  }

  async resolveAlbum(title: string, artistId: string | null, year?: number | null): Promise<Album> {
    const normalizedTitle = normalizeName(title);

    const resolveFn = (): Album => {
      const existing = this.db
        .select()
        .from(schema.albums)
        .where(
          and(
            eq(schema.albums.normalizedTitle, normalizedTitle),
            artistId === null ? isNull(schema.albums.artistId) : eq(schema.albums.artistId, artistId),
          ),
        )
        .get();

      if (existing) {
        return {
          id: existing.id,
          title: existing.title,
          artistId: existing.artistId,
          year: existing.year,
          createdAt: existing.createdAt,
        };
      }

      const album: Album = {
        id: crypto.randomUUID(),
        title: title.trim(),
        artistId,
        year: year ?? null,
        createdAt: new Date().toISOString(),
      };
      this.db.insert(schema.albums).values({ ...album, normalizedTitle }).run();
      return album;
    };

    return this.transaction(resolveFn);
  }

  // ============================================
  // Helpers
  // ============================================

  private rowToJob(row: JobRow): SyncJob {
    return {
      id: row.id,
      providerId: row.providerId,
      syncType: row.syncType,
      status: row.status,
      progress: {
        itemsDiscovered: row.itemsDiscovered,
        itemsProcessed: row.itemsProcessed,
        itemsFailed: row.itemsFailed,
        percent: row.percent,
        phase: row.phase,
      },
      cursor: row.cursor,
      stats: row.stats ?? null,
      errorMessage: row.errorMessage,
      createdAt: row.createdAt,
      startedAt: row.startedAt,
      completedAt: row.completedAt,
      discoveredAt: row.discoveredAt,
    };
  }

  private rowToWorkItem(row: WorkItemRow): WorkItem {
    return {
      id: row.id,
      syncJobId: row.syncJobId,
      providerId: row.providerId,
      remoteFileId: row.remoteFileId,
      path: row.path,
      size: row.size,
      mimeType: row.mimeType,
      providerModifiedAt: row.providerModifiedAt,
      priority: priorityFromRank(row.priority),
      status: row.status,
      retryCount: row.retryCount,
      lastError: row.lastError,
      retryAt: row.retryAt,
      processingStartedAt: row.processingStartedAt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  private rowToTrack(row: TrackRow): Track {
    return {
      id: row.id,
      providerId: row.providerId,
      providerFileId: row.providerFileId,
      path: row.path,
      title: row.title,
      artistId: row.artistId,
      albumId: row.albumId,
      durationMs: row.durationMs,
      bitrate: row.bitrate,
      format: row.format,
      fileSize: row.fileSize,
      year: row.year,
      trackNumber: row.trackNumber,
      genre: row.genre,
      contentHash: row.contentHash,
      providerModifiedAt: row.providerModifiedAt,
      duplicateOf: row.duplicateOf,
      deletedAt: row.deletedAt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
