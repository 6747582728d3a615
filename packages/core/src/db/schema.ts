import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import { SYNC_STATUSES, SYNC_TYPES } from '../types/sync.js';
import type { SyncStats } from '../types/sync.js';
import { WORK_ITEM_STATUSES } from '../types/queue.js';

// ============================================
// SYNC JOBS
// ============================================
export const syncJobs = sqliteTable(
  'sync_jobs',
  {
    id: text('id').primaryKey(),
    providerId: text('provider_id').notNull(),
    syncType: text('sync_type', { enum: SYNC_TYPES }).notNull(),
    status: text('status', { enum: SYNC_STATUSES }).notNull(),
    itemsDiscovered: integer('items_discovered').notNull().default(0),
    itemsProcessed: integer('items_processed').notNull().default(0),
    itemsFailed: integer('items_failed').notNull().default(0),
    percent: integer('percent').notNull().default(0),
    phase: text('phase').notNull(),
    cursor: text('cursor'),
    stats: text('stats', { mode: 'json' }).$type<SyncStats>(),
    errorMessage: text('error_message'),
    createdAt: text('created_at').notNull(),
    startedAt: text('started_at'),
    completedAt: text('completed_at'),
    discoveredAt: text('discovered_at'),
  },
  (table) => [
    index('sync_jobs_provider').on(table.providerId, table.createdAt),
    index('sync_jobs_provider_status').on(table.providerId, table.status),
  ],
);

// ============================================
// WORK ITEMS
// ============================================
export const workItems = sqliteTable(
  'work_items',
  {
    // Insertion order; FIFO tie-break within a priority band
    seq: integer('seq').primaryKey({ autoIncrement: true }),
    id: text('id').notNull(),
    syncJobId: text('sync_job_id').notNull(),
    providerId: text('provider_id').notNull(),
    remoteFileId: text('remote_file_id').notNull(),
    path: text('path').notNull(),
    size: integer('size'),
    mimeType: text('mime_type'),
    providerModifiedAt: text('provider_modified_at'),
    priority: integer('priority').notNull(),
    status: text('status', { enum: WORK_ITEM_STATUSES }).notNull(),
    retryCount: integer('retry_count').notNull().default(0),
    lastError: text('last_error'),
    retryAt: text('retry_at'),
    processingStartedAt: text('processing_started_at'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    uniqueIndex('work_items_id').on(table.id),
    index('work_items_dequeue').on(table.providerId, table.status, table.priority, table.seq),
    index('work_items_job').on(table.syncJobId),
    index('work_items_remote_file').on(table.providerId, table.remoteFileId),
  ],
);

// ============================================
// LIBRARY
// ============================================
export const artists = sqliteTable(
  'artists',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    normalizedName: text('normalized_name').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [uniqueIndex('artists_normalized_name').on(table.normalizedName)],
);

export const albums = sqliteTable(
  'albums',
  {
    id: text('id').primaryKey(),
    title: text('title').notNull(),
    normalizedTitle: text('normalized_title').notNull(),
    artistId: text('artist_id'),
    year: integer('year'),
    createdAt: text('created_at').notNull(),
  },
  (table) => [index('albums_lookup').on(table.normalizedTitle, table.artistId)],
);

export const tracks = sqliteTable(
  'tracks',
  {
    id: text('id').primaryKey(),
    providerId: text('provider_id').notNull(),
    providerFileId: text('provider_file_id').notNull(),
    path: text('path').notNull(),
    title: text('title').notNull(),
    artistId: text('artist_id'),
    albumId: text('album_id'),
    durationMs: integer('duration_ms'),
    bitrate: integer('bitrate'),
    format: text('format'),
    fileSize: integer('file_size'),
    year: integer('year'),
    trackNumber: integer('track_number'),
    genre: text('genre'),
    contentHash: text('content_hash'),
    providerModifiedAt: text('provider_modified_at'),
    duplicateOf: text('duplicate_of'),
    deletedAt: text('deleted_at'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    index('tracks_provider_file').on(table.providerId, table.providerFileId),
    index('tracks_content_hash').on(table.contentHash),
    index('tracks_duplicate_of').on(table.duplicateOf),
  ],
);
