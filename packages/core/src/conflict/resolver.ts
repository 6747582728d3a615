import { TOMBSTONE_PREFIX } from '../types/library.js';
import type {
  ConflictPolicy,
  LibraryStore,
  MergeResult,
  Track,
  TrackTags,
  TrackUpdate,
} from '../types/library.js';
import type { EventSink } from '../types/events.js';
import { copyTagField, mergeMetadata } from './merge.js';
import { fileStem } from '../sync/audio-filter.js';
import { noopEventSink, safeEmit } from '../events.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

export interface ConflictResolverOptions {
  policy?: ConflictPolicy;
  /** Remove deleted tracks instead of tombstoning them */
  hardDelete?: boolean;
  events?: EventSink;
  logger?: Logger;
}

export interface DuplicateResolution {
  contentHash: string;
  action: 'merged' | 'kept_both' | 'prompted';
  /** Winning track; null when the policy made no choice */
  primaryId: string | null;
  duplicateIds: string[];
  /** File size held by the losing copies */
  reclaimableBytes: number;
}

export interface DeletionResult {
  trackId: string;
  mode: 'soft' | 'hard';
  releasedDuplicates: number;
}

export interface SweepScope {
  providerId: string;
  /** Provider file ids seen by a completed full listing. Enables the missing-file pass. */
  seenFileIds?: ReadonlySet<string>;
}

export interface ConflictSweepStats {
  duplicatesDetected: number;
  duplicatesResolved: number;
  deletionsSoft: number;
  deletionsHard: number;
  spaceReclaimedBytes: number;
  errors: number;
}

export function tagsOf(track: Track): TrackTags {
  return {
    title: track.title,
    artistId: track.artistId,
    albumId: track.albumId,
    durationMs: track.durationMs,
    year: track.year,
    trackNumber: track.trackNumber,
    genre: track.genre,
    providerModifiedAt: track.providerModifiedAt,
  };
}

function timeOf(value: string | null): number {
  return value ? new Date(value).getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Primary-first ordering: highest bitrate, then most recently modified,
 * then oldest library entry, then id.
 */
export function comparePrimary(a: Track, b: Track): number {
  const bitrate = (b.bitrate ?? -1) - (a.bitrate ?? -1);
  if (bitrate !== 0) return bitrate;

  const modifiedA = timeOf(a.providerModifiedAt);
  const modifiedB = timeOf(b.providerModifiedAt);
  if (modifiedA !== modifiedB) return modifiedB > modifiedA ? 1 : -1;

  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Duplicate detection, rename reconciliation, deletion handling and metadata
 * merge over persisted library tracks. Every operation is idempotent.
 */
export class ConflictResolver {
  private readonly library: LibraryStore;
  private readonly events: EventSink;
  private readonly logger: Logger;
  readonly policy: ConflictPolicy;
  readonly hardDelete: boolean;

  constructor(library: LibraryStore, options?: ConflictResolverOptions) {
    this.library = library;
    this.policy = options?.policy ?? 'keep_newest';
    this.hardDelete = options?.hardDelete ?? false;
    this.events = options?.events ?? noopEventSink;
    this.logger = options?.logger ?? noopLogger;
  }

  mergeMetadata(existing: TrackTags, incoming: TrackTags): MergeResult {
    return mergeMetadata(existing, incoming, this.policy);
  }

  // ============================================
  // Duplicates
  // ============================================

  /**
   * Resolve every content-hash group with more than one live track, library-wide.
   * A failing group is logged and skipped.
   */
  async detectDuplicates(): Promise<DuplicateResolution[]> {
    const hashes = await this.library.listDuplicateHashes();
    const resolutions: DuplicateResolution[] = [];

    for (const contentHash of hashes) {
      try {
        const resolution = await this.resolveDuplicateGroup(contentHash);
        if (resolution) resolutions.push(resolution);
      } catch (error) {
        this.logger.warn('Failed to resolve duplicate group', {
          contentHash,
          error: errorMessage(error),
        });
      }
    }

    return resolutions;
  }

  async resolveDuplicateGroup(contentHash: string): Promise<DuplicateResolution | null> {
    const group = (await this.library.findTracksByContentHash(contentHash)).filter(
      (track) => track.duplicateOf === null,
    );
    if (group.length < 2) return null;

    const trackIds = group.map((track) => track.id);

    if (this.policy === 'keep_both') {
      return { contentHash, action: 'kept_both', primaryId: null, duplicateIds: [], reclaimableBytes: 0 };
    }

    if (this.policy === 'user_prompt') {
      safeEmit(this.events, { type: 'conflict', contentHash, trackIds }, this.logger);
      return { contentHash, action: 'prompted', primaryId: null, duplicateIds: [], reclaimableBytes: 0 };
    }

    const [primary, ...losers] = [...group].sort(comparePrimary);
    if (!primary) return null;

    // Fill gaps on the primary from the losing copies
    let primaryTags = tagsOf(primary);
    const filled: TrackUpdate = {};
    for (const loser of losers) {
      const { merged, changedFields } = mergeMetadata(primaryTags, tagsOf(loser), 'keep_both');
      for (const field of changedFields) {
        copyTagField(filled, merged, field);
      }
      primaryTags = merged;
    }
    if (Object.keys(filled).length > 0) {
      await this.library.updateTrack(primary.id, filled);
    }

    let reclaimableBytes = 0;
    for (const loser of losers) {
      await this.library.updateTrack(loser.id, { duplicateOf: primary.id });
      for (const nested of await this.library.findDuplicatesOf(loser.id)) {
        await this.library.updateTrack(nested.id, { duplicateOf: primary.id });
      }
      reclaimableBytes += loser.fileSize ?? 0;
    }

    this.logger.info('Resolved duplicate group', {
      contentHash,
      primaryId: primary.id,
      duplicates: losers.length,
    });

    return {
      contentHash,
      action: 'merged',
      primaryId: primary.id,
      duplicateIds: losers.map((track) => track.id),
      reclaimableBytes,
    };
  }

  // ============================================
  // Renames
  // ============================================

  /**
   * Point an existing track at its new path. A title that was derived from
   * the old file name follows the rename. Never downloads.
   */
  async resolveRename(
    providerId: string,
    remoteFileId: string,
    newPath: string,
  ): Promise<Track | null> {
    const track = await this.library.findTrackByProviderFile(providerId, remoteFileId);
    if (!track) return null;
    if (track.path === newPath) return track;

    const update: TrackUpdate = { path: newPath };
    if (track.title === fileStem(track.path)) {
      update.title = fileStem(newPath);
    }

    this.logger.info('Track renamed', { trackId: track.id, from: track.path, to: newPath });
    return this.library.updateTrack(track.id, update);
  }

  // ============================================
  // Deletions
  // ============================================

  /**
   * Remove the track behind a deleted provider file. Returns null when no
   * live track exists, so repeated calls are no-ops.
   */
  async handleDeletion(providerId: string, remoteFileId: string): Promise<DeletionResult | null> {
    const track = await this.library.findTrackByProviderFile(providerId, remoteFileId);
    if (!track) {
      this.logger.debug('Deletion for unknown file ignored', { providerId, remoteFileId });
      return null;
    }
    return this.deleteTrack(track);
  }

  async deleteTrack(track: Track): Promise<DeletionResult> {
    const duplicates = await this.library.findDuplicatesOf(track.id);

    if (this.hardDelete) {
      await this.library.deleteTrack(track.id);
    } else {
      await this.library.updateTrack(track.id, {
        providerFileId: `${TOMBSTONE_PREFIX}${track.providerFileId}`,
        deletedAt: new Date().toISOString(),
        duplicateOf: null,
      });
    }

    // Copies that lost to the deleted track compete again, as if it never existed
    for (const duplicate of duplicates) {
      await this.library.updateTrack(duplicate.id, { duplicateOf: null });
    }
    if (duplicates.length > 0 && track.contentHash) {
      await this.resolveDuplicateGroup(track.contentHash);
    }

    const mode = this.hardDelete ? 'hard' : 'soft';
    this.logger.info('Track deleted', { trackId: track.id, path: track.path, mode });
    return { trackId: track.id, mode, releasedDuplicates: duplicates.length };
  }

  // ============================================
  // Post-processing sweep
  // ============================================

  /**
   * Runs after processing drains: removes tracks a full listing no longer
   * contains, then resolves duplicates library-wide.
   */
  async sweep(scope: SweepScope): Promise<ConflictSweepStats> {
    const stats: ConflictSweepStats = {
      duplicatesDetected: 0,
      duplicatesResolved: 0,
      deletionsSoft: 0,
      deletionsHard: 0,
      spaceReclaimedBytes: 0,
      errors: 0,
    };

    if (scope.seenFileIds) {
      const refs = await this.library.listTrackFileRefs(scope.providerId);
      for (const ref of refs) {
        if (scope.seenFileIds.has(ref.providerFileId)) continue;
        try {
          const result = await this.handleDeletion(scope.providerId, ref.providerFileId);
          if (result?.mode === 'soft') stats.deletionsSoft++;
          if (result?.mode === 'hard') stats.deletionsHard++;
        } catch (error) {
          stats.errors++;
          this.logger.warn('Failed to remove missing track', {
            trackId: ref.id,
            error: errorMessage(error),
          });
        }
      }
    }

    const hashes = await this.library.listDuplicateHashes();
    stats.duplicatesDetected = hashes.length;
    for (const contentHash of hashes) {
      try {
        const resolution = await this.resolveDuplicateGroup(contentHash);
        if (resolution?.action === 'merged') {
          stats.duplicatesResolved++;
          stats.spaceReclaimedBytes += resolution.reclaimableBytes;
        }
      } catch (error) {
        stats.errors++;
        this.logger.warn('Failed to resolve duplicate group', {
          contentHash,
          error: errorMessage(error),
        });
      }
    }

    return stats;
  }
}

export function totalDeleted(stats: ConflictSweepStats): number {
  return stats.deletionsSoft + stats.deletionsHard;
}
