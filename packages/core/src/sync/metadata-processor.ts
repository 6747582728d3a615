import type { WorkItem } from '../types/queue.js';
import type { StorageProvider, ByteRange } from '../types/storage.js';
import type { ExtractedMetadata, MetadataExtractor } from '../types/extractor.js';
import type { LibraryStore, Track, TrackTags, TrackUpdate } from '../types/library.js';
import { ConflictResolver, tagsOf } from '../conflict/resolver.js';
import { copyTagField } from '../conflict/merge.js';
import { ExtractionError, ProviderError, errorMessage } from '../errors.js';
import { fileExtension, fileStem } from './audio-filter.js';
import { contentHash } from '../utils/hash.js';
import { withRetry } from '../utils/retry.js';
import { withTimeout } from '../utils/sleep.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

export type ProcessOutcome = 'added' | 'updated' | 'renamed' | 'unchanged';

export interface ProcessingResult {
  outcome: ProcessOutcome;
  trackId: string;
  bytesDownloaded: number;
  processingTimeMs: number;
}

export interface MetadataProcessorOptions {
  /** Download only the first `headerSizeBytes` (tags live in the header) */
  headerOnlyDownload?: boolean;
  headerSizeBytes?: number;
  downloadTimeoutMs?: number;
  downloadRetryAttempts?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

function isRetryableDownloadError(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  return true;
}

/**
 * Per-item pipeline: download, extract, persist.
 * Renames and unchanged files are settled before anything is downloaded.
 */
export class MetadataProcessor {
  private readonly library: LibraryStore;
  private readonly extractor: MetadataExtractor;
  private readonly resolver: ConflictResolver;
  private readonly logger: Logger;
  private readonly headerOnlyDownload: boolean;
  private readonly headerSizeBytes: number;
  private readonly downloadTimeoutMs: number;
  private readonly downloadRetryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(
    library: LibraryStore,
    extractor: MetadataExtractor,
    resolver: ConflictResolver,
    options?: MetadataProcessorOptions,
  ) {
    this.library = library;
    this.extractor = extractor;
    this.resolver = resolver;
    this.logger = options?.logger ?? noopLogger;
    this.headerOnlyDownload = options?.headerOnlyDownload ?? true;
    this.headerSizeBytes = options?.headerSizeBytes ?? 256 * 1024;
    this.downloadTimeoutMs = options?.downloadTimeoutMs ?? 60_000;
    this.downloadRetryAttempts = options?.downloadRetryAttempts ?? 3;
    this.retryBaseDelayMs = options?.retryBaseDelayMs ?? 100;
  }

  async process(item: WorkItem, provider: StorageProvider): Promise<ProcessingResult> {
    const start = Date.now();
    const existing = await this.library.findTrackByProviderFile(item.providerId, item.remoteFileId);

    // Same revision as stored: at most a move, never a download
    if (
      existing &&
      item.providerModifiedAt !== null &&
      existing.providerModifiedAt === item.providerModifiedAt
    ) {
      let outcome: ProcessOutcome = 'unchanged';
      if (existing.path !== item.path) {
        await this.resolver.resolveRename(item.providerId, item.remoteFileId, item.path);
        outcome = 'renamed';
      }
      return {
        outcome,
        trackId: existing.id,
        bytesDownloaded: 0,
        processingTimeMs: Date.now() - start,
      };
    }

    const bytes = await this.download(item, provider);
    const metadata = await this.extract(item, bytes);

    const track = existing
      ? await this.updateExisting(existing, item, bytes, metadata)
      : await this.createTrack(item, bytes, metadata);

    return {
      outcome: existing ? 'updated' : 'added',
      trackId: track.id,
      bytesDownloaded: bytes.byteLength,
      processingTimeMs: Date.now() - start,
    };
  }

  private async download(item: WorkItem, provider: StorageProvider): Promise<Uint8Array> {
    const headerLength =
      item.size !== null ? Math.min(item.size, this.headerSizeBytes) : this.headerSizeBytes;
    const range: ByteRange | undefined = this.headerOnlyDownload
      ? { offset: 0, length: headerLength }
      : undefined;

    return withRetry(
      () =>
        withTimeout(
          provider.download(item.remoteFileId, range),
          this.downloadTimeoutMs,
          () => new ProviderError(`Download timed out after ${this.downloadTimeoutMs}ms: ${item.path}`),
        ),
      {
        maxAttempts: this.downloadRetryAttempts,
        initialDelayMs: this.retryBaseDelayMs,
        shouldRetry: isRetryableDownloadError,
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug('Retrying download', {
            path: item.path,
            attempt,
            delayMs,
            error: errorMessage(error),
          });
        },
      },
    );
  }

  private async extract(item: WorkItem, bytes: Uint8Array): Promise<ExtractedMetadata> {
    let metadata: ExtractedMetadata;
    try {
      metadata = await this.extractor.extract(bytes, {
        fileName: item.path.slice(item.path.lastIndexOf('/') + 1),
        mimeType: item.mimeType,
        size: item.size,
      });
    } catch (error) {
      throw new ExtractionError(`Metadata extraction failed: ${errorMessage(error)}`, item.path);
    }

    if (metadata.error) {
      this.logger.warn('Partial metadata extracted', { path: item.path, error: metadata.error });
    }
    return metadata;
  }

  private async resolveTags(
    item: WorkItem,
    metadata: ExtractedMetadata,
  ): Promise<Omit<TrackTags, 'providerModifiedAt'>> {
    const artistName = metadata.artist?.trim() || null;
    const artistId = artistName ? (await this.library.resolveArtist(artistName)).id : null;

    let albumId: string | null = null;
    const albumTitle = metadata.album?.trim();
    if (albumTitle) {
      const albumArtistName = metadata.albumArtist?.trim();
      const albumArtistId = albumArtistName
        ? (await this.library.resolveArtist(albumArtistName)).id
        : artistId;
      albumId = (await this.library.resolveAlbum(albumTitle, albumArtistId, metadata.year ?? null)).id;
    }

    return {
      title: metadata.title?.trim() || fileStem(item.path),
      artistId,
      albumId,
      durationMs: metadata.durationMs ?? null,
      year: metadata.year ?? null,
      trackNumber: metadata.trackNumber ?? null,
      genre: metadata.genre?.trim() || null,
    };
  }

  private async createTrack(
    item: WorkItem,
    bytes: Uint8Array,
    metadata: ExtractedMetadata,
  ): Promise<Track> {
    const tags = await this.resolveTags(item, metadata);
    const track = await this.library.insertTrack({
      ...tags,
      providerId: item.providerId,
      providerFileId: item.remoteFileId,
      path: item.path,
      bitrate: metadata.bitrate ?? null,
      format: metadata.format ?? fileExtension(item.path),
      fileSize: item.size,
      contentHash: metadata.contentHash ?? contentHash(bytes),
      providerModifiedAt: item.providerModifiedAt,
    });

    this.logger.debug('Track added', { trackId: track.id, path: item.path });
    return track;
  }

  private async updateExisting(
    existing: Track,
    item: WorkItem,
    bytes: Uint8Array,
    metadata: ExtractedMetadata,
  ): Promise<Track> {
    const incoming: TrackTags = {
      ...(await this.resolveTags(item, metadata)),
      providerModifiedAt: item.providerModifiedAt,
    };
    const { merged, changedFields, conflictingFields } = this.resolver.mergeMetadata(
      tagsOf(existing),
      incoming,
    );

    if (conflictingFields.length > 0) {
      this.logger.info('Metadata conflict left unresolved', {
        trackId: existing.id,
        fields: conflictingFields,
      });
    }

    const hash = metadata.contentHash ?? contentHash(bytes);
    const update: TrackUpdate = {
      path: item.path,
      fileSize: item.size ?? existing.fileSize,
      bitrate: metadata.bitrate ?? existing.bitrate,
      format: metadata.format ?? existing.format,
      contentHash: hash,
      providerModifiedAt: item.providerModifiedAt ?? existing.providerModifiedAt,
    };
    for (const field of changedFields) {
      copyTagField(update, merged, field);
    }

    // New content: earlier duplicate decisions no longer hold
    if (hash !== existing.contentHash) {
      update.duplicateOf = null;
      for (const duplicate of await this.library.findDuplicatesOf(existing.id)) {
        await this.library.updateTrack(duplicate.id, { duplicateOf: null });
      }
    }

    const updated = await this.library.updateTrack(existing.id, update);
    this.logger.debug('Track updated', { trackId: existing.id, fields: changedFields });
    return updated ?? existing;
  }
}
