export type ConflictPolicy = 'keep_newest' | 'keep_both' | 'user_prompt';

export const CONFLICT_POLICIES = [
  'keep_newest',
  'keep_both',
  'user_prompt',
] as const satisfies readonly ConflictPolicy[];

/** Prefix written onto `providerFileId` when a track is soft-deleted. */
export const TOMBSTONE_PREFIX = 'DELETED_';

export interface Track {
  id: string;
  providerId: string;
  providerFileId: string;
  path: string;
  title: string;
  artistId: string | null;
  albumId: string | null;
  durationMs: number | null;
  bitrate: number | null;
  format: string | null;
  fileSize: number | null;
  year: number | null;
  trackNumber: number | null;
  genre: string | null;
  contentHash: string | null;
  providerModifiedAt: string | null;
  /** Set when this track lost duplicate resolution to another track */
  duplicateOf: string | null;
  /** Set on soft delete */
  deletedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewTrack = Omit<Track, 'id' | 'duplicateOf' | 'deletedAt' | 'createdAt' | 'updatedAt'>;

export type TrackUpdate = Partial<Omit<Track, 'id' | 'createdAt' | 'updatedAt'>>;

/** Tag-level fields merged under the conflict policy. File facts (hash, size, bitrate) always follow the newest file. */
export const MERGEABLE_FIELDS = [
  'title',
  'artistId',
  'albumId',
  'durationMs',
  'year',
  'trackNumber',
  'genre',
] as const satisfies readonly (keyof Track)[];

export type MergeableField = (typeof MERGEABLE_FIELDS)[number];

export type TrackTags = Pick<Track, MergeableField | 'providerModifiedAt'>;

export interface MergeResult {
  merged: TrackTags;
  changedFields: MergeableField[];
  /** Fields where both sides had different values that the policy did not settle */
  conflictingFields: MergeableField[];
}

export interface Artist {
  id: string;
  name: string;
  createdAt: string;
}

export interface Album {
  id: string;
  title: string;
  artistId: string | null;
  year: number | null;
  createdAt: string;
}

export interface ListTracksOptions {
  providerId?: string;
  /** Include soft-deleted tracks and losing duplicates */
  includeHidden?: boolean;
  limit?: number;
  offset?: number;
}

export interface TrackFileRef {
  id: string;
  providerFileId: string;
}

/**
 * Local library persistence: tracks, artists, albums.
 */
export interface LibraryStore {
  insertTrack(track: NewTrack): Promise<Track>;

  updateTrack(id: string, update: TrackUpdate): Promise<Track | null>;

  deleteTrack(id: string): Promise<boolean>;

  getTrack(id: string): Promise<Track | null>;

  /** Live (not tombstoned) track for a provider file */
  findTrackByProviderFile(providerId: string, providerFileId: string): Promise<Track | null>;

  /** Live tracks with this content hash, duplicates included */
  findTracksByContentHash(contentHash: string): Promise<Track[]>;

  /** Hashes shared by more than one live, non-duplicate track */
  listDuplicateHashes(): Promise<string[]>;

  /** Tracks whose `duplicateOf` points at the given track */
  findDuplicatesOf(trackId: string): Promise<Track[]>;

  /** Live tracks of a provider, id + provider file id only */
  listTrackFileRefs(providerId: string): Promise<TrackFileRef[]>;

  /** Library listing; hides soft-deleted tracks and losing duplicates by default */
  listTracks(options?: ListTracksOptions): Promise<Track[]>;

  resolveArtist(name: string): Promise<Artist>;

  resolveAlbum(title: string, artistId: string | null, year?: number | null): Promise<Album>;
}
