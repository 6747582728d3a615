/**
 * A file as reported by the remote storage provider.
 */
export interface RemoteFile {
  /** Stable provider file id; survives renames and moves */
  id: string;
  name: string;
  path: string;
  size: number | null;
  mimeType: string | null;
  modifiedAt: string | null;
  isFolder?: boolean;
}

/** One page of a full listing. */
export interface MediaListing {
  files: RemoteFile[];
  /** Page token for the next page; null on the last page */
  nextCursor: string | null;
  /** Change-feed baseline for later incremental syncs, reported on the last page */
  changeCursor?: string | null;
}

/** One page of a change feed. */
export interface ChangeSet {
  /** Added or modified files */
  changed: RemoteFile[];
  /** Provider file ids removed since the cursor */
  deleted: string[];
  nextCursor: string | null;
  /** When true, call `getChanges(nextCursor)` again before the feed is exhausted */
  hasMore?: boolean;
}

export interface ByteRange {
  offset: number;
  length: number;
}

/**
 * Remote storage backend (Google Drive, OneDrive, Dropbox, ...).
 * Cursors are opaque: the engine stores and forwards them, never parses them.
 */
export interface StorageProvider {
  readonly id: string;

  listMedia(cursor: string | null): Promise<MediaListing>;

  getChanges(cursor: string): Promise<ChangeSet>;

  download(fileId: string, range?: ByteRange): Promise<Uint8Array>;
}

/**
 * Hands out an authenticated provider handle for a profile.
 * Token management lives behind this interface.
 */
export interface SessionManager {
  acquire(providerId: string): Promise<StorageProvider>;
}
