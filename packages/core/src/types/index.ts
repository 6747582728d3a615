export type {
  SyncType,
  SyncStatus,
  SyncProgress,
  SyncStats,
  SyncJob,
  SyncHandle,
} from './sync.js';

export { SYNC_TYPES, SYNC_STATUSES, TERMINAL_STATUSES } from './sync.js';

export type {
  WorkItemPriority,
  WorkItemStatus,
  WorkItem,
  NewWorkItem,
  WorkItemUpdate,
  WorkItemRefresh,
  QueueScope,
  WorkItemCounts,
  QueueStats,
} from './queue.js';

export { WORK_ITEM_STATUSES, PRIORITY_RANK, priorityFromRank } from './queue.js';

export type {
  RemoteFile,
  MediaListing,
  ChangeSet,
  ByteRange,
  StorageProvider,
  SessionManager,
} from './storage.js';

export type {
  ConflictPolicy,
  Track,
  NewTrack,
  TrackUpdate,
  MergeableField,
  TrackTags,
  MergeResult,
  Artist,
  Album,
  ListTracksOptions,
  TrackFileRef,
  LibraryStore,
} from './library.js';

export { CONFLICT_POLICIES, TOMBSTONE_PREFIX, MERGEABLE_FIELDS } from './library.js';

export type { ExtractedMetadata, ExtractionHints, MetadataExtractor } from './extractor.js';

export type { ConnectionType, NetworkInfo, NetworkMonitor } from './network.js';

export type { SyncEvent, SyncEventType, EventSink } from './events.js';

export type { JobRepository, WorkItemRepository, DatabaseAdapter } from './database.js';
