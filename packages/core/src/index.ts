// Types
export * from './types/index.js';

// Errors
export {
  SyncError,
  ProviderError,
  ExtractionError,
  PersistenceError,
  InvalidStateTransitionError,
  CursorMissingError,
  SyncInProgressError,
  JobNotFoundError,
  WorkItemNotFoundError,
  NetworkConstraintError,
  SyncTimeoutError,
  SyncCancelledError,
  errorMessage,
} from './errors.js';

// Configuration
export {
  SyncConfigSchema,
  type SyncConfig,
  type SyncConfigInput,
  loadSyncConfig,
  getSyncConfigFromEnv,
  DEFAULT_AUDIO_MIME_TYPES,
  DEFAULT_AUDIO_EXTENSIONS,
} from './config.js';

// Providers
export { ProviderRegistry, type ProviderFactory } from './providers/index.js';

// Database adapters
export { SQLiteAdapter } from './db/index.js';

// Job lifecycle
export {
  canTransition,
  isTerminal,
  computePercent,
  emptyStats,
  totalProcessed,
  jobDurationMs,
  createSyncJob,
  startJob,
  completeJob,
  failJob,
  cancelJob,
  updateJobProgress,
  updateJobCursor,
  recordDiscovery,
  type CreateSyncJobOptions,
  type ProgressUpdate,
} from './job/state-machine.js';

// Work queue
export { WorkItemQueue, type WorkItemQueueOptions } from './queue/work-item-queue.js';

// Conflict resolution
export {
  ConflictResolver,
  totalDeleted,
  type ConflictResolverOptions,
  type DuplicateResolution,
  type DeletionResult,
  type SweepScope,
  type ConflictSweepStats,
} from './conflict/resolver.js';
export { mergeMetadata, isNewer } from './conflict/merge.js';

// Sync engine
export * from './sync/index.js';

// Events
export { EmitterEventSink, noopEventSink } from './events.js';

// Utilities
export {
  contentHash,
  withRetry,
  type RetryOptions,
  Semaphore,
  type Logger,
  noopLogger,
  consoleLogger,
  createConsoleLogger,
  type LogLevel,
  type ConsoleLoggerOptions,
  withLogContext,
} from './utils/index.js';
