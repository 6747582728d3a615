export {
  SyncCoordinator,
  type SyncCoordinatorOptions,
  type SyncStore,
} from './coordinator.js';
export { DiscoveryPhase, type DiscoveryResult, type DiscoveryPhaseOptions } from './discovery.js';
export {
  MetadataProcessor,
  type MetadataProcessorOptions,
  type ProcessOutcome,
  type ProcessingResult,
} from './metadata-processor.js';
export {
  runProcessingPhase,
  emptyProcessingStats,
  type ProcessingStats,
  type ProcessingPhaseOptions,
} from './processing.js';
export {
  createAudioFilter,
  fileExtension,
  fileStem,
  type AudioFilter,
  type AudioFilterConfig,
} from './audio-filter.js';
