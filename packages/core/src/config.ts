import { z } from 'zod';
import { CONFLICT_POLICIES } from './types/library.js';

export const DEFAULT_AUDIO_MIME_TYPES = [
  'audio/mpeg',
  'audio/mp3',
  'audio/flac',
  'audio/x-flac',
  'audio/ogg',
  'audio/x-vorbis+ogg',
  'audio/vorbis',
  'audio/mp4',
  'audio/m4a',
  'audio/x-m4a',
  'audio/aac',
  'audio/wav',
  'audio/x-wav',
  'audio/wave',
  'audio/webm',
  'audio/opus',
];

export const DEFAULT_AUDIO_EXTENSIONS = [
  'mp3',
  'flac',
  'ogg',
  'oga',
  'opus',
  'm4a',
  'aac',
  'wav',
  'wave',
  'wma',
  'alac',
  'aiff',
  'aif',
  'ape',
  'wv',
];

export const SyncConfigSchema = z.object({
  // Concurrency & Timeouts
  maxConcurrentDownloads: z.number().int().min(1).max(32).default(4),
  syncTimeoutMs: z.number().int().positive().default(3_600_000),
  downloadTimeoutMs: z.number().int().positive().default(60_000),
  // Network
  wifiOnly: z.boolean().default(false),
  // Downloads
  maxFileSizeBytes: z.number().int().positive().default(500 * 1024 * 1024),
  headerOnlyDownload: z.boolean().default(true),
  headerSizeBytes: z.number().int().positive().default(256 * 1024),
  downloadRetryAttempts: z.number().int().min(1).default(3),
  // Work item retries
  maxRetries: z.number().int().min(1).default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(100),
  retryMaxDelayMs: z.number().int().nonnegative().default(30_000),
  // Progress & Conflicts
  progressInterval: z.number().int().min(1).default(10),
  conflictPolicy: z.enum(CONFLICT_POLICIES).default('keep_newest'),
  hardDelete: z.boolean().default(false),
  cleanupCompleted: z.boolean().default(true),
  // Audio filter
  audioMimeTypes: z.array(z.string().min(1)).default(DEFAULT_AUDIO_MIME_TYPES),
  audioExtensions: z.array(z.string().min(1)).default(DEFAULT_AUDIO_EXTENSIONS),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

/**
 * Validate a partial config and fill in defaults. Throws a ZodError on invalid input.
 */
export function loadSyncConfig(overrides?: SyncConfigInput): SyncConfig {
  return SyncConfigSchema.parse(overrides ?? {});
}

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function boolFromEnv(value: string | undefined): boolean | undefined {
  return value ? value === 'true' : undefined;
}

function listFromEnv(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
}

/**
 * Read `TUNESYNC_*` environment variables.
 */
export function getSyncConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  return SyncConfigSchema.parse({
    maxConcurrentDownloads: intFromEnv(env['TUNESYNC_MAX_CONCURRENT_DOWNLOADS']),
    syncTimeoutMs: intFromEnv(env['TUNESYNC_SYNC_TIMEOUT_MS']),
    downloadTimeoutMs: intFromEnv(env['TUNESYNC_DOWNLOAD_TIMEOUT_MS']),
    wifiOnly: boolFromEnv(env['TUNESYNC_WIFI_ONLY']),
    maxFileSizeBytes: intFromEnv(env['TUNESYNC_MAX_FILE_SIZE_BYTES']),
    headerOnlyDownload: boolFromEnv(env['TUNESYNC_HEADER_ONLY_DOWNLOAD']),
    headerSizeBytes: intFromEnv(env['TUNESYNC_HEADER_SIZE_BYTES']),
    downloadRetryAttempts: intFromEnv(env['TUNESYNC_DOWNLOAD_RETRY_ATTEMPTS']),
    maxRetries: intFromEnv(env['TUNESYNC_MAX_RETRIES']),
    retryBaseDelayMs: intFromEnv(env['TUNESYNC_RETRY_BASE_DELAY_MS']),
    retryMaxDelayMs: intFromEnv(env['TUNESYNC_RETRY_MAX_DELAY_MS']),
    progressInterval: intFromEnv(env['TUNESYNC_PROGRESS_INTERVAL']),
    conflictPolicy: env['TUNESYNC_CONFLICT_POLICY'] || undefined,
    hardDelete: boolFromEnv(env['TUNESYNC_HARD_DELETE']),
    cleanupCompleted: boolFromEnv(env['TUNESYNC_CLEANUP_COMPLETED']),
    audioMimeTypes: listFromEnv(env['TUNESYNC_AUDIO_MIME_TYPES']),
    audioExtensions: listFromEnv(env['TUNESYNC_AUDIO_EXTENSIONS']),
  });
}
