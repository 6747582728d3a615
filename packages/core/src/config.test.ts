import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_AUDIO_EXTENSIONS,
  DEFAULT_AUDIO_MIME_TYPES,
  getSyncConfigFromEnv,
  loadSyncConfig,
} from './config.js';

describe('loadSyncConfig', () => {
  it('fills in defaults', () => {
    expect(loadSyncConfig()).toEqual({
      maxConcurrentDownloads: 4,
      syncTimeoutMs: 3_600_000,
      downloadTimeoutMs: 60_000,
      wifiOnly: false,
      maxFileSizeBytes: 524_288_000,
      headerOnlyDownload: true,
      headerSizeBytes: 262_144,
      downloadRetryAttempts: 3,
      maxRetries: 3,
      retryBaseDelayMs: 100,
      retryMaxDelayMs: 30_000,
      progressInterval: 10,
      conflictPolicy: 'keep_newest',
      hardDelete: false,
      cleanupCompleted: true,
      audioMimeTypes: DEFAULT_AUDIO_MIME_TYPES,
      audioExtensions: DEFAULT_AUDIO_EXTENSIONS,
    });
  });

  it('keeps overrides', () => {
    const config = loadSyncConfig({ maxConcurrentDownloads: 8, conflictPolicy: 'keep_both' });
    expect(config.maxConcurrentDownloads).toBe(8);
    expect(config.conflictPolicy).toBe('keep_both');
  });

  it('rejects invalid values', () => {
    expect(() => loadSyncConfig({ maxConcurrentDownloads: 0 })).toThrow(ZodError);
    expect(() => loadSyncConfig({ maxConcurrentDownloads: 33 })).toThrow(ZodError);
  });
});

describe('getSyncConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(getSyncConfigFromEnv({})).toEqual(loadSyncConfig());
  });

  it('parses TUNESYNC_ variables', () => {
    const config = getSyncConfigFromEnv({
      TUNESYNC_MAX_CONCURRENT_DOWNLOADS: '2',
      TUNESYNC_WIFI_ONLY: 'true',
      TUNESYNC_HARD_DELETE: 'false',
      TUNESYNC_CONFLICT_POLICY: 'user_prompt',
      TUNESYNC_AUDIO_EXTENSIONS: 'MP3, flac,,ogg ',
    });

    expect(config.maxConcurrentDownloads).toBe(2);
    expect(config.wifiOnly).toBe(true);
    expect(config.hardDelete).toBe(false);
    expect(config.conflictPolicy).toBe('user_prompt');
    expect(config.audioExtensions).toEqual(['mp3', 'flac', 'ogg']);
  });

  it('rejects an unknown conflict policy', () => {
    expect(() => getSyncConfigFromEnv({ TUNESYNC_CONFLICT_POLICY: 'newest' })).toThrow(ZodError);
  });
});
