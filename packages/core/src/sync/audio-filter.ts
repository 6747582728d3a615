import type { RemoteFile } from '../types/storage.js';
import type { SyncConfig } from '../config.js';

export type AudioFilterConfig = Pick<SyncConfig, 'audioMimeTypes' | 'audioExtensions' | 'maxFileSizeBytes'>;

export type AudioFilter = (file: RemoteFile) => boolean;

/** Lower-cased extension without the dot, or null */
export function fileExtension(name: string): string | null {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) return null;
  return name.slice(dot + 1).toLowerCase();
}

/** File name without directory and extension */
export function fileStem(path: string): string {
  const name = path.slice(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Build the predicate deciding which remote files become work items.
 * Folders and files over the size limit are skipped; the rest match by
 * MIME type or, failing that, by extension.
 */
export function createAudioFilter(config: AudioFilterConfig): AudioFilter {
  const mimeTypes = new Set(config.audioMimeTypes.map((type) => type.toLowerCase()));
  const extensions = new Set(
    config.audioExtensions.map((ext) => ext.toLowerCase().replace(/^\./, '')),
  );

  return (file) => {
    if (file.isFolder) return false;
    if (file.size !== null && file.size > config.maxFileSizeBytes) return false;

    if (file.mimeType && mimeTypes.has(file.mimeType.toLowerCase())) return true;

    const ext = fileExtension(file.name);
    return ext !== null && extensions.has(ext);
  };
}
