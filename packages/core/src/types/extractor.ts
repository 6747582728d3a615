/**
 * Best-effort tag data. Every field may be missing on partial or corrupt input.
 */
export interface ExtractedMetadata {
  title?: string | null;
  artist?: string | null;
  album?: string | null;
  albumArtist?: string | null;
  durationMs?: number | null;
  bitrate?: number | null;
  format?: string | null;
  year?: number | null;
  trackNumber?: number | null;
  genre?: string | null;
  contentHash?: string | null;
  /** Set when extraction only partially succeeded */
  error?: string | null;
}

export interface ExtractionHints {
  fileName: string;
  mimeType: string | null;
  size: number | null;
}

export interface MetadataExtractor {
  extract(bytes: Uint8Array, hints: ExtractionHints): Promise<ExtractedMetadata>;
}
