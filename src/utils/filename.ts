import { TrackMetadata } from '../models/track.model';

export interface FilenameOptions {
  fallbackPrefix: string;
  maxLength: number;
  extension: string;
}

const defaultOptions: FilenameOptions = {
  fallbackPrefix: 'tidal',
  maxLength: 150,
  extension: 'flac'
};

// Reserved on at least one common filesystem
const RESERVED_CHARS = /[<>:"/\\|?*]/g;

function cleanPart(value: string): string {
  return value.normalize('NFC').replace(RESERVED_CHARS, '');
}

/**
 * Truncate by code points so a surrogate pair is never split.
 */
function truncateChars(value: string, maxLength: number): string {
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') : value;
}

/**
 * Build the output filename: "<artist> - <title>.flac" when both are known,
 * "<prefix>_track_<id>.flac" otherwise.
 */
export function buildFilename(
  metadata: TrackMetadata,
  trackId: string,
  options: Partial<FilenameOptions> = {}
): string {
  const { fallbackPrefix, maxLength, extension } = { ...defaultOptions, ...options };

  if (metadata.artist && metadata.title) {
    const name = `${cleanPart(metadata.artist)} - ${cleanPart(metadata.title)}`;
    return `${truncateChars(name, maxLength)}.${extension}`;
  }

  return `${fallbackPrefix}_track_${trackId}.${extension}`;
}
