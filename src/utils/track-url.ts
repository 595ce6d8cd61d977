import { TrackReference } from '../models/track.model';
import { InputValidationError } from './errors';
import { err, ok, Result } from './result';

const TRACK_URL_PATTERN = /^https:\/\/listen\.tidal\.com\/track\/\d+/;
const TRACK_ID_PATTERN = /track\/(\d+)/;

/**
 * Check that a URL points at a Tidal track (listen.tidal.com/track/<id>).
 */
export function validateTrackUrl(url: string): boolean {
  return TRACK_URL_PATTERN.test(url);
}

export function getTrackId(url: string): string | undefined {
  const match = TRACK_ID_PATTERN.exec(url);
  return match ? match[1] : undefined;
}

export function toTrackReference(url: string): Result<TrackReference, InputValidationError> {
  if (!validateTrackUrl(url)) {
    return err(new InputValidationError('Invalid Tidal track URL'));
  }

  const trackId = getTrackId(url);
  if (!trackId) {
    return err(new InputValidationError('Could not extract track ID from URL'));
  }

  return ok({ sourceUrl: url, trackId });
}

/**
 * Percent-encode a URL for use as a query value, leaving "/" and the
 * unreserved characters as they are.
 */
export function encodeTrackUrl(url: string): string {
  return encodeURIComponent(url)
    .replace(/%2F/g, '/')
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Lookup page the conversion service renders for a track. Also sent as the
 * Referer when creating a job.
 */
export function lookupPageUrl(serviceHost: string, trackUrl: string, country: string): string {
  return `https://${serviceHost}/?url=${encodeTrackUrl(trackUrl)}&country=${country}`;
}
