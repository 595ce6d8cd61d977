/**
 * Download errors
 * Every failure the download flow can report. They are returned inside a
 * Result rather than thrown past the service boundary.
 */

import { isAxiosError } from 'axios';

export type DownloadErrorKind =
  | 'input'
  | 'metadata'
  | 'service'
  | 'timeout'
  | 'io'
  | 'config';

/**
 * Base class for all download errors.
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly kind: DownloadErrorKind,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed track URL. Raised before any network call.
 */
export class InputValidationError extends DownloadError {
  constructor(message: string) {
    super(message, 'input');
  }
}

/**
 * Metadata could not be scraped. Only ever logged, never fatal.
 */
export class MetadataUnavailableError extends DownloadError {
  constructor(message: string, cause?: unknown) {
    super(message, 'metadata', cause);
  }
}

/**
 * Transport failure or rejected request against the conversion service.
 */
export class ServiceRequestError extends DownloadError {
  constructor(message: string, cause?: unknown) {
    super(message, 'service', cause);
  }
}

export class TimeoutError extends DownloadError {
  constructor(message: string) {
    super(message, 'timeout');
  }
}

/**
 * Writing the output file failed.
 */
export class FileWriteError extends DownloadError {
  constructor(message: string, cause?: unknown) {
    super(message, 'io', cause);
  }
}

export class ConfigError extends DownloadError {
  constructor(message: string) {
    super(message, 'config');
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) {
      const { status, statusText } = error.response;
      return statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
