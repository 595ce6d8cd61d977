export enum JobStatus {
    PENDING = 'pending',
    IN_PROGRESS = 'inProgress',
    COMPLETED = 'completed',
    FAILED = 'failed'
  }

  export interface TrackReference {
    readonly sourceUrl: string;   // URL as given by the user
    readonly trackId: string;     // Numeric Tidal track id
  }

  /**
   * Artist and title are scraped as a pair: both are set or neither is.
   */
  export interface TrackMetadata {
    artist?: string;
    title?: string;
  }

  export interface ConversionJob {
    readonly handoffId: string;   // Job id issued by the conversion service
    readonly serverName: string;  // Subdomain that hosts the job
    status: JobStatus;
    readonly createdAt: number;   // Epoch ms, taken from the client clock
  }

  export type DownloadStatus = 'success' | 'fail';

  export interface DownloadResult {
    sourceUrl: string;
    trackId?: string;
    status: DownloadStatus;
    message: string;
    filePath?: string;
  }

  export interface DownloadedFile {
    filePath: string;
    bytesWritten: number;
  }

  /**
   * A single line on the progress channel. Service status payloads are passed
   * through as-is, so any extra fields are allowed.
   */
  export interface ProgressEvent {
    status: string;
    message?: string;
    [field: string]: unknown;
  }

  /**
   * Raw status object returned by the conversion service while polling.
   */
  export type StatusPayload = Record<string, unknown>;

  /**
   * Final result as printed by the CLI.
   */
  export interface DownloadResultPayload {
    tidal_url: string;
    status: DownloadStatus;
    message: string;
    file_path: string | null;
  }

  export function toResultPayload(result: DownloadResult): DownloadResultPayload {
    return {
      tidal_url: result.sourceUrl,
      status: result.status,
      message: result.message,
      file_path: result.filePath ?? null
    };
  }
