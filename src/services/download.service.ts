import { EventEmitter } from 'events';
import * as path from 'path';
import { AppConfig } from '../config/config';
import { DownloadResult, ProgressEvent, StatusPayload } from '../models/track.model';
import { describeError, DownloadError } from '../utils/errors';
import { buildFilename } from '../utils/filename';
import { formatSize } from '../utils/formatter';
import { toTrackReference } from '../utils/track-url';
import { ConversionClient } from './conversion.service';
import { FileService } from './file.service';
import { Logger } from './logger.service';
import { MetadataService } from './metadata.service';

/**
 * Runs one track download from URL to file.
 *
 * Emits 'progress' with a ProgressEvent for every step worth reporting, and
 * with each raw status payload from the conversion service.
 */
export class TrackDownloader extends EventEmitter {
  constructor(
    private logger: Logger,
    private config: AppConfig,
    private fileService: FileService,
    private metadataService: MetadataService,
    private conversionClient: ConversionClient
  ) {
    super();
  }

  /**
   * Download a track. Never rejects: every failure ends up in the result.
   */
  public async download(trackUrl: string, outputDir?: string): Promise<DownloadResult> {
    const result: DownloadResult = {
      sourceUrl: trackUrl,
      status: 'fail',
      message: 'Failed to download track'
    };
    
    const reference = toTrackReference(trackUrl);
    if (!reference.ok) {
      return this.fail(result, reference.error);
    }
    const track = reference.value;
    result.trackId = track.trackId;
    
    try {
      const targetDir = path.resolve(outputDir || this.config.outputDir);
      await this.fileService.ensureDirectory(targetDir);
      
      const metadata = await this.metadataService.getTrackInfo(track.sourceUrl);
      const filename = buildFilename(metadata, track.trackId, {
        fallbackPrefix: this.config.filenamePrefix,
        maxLength: this.config.maxFilenameLength
      });
      
      this.report({
        status: 'info',
        message: 'Track information retrieved',
        artist: metadata.artist ?? null,
        title: metadata.title ?? null
      });
      
      const created = await this.conversionClient.createJob(track);
      if (!created.ok) {
        return this.fail(result, created.error);
      }
      const job = created.value;
      
      this.report({
        status: 'pending',
        message: 'Download initiated',
        handoff_id: job.handoffId
      });
      
      const polled = await this.conversionClient.pollUntilComplete(job, (event) => this.report(event));
      if (!polled.ok) {
        return this.fail(result, polled.error);
      }
      
      const filePath = path.join(targetDir, filename);
      this.report({
        status: 'downloading',
        message: `Downloading file: ${filename}`,
        path: filePath
      });
      
      const downloaded = await this.conversionClient.downloadFile(job, filePath);
      if (!downloaded.ok) {
        return this.fail(result, downloaded.error);
      }
      
      this.logger.debug(`Wrote ${formatSize(downloaded.value.bytesWritten)} to ${downloaded.value.filePath}`);
      
      result.status = 'success';
      result.message = 'Track downloaded successfully';
      result.filePath = downloaded.value.filePath;
      return result;
    } catch (error) {
      result.message = `Unexpected error: ${describeError(error)}`;
      this.logger.error(result.message);
      return result;
    }
  }

  private report(event: ProgressEvent | StatusPayload): void {
    this.emit('progress', event);
  }

  private fail(result: DownloadResult, error: DownloadError): DownloadResult {
    this.logger.debug(`${error.name}: ${error.message}`, { kind: error.kind });
    result.message = error.message;
    return result;
  }
}
