import { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { z } from 'zod';
import { AppConfig } from '../config/config';
import {
  ConversionJob,
  DownloadedFile,
  JobStatus,
  StatusPayload,
  TrackReference
} from '../models/track.model';
import { Clock, systemClock } from '../utils/clock';
import {
  ConfigError,
  describeError,
  DownloadError,
  FileWriteError,
  ServiceRequestError,
  TimeoutError
} from '../utils/errors';
import { formatTime } from '../utils/formatter';
import { err, ok, Result } from '../utils/result';
import { lookupPageUrl } from '../utils/track-url';
import { FileService } from './file.service';
import { Logger } from './logger.service';

const LOAD_PATH = '/api/load?url=%2Fapi%2Ffetch%2Fstream%2Fv2';
const DAY_MS = 24 * 60 * 60 * 1000;

const loadResponseSchema = z.object({
  success: z.boolean().optional(),
  handoff: z.string().optional(),
  name: z.string().optional()
});

// Any JSON object; only "status" is interpreted
const statusPayloadSchema = z.object({}).passthrough();

export interface LoadRequestPayload {
  url: string;
  metadata: boolean;
  compat: boolean;
  private: boolean;
  handoff: boolean;
  account: { type: 'country'; id: string };
  upload: { enabled: boolean; service: string };
  downscale: string;
  token: { primary: string; expiry: number };
}

function isFailedStatus(status: string): boolean {
  return status === 'error' || status === 'failed';
}

/**
 * Client for the lucida.to conversion API: create a job, poll it on its
 * assigned server until it completes, then stream the converted file.
 */
export class ConversionClient {
  constructor(
    private logger: Logger,
    private config: AppConfig,
    private http: AxiosInstance,
    private fileService: FileService,
    private clock: Clock = systemClock
  ) {}

  public get serviceOrigin(): string {
    return `https://${this.config.serviceHost}`;
  }

  /**
   * Base URL of the server a job was assigned to
   */
  public jobUrl(job: ConversionJob): string {
    return `https://${job.serverName}.${this.config.serviceHost}/api/fetch/request/${job.handoffId}`;
  }

  public buildLoadPayload(track: TrackReference, token: string): LoadRequestPayload {
    const expiry = Math.floor((this.clock.now() + this.config.tokenTtlDays * DAY_MS) / 1000);
    
    return {
      url: `http://www.tidal.com/track/${track.trackId}`,
      metadata: true,
      compat: false,
      private: true,
      handoff: true,
      account: {
        type: 'country',
        id: this.config.country
      },
      upload: {
        enabled: false,
        service: 'pixeldrain'
      },
      downscale: this.config.downscale,
      token: {
        primary: token,
        expiry
      }
    };
  }

  /**
   * Ask the service to start converting a track
   */
  public async createJob(track: TrackReference): Promise<Result<ConversionJob>> {
    const token = this.config.token;
    if (!token) {
      return err(new ConfigError('No service token configured (use --token or TIDALRIP_TOKEN)'));
    }
    
    try {
      const response = await this.http.post<unknown>(
        `${this.serviceOrigin}${LOAD_PATH}`,
        JSON.stringify(this.buildLoadPayload(track, token)),
        {
          headers: {
            'Content-Type': 'text/plain;charset=UTF-8',
            'User-Agent': this.config.userAgent,
            'Origin': this.serviceOrigin,
            'Referer': lookupPageUrl(this.config.serviceHost, track.sourceUrl, this.config.country)
          }
        }
      );
      
      const parsed = loadResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        return err(new ServiceRequestError('Request error: unexpected response from conversion service'));
      }
      
      const { success, handoff, name } = parsed.data;
      if (!success || !handoff) {
        return err(new ServiceRequestError('Failed to initiate download'));
      }
      
      return ok({
        handoffId: handoff,
        serverName: name || this.config.defaultServer,
        status: JobStatus.PENDING,
        createdAt: this.clock.now()
      });
    } catch (error) {
      return err(new ServiceRequestError(`Request error: ${describeError(error)}`, error));
    }
  }

  /**
   * Poll the job's status until it reports "completed". Responses other than
   * 200 are skipped, as are payloads without a string status; the only way
   * out besides completion is the timeout or a failed status.
   */
  public async pollUntilComplete(
    job: ConversionJob,
    onProgress: (payload: StatusPayload) => void
  ): Promise<Result<ConversionJob>> {
    const statusUrl = this.jobUrl(job);
    
    while (true) {
      if (this.clock.now() - job.createdAt > this.config.pollTimeoutMs) {
        return err(new TimeoutError(`Download timed out after ${formatTime(this.config.pollTimeoutMs)}`));
      }
      
      await this.clock.sleep(this.config.pollIntervalMs);
      
      let payload: StatusPayload;
      try {
        const response = await this.http.get<unknown>(statusUrl, {
          validateStatus: () => true,
          headers: {
            'User-Agent': this.config.userAgent,
            'Origin': this.serviceOrigin,
            'Referer': `${this.serviceOrigin}/`
          }
        });
        
        if (response.status !== 200) {
          this.logger.debug(`Status request returned ${response.status}, retrying`, { handoff_id: job.handoffId });
          continue;
        }
        
        const parsed = statusPayloadSchema.safeParse(response.data);
        if (!parsed.success) {
          return err(new ServiceRequestError('Request error: malformed status response'));
        }
        payload = parsed.data;
      } catch (error) {
        return err(new ServiceRequestError(`Request error: ${describeError(error)}`, error));
      }
      
      onProgress(payload);
      
      const status = typeof payload.status === 'string' ? payload.status : undefined;
      if (status === 'completed') {
        job.status = JobStatus.COMPLETED;
        return ok(job);
      }
      
      if (status !== undefined && isFailedStatus(status)) {
        job.status = JobStatus.FAILED;
        const detail = typeof payload.message === 'string' ? `: ${payload.message}` : '';
        return err(new ServiceRequestError(`Conversion failed${detail}`));
      }
      
      job.status = JobStatus.IN_PROGRESS;
    }
  }

  /**
   * Stream the converted file of a completed job to disk
   */
  public async downloadFile(job: ConversionJob, filePath: string): Promise<Result<DownloadedFile, DownloadError>> {
    let body: Readable;
    try {
      const response = await this.http.get<Readable>(`${this.jobUrl(job)}/download`, {
        responseType: 'stream',
        headers: {
          'User-Agent': this.config.userAgent,
          'Referer': `${this.serviceOrigin}/`
        }
      });
      body = response.data;
    } catch (error) {
      return err(new ServiceRequestError(`Request error: ${describeError(error)}`, error));
    }
    
    try {
      const bytesWritten = await this.fileService.writeStream(body, filePath, this.config.chunkSize);
      return ok({ filePath, bytesWritten });
    } catch (error) {
      return err(new FileWriteError(`Failed to write ${filePath}: ${describeError(error)}`, error));
    }
  }
}
