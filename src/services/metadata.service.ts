import { AxiosInstance } from 'axios';
import { decode as decodeHtmlEntities } from 'he';
import { AppConfig } from '../config/config';
import { TrackMetadata } from '../models/track.model';
import { describeError, MetadataUnavailableError } from '../utils/errors';
import { err, ok, Result } from '../utils/result';
import { lookupPageUrl } from '../utils/track-url';
import { Logger } from './logger.service';

/**
 * Pulls the raw "<title> by <artist>" text out of a lookup page, or returns
 * undefined when its pattern does not match.
 */
export type TitleMatcher = (html: string) => string | undefined;

function regexMatcher(pattern: RegExp): TitleMatcher {
  return (html) => {
    const match = pattern.exec(html);
    return match ? match[1] : undefined;
  };
}

// Tried in order, first hit wins
export const titleMatchers: TitleMatcher[] = [
  regexMatcher(/<title>(.*?)\s+\|\s+lucida<\/title>/),
  regexMatcher(/<meta property="og:title" content="Download (.*?) on Lucida for free">/),
  regexMatcher(/<title>(.*?)<\/title>/)
];

const BY_SEPARATOR = /(.*?)\s+by\s+(.*?)($|\s+\|)/;

export function extractTitleText(html: string, matchers: TitleMatcher[] = titleMatchers): string | undefined {
  for (const matcher of matchers) {
    const text = matcher(html);
    if (text) {
      return decodeHtmlEntities(text);
    }
  }
  return undefined;
}

/**
 * Split "Title by Artist" (optionally followed by " | suffix") into its parts.
 * Each part is entity-decoded once more, so doubly escaped titles come out clean.
 */
export function parseTitleText(text: string): { artist: string; title: string } | undefined {
  const match = BY_SEPARATOR.exec(text);
  if (!match) {
    return undefined;
  }
  
  return {
    title: decodeHtmlEntities(match[1].trim()).normalize('NFC'),
    artist: decodeHtmlEntities(match[2].trim()).normalize('NFC')
  };
}

export class MetadataService {
  constructor(
    private logger: Logger,
    private config: AppConfig,
    private http: AxiosInstance,
    private matchers: TitleMatcher[] = titleMatchers
  ) {}

  /**
   * Best effort: any failure is logged as a warning and yields empty metadata.
   */
  public async getTrackInfo(trackUrl: string): Promise<TrackMetadata> {
    const result = await this.scrape(trackUrl);
    if (!result.ok) {
      this.logger.warn(result.error.message);
      return {};
    }
    
    this.logger.debug(`Parsed title: '${result.value.title}' by '${result.value.artist}'`);
    return result.value;
  }

  private async scrape(trackUrl: string): Promise<Result<{ artist: string; title: string }, MetadataUnavailableError>> {
    let html: string;
    try {
      const response = await this.http.get<string>(lookupPageUrl(this.config.serviceHost, trackUrl, this.config.country), {
        responseType: 'text',
        responseEncoding: 'utf8',
        headers: { 'User-Agent': this.config.userAgent }
      });
      html = response.data;
    } catch (error) {
      return err(new MetadataUnavailableError(`Failed to get track info: ${describeError(error)}`, error));
    }
    
    const titleText = extractTitleText(html, this.matchers);
    if (!titleText) {
      return err(new MetadataUnavailableError('Could not extract title from HTML response'));
    }
    
    const parsed = parseTitleText(titleText);
    if (!parsed) {
      return err(new MetadataUnavailableError(`Could not parse artist and title from: ${titleText}`));
    }
    
    return ok(parsed);
  }
}
