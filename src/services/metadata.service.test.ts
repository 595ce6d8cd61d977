import { describe, expect, it, vi } from 'vitest';
import { createFakeHttp, testConfig } from '../testing/fakes';
import { Logger } from './logger.service';
import { extractTitleText, MetadataService, parseTitleText } from './metadata.service';

const TRACK_URL = 'https://listen.tidal.com/track/12345';

describe('extractTitleText', () => {
  it('prefers the "| lucida" page title', () => {
    const html = '<title>Song by Band | lucida</title>' +
      '<meta property="og:title" content="Download Other by Someone on Lucida for free">';
    expect(extractTitleText(html)).toBe('Song by Band');
  });

  it('falls back to the og:title meta tag', () => {
    const html = '<title>lucida.to</title>' +
      '<meta property="og:title" content="Download Song by Band on Lucida for free">';
    expect(extractTitleText(html)).toBe('Song by Band');
  });

  it('falls back to any page title', () => {
    expect(extractTitleText('<head><title>Song by Band</title></head>')).toBe('Song by Band');
  });

  it('decodes HTML entities', () => {
    expect(extractTitleText('<title>Rock &amp; Roll by AC&#x2F;DC | lucida</title>')).toBe('Rock & Roll by AC/DC');
  });

  it('returns undefined when nothing matches', () => {
    expect(extractTitleText('<html><body>nothing here</body></html>')).toBeUndefined();
  });

  it('tries custom matchers in order', () => {
    const first = vi.fn(() => undefined);
    const second = vi.fn(() => 'B by A');
    const third = vi.fn(() => 'never');
    expect(extractTitleText('<html></html>', [first, second, third])).toBe('B by A');
    expect(first).toHaveBeenCalledTimes(1);
    expect(third).not.toHaveBeenCalled();
  });
});

describe('parseTitleText', () => {
  it('splits title and artist around " by "', () => {
    expect(parseTitleText('Shape of You by Ed Sheeran | Lucida')).toEqual({
      title: 'Shape of You',
      artist: 'Ed Sheeran'
    });
    expect(parseTitleText('Track by Artist')).toEqual({ title: 'Track', artist: 'Artist' });
  });

  it('normalizes both parts to NFC', () => {
    expect(parseTitleText('Cafe\u0301 by Be\u0301la')).toEqual({ title: 'Caf\u00e9', artist: 'B\u00e9la' });
  });

  it('decodes entities left in each part', () => {
    expect(parseTitleText('Rock &amp; Roll by AC&#x2F;DC')).toEqual({ title: 'Rock & Roll', artist: 'AC/DC' });
  });

  it('returns undefined without a separator', () => {
    expect(parseTitleText('Just a title')).toBeUndefined();
  });
});

describe('MetadataService', () => {
  const logger = new Logger({ logToConsole: false });

  it('requests the lookup page with a browser user agent', async () => {
    const config = testConfig();
    const { http, requests } = createFakeHttp(() => ({
      data: '<html><head><title>Track by Artist | lucida</title></head></html>'
    }));
    const service = new MetadataService(logger, config, http);

    await expect(service.getTrackInfo(TRACK_URL)).resolves.toEqual({ artist: 'Artist', title: 'Track' });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://lucida.to/?url=https%3A//listen.tidal.com/track/12345&country=auto');
    expect(requests[0].headers.get('User-Agent')).toBe(config.userAgent);
  });

  it('returns empty metadata and warns when the request fails', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const { http } = createFakeHttp(() => ({ status: 500, data: 'oops' }));
    const service = new MetadataService(logger, testConfig(), http);

    await expect(service.getTrackInfo(TRACK_URL)).resolves.toEqual({});
    expect(warn).toHaveBeenCalledWith('Failed to get track info: HTTP 500');
    warn.mockRestore();
  });

  it('returns empty metadata when the title cannot be split', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const { http } = createFakeHttp(() => ({ data: '<title>Mystery | lucida</title>' }));
    const service = new MetadataService(logger, testConfig(), http);

    await expect(service.getTrackInfo(TRACK_URL)).resolves.toEqual({});
    expect(warn).toHaveBeenCalledWith('Could not parse artist and title from: Mystery');
    warn.mockRestore();
  });

  it('unescapes doubly escaped titles', async () => {
    const { http } = createFakeHttp(() => ({ data: '<title>Salt &amp;amp; Pepper by Duo | lucida</title>' }));
    const service = new MetadataService(logger, testConfig(), http);

    await expect(service.getTrackInfo(TRACK_URL)).resolves.toEqual({ artist: 'Duo', title: 'Salt & Pepper' });
  });

  it('returns empty metadata when no title is found', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const { http } = createFakeHttp(() => ({ data: '<html></html>' }));
    const service = new MetadataService(logger, testConfig(), http);

    await expect(service.getTrackInfo(TRACK_URL)).resolves.toEqual({});
    expect(warn).toHaveBeenCalledWith('Could not extract title from HTML response');
    warn.mockRestore();
  });
});
