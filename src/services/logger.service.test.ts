import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, Logger, LogLevel } from './logger.service';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes informational lines as JSON to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger();

    logger.info('Track information retrieved', { artist: 'Artist', title: null });

    expect(log).toHaveBeenCalledWith('{"status":"info","message":"Track information retrieved","artist":"Artist","title":null}');
  });

  it('writes warnings to stderr with the "warning" status', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger();

    logger.warn('Could not extract title from HTML response');

    expect(error).toHaveBeenCalledWith('{"status":"warning","message":"Could not extract title from HTML response"}');
  });

  it('drops lines below the configured level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger({ level: LogLevel.INFO });

    logger.debug('hidden');

    expect(error).not.toHaveBeenCalled();
  });

  it('passes progress events through unchanged', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger();

    logger.event({ status: 'completed', progress: { current: 10, total: 10 } });

    expect(log).toHaveBeenCalledWith('{"status":"completed","progress":{"current":10,"total":10}}');
  });

  it('always writes the result line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger({ level: LogLevel.ERROR });

    logger.info('hidden');
    logger.result({ status: 'fail' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('{"status":"fail"}');
  });

  it('appends lines to a log file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tidalrip-log-'));
    const logFilePath = path.join(dir, 'logs', 'tidalrip.log');
    const logger = new Logger({ logToConsole: false, logToFile: true, logFilePath });

    logger.info('first');
    logger.event({ status: 'pending', handoff_id: 'abc' });
    await logger.close();

    expect(fs.readFileSync(logFilePath, 'utf8')).toBe(
      '{"status":"info","message":"first"}\n{"status":"pending","handoff_id":"abc"}\n'
    );
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('getLogLevel', () => {
  it('maps names to levels', () => {
    expect(getLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(getLogLevel('warn')).toBe(LogLevel.WARN);
    expect(getLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});
