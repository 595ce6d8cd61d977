#!/usr/bin/env node
import axios from 'axios';
import { Command } from 'commander';
import * as path from 'path';
import { loadConfig } from './config/config';
import { ProgressEvent, StatusPayload, toResultPayload } from './models/track.model';
import { ConversionClient } from './services/conversion.service';
import { TrackDownloader } from './services/download.service';
import { FileService } from './services/file.service';
import { getLogLevel, Logger } from './services/logger.service';
import { MetadataService } from './services/metadata.service';

type CliOptions = {
  output?: string;
  token?: string;
  config?: string;
  logLevel: string;
  logFile?: string;
};

// Setup command line interface
const program = new Command();
program
  .name('tidalrip')
  .description('Download tracks from Tidal through the lucida.to conversion service')
  .version('1.0.0')
  .argument('<url>', 'Tidal track URL, e.g. https://listen.tidal.com/track/12345')
  .option('-o, --output <path>', 'Output directory (default: current directory)')
  .option('-t, --token <token>', 'Conversion service token (overrides TIDALRIP_TOKEN)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', 'info')
  .option('--log-file <path>', 'Also append log lines to a file');

program.parse(process.argv);
const options = program.opts<CliOptions>();
const [trackUrl] = program.args;

async function main(): Promise<number> {
  const config = loadConfig(options.config);
  
  // Command line options win over file and environment
  if (options.output) {
    config.outputDir = path.resolve(options.output);
  }
  if (options.token) {
    config.token = options.token;
  }
  
  const logger = new Logger({
    level: getLogLevel(options.logLevel),
    logToConsole: true,
    logToFile: !!options.logFile,
    logFilePath: options.logFile
  });
  
  setupProcessHandlers(logger);
  
  const http = axios.create();
  const fileService = new FileService(logger);
  const downloader = new TrackDownloader(
    logger,
    config,
    fileService,
    new MetadataService(logger, config, http),
    new ConversionClient(logger, config, http, fileService)
  );
  
  downloader.on('progress', (event: ProgressEvent | StatusPayload) => logger.event(event));
  
  const result = await downloader.download(trackUrl, config.outputDir);
  logger.result(toResultPayload(result));
  await logger.close();
  
  return result.status === 'success' ? 0 : 1;
}

function setupProcessHandlers(logger: Logger): void {
  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise Rejection: ${String(reason)}`);
    process.exit(1);
  });
  
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught Exception: ${error.message}`);
    process.exit(1);
  });
}

// Start the application
main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(JSON.stringify({ status: 'error', message: `Fatal error: ${String(error)}` }));
    process.exit(1);
  });
