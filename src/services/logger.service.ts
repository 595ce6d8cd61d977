import * as fs from 'fs';
import * as path from 'path';
import { ProgressEvent, StatusPayload } from '../models/track.model';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
}

// Value of the "status" field for each level
const levelStatus: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warning',
  [LogLevel.ERROR]: 'error'
};

/**
 * Writes one JSON object per line. Informational lines go to stdout,
 * diagnostics (debug, warning, error) to stderr.
 */
export class Logger {
  private options: LoggerOptions;
  private logFile: fs.WriteStream | null = null;
  
  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      logToConsole: options.logToConsole ?? true,
      logToFile: options.logToFile ?? false,
      logFilePath: options.logFilePath
    };
    
    this.initLogFile();
  }

  private initLogFile(): void {
    if (this.options.logToFile && this.options.logFilePath) {
      try {
        const logDir = path.dirname(this.options.logFilePath);
        if (!fs.existsSync(logDir)) {
          fs.mkdirSync(logDir, { recursive: true });
        }
        
        this.logFile = fs.createWriteStream(this.options.logFilePath, { flags: 'a' });
      } catch (error) {
        console.error(JSON.stringify({
          status: 'error',
          message: `Error creating log file at ${this.options.logFilePath}: ${String(error)}`
        }));
        this.options.logToFile = false;
      }
    }
  }

  public debug(message: string, fields: LogFields = {}): void {
    this.log(LogLevel.DEBUG, { status: levelStatus[LogLevel.DEBUG], message, ...fields });
  }

  public info(message: string, fields: LogFields = {}): void {
    this.log(LogLevel.INFO, { status: levelStatus[LogLevel.INFO], message, ...fields });
  }

  public warn(message: string, fields: LogFields = {}): void {
    this.log(LogLevel.WARN, { status: levelStatus[LogLevel.WARN], message, ...fields });
  }

  public error(message: string, fields: LogFields = {}): void {
    this.log(LogLevel.ERROR, { status: levelStatus[LogLevel.ERROR], message, ...fields });
  }

  /**
   * Progress events carry their own status (pending, downloading, or whatever
   * the conversion service reported) and are logged at INFO level.
   */
  public event(event: ProgressEvent | StatusPayload): void {
    const level = this.levelForStatus(typeof event.status === 'string' ? event.status : '');
    this.log(level, event);
  }

  /**
   * Final result line. Written regardless of level.
   */
  public result(payload: object): void {
    this.write(LogLevel.INFO, JSON.stringify(payload));
  }

  private levelForStatus(status: string): LogLevel {
    switch (status) {
      case 'debug': return LogLevel.DEBUG;
      case 'warning': return LogLevel.WARN;
      case 'error': return LogLevel.ERROR;
      default: return LogLevel.INFO;
    }
  }

  private log(level: LogLevel, entry: object): void {
    if (level < this.options.level) return;
    this.write(level, JSON.stringify(entry));
  }

  private write(level: LogLevel, line: string): void {
    if (this.options.logToConsole) {
      const consoleMethod = this.getConsoleMethod(level);
      consoleMethod(line);
    }
    
    if (this.options.logToFile && this.logFile) {
      this.logFile.write(`${line}\n`);
    }
  }

  private getConsoleMethod(level: LogLevel): (message: string) => void {
    switch(level) {
      case LogLevel.INFO: return console.log;
      default: return console.error;
    }
  }

  public close(): Promise<void> {
    const logFile = this.logFile;
    this.logFile = null;
    if (!logFile) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => logFile.end(() => resolve()));
  }
}

export function getLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}
