import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LoggerOptions {
  level: LogLevel;
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  source?: string;
}

export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

export class Logger {
  private options: LoggerOptions;
  private logFile: fs.WriteStream | null = null;

  constructor(options: Partial<LoggerOptions> = {}, private parent?: Logger) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      logToConsole: options.logToConsole ?? true,
      logToFile: options.logToFile ?? false,
      logFilePath: options.logFilePath,
      source: options.source
    };

    if (!parent) {
      this.initLogFile();
    }
  }

  private initLogFile(): void {
    if (this.options.logToFile && this.options.logFilePath) {
      try {
        const logDir = path.dirname(this.options.logFilePath);
        fs.mkdirSync(logDir, { recursive: true });

        this.logFile = fs.createWriteStream(this.options.logFilePath, { flags: 'a' });
        this.logFile.write(`\n--- Log started at ${new Date().toISOString()} ---\n`);
      } catch (error) {
        console.error(`Error creating log file at ${this.options.logFilePath}:`, error);
        this.options.logToFile = false;
      }
    }
  }

  /**
   * Logger writing through this one's log file, prefixing lines with `source`
   */
  public child(source: string): Logger {
    return new Logger({ ...this.options, source }, this.parent ?? this);
  }

  public debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  public info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  public warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  public error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  private log(level: LogLevel, message: string): void {
    if (level < this.options.level) return;

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level].padEnd(5);
    const source = this.options.source ? `[${this.options.source}] ` : '';
    const formattedMessage = `[${timestamp}] ${levelStr} - ${source}${message}`;

    if (this.options.logToConsole) {
      const consoleMethod = this.getConsoleMethod(level);
      consoleMethod(formattedMessage);
    }

    (this.parent ?? this).writeToFile(formattedMessage);
  }

  private writeToFile(line: string): void {
    if (this.options.logToFile && this.logFile) {
      this.logFile.write(line + '\n');
    }
  }

  private getConsoleMethod(level: LogLevel): (message: string) => void {
    switch(level) {
      case LogLevel.DEBUG: return console.debug;
      case LogLevel.INFO: return console.info;
      case LogLevel.WARN: return console.warn;
      case LogLevel.ERROR: return console.error;
      default: return console.log;
    }
  }

  /**
   * Write the end marker and resolve once the log file is flushed
   */
  public close(): Promise<void> {
    const logFile = this.logFile;
    if (!logFile) return Promise.resolve();

    this.logFile = null;
    return new Promise<void>(resolve => {
      logFile.end(`--- Log ended at ${new Date().toISOString()} ---\n\n`, () => resolve());
    });
  }
}
