// Logger implementation backed by LogTape, with a plain console/file fallback

import {
  configure,
  getConsoleSink,
  getLevelFilter,
  getLogger,
  type LogLevel,
  type LogRecord,
  type Logger as LogTapeLogger,
  type Sink,
} from '@logtape/logtape';
import chalk from 'chalk';
import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import { describeError } from './errors.js';
import { BRAND_MARK } from './utils/brand.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  info(message: string, metadata?: unknown): void;
  error(message: string, metadata?: unknown): void;
  warn(message: string, metadata?: unknown): void;
  debug(message: string, metadata?: unknown): void;
  success(message: string, metadata?: unknown): void;
}

const ROOT_CATEGORY = 'wasmwright';

export function formatMetadata(metadata: unknown): string {
  if (metadata === undefined || metadata === null) return '';
  if (metadata instanceof Error) return describeError(metadata);
  if (typeof metadata === 'string') return metadata;
  try {
    return JSON.stringify(metadata);
  } catch {
    return String(metadata);
  }
}

function toLogTapeLevel(level: LogLevelName): LogLevel {
  return level === 'warn' ? 'warning' : level;
}

function renderRecord(record: LogRecord): string {
  const message = record.message.map((part) => String(part)).join('');
  const extra = formatMetadata(record.properties.metadata);
  return extra ? `${message}\n${extra}` : message;
}

/**
 * Truncate and open `logFile`. A failure, now or on a later write, prints one
 * warning and leaves the stream unwritable; it never reaches the process.
 */
function openLogStream(logFile: string): WriteStream | undefined {
  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch (error) {
    console.warn(chalk.yellow(`Cannot open log file ${logFile}: ${formatMetadata(error)}`));
    return undefined;
  }
  // One run = one log
  const stream = createWriteStream(logFile, { flags: 'w' });
  stream.on('error', (error) => {
    console.warn(chalk.yellow(`Cannot write log file ${logFile}, file logging is off: ${error.message}`));
    stream.destroy();
  });
  return stream;
}

function endStream(stream: WriteStream): Promise<void> {
  if (stream.destroyed) return Promise.resolve();
  return new Promise((resolve) => stream.end(() => resolve()));
}

// LogTape-based logger implementation
class LogTapeBackedLogger implements Logger {
  constructor(private readonly logger: LogTapeLogger) {}

  info(message: string, metadata?: unknown): void {
    this.logger.info('{message}', { message, metadata });
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error('{message}', { message, metadata });
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warn('{message}', { message, metadata });
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug('{message}', { message, metadata });
  }

  success(message: string, metadata?: unknown): void {
    this.logger.info('{message}', { message: `✔ ${message}`, metadata });
  }
}

// Console logger without LogTape, also used directly by tests
export class SimpleLogger implements Logger {
  private readonly logLevel: LogLevelName;
  private logStream?: WriteStream;

  constructor(logLevel: LogLevelName = 'info', logFile?: string) {
    this.logLevel = logLevel;

    if (logFile) {
      this.logStream = openLogStream(logFile);
    }
  }

  private shouldLog(level: LogLevelName): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevelName, message: string): string {
    const time = new Date().toLocaleTimeString('en-US', { hour12: false });
    return `${BRAND_MARK} [${time}] ${level.toUpperCase()}: ${message}`;
  }

  private writeToFile(level: LogLevelName, message: string, metadata?: unknown): void {
    if (!this.logStream?.writable) return;
    const timestamp = new Date().toISOString();
    const extra = formatMetadata(metadata);
    this.logStream.write(
      `${timestamp} ${level.toUpperCase().padEnd(5)}: ${message}${extra ? `\n${extra}` : ''}\n`
    );
  }

  public flush(): Promise<void> {
    const stream = this.logStream;
    if (!stream) return Promise.resolve();
    this.logStream = undefined;
    return endStream(stream);
  }

  info(message: string, metadata?: unknown): void {
    if (!this.shouldLog('info')) return;
    console.log(this.formatMessage('info', message));
    if (metadata !== undefined) console.log(formatMetadata(metadata));
    this.writeToFile('info', message, metadata);
  }

  error(message: string, metadata?: unknown): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(this.formatMessage('error', message)));
    if (metadata !== undefined) console.error(formatMetadata(metadata));
    this.writeToFile('error', message, metadata);
  }

  warn(message: string, metadata?: unknown): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(this.formatMessage('warn', message)));
    if (metadata !== undefined) console.warn(formatMetadata(metadata));
    this.writeToFile('warn', message, metadata);
  }

  debug(message: string, metadata?: unknown): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(this.formatMessage('debug', message)));
    if (metadata !== undefined) console.log(formatMetadata(metadata));
    this.writeToFile('debug', message, metadata);
  }

  success(message: string, metadata?: unknown): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(this.formatMessage('info', `✔ ${message}`)));
    if (metadata !== undefined) console.log(formatMetadata(metadata));
    this.writeToFile('info', `✔ ${message}`, metadata);
  }
}

// File stream behind the LogTape file sink; replaced on every createLogger
let activeLogStream: WriteStream | undefined;

function createFileSink(stream: WriteStream): Sink {
  return (record: LogRecord) => {
    if (!stream.writable) return;
    const timestamp = new Date(record.timestamp).toISOString();
    const level = record.level.toUpperCase().padEnd(7);
    stream.write(`${timestamp} ${level}: ${renderRecord(record)}\n`);
  };
}

/**
 * Flush and close the log file opened by `createLogger`, if any.
 */
export function closeLogFile(): Promise<void> {
  const stream = activeLogStream;
  activeLogStream = undefined;
  return stream ? endStream(stream) : Promise.resolve();
}

// Main logger factory
export async function createLogger(logFile?: string, logLevel: LogLevelName = 'info'): Promise<Logger> {
  await closeLogFile();
  try {
    const sinks: Record<string, Sink> = {
      console: getConsoleSink({
        formatter: (record: LogRecord) => {
          const time = new Date(record.timestamp).toLocaleTimeString('en-US', { hour12: false });
          const level = record.level.toUpperCase().padEnd(7);
          return `${BRAND_MARK} [${time}] ${level} ${renderRecord(record)}`;
        },
      }),
    };
    const fileStream = logFile ? openLogStream(logFile) : undefined;
    activeLogStream = fileStream;
    if (fileStream) {
      sinks.file = createFileSink(fileStream);
    }

    await configure({
      sinks,
      filters: { level: getLevelFilter(toLogTapeLevel(logLevel)) },
      loggers: [
        {
          category: [ROOT_CATEGORY],
          sinks: fileStream ? ['console', 'file'] : ['console'],
          filters: ['level'],
        },
        { category: ['logtape', 'meta'], sinks: [] },
      ],
      reset: true,
    });

    return new LogTapeBackedLogger(getLogger([ROOT_CATEGORY]));
  } catch (error) {
    console.warn(chalk.yellow(`LogTape unavailable, using plain logger: ${formatMetadata(error)}`));
    await closeLogFile();
    return new SimpleLogger(logLevel, logFile);
  }
}

// Prefixes every message with the component it came from
export class ScopedLogger implements Logger {
  constructor(
    private readonly logger: Logger,
    private readonly scope: string
  ) {}

  private formatMessage(message: string): string {
    return `[${this.scope}] ${message}`;
  }

  info(message: string, metadata?: unknown): void {
    this.logger.info(this.formatMessage(message), metadata);
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error(this.formatMessage(message), metadata);
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warn(this.formatMessage(message), metadata);
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug(this.formatMessage(message), metadata);
  }

  success(message: string, metadata?: unknown): void {
    this.logger.success(this.formatMessage(message), metadata);
  }
}

export function createScopedLogger(baseLogger: Logger, scope: string): Logger {
  return new ScopedLogger(baseLogger, scope);
}

// Silent logger for library callers that pass none
export const NULL_LOGGER: Logger = {
  info: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
  success: () => undefined,
};

