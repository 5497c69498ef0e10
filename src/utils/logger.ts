// src/utils/logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LogLevel } from '../types/config.types';
import { describeError } from './errors';

export interface LoggerOptions {
  level?: LogLevel;
  /** Adds patent-fetcher.log and error.log file transports in this directory */
  logDirectory?: string;
  /** Write console lines to this stream instead of stderr (used by the progress bar) */
  stream?: NodeJS.WritableStream;
}

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const consoleTransport = options.stream
    ? new winston.transports.Stream({
        stream: options.stream,
        format: lineFormat
      })
    : new winston.transports.Console({
        // stdout is reserved for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(winston.format.colorize(), lineFormat)
      });

  const logger = winston.createLogger({
    level: options.level || 'info',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
      }),
      winston.format.errors({ stack: true })
    ),
    transports: [consoleTransport]
  });

  if (options.logDirectory) {
    const logsDir = path.resolve(options.logDirectory);
    fs.mkdirSync(logsDir, { recursive: true });

    logger.add(new winston.transports.File({
      filename: path.join(logsDir, 'patent-fetcher.log'),
      format: lineFormat
    }));

    logger.add(new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: lineFormat
    }));
  }

  return logger;
}

export function createSilentLogger(): winston.Logger {
  return winston.createLogger({ silent: true });
}

/**
 * Context wrapper around a winston logger. Instances are passed down
 * explicitly; library classes default to a silent one.
 */
export class Logger {
  private readonly context: string;
  private readonly base: winston.Logger;

  constructor(context: string, base: winston.Logger = createSilentLogger()) {
    this.context = context;
    this.base = base;
  }

  child(context: string): Logger {
    return new Logger(context, this.base);
  }

  info(message: string): void {
    this.base.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    this.base.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error !== undefined) {
      this.base.error(`[${this.context}] ${message}: ${describeError(error)}`);
    } else {
      this.base.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    this.base.debug(`[${this.context}] ${message}`);
  }
}
