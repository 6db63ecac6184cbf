import winston from 'winston';
import { mkdirSync } from 'fs';
import { join } from 'path';
import type { Config, LogFormat } from '../config/schema.js';
import { ModsiteError } from '../errors/index.js';

/**
 * Build logging on winston.
 * Everything goes to stderr so stdout only carries the build summary.
 */

type LoggingConfig = Config['logging'];

export const LOG_FILE = 'modsite.log';

const MEGABYTE = 1024 ** 2;
const SIZE_UNITS: Record<string, number> = { b: 1, k: 1024, m: MEGABYTE, g: 1024 * MEGABYTE };

const stamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' });
const withStacks = winston.format.errors({ stack: true });

const FORMATS: Record<LogFormat, () => winston.Logform.Format> = {
  json: () => winston.format.combine(stamp, withStacks, winston.format.json()),
  simple: () =>
    winston.format.combine(
      stamp,
      withStacks,
      winston.format.printf(({ timestamp, level, message }) => `${timestamp} ${level}: ${message}`)
    ),
  pretty: () =>
    winston.format.combine(
      stamp,
      withStacks,
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...fields }) => {
        const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
        return `${timestamp} ${level}: ${message}${extra}`;
      })
    ),
};

/**
 * `10m` -> bytes. The config schema has already checked the shape.
 */
export function parseSize(size: string): number {
  const match = /^(\d+)([bkmg])$/.exec(size.toLowerCase());
  if (!match?.[1] || !match[2]) {
    return 10 * MEGABYTE;
  }
  return parseInt(match[1], 10) * (SIZE_UNITS[match[2]] ?? 1);
}

export class Logger {
  private readonly output: winston.Logger;

  constructor(config: LoggingConfig) {
    const transports: winston.transport[] = [
      new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
    ];

    if (config.dir) {
      mkdirSync(config.dir, { recursive: true });
      transports.push(
        new winston.transports.File({
          filename: join(config.dir, LOG_FILE),
          maxsize: parseSize(config.maxSize),
          maxFiles: config.maxFiles,
        })
      );
    }

    this.output = winston.createLogger({
      level: config.level,
      format: FORMATS[config.format](),
      transports,
      exitOnError: false,
    });
  }

  debug(message: string, metadata?: object): void {
    this.output.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.output.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.output.warn(message, metadata);
  }

  /**
   * Log a failure; modsite errors also record their code and context
   */
  error(message: string, error?: Error): void {
    if (!error) {
      this.output.error(message);
      return;
    }

    this.output.error(message, {
      error: error.message,
      stack: error.stack,
      ...(error instanceof ModsiteError ? { code: error.code, context: error.context } : {}),
    });
  }
}

let instance: Logger | null = null;

/**
 * Process-wide logger; the first call must pass the logging config
 */
export function getLogger(config?: LoggingConfig): Logger {
  if (instance) {
    return instance;
  }
  if (!config) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  instance = new Logger(config);
  return instance;
}

export function resetLogger(): void {
  instance = null;
}
