/**
 * Structured logging utility using Pino
 * Features:
 * - JSON format by default, pretty-print for development
 * - File output with rotation
 * - Redaction of AWS credentials and pre-signed URLs
 */

import pino from 'pino';
import { createStream } from 'rotating-file-stream';
import type { RotatingFileStream } from 'rotating-file-stream';
import { existsSync, mkdirSync } from 'node:fs';
import { basename, dirname } from 'node:path';

/**
 * Log levels compatible with Pino
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel | string;

  /**
   * Path to log file (if omitted, logs only to stdout)
   */
  file?: string;

  /**
   * Enable pretty printing (default: true in development)
   */
  pretty?: boolean;

  /**
   * Maximum size of each log file before rotation (e.g., '10M')
   */
  maxSize?: string;

  /**
   * Maximum number of rotated log files to keep
   */
  maxFiles?: number;

  name?: string;

  /**
   * Stream to write to instead of stdout (ignored when `file` is set)
   */
  destination?: pino.DestinationStream;
}

/**
 * Paths never written to the log
 */
const REDACT_PATHS = [
  'accessKeyId',
  'secretAccessKey',
  'sessionToken',
  'credentials',
  '*.secretAccessKey',
  '*.sessionToken',
  // Pre-signed S3 URLs grant access to the object
  'url',
  '*.url',
];

const VALID_LEVELS: readonly pino.LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function normalizeLevel(level: string | undefined): pino.LevelWithSilent {
  const normalized = (level || 'info').toLowerCase();
  return VALID_LEVELS.find((valid) => valid === normalized) ?? 'info';
}

function createRotatingFileStream(
  filePath: string,
  maxSize: string = '10M',
  maxFiles: number = 5
): RotatingFileStream {
  const dir = dirname(filePath);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filename = basename(filePath);

  return createStream(filename, {
    path: dir,
    size: maxSize,
    interval: '1d',
    compress: 'gzip',
    maxFiles,
    history: `${filename}.history`,
  });
}

/**
 * Create a Pino logger with the given configuration
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const options: pino.LoggerOptions = {
    level: normalizeLevel(config.level),
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.name) {
    options.name = config.name;
  }

  if (config.file) {
    return pino(
      options,
      pino.multistream([
        { stream: process.stdout },
        { stream: createRotatingFileStream(config.file, config.maxSize, config.maxFiles) },
      ])
    );
  }

  if (config.destination) {
    return pino(options, config.destination);
  }

  if (config.pretty ?? process.env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(options);
}

/**
 * Logger class that wraps Pino for a familiar API
 */
export class Logger {
  private pinoInstance: pino.Logger;
  private config: LoggerConfig;

  constructor(config: LoggerConfig = {}, instance?: pino.Logger) {
    this.config = config;
    this.pinoInstance = instance ?? createLogger(config);
  }

  debug(msg: string, ...args: unknown[]): void;
  debug(obj: object, msg?: string): void;
  debug(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('debug', msgOrObj, rest);
  }

  info(msg: string, ...args: unknown[]): void;
  info(obj: object, msg?: string): void;
  info(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('info', msgOrObj, rest);
  }

  warn(msg: string, ...args: unknown[]): void;
  warn(obj: object, msg?: string): void;
  warn(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('warn', msgOrObj, rest);
  }

  /**
   * Log an error message. An Error first argument is logged under `err`.
   */
  error(msg: string, ...args: unknown[]): void;
  error(err: Error, msg?: string): void;
  error(obj: object, msg?: string): void;
  error(msgOrErrOrObj: string | Error | object, ...rest: unknown[]): void {
    if (msgOrErrOrObj instanceof Error) {
      const msg = typeof rest[0] === 'string' ? rest[0] : msgOrErrOrObj.message;
      this.pinoInstance.error({ err: msgOrErrOrObj }, msg);
      return;
    }
    this.write('error', msgOrErrOrObj, rest);
  }

  setLevel(level: LogLevel | string): void {
    this.pinoInstance.level = normalizeLevel(level);
  }

  getLevel(): string {
    return this.pinoInstance.level;
  }

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, string>): Logger {
    return new Logger({ ...this.config }, this.pinoInstance.child(bindings));
  }

  private write(level: 'debug' | 'info' | 'warn' | 'error', msgOrObj: string | object, rest: unknown[]): void {
    if (typeof msgOrObj === 'string') {
      if (rest.length > 0) {
        this.pinoInstance[level]({ args: rest }, msgOrObj);
      } else {
        this.pinoInstance[level](msgOrObj);
      }
      return;
    }
    const msg = typeof rest[0] === 'string' ? rest[0] : undefined;
    this.pinoInstance[level](msgOrObj, msg);
  }
}

/**
 * Logger settings from LOG_LEVEL, LOG_FILE and LOG_FORMAT. Without
 * LOG_FORMAT, pretty printing follows NODE_ENV.
 */
export function loggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: env.LOG_LEVEL || 'info',
    file: env.LOG_FILE,
    pretty: env.LOG_FORMAT ? env.LOG_FORMAT === 'text' : undefined,
    maxSize: '10M',
    maxFiles: 5,
  };
}

/**
 * Default global logger instance
 * Uses environment variables for configuration
 */
const globalLogger = new Logger(loggerConfigFromEnv());

export { globalLogger as logger };

/**
 * Create a new logger with a module name prefix
 */
export function createModuleLogger(moduleName: string): Logger {
  return globalLogger.child({ module: moduleName });
}
