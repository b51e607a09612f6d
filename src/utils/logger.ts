/**
 * Structured logging utility using Pino
 * Features:
 * - JSON format for CI logs, pretty-print for local runs
 * - Configurable log levels
 * - Optional file output with rotation
 * - Redaction of TestRail, LLM and Slack credentials
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
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
  /**
   * Minimum log level to output
   */
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
   * Rotate the log file instead of appending forever
   */
  enableFileRotation?: boolean;

  /**
   * Maximum size of each log file before rotation (e.g., '10M')
   */
  maxSize?: string;

  /**
   * Maximum number of rotated log files to keep
   */
  maxFiles?: number;

  /**
   * Additional redaction paths, 'path.to.property' or 'path.*'
   */
  redactPaths?: string[];

  /**
   * Service/module name for log context
   */
  name?: string;
}

const DEFAULT_REDACT_PATHS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'authorization',
  'webhookUrl',
  'headers.authorization',
  'headers["x-api-key"]',
  'testRail.apiKey',
  'llm.apiKey',
  'slack.webhookUrl',
  '*.password',
  '*.token',
  '*.apiKey',
  '*.webhookUrl',
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
  return VALID_LEVELS.find((candidate) => candidate === normalized) ?? 'info';
}

function createRotatingFileStream(
  filePath: string,
  maxSize: string = '10M',
  maxFiles: number = 5
): rfs.RotatingFileStream {
  const dir = dirname(filePath);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filename = basename(filePath) || 'qa-sync.log';

  return rfs.createStream(filename, {
    path: dir,
    size: maxSize,
    interval: '1d',
    compress: 'gzip',
    maxFiles,
    history: `${filename}.history`,
  });
}

function shouldUsePrettyPrint(config: LoggerConfig): boolean {
  if (config.pretty !== undefined) {
    return config.pretty;
  }
  return process.env.NODE_ENV === 'development';
}

/**
 * Create a Pino logger with the given configuration
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level = normalizeLevel(config.level);

  const baseOptions: pino.LoggerOptions = {
    level,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.name) {
    baseOptions.name = config.name;
  }

  if (config.file && config.enableFileRotation) {
    const fileStream = createRotatingFileStream(config.file, config.maxSize, config.maxFiles);

    return pino(
      baseOptions,
      pino.multistream([{ stream: process.stdout }, { stream: fileStream }])
    );
  }

  const transports: pino.TransportTargetOptions[] = [];

  if (shouldUsePrettyPrint(config)) {
    transports.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    });
  }

  if (config.file) {
    transports.push({
      target: 'pino/file',
      options: { destination: config.file, mkdir: true },
    });
  }

  const [onlyTransport] = transports;
  if (transports.length > 1) {
    // pino rejects custom level formatters on multi-target transports
    baseOptions.transport = { targets: transports };
  } else {
    baseOptions.formatters = { level: (label) => ({ level: label }) };
    if (onlyTransport) {
      baseOptions.transport = onlyTransport;
    }
  }

  return pino(baseOptions);
}

/**
 * Logger class that wraps Pino for a familiar API
 */
export class Logger {
  private pinoInstance: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}, instance?: pino.Logger) {
    this.config = config;
    this.pinoInstance = instance ?? createLogger(config);
  }

  debug(msg: string, ...args: unknown[]): void;
  debug(obj: object, msg?: string, ...args: unknown[]): void;
  debug(msgOrObj: string | object, msg?: string, ...args: unknown[]): void {
    if (typeof msgOrObj === 'string') {
      this.pinoInstance.debug(this.context(msg, args), msgOrObj);
    } else {
      this.pinoInstance.debug(msgOrObj, msg, ...args);
    }
  }

  info(msg: string, ...args: unknown[]): void;
  info(obj: object, msg?: string, ...args: unknown[]): void;
  info(msgOrObj: string | object, msg?: string, ...args: unknown[]): void {
    if (typeof msgOrObj === 'string') {
      this.pinoInstance.info(this.context(msg, args), msgOrObj);
    } else {
      this.pinoInstance.info(msgOrObj, msg, ...args);
    }
  }

  warn(msg: string, ...args: unknown[]): void;
  warn(obj: object, msg?: string, ...args: unknown[]): void;
  warn(msgOrObj: string | object, msg?: string, ...args: unknown[]): void {
    if (typeof msgOrObj === 'string') {
      this.pinoInstance.warn(this.context(msg, args), msgOrObj);
    } else {
      this.pinoInstance.warn(msgOrObj, msg, ...args);
    }
  }

  error(msg: string, ...args: unknown[]): void;
  error(err: Error, msg?: string, ...args: unknown[]): void;
  error(obj: object, msg?: string, ...args: unknown[]): void;
  error(msgOrErrOrObj: string | Error | object, msg?: string, ...args: unknown[]): void {
    if (msgOrErrOrObj instanceof Error) {
      this.pinoInstance.error({ err: msgOrErrOrObj, args }, msg || msgOrErrOrObj.message);
    } else if (typeof msgOrErrOrObj === 'string') {
      this.pinoInstance.error(this.context(msg, args), msgOrErrOrObj);
    } else {
      this.pinoInstance.error(msgOrErrOrObj, msg, ...args);
    }
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

  getPino(): pino.Logger {
    return this.pinoInstance;
  }

  /**
   * `logger.info('msg', { key })` style calls: a single object argument becomes
   * the log context, anything else is kept under `args`.
   */
  private context(first: unknown, rest: unknown[]): object {
    const all = first === undefined ? rest : [first, ...rest];
    const [only] = all;
    if (all.length === 1 && typeof only === 'object' && only !== null && !Array.isArray(only)) {
      return only;
    }
    return all.length > 0 ? { args: all } : {};
  }
}

/**
 * Default global logger instance, configured from the environment
 */
const globalLogger = new Logger({
  level: process.env.LOG_LEVEL || 'info',
  file: process.env.LOG_FILE,
  pretty: process.env.LOG_FORMAT === 'text' || process.env.NODE_ENV === 'development',
  enableFileRotation: process.env.LOG_ROTATE !== 'false',
  maxSize: '10M',
  maxFiles: 5,
});

export { globalLogger as logger };

/**
 * Create a new logger with a module name binding
 */
export function createModuleLogger(moduleName: string): Logger {
  return globalLogger.child({ module: moduleName });
}
