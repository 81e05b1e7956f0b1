/**
 * Logging on top of winston. Lists only log at `debug` (capacity changes)
 * and `warn` (allocation failures); the default logger is silent.
 */

import winston from 'winston';
import type { Writable } from 'node:stream';
import { getConfig, type LogLevelSetting } from './config';
import { LOGGER_MODULE } from './internal/constants';

export enum LogLevel {
  error = 'error',
  warn = 'warn',
  info = 'info',
  debug = 'debug',
}

export type Context = Record<string, string | number | boolean | null>;

export type LogHandler = (message: string, context?: Context, error?: Error) => void;

export interface Logger {
  error: LogHandler;
  warn: LogHandler;
  info: LogHandler;
  debug: LogHandler;
}

export interface LoggerOptions {
  level?: LogLevelSetting;
  module?: string;
  // Writes JSON lines here instead of the console
  stream?: Writable;
}

export class WinstonLogger implements Logger {
  private readonly winston: winston.Logger;
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    const level = options.level ?? getConfig().logLevel;
    this.silent = level === 'silent';
    this.winston = winston.createLogger({
      level: level === 'silent' ? LogLevel.error : level,
      silent: this.silent,
      defaultMeta: { module: options.module ?? LOGGER_MODULE },
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports: [
        options.stream
          ? new winston.transports.Stream({ stream: options.stream })
          : new winston.transports.Console(),
      ],
      exitOnError: false,
    });
  }

  error(message: string, context?: Context, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: Context, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: Context, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  debug(message: string, context?: Context, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  private createLogEntry(level: LogLevel, message: string, context?: Context, error?: Error): void {
    if (this.silent || !this.winston.isLevelEnabled(level)) return;
    this.winston.log(level, message, {
      ...context,
      ...(error ? { error: error.message, stack: error.stack ?? '' } : {}),
    });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new WinstonLogger(options);
}

// Shared per-module loggers, rebuilt when the configured level changes
const DEFAULT_LOGGERS = new Map<string, { level: LogLevelSetting; logger: Logger }>();

export function getLogger(module: string = LOGGER_MODULE): Logger {
  const level = getConfig().logLevel;
  const cached = DEFAULT_LOGGERS.get(module);
  if (cached && cached.level === level) return cached.logger;

  const logger = createLogger({ level, module });
  DEFAULT_LOGGERS.set(module, { level, logger });
  return logger;
}
