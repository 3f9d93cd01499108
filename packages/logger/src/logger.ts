import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LogLevel, validateLoggerEnv } from './env.schema.js';

export interface LogMethod {
  (msg: string): void;
  (obj: Record<string, unknown>, msg: string): void;
}

export interface Logger {
  debug: LogMethod;
  error: LogMethod;
  info: LogMethod;
  trace: LogMethod;
  warn: LogMethod;
}

export interface LoggerOptions {
  /** Write JSON lines here instead of the env-selected transport. */
  destination?: pino.DestinationStream | undefined;
  level?: LogLevel | undefined;
}

let loggerOptions: LoggerOptions = {};

let rootLogger: pino.Logger | undefined;

const categoryLoggers = new Map<string, pino.Logger>();

const loggerCache = new Map<string, Logger>();

function createNoopStream(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

function createRootLogger(): pino.Logger {
  const env = validateLoggerEnv(process.env);

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: loggerOptions.level ?? env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (loggerOptions.destination) {
    return pino.pino(pinoConfig, loggerOptions.destination);
  }

  // vitest may set VITEST after this module was evaluated, so check process.env directly
  const isTestEnv = env.NODE_ENV === 'test' || process.env['VITEST'] === 'true';
  if (isTestEnv || !env.LOGGER_CONSOLE_ENABLED) {
    return pino.pino(pinoConfig, createNoopStream());
  }

  if (env.NODE_ENV === 'development') {
    pinoConfig.transport = {
      options: {
        ignore: 'pid,hostname,service,environment',
        messageFormat: '[{category}] {msg}',
        translateTime: 'SYS:HH:MM:ss',
      },
      target: 'pino-pretty',
    };
  } else {
    // Plain JSON on stdout for log processors
    pinoConfig.transport = {
      options: { destination: 1 },
      target: 'pino/file',
    };
  }

  return pino.pino(pinoConfig);
}

function resolveCategoryLogger(category: string): pino.Logger {
  const cached = categoryLoggers.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const child = rootLogger.child({ category });
  categoryLoggers.set(category, child);
  return child;
}

/**
 * Looks up the underlying pino child on every call so that loggers captured
 * before initLogger() pick up the new configuration.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.write('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.write('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.write('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.write('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.write('error', msgOrObj, maybeMsg);
  }

  private write(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    const target = resolveCategoryLogger(this.category);
    if (typeof msgOrObj === 'string') {
      target[level](msgOrObj);
    } else {
      target[level](msgOrObj, maybeMsg);
    }
  }
}

/**
 * Reconfigure logging. Drops cached pino instances so the next write
 * builds them from the new options.
 */
export function initLogger(options: LoggerOptions = {}): void {
  loggerOptions = options;
  rootLogger = undefined;
  categoryLoggers.clear();
}

export function getLogger(category: string): Logger {
  let logger = loggerCache.get(category);
  if (!logger) {
    logger = new CategoryLogger(category);
    loggerCache.set(category, logger);
  }
  return logger;
}
