import os from 'node:os';
import path from 'node:path';

import pino from 'pino';

import { validateLoggerEnv, type LogLevel } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

/**
 * Runtime logger settings. Anything left unset falls back to the environment.
 */
export interface LoggerOptions {
  /** Write to stderr (pretty in development, JSON otherwise) */
  console?: boolean | undefined;
  /** Append JSON lines to LOGGER_FILE_LOG_DIRNAME/LOGGER_FILE_LOG_FILENAME */
  file?: boolean | undefined;
  level?: LogLevel | undefined;
  /** Send every entry to this stream instead of the configured transports */
  destination?: pino.DestinationStream | undefined;
}

interface ResolvedOptions {
  console: boolean;
  file: boolean;
  level: LogLevel;
  destination?: pino.DestinationStream | undefined;
}

function defaultOptions(): ResolvedOptions {
  return {
    console: env.LOGGER_CONSOLE_ENABLED,
    file: env.LOGGER_FILE_LOG_ENABLED,
    level: env.LOGGER_LOG_LEVEL,
  };
}

let options: ResolvedOptions = defaultOptions();

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

function isTestEnv(): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino(pinoConfig, options.destination);
  }

  // Suppress all output under test unless a destination was given explicitly
  if (isTestEnv()) {
    return pino({ ...pinoConfig, enabled: false, level: 'silent' });
  }

  const transportTargets: TransportTarget[] = [];

  // stdout carries the report, so console logs go to stderr
  if (options.console) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (options.file) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: path.join(env.LOGGER_FILE_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino({ ...pinoConfig, enabled: false, level: 'silent' });
  }

  return pino({ ...pinoConfig, transport: { targets: transportTargets } });
}

/**
 * Internal: get or create the underlying pino logger for a category.
 */
function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  // Children inherit the root level; passing one here would re-enable a silenced root
  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with reconfiguration.
 *
 * We return a Proxy that looks up the latest underlying pino logger on every
 * property access, so modules can create their logger at top level and still
 * follow a later `configureLogger(...)` call.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update logger settings at runtime (used by the CLI for --verbose).
 * Resets cached loggers so new configuration applies immediately.
 */
export function configureLogger(next: LoggerOptions): void {
  options = {
    console: next.console ?? options.console,
    file: next.file ?? options.file,
    level: next.level ?? options.level,
    destination: next.destination ?? options.destination,
  };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Restore the environment-derived settings and drop any custom destination.
 */
export function resetLogger(): void {
  options = defaultOptions();
  rootLogger = undefined;
  loggerCache.clear();
}
