/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Supports JSON output for production and pretty-printing for development.
 */

import pino, { DestinationStream, Logger } from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Where log lines go instead of stdout */
  destination?: DestinationStream;
}

let rootLogger: Logger | null = null;
let prettyStream: DestinationStream | null = null;

// Module loggers are created at import time, before the CLI has read its
// config, so the root writes through a stream initLogger can retarget.
let output: DestinationStream = process.stdout;
const forward: DestinationStream = { write: (line: string) => output.write(line) };
const moduleLoggers: Logger[] = [];

/** Narrow an arbitrary string (env var, CLI flag) to a LogLevel */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

/**
 * Initialize the root logger. Call once at startup; later calls retarget
 * every logger already handed out.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
  const usePretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && level !== 'silent');

  if (config.destination) {
    output = config.destination;
  } else if (usePretty) {
    prettyStream ??= pretty({
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      messageFormat: '[{module}] {msg}',
    });
    output = prettyStream;
  } else {
    output = process.stdout;
  }

  rootLogger ??= pino({ level }, forward);
  rootLogger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
  return rootLogger;
}

/**
 * Get a scoped logger for a specific module.
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  const child = getRootLogger().child({ module });
  moduleLoggers.push(child);
  return child;
}

/**
 * Get the root logger instance.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}
