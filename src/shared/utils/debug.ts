/**
 * Leveled stderr logging.
 *
 * Each module creates its own named logger. Output is suppressed
 * unless a level is set via setLogLevel(), the RUNFMT_LOG_LEVEL
 * environment variable, or the config file.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LOG_LEVEL_ENV_KEY = 'RUNFMT_LOG_LEVEL';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_LABEL: Record<EmittingLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env[LOG_LEVEL_ENV_KEY]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'silent';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Re-read the level from the environment (used by tests). */
export function resetLogLevel(): void {
  currentLevel = levelFromEnv();
}

export function shouldLog(level: EmittingLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

function formatData(data: LogData | undefined): string {
  if (!data || Object.keys(data).length === 0) return '';
  return ` ${JSON.stringify(data)}`;
}

function emit(level: EmittingLevel, name: string, message: string, data?: LogData): void {
  if (!shouldLog(level)) return;
  const label = LEVEL_LABEL[level](`[${level.toUpperCase()}]`);
  process.stderr.write(`${label} [${name}] ${message}${formatData(data)}\n`);
}

/**
 * Create a logger bound to a module name.
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, data) => emit('debug', name, message, data),
    info: (message, data) => emit('info', name, message, data),
    warn: (message, data) => emit('warn', name, message, data),
    error: (message, data) => emit('error', name, message, data),
  };
}
