/**
 * logger.ts
 * Process-wide logger with console, file and pluggable sinks.
 * Every module takes a named child via createLogger(source); the terminal
 * feed attaches itself as a sink so operators can watch log lines live.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { safeJsonStringify } from './json-utils.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  source: string;
  message: string;
  meta?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

const LOG_LEVELS: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const sinks = new Set<LogSink>();

function getLogLevel(): LogLevelName {
  const configured = process.env.LOG_LEVEL;
  if (configured === 'debug' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  return 'info';
}

function shouldLog(level: LogLevelName): boolean {
  if (level === 'debug') {
    return process.env.DEBUG === 'true';
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function getCurrentLogFile(): string {
  const logDir = process.env.LOG_DIR ?? './logs';
  const dateStr = new Date().toISOString().split('T')[0];
  return `${logDir}/gateway-${dateStr}.log`;
}

function writeToFile(entry: LogEntry): void {
  if (process.env.DISABLE_FILE_LOGGING === 'true') {
    return;
  }
  try {
    mkdirSync(process.env.LOG_DIR ?? './logs', { recursive: true });
    appendFileSync(getCurrentLogFile(), safeJsonStringify(entry) + '\n');
  } catch (err) {
    console.error('Failed to write to log file:', err);
  }
}

function logToConsole(entry: LogEntry): void {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()} [${entry.source}]: ${entry.message}`;
  const args: unknown[] = entry.meta === undefined ? [prefix] : [prefix, entry.meta];
  if (entry.level === 'error') {
    console.error(...args);
  } else if (entry.level === 'warn') {
    console.warn(...args);
  } else {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}

function dispatch(entry: LogEntry): void {
  for (const sink of sinks) {
    try {
      sink(entry);
    } catch (err) {
      console.error('Log sink failed:', err);
    }
  }
}

function emit(source: string, level: LogLevelName, message: string, meta?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, source, message, meta };
  writeToFile(entry);
  logToConsole(entry);
  dispatch(entry);
}

/**
 * Register a sink that receives every emitted entry. Returns a detach function.
 */
export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink);
  return () => {
    sinks.delete(sink);
  };
}

/**
 * Render an entry's message with its metadata appended as compact JSON.
 */
export function formatLogLine(entry: LogEntry): string {
  if (entry.meta === undefined) {
    return entry.message;
  }
  const meta = safeJsonStringify(entry.meta);
  return meta ? `${entry.message} ${meta}` : entry.message;
}

export function createLogger(source: string): Logger {
  return {
    debug: (message, meta) => emit(source, 'debug', message, meta),
    info: (message, meta) => emit(source, 'info', message, meta),
    warn: (message, meta) => emit(source, 'warn', message, meta),
    error: (message, meta) => emit(source, 'error', message, meta),
  };
}

export const logger = createLogger('gateway');
