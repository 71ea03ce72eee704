//NOTE(self): Leveled logger for the plan scripts
//NOTE(self): Diagnostics go to stderr so stdout stays the report; a log directory adds a daily JSONL file

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

type Sink = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function consoleSink(entry: LogEntry): void {
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  console.error(`${prefix} ${entry.message}${contextStr}`);
}

function fileSink(directory: string): Sink {
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  let warned = false;
  return entry => {
    const date = entry.timestamp.split('T')[0];
    try {
      appendFileSync(join(directory, `${date}.log`), JSON.stringify(entry) + '\n');
    } catch (err) {
      //NOTE(self): Report the first failure only; the console sink still has every entry
      if (!warned) {
        warned = true;
        consoleSink({ timestamp: entry.timestamp, level: 'warn', message: 'Log file write failed', context: { error: String(err) } });
      }
    }
  };
}

let minLevel: LogLevel = 'info';
let sinks: Sink[] = [consoleSink];

//NOTE(self): Console logging works without init
export function initLogger(level: LogLevel = 'info', directory?: string): void {
  minLevel = level;
  sinks = directory ? [consoleSink, fileSink(directory)] : [consoleSink];
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, context };
  for (const sink of sinks) {
    sink(entry);
  }
}

export function debug(message: string, context?: Record<string, unknown>): void {
  log('debug', message, context);
}

export function info(message: string, context?: Record<string, unknown>): void {
  log('info', message, context);
}

export function warn(message: string, context?: Record<string, unknown>): void {
  log('warn', message, context);
}

export function error(message: string, context?: Record<string, unknown>): void {
  log('error', message, context);
}

export const logger = { debug, info, warn, error, log, initLogger };
