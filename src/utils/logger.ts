import fs from 'fs-extra';
import type { LogLevel } from '../types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

interface LoggingOptions {
  level: LogLevel;
  logFile?: string;
}

let options: LoggingOptions = { level: 'info' };

/**
 * Sets the threshold and the optional log file for every logger. stdout is
 * owned by the stdio transport, so log lines only ever go to stderr.
 */
export function configureLogging(next: LoggingOptions): void {
  if (next.logFile) {
    fs.ensureFileSync(next.logFile);
  }
  options = { ...next };
}

export function formatLogLine(name: string, level: LogLevel, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}][${level.toUpperCase()}][${name}] ${message}`;
}

export function createLogger(name: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    if (LEVELS[level] < LEVELS[options.level]) {
      return;
    }
    const line = formatLogLine(name, level, message);
    console.error(line);
    if (options.logFile) {
      fs.appendFileSync(options.logFile, `${line}\n`, 'utf-8');
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
