/**
 * Logger
 *
 * Leveled logger with text or JSON output, optional JSON-lines file sink
 * and a bounded in-memory history.
 *
 * Environment:
 * - LOG_LEVEL: debug | info | warn | error
 * - DEBUG: "true", "1" or "taskloom" forces debug level
 * - LOG_FORMAT: text | json
 * - LOG_FILE: path of a JSON-lines log file
 * - NO_COLOR: disables colored text output
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  source?: string;
  context?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  silent?: boolean;
  enableColors?: boolean;
  enableTimestamps?: boolean;
  source?: string;
  filePath?: string;
  maxHistory?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEBUG_FLAGS = ['true', '1', 'taskloom'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  if (process.env.DEBUG && DEBUG_FLAGS.includes(process.env.DEBUG)) {
    return 'debug';
  }
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(envLevel) ? envLevel : 'info';
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private silent: boolean;
  private enableColors: boolean;
  private enableTimestamps: boolean;
  private source?: string;
  private filePath?: string;
  private maxHistory: number;
  private history: LogEntry[] = [];
  private closed = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv();
    this.format = options.format ?? (process.env.LOG_FORMAT === 'json' ? 'json' : 'text');
    this.silent = options.silent ?? process.env.NODE_ENV === 'test';
    this.enableColors =
      options.enableColors ?? (!process.env.NO_COLOR && process.stdout.isTTY === true);
    this.enableTimestamps = options.enableTimestamps ?? true;
    this.source = options.source;
    this.filePath = options.filePath ?? process.env.LOG_FILE;
    this.maxHistory = options.maxHistory ?? 1000;

    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  isDebugEnabled(): boolean {
    return this.level === 'debug';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log an error; an Error argument is flattened into the context
   */
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, {
        errorName: errorOrContext.name,
        errorMessage: errorOrContext.message,
        errorStack: errorOrContext.stack,
        ...context,
      });
      return;
    }
    this.log('error', message, errorOrContext ? { ...errorOrContext, ...context } : context);
  }

  /**
   * Logger with the same settings that tags its entries with `source`
   */
  child(source: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      silent: this.silent,
      enableColors: this.enableColors,
      enableTimestamps: this.enableTimestamps,
      source: this.source ? `${this.source}:${source}` : source,
      filePath: this.closed ? undefined : this.filePath,
      maxHistory: this.maxHistory,
    });
  }

  getHistory(): LogEntry[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Stop writing to the file sink
   */
  close(): void {
    this.closed = true;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      source: this.source,
      context,
    };

    this.history.push(entry);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }

    if (this.filePath && !this.closed) {
      fs.appendFileSync(this.filePath, `${this.toJsonLine(entry)}\n`);
    }

    if (this.silent) {
      return;
    }

    const line = this.format === 'json' ? this.toJsonLine(entry) : this.toText(entry);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private toJsonLine(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.source ? { source: entry.source } : {}),
      ...entry.context,
    });
  }

  private toText(entry: LogEntry): string {
    const parts: string[] = [];
    if (this.enableTimestamps) {
      parts.push(this.paint('gray', entry.timestamp));
    }
    parts.push(this.paint(this.levelColor(entry.level), entry.level.toUpperCase().padEnd(5)));
    if (entry.source) {
      parts.push(this.paint('cyan', `[${entry.source}]`));
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(this.paint('gray', JSON.stringify(entry.context)));
    }
    return parts.join(' ');
  }

  private levelColor(level: LogLevel): 'gray' | 'blue' | 'yellow' | 'red' {
    switch (level) {
      case 'debug':
        return 'gray';
      case 'info':
        return 'blue';
      case 'warn':
        return 'yellow';
      case 'error':
        return 'red';
    }
  }

  private paint(color: 'gray' | 'blue' | 'yellow' | 'red' | 'cyan', text: string): string {
    return this.enableColors ? chalk[color](text) : text;
  }
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

export function resetLogger(): void {
  if (loggerInstance) {
    loggerInstance.close();
  }
  loggerInstance = null;
}

/**
 * Shared logger; always delegates to the current instance
 */
export const logger = {
  debug: (message: string, context?: Record<string, unknown>): void =>
    getLogger().debug(message, context),
  info: (message: string, context?: Record<string, unknown>): void =>
    getLogger().info(message, context),
  warn: (message: string, context?: Record<string, unknown>): void =>
    getLogger().warn(message, context),
  error: (
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void => getLogger().error(message, errorOrContext, context),
  isDebugEnabled: (): boolean => getLogger().isDebugEnabled(),
};
