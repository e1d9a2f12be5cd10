/**
 * Logger
 *
 * Leveled logging to stderr, either as coloured console lines or as one JSON
 * object per line for log collectors.
 */

import chalk from 'chalk';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'pretty' | 'json';

export type LogFields = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DBG'),
  info: chalk.green('INF'),
  warn: chalk.yellow('WRN'),
  error: chalk.red('ERR'),
};

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  /** Output format */
  format?: LogFormat;
  /** Component name shown with every line */
  context?: string;
  /** Line sink, stderr by default */
  write?: (line: string) => void;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly context?: string;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'pretty';
    this.context = options.context;
    this.write = options.write ?? ((line) => console.error(line));
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  /**
   * Logger for a sub-component, sharing level, format and sink.
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: this.context ? `${this.context}.${context}` : context,
      write: this.write,
    });
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, fields: LogFields = {}): void {
    if (!this.isEnabled(level)) return;

    const time = new Date().toISOString();
    if (this.format === 'json') {
      const record: Record<string, unknown> = { time, level, message };
      if (this.context) record.component = this.context;
      for (const [key, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        record[key] = normalizeField(value);
      }
      this.write(JSON.stringify(record));
      return;
    }

    let line = `${chalk.gray(time)} ${LEVEL_LABEL[level]}`;
    if (this.context) line += ` ${chalk.cyan(`[${this.context}]`)}`;
    line += ` ${message}`;
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      line += ` ${chalk.gray(`${key}=`)}${formatValue(normalizeField(value))}`;
    }
    this.write(line);
  }
}

/**
 * Logger that drops everything; handy as a default and in tests.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'silent' });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function normalizeField(value: unknown): unknown {
  if (value instanceof Error) return describeError(value);
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}
