/**
 * Process-wide logging profile.
 *
 * The launcher builds one profile per run, before the registry is consulted,
 * and hands it to every backend through its context. Records go to stderr so
 * stdout stays free for fetched data.
 */

import chalk from 'chalk';
import { LogLevel, LoggingMode, Writer } from '../types';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogRecord {
  time: Date;
  name: string;
  level: LogLevel;
  message: string;
}

export interface LoggingOptions {
  debug: boolean;
  /** Loggers held at warn in the normal profile. */
  suppressedLoggers?: readonly string[];
  color?: boolean;
  sink?: Writer;
  clock?: () => Date;
}

export interface LoggingProfile {
  readonly mode: LoggingMode;
  readonly level: LogLevel;
  readonly suppressedLoggers: readonly string[];
  levelFor(name: string): LogLevel;
  format(record: LogRecord): string;
  getLogger(name: string): Logger;
}

export type Painter = InstanceType<typeof chalk.Instance>;

// Colors follow stderr's capabilities, where every log and error line goes
export function createPainter(color: boolean): Painter {
  const support = chalk.stderr.supportsColor;
  return new chalk.Instance({ level: color && support ? support.level : 0 });
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(time: Date): string {
  const date = `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())}`;
  const clock = `${pad(time.getHours())}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
  return `${date} ${clock}`;
}

export function formatNormal(record: LogRecord): string {
  return `[${formatTimestamp(record.time)}] ${record.message}`;
}

export function formatDebug(record: LogRecord): string {
  const level = record.level.toUpperCase();
  return `[${formatTimestamp(record.time)} - ${record.name} - ${level}] - ${record.message}`;
}

export class Logger {
  constructor(
    readonly name: string,
    readonly level: LogLevel,
    private readonly emit: (record: LogRecord) => void
  ) {}

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    this.emit({ time: new Date(), name: this.name, level, message });
  }
}

/**
 * Builds the single logging profile for a run. Same options, same profile:
 * nothing here touches global state.
 */
export function configureLogging(options: LoggingOptions): LoggingProfile {
  const mode: LoggingMode = options.debug ? 'debug' : 'normal';
  const level: LogLevel = options.debug ? 'debug' : 'info';
  const suppressed = Object.freeze([...(options.suppressedLoggers ?? [])]);
  const sink = options.sink ?? process.stderr;
  const clock = options.clock;
  const paint = createPainter(options.color !== false);
  const format = options.debug ? formatDebug : formatNormal;

  const colorize = (record: LogRecord, line: string): string => {
    switch (record.level) {
      case 'debug':
        return paint.gray(line);
      case 'warn':
        return paint.yellow(line);
      case 'error':
        return paint.red(line);
      default:
        return line;
    }
  };

  const emit = (record: LogRecord): void => {
    const stamped = clock ? { ...record, time: clock() } : record;
    sink.write(colorize(stamped, format(stamped)) + '\n');
  };

  const levelFor = (name: string): LogLevel => {
    if (!options.debug && suppressed.includes(name)) {
      return 'warn';
    }
    return level;
  };

  return Object.freeze({
    mode,
    level,
    suppressedLoggers: suppressed,
    levelFor,
    format,
    getLogger: (name: string) => new Logger(name, levelFor(name), emit),
  });
}
