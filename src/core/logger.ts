/**
 * Structured Registry Logger
 *
 * Design decisions:
 * - Level check is a single integer comparison; disabled levels cost nothing
 * - One JSON object per line (machine-parseable)
 * - Child loggers carry bindings such as the registry name
 * - No external dependencies
 */

import type { Writable } from 'node:stream';

export enum LogLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

const LEVEL_NAMES: readonly string[] = ['SILENT', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel | number;
  name?: string;
  timestamp?: boolean;
  stream?: Writable;
  bindings?: LogFields;
}

export interface ILogger {
  error(msg: string | LogFields, data?: LogFields): void;
  warn(msg: string | LogFields, data?: LogFields): void;
  info(msg: string | LogFields, data?: LogFields): void;
  debug(msg: string | LogFields, data?: LogFields): void;
  child(bindings: LogFields): ILogger;
  setLevel(level: LogLevel | number): void;
  isLevelEnabled(level: LogLevel | number): boolean;
}

export class Logger implements ILogger {
  private _level: number;
  private readonly _name: string;
  private readonly _timestamp: boolean;
  private readonly _stream: Writable;
  private readonly _bindings: LogFields | null;

  constructor(opts: LoggerOptions = {}) {
    this._level = opts.level ?? LogLevel.WARN;
    this._name = opts.name || '';
    this._timestamp = opts.timestamp !== false;
    this._stream = opts.stream || process.stderr;
    this._bindings = opts.bindings ?? null;
  }

  setLevel(level: LogLevel | number): void {
    this._level = level;
  }

  isLevelEnabled(level: LogLevel | number): boolean {
    return level !== LogLevel.SILENT && this._level >= level;
  }

  error(msg: string | LogFields, data?: LogFields): void {
    if (this._level < LogLevel.ERROR) return;
    this._write(LogLevel.ERROR, msg, data);
  }

  warn(msg: string | LogFields, data?: LogFields): void {
    if (this._level < LogLevel.WARN) return;
    this._write(LogLevel.WARN, msg, data);
  }

  info(msg: string | LogFields, data?: LogFields): void {
    if (this._level < LogLevel.INFO) return;
    this._write(LogLevel.INFO, msg, data);
  }

  debug(msg: string | LogFields, data?: LogFields): void {
    if (this._level < LogLevel.DEBUG) return;
    this._write(LogLevel.DEBUG, msg, data);
  }

  child(bindings: LogFields): Logger {
    return new Logger({
      level: this._level,
      name: this._name,
      timestamp: this._timestamp,
      stream: this._stream,
      bindings: { ...this._bindings, ...bindings },
    });
  }

  private _write(level: LogLevel, msg: string | LogFields, data?: LogFields): void {
    const entry: LogFields =
      typeof msg === 'object' ? { ...msg, level: LEVEL_NAMES[level] } : { level: LEVEL_NAMES[level], msg };

    if (this._timestamp) {
      entry.time = Date.now();
    }

    if (this._name) {
      entry.name = this._name;
    }

    if (this._bindings) {
      Object.assign(entry, this._bindings);
    }

    if (data) {
      Object.assign(entry, data);
    }

    this._stream.write(JSON.stringify(entry, errorReplacer) + '\n');
  }
}

/** Errors have no enumerable fields; log their name and message instead of `{}` */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/** Create a logger instance */
export function createLogger(opts?: LoggerOptions): Logger {
  return new Logger(opts);
}

/** No-op logger, all methods are empty */
export const noopLogger: ILogger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
  child() {
    return noopLogger;
  },
  setLevel() {},
  isLevelEnabled() {
    return false;
  },
};
