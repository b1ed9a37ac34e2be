/**
 * logger.ts
 * Structured logger for report generation runs.
 *
 * ConsoleLogger for the CLI, FileLogger to keep an audit trail of a run,
 * TeeLogger for both, SilentLogger as the default everywhere a logger is
 * optional (builders, orchestrator, tests).
 *
 * Line format: `HH:MM:SS.mmm [survey-reports] [LEVEL] message  {context}`
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<EmitLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export const DEFAULT_LOG_PREFIX = 'survey-reports';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function formatLogLine(
  prefix: string,
  level: EmitLevel,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const ts = now.toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// Level-filtered base
// ---------------------------------------------------------------------------

abstract class LevelFilteredLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly _prefix: string;

  protected constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract emit(level: EmitLevel, line: string): void;

  private _log(level: EmitLevel, message: string, context?: Record<string, unknown>): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this.emit(level, formatLogLine(this._prefix, level, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger: stdout, errors to stderr
// ---------------------------------------------------------------------------

export class ConsoleLogger extends LevelFilteredLogger {
  constructor(level: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  protected emit(level: EmitLevel, line: string): void {
    const stream = level === 'error' ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }
}

// ---------------------------------------------------------------------------
// FileLogger: buffers lines, written out by flush()
// ---------------------------------------------------------------------------

export class FileLogger extends LevelFilteredLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  /** Lines buffered so far. */
  get lines(): readonly string[] {
    return this._lines;
  }

  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected emit(_level: EmitLevel, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
