/**
 * Structured logger for braceconf tools.
 *
 * Emits {@link LogEntry} objects to a pluggable sink, with level
 * filtering and child loggers for component-scoped output.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all logging output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Human-readable level name (e.g. "DEBUG", "INFO"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp of when the entry was created. */
  timestamp: string;
  /** Component name for scoped logging. */
  component?: string;
  /** Arbitrary contextual fields. */
  [key: string]: unknown;
}

/** A function that receives each emitted {@link LogEntry}. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** JSON lines on stdout. */
export const jsonOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Build a sink that writes one human-readable line per entry.
 *
 * ```
 * WARN [cli] upstream has no servers upstream=api
 * ```
 */
export function lineOutput(write: (line: string) => void): LogOutput {
  return (entry: LogEntry): void => {
    const { level, message, timestamp: _timestamp, component, ...fields } = entry;
    const parts = [level];
    if (component !== undefined) {
      parts.push(`[${component}]`);
    }
    parts.push(message);
    for (const [key, value] of Object.entries(fields)) {
      parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
    write(parts.join(' '));
  };
}

/**
 * Parse a level name such as `"warn"` or `"DEBUG"`.
 *
 * @returns The matching level, or `undefined` for an unknown name.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  /** Component name prepended to child logger components. */
  component?: string;
  /** Output sink. Defaults to {@link jsonOutput}. */
  output?: LogOutput;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, contextual fields and child
 * loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'cli' });
 * log.info('formatted file', { path: 'nginx.conf' });
 * log.child('format').warn('no upstreams found');
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? jsonOutput;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level and output. The
   * child's component is `parent.child` when this logger has one.
   */
  child(component: string): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
