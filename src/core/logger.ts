/**
 * Structured Logging
 * JSON lines on stdout/stderr. Seeds never reach the output: any context value
 * that looks like an nkey seed is replaced before the entry is emitted.
 */

// ── Log Levels ──

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ── Logger Interface ──

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

// ── Structured Log Entry ──

export interface LogEntry {
  timestamp: string;
  level: string;
  module: string;
  message: string;
  context?: Record<string, unknown>;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel | undefined> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  SILENT: LogLevel.SILENT,
};

/** Parse a level name (case-insensitive); unknown names yield undefined */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVELS_BY_NAME[name.trim().toUpperCase()];
}

// ── Global State ──

let globalLogLevel: LogLevel = parseLogLevel(process.env.TRUSTMINT_LOG_LEVEL) ?? LogLevel.INFO;
let logOutput: (entry: LogEntry) => void = defaultOutput;

function defaultOutput(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

/** Set the global log level. Loggers at a lower level are suppressed. */
export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Override the log output function (for testing). */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

export function resetLogOutput(): void {
  logOutput = defaultOutput;
}

// ── Redaction ──

const SEED_PATTERN = /^S[OAUNCP][A-Z2-7]{50,}$/;
export const REDACTED = '[redacted seed]';

function redact(value: unknown): unknown {
  if (typeof value === 'string') return SEED_PATTERN.test(value) ? REDACTED : value;
  if (Array.isArray(value)) return value.map(redact);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, redact(v)]));
  }
  return value;
}

// ── Console Logger ──

export class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level?: LogLevel,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = this.level ?? globalLogLevel;
    if (level < effectiveLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = Object.fromEntries(Object.entries(context).map(([k, v]) => [k, redact(v)]));
    }
    logOutput(entry);
  }
}

/** Create a logger for a given module. */
export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
