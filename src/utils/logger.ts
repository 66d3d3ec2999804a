/**
 * Logging for Quarry.
 *
 * Every line goes to stderr; stdout belongs to command output such as
 * `quarry ask --json`. Loggers are scoped (`[fan-out] ...`) and can carry
 * bound context, so lines from concurrent pipeline runs stay attributable:
 *
 *   const runLog = createLogger('controller').child({ run: 3 });
 *   runLog.info('Decomposed');   // [12:00:00] INFO  [controller] Decomposed (run=3)
 *
 * The threshold comes from QUARRY_LOG_LEVEL (or setLogLevel, or the CLI's
 * --verbose/--quiet); QUARRY_LOG_JSON=true switches to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels an entry can carry; `silent` is only a threshold. */
export type LogSeverity = Exclude<LogLevel, 'silent'>;

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogSeverity;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Logger with the same scope whose lines also carry `context`. */
  child(context: LogMeta): Logger;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

function levelFromEnv(): LogLevel {
  const value = process.env.QUARRY_LOG_LEVEL;
  return isLogLevel(value) ? value : 'info';
}

const settings: { threshold: LogLevel; json: boolean } = {
  threshold: levelFromEnv(),
  json: process.env.QUARRY_LOG_JSON === 'true',
};

export function setLogLevel(level: LogLevel): void {
  settings.threshold = level;
}

export function getLogLevel(): LogLevel {
  return settings.threshold;
}

export function setJsonMode(enabled: boolean): void {
  settings.json = enabled;
}

function renderValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Render one entry as a line (without the trailing newline).
 */
export function formatEntry(entry: LogEntry, json: boolean = settings.json): string {
  if (json) return JSON.stringify(entry);

  const clock = entry.timestamp.slice(11, 19);
  const line = `[${clock}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  const pairs = Object.entries(entry.meta ?? {}).map(([key, value]) => `${key}=${renderValue(value)}`);
  return pairs.length > 0 ? `${line} (${pairs.join(' ')})` : line;
}

class ScopedLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly context: LogMeta = {},
  ) {}

  debug(msg: string, meta?: LogMeta): void {
    this.emit('debug', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.emit('info', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.emit('warn', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.emit('error', msg, meta);
  }

  child(context: LogMeta): Logger {
    return new ScopedLogger(this.scope, { ...this.context, ...context });
  }

  private emit(level: LogSeverity, msg: string, meta?: LogMeta): void {
    if (SEVERITY_RANK[level] < SEVERITY_RANK[settings.threshold]) return;

    const merged = { ...this.context, ...meta };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.scope ? `[${this.scope}] ${msg}` : msg,
    };
    if (Object.keys(merged).length > 0) entry.meta = merged;

    process.stderr.write(`${formatEntry(entry)}\n`);
  }
}

/**
 * Logger whose messages are prefixed with `[scope]`.
 */
export function createLogger(scope: string, context?: LogMeta): Logger {
  return new ScopedLogger(scope, context);
}
