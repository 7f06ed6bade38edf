import type { LogLevel } from '@/types/logLevel';

/**
 * Structured logger with hierarchical scopes and optional JSON output.
 * `spam` is below debug and meant for per-line protocol traces.
 */
export type { LogLevel } from '@/types/logLevel';

const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

export type LogContext = Record<string, unknown>;

/** Levels an entry can be written at. */
export type EntryLevel = Exclude<LogLevel, 'none'>;

export type LogRecord = {
  timestamp: string;
  level: EntryLevel;
  scopes: readonly string[];
  message: string;
  context: LogContext;
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  clock?: () => Date;
}

/**
 * Minimal surface the rest of the code depends on; lets tests pass a recorder.
 */
export interface Logger {
  spam(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function stringifyValue(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    return /[\s"\\[\]=]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable]';
    }
  }
  return String(value);
}

/**
 * `[ts][LEVEL][Scope|Sub] [key=value ...] message`; keys are sorted and
 * undefined values left out.
 */
export function formatLogLine(record: LogRecord): string {
  const entries = Object.entries(record.context)
    .filter(([, value]) => value !== undefined)
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${stringifyValue(value)}`);
  const ctx = entries.length > 0 ? ` [${entries.join(' ')}]` : '';
  return `[${record.timestamp}][${record.level.toUpperCase()}][${record.scopes.join('|')}]${ctx} ${record.message}`;
}

export function formatLogJson(record: LogRecord): string {
  const context: LogContext = {};
  for (const [key, value] of Object.entries(record.context)) {
    context[key] = value instanceof Error ? value.message : value;
  }
  return JSON.stringify({ ...record, context });
}

class LogManager {
  private level: LogLevel = 'info';
  private json = false;
  private stdout: NodeJS.WritableStream = process.stdout;
  private stderr: NodeJS.WritableStream = process.stderr;
  private clock: () => Date = () => new Date();

  public configure(options: LoggerOptions): void {
    this.level = options.level ?? this.level;
    this.json = options.json ?? this.json;
    this.stdout = options.stdout ?? this.stdout;
    this.stderr = options.stderr ?? this.stderr;
    this.clock = options.clock ?? this.clock;
  }

  public isEnabled(level: EntryLevel): boolean {
    return WEIGHTS[level] >= WEIGHTS[this.level];
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this, [component, ...scopes]);
  }

  /** Warnings and errors go to stderr, everything else to stdout. */
  public emit(level: EntryLevel, scopes: readonly string[], message: string, context: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const record: LogRecord = {
      timestamp: this.clock().toISOString(),
      level,
      scopes,
      message,
      context,
    };
    const payload = this.json ? formatLogJson(record) : formatLogLine(record);
    const stream = level === 'error' || level === 'warn' ? this.stderr : this.stdout;
    stream.write(`${payload}\n`);
  }
}

export const logManager = new LogManager();

/**
 * Logger instance bound to a set of scopes (component names).
 */
export class ComponentLogger implements Logger {
  constructor(
    private readonly manager: LogManager,
    private readonly scopes: readonly string[],
  ) {}

  public spam(message: string, context?: LogContext): void {
    this.write('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: EntryLevel, message: string, context?: LogContext): void {
    this.manager.emit(level, this.scopes, message, context ?? {});
  }
}

/**
 * Creates a scoped logger using the global configuration.
 */
export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}
