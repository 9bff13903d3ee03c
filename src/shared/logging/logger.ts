import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

export type LogContext = Record<string, unknown>;

type EmittedLevel = Exclude<LogLevel, 'none'>;

/** One log entry before it is formatted. */
export interface LogRecord {
  timestamp: Date;
  level: EmittedLevel;
  scopes: readonly string[];
  message: string;
  context?: LogContext;
}

/**
 * What collaborators log through. Tests hand in recording implementations.
 */
export interface Logger {
  /** Below debug; per-callback traces. */
  spam(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Thresholds for scope paths such as `Music|Resolver`. The longest matching
   * prefix of a logger's scopes wins over `level`.
   */
  scopeLevels?: Record<string, LogLevel>;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

const SEVERITY: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

export class LogManager {
  private level: LogLevel = 'info';
  private scopeLevels: Record<string, LogLevel> = {};
  private json = false;
  private stdout: NodeJS.WritableStream = process.stdout;
  private stderr: NodeJS.WritableStream = process.stderr;

  public configure(options: LoggerOptions): void {
    this.level = options.level ?? this.level;
    this.scopeLevels = options.scopeLevels ?? this.scopeLevels;
    this.json = options.json ?? this.json;
    this.stdout = options.stdout ?? this.stdout;
    this.stderr = options.stderr ?? this.stderr;
  }

  public thresholdFor(scopes: readonly string[]): LogLevel {
    for (let depth = scopes.length; depth > 0; depth -= 1) {
      const override = this.scopeLevels[scopes.slice(0, depth).join('|')];
      if (override) return override;
    }
    return this.level;
  }

  public publish(record: LogRecord): void {
    const line = this.json ? formatJson(record) : formatLine(record);
    const stream = record.level === 'warn' || record.level === 'error' ? this.stderr : this.stdout;
    stream.write(`${line}\n`);
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this, [component, ...scopes]);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

/**
 * Logger bound to a scope path. The threshold is looked up on every call, so
 * reconfiguring the manager affects existing loggers.
 */
export class ComponentLogger implements Logger {
  constructor(
    private readonly manager: LogManager,
    private readonly scopes: readonly string[],
  ) {}

  public child(...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.manager, [...this.scopes, ...scopes]);
  }

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

  public isEnabled(level: LogLevel): boolean {
    return level !== 'none' && SEVERITY[level] >= SEVERITY[this.manager.thresholdFor(this.scopes)];
  }

  private write(level: EmittedLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    this.manager.publish({ timestamp: new Date(), level, scopes: this.scopes, message, context });
  }
}

export function formatLine(record: LogRecord): string {
  const scope = record.scopes.join('|');
  return `[${record.timestamp.toISOString()}][${record.level.toUpperCase()}][${scope}]${formatContext(record.context)} ${record.message}`;
}

export function formatJson(record: LogRecord): string {
  return JSON.stringify({
    timestamp: record.timestamp.toISOString(),
    level: record.level,
    scopes: record.scopes,
    message: record.message,
    context: record.context ?? {},
  });
}

export function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) return '';
  const entries = Object.entries(context)
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${renderValue(value)}`);
  return ` [${entries.join(' ')}]`;
}

function renderValue(value: unknown): string {
  switch (typeof value) {
    case 'undefined':
      return 'undefined';
    case 'string':
      if (value === '') return '""';
      return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
    case 'object':
      if (value === null) return 'null';
      try {
        return JSON.stringify(value);
      } catch {
        return String(value);
      }
    default:
      return String(value);
  }
}

/**
 * Message of a thrown value, for log context.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
