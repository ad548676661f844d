export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type Primitive = string | number | boolean | null | undefined;

type LogPayload = Primitive | Record<string, unknown> | Array<unknown> | object;

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && LOG_LEVELS.some(level => level === value);

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    default:
      console.debug(line);
  }
};

// NaN and Infinity show up in coerced numeric cells; JSON.stringify would print them as null.
const serializePayload = (payload: LogPayload): string => {
  if (typeof payload === 'string') return payload;
  return JSON.stringify(payload, (_key, value: unknown) => {
    if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
    return value;
  });
};

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly scope?: string;

  constructor(level: LogLevel = 'info', sink: LogSink = consoleSink, scope?: string) {
    this.level = level;
    this.sink = sink;
    this.scope = scope;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Same level and sink, with `[scope]` prepended to every message. */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, this.sink, nested);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  private format(level: LogLevel, message: string, payload?: LogPayload) {
    const timestamp = new Date().toISOString();
    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    const base = `[${timestamp}] [${level.toUpperCase()}] ${scoped}`;
    if (payload === undefined) return base;
    return `${base} ${serializePayload(payload)}`;
  }

  private write(level: LogLevel, message: string, payload?: LogPayload) {
    if (!this.shouldLog(level)) return;
    this.sink(level, this.format(level, message, payload));
  }

  error(message: string, payload?: LogPayload) {
    this.write('error', message, payload);
  }

  warn(message: string, payload?: LogPayload) {
    this.write('warn', message, payload);
  }

  info(message: string, payload?: LogPayload) {
    this.write('info', message, payload);
  }

  debug(message: string, payload?: LogPayload) {
    this.write('debug', message, payload);
  }
}

const envLevel = process.env.LOG_LEVEL;
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
