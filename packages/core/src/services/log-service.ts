/**
 * ILogService - structured logging for the client and CLI
 *
 * Two output modes:
 * - Development: `[Module] message` with optional data as a second argument
 * - Production: one JSON record per line
 *
 * Usage:
 *   const log = createLogService({ level: 'debug' });
 *   const clientLog = log.child('OllamaClient');
 *   clientLog.debug('POST /api/chat', { stream: false });
 *   // Dev:  [OllamaClient] POST /api/chat { stream: false }
 *   // Prod: {"level":"debug","ts":"...","module":"OllamaClient","msg":"POST /api/chat","stream":false}
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * Nested children join their names with `:`.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

function isRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === 'object' && data !== null && !Array.isArray(data) && !(data instanceof Error);
}

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? (process.env.NODE_ENV === 'production');
  }

  debug(message: string, data?: unknown): void {
    if (this.enabled('debug')) this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (this.enabled('info')) this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (this.enabled('warn')) this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[this.levelName] <= LOG_LEVELS[level];
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const fn = level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'debug'
          ? console.debug
          : console.log;

    if (this.json) {
      const record = isRecord(data) ? data : data !== undefined ? { data } : {};
      fn(JSON.stringify({
        level,
        ts: new Date().toISOString(),
        ...(this.module ? { module: this.module } : {}),
        msg: message,
        ...record,
      }));
      return;
    }

    const line = this.module ? `[${this.module}] ${message}` : message;
    if (data !== undefined) {
      fn(line, data);
    } else {
      fn(line);
    }
  }
}

export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
