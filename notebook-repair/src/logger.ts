import { randomBytes } from 'node:crypto';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export const LOG_FORMATS = ['text', 'json'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  correlationId: string;
  sink: LogSink;
}

export function generateCorrelationId(): string {
  return `repair-${Date.now()}-${randomBytes(4).toString('hex')}`;
}

/**
 * Line-oriented logger. Everything goes to one sink (stdout by default),
 * errors included.
 */
export class RepairLogger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      correlationId: options.correlationId ?? generateCorrelationId(),
      sink: options.sink ?? (line => console.log(line))
    };
  }

  get correlationId(): string {
    return this.options.correlationId;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    if (this.options.format === 'text') {
      this.options.sink(message);
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: this.options.correlationId,
      message,
      ...(data ? { data } : {})
    };
    this.options.sink(JSON.stringify(logEntry));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.level);
  }
}
