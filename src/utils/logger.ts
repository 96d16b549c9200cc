/**
 * Structured logging utility
 * One line per event: timestamp, level, message and a JSON context with secrets redacted
 */

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const SECRET_KEYS = ['password', 'pin', 'token', 'key', 'secret', 'apikey', 'api_key', 'authorization'];

export class Logger {
  constructor(private readonly scope?: string) {}

  /**
   * Logger that prefixes every message with a component name
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  private threshold(): LogLevel {
    switch (process.env.NODE_ENV) {
      case 'production':
        return 'INFO';
      case 'test':
        return 'WARN';
      default:
        return 'DEBUG';
    }
  }

  private sanitize(obj: unknown): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.sanitize(item));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SECRET_KEYS.some((secret) => lowerKey.includes(secret))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitize(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    const contextStr = context ? JSON.stringify(this.sanitize(context)) : '';
    return `[${timestamp}] [${level}] ${scoped} ${contextStr}`.trimEnd();
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold()];
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('INFO')) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    const errorContext = {
      ...context,
      error: error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name
      } : error
    };
    console.error(this.formatMessage('ERROR', message, errorContext));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('WARN')) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('DEBUG')) {
      console.debug(this.formatMessage('DEBUG', message, context));
    }
  }
}

export const logger = new Logger();
