/**
 * Levelled logger for route handlers and the analysis pipeline.
 * LOG_LEVEL selects the minimum level. Without it: info in production, warn
 * under test, debug otherwise.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = {
  route?: string;
  action?: string;
  [key: string]: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

type LoggerEnv = {
  LOG_LEVEL?: string;
  NODE_ENV?: string;
};

function resolveLevel(env: LoggerEnv): LogLevel {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(configured)) return configured;
  if (env.NODE_ENV === 'production') return 'info';
  return env.NODE_ENV === 'test' ? 'warn' : 'debug';
}

class Logger {
  constructor(private readonly minLevel: LogLevel) {}

  private enabled(level: LogLevel) {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` | ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? { message: error.message, stack: error.stack, name: error.name }
          : error,
    };
    console.error(this.formatMessage('error', message, errorContext));
  }
}

export function createLogger(env: LoggerEnv = process.env) {
  return new Logger(resolveLevel(env));
}

export type { Logger };

export const logger = createLogger();
