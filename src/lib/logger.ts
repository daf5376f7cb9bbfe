/**
 * Structured Logger
 * JSON log lines for the client and the CLI.
 *   - level filtering
 *   - requestId correlation
 *   - duration tracking for async operations
 *   - error serialization (name, message, code, stack)
 *
 * Output goes to stderr by default; stdout is reserved for command output.
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Correlates every line written for one logical operation */
  requestId?: string;
  method?: string;
  url?: string;
  /** Milliseconds */
  duration?: number;
  statusCode?: number;
  attempt?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level (default: 'info') */
  minLevel?: LogLevel;
  /** 'stderr' sends every level to console.error (default); 'stdout' picks the console method by level */
  destination?: 'stdout' | 'stderr';
  formatter?: (entry: LogEntry) => string;
  /** Include stack traces (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'info',
      destination: config.destination || 'stderr',
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    const formatted = this.config.formatter(entry);

    if (this.config.destination === 'stderr') {
      console.error(formatted);
      return;
    }

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context);

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    } else if (error !== undefined && error !== null) {
      entry.error = { name: 'NonError', message: String(error) };
    }

    this.output(entry);
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * Logger for a sub-component. Shares level, destination and formatter with this one,
   * so a level change on either applies to both.
   */
  child(component: string): StructuredLogger {
    const logger = new StructuredLogger(component);
    logger.config = this.config;
    return logger;
  }

  /**
   * Run an async operation and log its outcome with the elapsed time
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, error, { ...context, duration: Date.now() - startTime });
      throw error;
    }
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.output(this.createEntry(level, message, context));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    };
  }
}

/**
 * Per-component loggers
 */
export const loggers = {
  api: new StructuredLogger('API'),
  cli: new StructuredLogger('CLI'),
};

/**
 * Apply one minimum level to every component logger
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function createRequestId(): string {
  return randomUUID();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
