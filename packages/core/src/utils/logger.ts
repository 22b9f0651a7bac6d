/**
 * Structured Logger
 *
 * Provides consistent, structured logging across all components.
 * Entries pass through the logger's scrubber before any handler sees them,
 * so a raw secret registered with `withSecrets()` never reaches output.
 */

import { scrubRecord, scrubText } from '../redaction/scrub.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  enableStructured: boolean;
  /** Raw values masked out of every message, context and error */
  secrets: readonly string[];
  onLog?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  component: 'leakgate',
  enableConsole: true,
  enableStructured: false,
  secrets: [],
};

/**
 * Create a scoped logger instance
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Create a child logger with a new component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  /**
   * Create a logger that masks the given raw values in everything it emits
   */
  withSecrets(secrets: readonly string[]): Logger {
    return new Logger({
      ...this.config,
      secrets: [...this.config.secrets, ...secrets.filter((secret) => secret.length > 0)],
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorInfo = error ? {
      name: error.name,
      message: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
      stack: error.stack,
    } : undefined;

    this.log('error', message, context, errorInfo);
  }

  /**
   * Create a log group for related operations
   */
  group(name: string): LogGroup {
    return new LogGroup(this, name);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const { secrets } = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message: scrubText(message, secrets),
      context: context ? scrubRecord(context, secrets) : undefined,
      error: error ? {
        name: error.name,
        message: scrubText(error.message, secrets),
        code: error.code,
        stack: error.stack === undefined ? undefined : scrubText(error.stack, secrets),
      } : undefined,
    };

    if (this.config.onLog) {
      this.config.onLog(entry);
    }

    if (this.config.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableStructured) {
      const output = JSON.stringify(entry);
      switch (entry.level) {
        case 'error':
          console.error(output);
          break;
        case 'warn':
          console.warn(output);
          break;
        default:
          console.log(output);
      }
      return;
    }

    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    const message = `${prefix} ${entry.message}${contextStr}`;
    switch (entry.level) {
      case 'error':
        console.error(message);
        if (entry.error?.stack) {
          console.error(entry.error.stack);
        }
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'debug':
        console.debug(message);
        break;
      default:
        console.log(message);
    }
  }
}

/**
 * Log group for tracking related operations
 */
export class LogGroup {
  private logger: Logger;
  private name: string;
  private startTime: number;
  private operations: Array<{ name: string; duration: number; success: boolean }> = [];

  constructor(logger: Logger, name: string) {
    this.logger = logger;
    this.name = name;
    this.startTime = performance.now();
    this.logger.debug(`Starting: ${name}`);
  }

  addOperation(name: string, duration: number, success: boolean): void {
    this.operations.push({ name, duration, success });
  }

  /**
   * End the group and log summary
   */
  end(success = true): void {
    const totalDuration = Math.round(performance.now() - this.startTime);
    const failed = this.operations.filter(op => !op.success).length;

    if (success && failed === 0) {
      this.logger.info(`Completed: ${this.name}`, {
        duration: totalDuration,
        operationCount: this.operations.length,
      });
    } else {
      this.logger.warn(`Completed with issues: ${this.name}`, {
        duration: totalDuration,
        operationCount: this.operations.length,
        failedCount: failed,
      });
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({ level: 'info', component: 'leakgate' });
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}
