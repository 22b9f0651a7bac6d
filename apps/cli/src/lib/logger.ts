/**
 * CLI logger: consola for level filtering, chalk for colour, stderr for
 * everything so stdout carries only the report
 */

import { createConsola, LogLevels, type ConsolaReporter, type LogObject, type LogType } from 'consola';
import chalk from 'chalk';
import type { LogEntry } from '@leakgate/core';
import type { SymbolSet } from './environment.js';
import { ASCII_SYMBOLS } from './environment.js';

/** Log levels accepted on the command line and in LOG_LEVEL */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silent: LogLevels.silent,
  error: LogLevels.error,
  warn: LogLevels.warn,
  info: LogLevels.info,
  debug: LogLevels.debug,
};

/** Logger options */
export interface LoggerOptions {
  /** Minimum log level */
  level?: LogLevel;
  /** Output as JSON lines */
  json?: boolean;
  colors?: boolean;
  symbols?: SymbolSet;
  /** Sink for formatted lines (default: stderr) */
  write?: (line: string) => void;
}

/** Logger instance interface */
export interface Logger {
  success: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
  /** Forward a core pipeline log entry */
  fromCore: (entry: LogEntry) => void;
}

function render(args: readonly unknown[]): string {
  return args.map((arg) => (typeof arg === 'string' ? arg : JSON.stringify(arg))).join(' ');
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const useColors = options.colors ?? false;
  const symbols = options.symbols ?? ASCII_SYMBOLS;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  // Color functions (with fallbacks when colors disabled)
  const c = {
    green: useColors ? chalk.green : (s: string) => s,
    red: useColors ? chalk.red : (s: string) => s,
    yellow: useColors ? chalk.yellow : (s: string) => s,
    cyan: useColors ? chalk.cyan : (s: string) => s,
    dim: useColors ? chalk.dim : (s: string) => s,
  };

  const decorate: Partial<Record<LogType, (message: string) => string>> = {
    success: (message) => `${c.green(symbols.tick)} ${message}`,
    error: (message) => `${c.red(symbols.cross)} ${message}`,
    warn: (message) => `${c.yellow(symbols.warning)} ${message}`,
    info: (message) => `${c.cyan(symbols.info)} ${message}`,
    debug: (message) => c.dim(`${symbols.bullet} ${message}`),
  };

  const reporter: ConsolaReporter = {
    log: (logObj: LogObject) => {
      const message = render(logObj.args);
      if (options.json) {
        write(JSON.stringify({ timestamp: logObj.date.toISOString(), level: logObj.type, message }));
        return;
      }
      const format = decorate[logObj.type];
      write(format ? format(message) : message);
    },
  };

  const consola = createConsola({
    level: LOG_LEVEL_MAP[options.level ?? 'info'],
    reporters: [reporter],
  });

  return {
    success: (message) => consola.success(message),
    error: (message) => consola.error(message),
    warn: (message) => consola.warn(message),
    info: (message) => consola.info(message),
    debug: (message) => consola.debug(message),
    fromCore: (entry) => {
      const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
      const line = `[${entry.component}] ${entry.message}${context}`;
      switch (entry.level) {
        case 'error':
          consola.error(entry.error ? `${line}: ${entry.error.message}` : line);
          break;
        case 'warn':
          consola.warn(line);
          break;
        case 'info':
          consola.info(line);
          break;
        default:
          consola.debug(line);
      }
    },
  };
}
