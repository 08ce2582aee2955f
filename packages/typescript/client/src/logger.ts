/**
 * Logger - injectable logging used by the client and the test doubles
 */

import pc from 'picocolors';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ConsoleLoggerOptions {
  /** Tag printed before every line (default: 'ensemble') */
  prefix?: string;
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
  /** Disable colors, e.g. when output is captured */
  colors?: boolean;
}

/**
 * Create a Logger that writes to the console with colored level tags
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? 'ensemble';
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const colors = pc.createColors(options.colors ?? pc.isColorSupported);

  const tags: Record<LogLevel, string> = {
    debug: colors.dim(`[${prefix}] debug`),
    info: colors.cyan(`[${prefix}] info`),
    warn: colors.yellow(`[${prefix}] warn`),
    error: colors.red(`[${prefix}] error`),
  };

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `${tags[level]} ${message}`;
    if (level === 'error') {
      console.error(line, ...args);
    } else if (level === 'warn') {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
