/**
 * @module logging/logger
 * @description Console and silent implementations of the Logger interface
 * @status COMPLETE
 * @dependencies src/types/common.ts
 */

import type { Logger } from '../types/common';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Writes to stderr through console.warn / console.error so that stdout
 * stays free for command output
 */
export function createConsoleLogger(minLevel: LogLevel = 'warn'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (!enabled(level)) return;
    const line = `[${level}] ${message}`;
    const sink = level === 'error' ? console.error : console.warn;
    if (context === undefined) {
      sink(line);
    } else {
      sink(line, context);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
