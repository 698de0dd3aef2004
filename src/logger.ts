/**
 * Levelled logger.
 *
 * Everything goes to stderr: with the stdio transport, stdout carries the
 * MCP protocol stream.
 */

import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string, ...details: unknown[]) => void;

export function createLogger(
  level: LogLevel = 'info',
  scope?: string,
  sink: LogSink = (line, ...details) => console.error(line, ...details)
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) {
      return;
    }
    const prefix = scope ? ` [${scope}]` : '';
    sink(`[${new Date().toISOString()}] ${messageLevel.toUpperCase()}${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope, sink),
  };
}

/** A logger that drops everything, for tests and library callers */
export const silentLogger: Logger = createLogger('error', undefined, () => undefined);
