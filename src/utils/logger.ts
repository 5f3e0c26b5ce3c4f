/**
 * Console logger
 * Everything goes to stderr: stdout carries the stdio MCP transport.
 */

import { getConfig, type LogLevel } from './config.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger tagged with a component name
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  const threshold = () => LEVEL_RANK[level ?? getConfig().server.logLevel];

  const write = (messageLevel: LogLevel, message: string, args: unknown[]) => {
    if (LEVEL_RANK[messageLevel] < threshold()) return;
    console.error(`[${component}] ${messageLevel.toUpperCase()} ${message}`, ...args);
  };

  return {
    debug: (msg, ...args) => write('debug', msg, args),
    info: (msg, ...args) => write('info', msg, args),
    warn: (msg, ...args) => write('warn', msg, args),
    error: (msg, ...args) => write('error', msg, args),
  };
}

/**
 * Logger that drops everything (tests, embedding)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
