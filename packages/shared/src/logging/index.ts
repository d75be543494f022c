// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Logger
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for dependency injection. Components take one in their
 * options and fall back to a console logger.
 */
export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

/**
 * Console logger that prefixes every line with the component scope, e.g.
 * "[CommandRegistry] Registered command". Everything goes to stderr so stdout
 * stays free for command output.
 */
export function createLogger(scope: string, options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? Boolean(process.env.DEBUG);

  const write = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    const line = `[${scope}] ${message}`;
    const args: unknown[] = details ? [line, details] : [line];
    if (level === 'warn') {
      console.warn(...args);
    } else {
      console.error(...args);
    }
  };

  return {
    debug: (message, details) => {
      if (debugEnabled) write('debug', message, details);
    },
    info: (message, details) => write('info', message, details),
    warn: (message, details) => write('warn', message, details),
    error: (message, details) => write('error', message, details),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
