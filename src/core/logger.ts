/**
 * Centralized pino logger factory for vexcmd.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for JSON command output, so diagnostics go to files,
 * or to stderr before initLogger has run.
 */

import pino, { type Logger } from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: Logger | null = null;
let currentLogDir: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param stateDir - Absolute path to the project's .vexcmd directory
 * @param config   - Logging section of the resolved config
 */
export function initLogger(stateDir: string, config: LoggingConfig): Logger {
  const dest = join(stateDir, config.filePath);
  currentLogDir = dirname(dest);

  mkdirSync(currentLogDir, { recursive: true });

  // pino.transport() runs in a worker thread; pino-roll handles size and
  // daily rotation plus retention.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so library callers and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'library', 'resolver')
 */
export function getLogger(subsystem: string): Logger {
  if (!rootLogger) {
    return pino(
      {
        level: process.env['VEXCMD_LOG_LEVEL'] ?? 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Get the current log directory path, or null before initLogger. */
export function getLogDir(): string | null {
  return currentLogDir;
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogDir = null;
}
