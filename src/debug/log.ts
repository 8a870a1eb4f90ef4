/**
 * Debug Module - Core Logging Interface
 *
 * Structured logging with level filtering and history tracking.
 *
 * @module debug/log
 */

import { getRuntimeConfig } from '../config/runtime.js';
import {
  LOG_LEVELS,
  type LogLevelValue,
  currentLogLevel,
  enabledModules,
  disabledModules,
  logHistory,
} from './config.js';

type ConsoleMethod = (...args: unknown[]) => void;

// ============================================================================
// Internal Helpers
// ============================================================================

function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < currentLogLevel) return false;

  const moduleLower = module.toLowerCase();
  if (enabledModules.size > 0 && !enabledModules.has(moduleLower)) {
    return false;
  }
  return !disabledModules.has(moduleLower);
}

/**
 * Format a log message with timestamp and module tag.
 */
export function formatMessage(module: string, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][${module}] ${message}`;
}

/**
 * Store an entry in history, trimming to the configured maximum.
 */
export function storeLog(level: string, module: string, message: string, data?: unknown): void {
  logHistory.push({
    time: Date.now(),
    perfTime: performance.now(),
    level,
    module,
    message,
    data,
  });

  const maxHistory = getRuntimeConfig().debug.logHistory.maxLogHistoryEntries;
  while (logHistory.length > maxHistory) {
    logHistory.shift();
  }
}

function emit(
  out: ConsoleMethod,
  level: string,
  module: string,
  message: string,
  data: unknown
): void {
  storeLog(level, module, message, data);
  const formatted = formatMessage(module, message);
  if (data !== undefined) {
    out(formatted, data);
  } else {
    out(formatted);
  }
}

// ============================================================================
// Logging Interface
// ============================================================================

/**
 * Main logging interface.
 *
 * @example
 * ```typescript
 * log.info('Codec', 'Packed offline_core image');
 * log.warn('Model', 'max pooling disabled for 1-bit input', { field: 'maxPoolingEn' });
 * ```
 */
export const log = {
  debug(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.DEBUG)) return;
    emit(console.debug, 'DEBUG', module, message, data);
  },

  verbose(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.VERBOSE)) return;
    emit(console.log, 'VERBOSE', module, message, data);
  },

  info(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.INFO)) return;
    emit(console.log, 'INFO', module, message, data);
  },

  warn(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.WARN)) return;
    emit(console.warn, 'WARN', module, message, data);
  },

  error(module: string, message: string, data?: unknown): void {
    if (!shouldLog(module, LOG_LEVELS.ERROR)) return;
    emit(console.error, 'ERROR', module, message, data);
  },

  /**
   * Always log regardless of level.
   */
  always(module: string, message: string, data?: unknown): void {
    emit(console.log, 'ALWAYS', module, message, data);
  },
};
