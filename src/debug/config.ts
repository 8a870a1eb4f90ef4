/**
 * Debug Module - Configuration and State
 *
 * Log levels, trace categories and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';

// ============================================================================
// Types and Constants
// ============================================================================

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/**
 * Trace categories
 */
export const TRACE_CATEGORIES = [
  'layouts',  // Layout file loading and registration
  'schema',   // Schema resolution and cache hits
  'names',    // Alias resolution
  'model',    // Model construction and cross-field checks
  'codec',    // Packing and unpacking
] as const;

export type TraceCategory = (typeof TRACE_CATEGORIES)[number];

export function isTraceCategory(value: string): value is TraceCategory {
  return TRACE_CATEGORIES.some((category) => category === value);
}

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

// ============================================================================
// Global State
// ============================================================================

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export const enabledModules = new Set<string>();
export const disabledModules = new Set<string>();
export const logHistory: LogEntry[] = [];
export const enabledTraceCategories = new Set<TraceCategory>();

const LEVEL_BY_NAME: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

// ============================================================================
// Configuration Functions
// ============================================================================

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  currentLogLevel = LEVEL_BY_NAME[level.toLowerCase()] ?? LOG_LEVELS.INFO;
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LEVEL_BY_NAME)) {
    if (value === currentLogLevel) return name;
  }
  return 'info';
}

/**
 * Set trace categories.
 *
 * @param categories - Comma-separated categories, 'all', false to disable, or array
 *   Examples:
 *   - 'codec,model' - enable codec and model
 *   - 'all' - enable all categories
 *   - 'all,-names' - all except names
 *   - false - disable all tracing
 */
export function setTrace(categories: string | readonly string[] | false): void {
  enabledTraceCategories.clear();
  if (categories === false) {
    return;
  }

  const entries = typeof categories === 'string'
    ? categories.split(',').map((s) => s.trim())
    : categories;

  if (entries.includes('all')) {
    for (const category of TRACE_CATEGORIES) {
      enabledTraceCategories.add(category);
    }
  }

  for (const entry of entries) {
    if (entry === 'all') continue;
    const excluded = entry.startsWith('-');
    const name = excluded ? entry.slice(1) : entry;
    if (!isTraceCategory(name)) continue;
    if (excluded) {
      enabledTraceCategories.delete(name);
    } else {
      enabledTraceCategories.add(name);
    }
  }
}

/**
 * Get enabled trace categories.
 */
export function getTrace(): TraceCategory[] {
  return [...enabledTraceCategories];
}

export function isTraceEnabled(category: TraceCategory): boolean {
  return enabledTraceCategories.has(category);
}

/**
 * Apply log level and trace settings from a debug config.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  const desired = config.logLevel.defaultLogLevel;
  if (desired && desired !== getLogLevel()) {
    setLogLevel(desired);
  }

  if (config.trace.enabled) {
    const categories = config.trace.categories.length
      ? config.trace.categories.join(',')
      : 'all';
    setTrace(categories);
  } else if (getTrace().length > 0) {
    setTrace(false);
  }
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  enabledModules.clear();
  for (const m of modules) {
    enabledModules.add(m.toLowerCase());
  }
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  for (const m of modules) {
    disabledModules.add(m.toLowerCase());
  }
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}
