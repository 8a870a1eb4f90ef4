/**
 * Debug Module - Log History and Snapshots
 *
 * @module debug/history
 */

import { getRuntimeConfig } from '../config/runtime.js';
import type { RegistersConfigSchema } from '../config/schema/index.js';
import {
  type LogEntry,
  type TraceCategory,
  enabledTraceCategories,
  enabledModules,
  disabledModules,
  getLogLevel,
  logHistory,
} from './config.js';

export interface LogHistoryFilter {
  /** Level name, case-insensitive ('warn', 'TRACE:codec') */
  level?: string;
  /** Substring of the module name */
  module?: string;
  /** Entries logged at or after this performance.now() time */
  since?: number;
  /** Keep only the most recent N entries */
  last?: number;
}

/**
 * State of the logger and the register policy, for bug reports.
 */
export interface DebugSnapshot {
  timestamp: string;
  logLevel: string;
  traceCategories: TraceCategory[];
  moduleFilters: { enabled: string[]; disabled: string[] };
  registers: RegistersConfigSchema;
  entriesByModule: Record<string, number>;
  recentLogs: string[];
  errorCount: number;
  warnCount: number;
}

export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  const level = filter.level?.toUpperCase();
  const module = filter.module?.toLowerCase();
  const since = filter.since;

  const matches = logHistory.filter((entry) =>
    (level === undefined || entry.level.toUpperCase() === level) &&
    (module === undefined || entry.module.toLowerCase().includes(module)) &&
    (since === undefined || entry.perfTime >= since)
  );
  return filter.last ? matches.slice(-filter.last) : matches;
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}

export function getDebugSnapshot(recent = 50): DebugSnapshot {
  const entriesByModule: Record<string, number> = {};
  for (const entry of logHistory) {
    entriesByModule[entry.module] = (entriesByModule[entry.module] ?? 0) + 1;
  }

  return {
    timestamp: new Date().toISOString(),
    logLevel: getLogLevel(),
    traceCategories: [...enabledTraceCategories],
    moduleFilters: { enabled: [...enabledModules], disabled: [...disabledModules] },
    registers: { ...getRuntimeConfig().registers },
    entriesByModule,
    recentLogs: logHistory
      .slice(-recent)
      .map((e) => `[${e.perfTime.toFixed(1)}ms][${e.level}][${e.module}] ${e.message}`),
    errorCount: logHistory.filter((e) => e.level === 'ERROR').length,
    warnCount: logHistory.filter((e) => e.level === 'WARN').length,
  };
}
