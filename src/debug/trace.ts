/**
 * Debug Module - Trace Logging Interface
 *
 * Category-based tracing for detailed subsystem debugging. Trace output
 * ignores the log level; only the enabled categories matter.
 *
 * @module debug/trace
 */

import { type TraceCategory, isTraceEnabled } from './config.js';
import { storeLog } from './log.js';

function traceTo(category: TraceCategory, module: string, message: string, data?: unknown): void {
  if (!isTraceEnabled(category)) return;
  const timestamp = performance.now().toFixed(1);
  const formatted = `[${timestamp}ms][TRACE:${category}] ${message}`;
  storeLog(`TRACE:${category}`, module, message, data);
  if (data !== undefined) {
    console.log(formatted, data);
  } else {
    console.log(formatted);
  }
}

/**
 * Trace logging interface - only logs if category is enabled.
 */
export const trace = {
  /** Layout file loading and registration. */
  layouts(message: string, data?: unknown): void {
    traceTo('layouts', 'Layouts', message, data);
  },

  /** Schema resolution. */
  schema(message: string, data?: unknown): void {
    traceTo('schema', 'Schema', message, data);
  },

  /** Alias resolution. */
  names(message: string, data?: unknown): void {
    traceTo('names', 'Names', message, data);
  },

  /** Model construction. */
  model(message: string, data?: unknown): void {
    traceTo('model', 'Model', message, data);
  },

  /** Packing and unpacking. */
  codec(message: string, data?: unknown): void {
    traceTo('codec', 'Codec', message, data);
  },
};
