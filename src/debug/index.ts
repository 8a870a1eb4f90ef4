/**
 * Debug Module - Unified Logging and Tracing
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Trace Categories (what to show when tracing)
 *   layouts - layout loading and registration
 *   schema  - schema resolution and cache hits
 *   names   - alias resolution
 *   model   - model construction
 *   codec   - packing and unpacking
 *   all     - everything
 *
 * ## Usage
 *   import { log, trace, setLogLevel, setTrace } from '../debug/index.js';
 *
 *   log.info('Codec', 'Packed offline_core');
 *   trace.schema('cache hit offline_neuron@1');
 *
 *   setLogLevel('verbose');
 *   setTrace('codec,model');
 *   setTrace('all,-names');
 *   setTrace(false);
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  type LogLevel,
  type LogLevelValue,
  type TraceCategory,
  type LogEntry,
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  isTraceEnabled,
  applyDebugConfig,
  enableModules,
  disableModules,
  resetModuleFilters,
} from './config.js';

export { log } from './log.js';
export { trace } from './trace.js';

export {
  type LogHistoryFilter,
  type DebugSnapshot,
  getLogHistory,
  clearLogHistory,
  getDebugSnapshot,
} from './history.js';
