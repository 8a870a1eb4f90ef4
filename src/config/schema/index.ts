/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial input merged over defaults
 *
 * @module config/schema
 */

// =============================================================================
// Debug Schema
// =============================================================================
export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type TraceCategory,
  type TraceConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

// =============================================================================
// Registers Schema
// =============================================================================
export {
  type UnknownNamePolicy,
  type RegistersConfigSchema,
  DEFAULT_REGISTERS_CONFIG,
} from './registers.schema.js';

// =============================================================================
// Master Config
// =============================================================================
export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  DEFAULT_RUNTIME_CONFIG,
  createRegisterLibConfig,
} from './neuroreg.schema.js';
