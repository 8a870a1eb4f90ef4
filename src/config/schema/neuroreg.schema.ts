/**
 * Neuroreg Config Schema
 *
 * Master configuration that composes every runtime config. Individual
 * configs remain importable for subsystems that only need their own domain.
 *
 * @module config/schema/neuroreg
 */

import type { DebugConfigSchema } from './debug.schema.js';
import type { RegistersConfigSchema } from './registers.schema.js';

import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';
import { DEFAULT_REGISTERS_CONFIG } from './registers.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Logging and tracing */
  debug: DebugConfigSchema;

  /** Model construction policy */
  registers: RegistersConfigSchema;
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  debug: DEFAULT_DEBUG_CONFIG,
  registers: DEFAULT_REGISTERS_CONFIG,
};

/**
 * Partial runtime overrides, one level below each domain.
 */
export interface RuntimeConfigOverrides {
  debug?: {
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
    trace?: Partial<DebugConfigSchema['trace']>;
  };
  registers?: Partial<RegistersConfigSchema>;
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a runtime configuration with optional overrides.
 *
 * @example
 * ```typescript
 * const config = createRegisterLibConfig({
 *   registers: { unknownNames: 'ignore' },
 *   debug: { logLevel: { defaultLogLevel: 'warn' } },
 * });
 * ```
 */
export function createRegisterLibConfig(overrides: RuntimeConfigOverrides = {}): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  const debug: NonNullable<RuntimeConfigOverrides['debug']> = overrides.debug ?? {};
  const trace = { ...base.debug.trace, ...debug.trace };

  return {
    debug: {
      logHistory: { ...base.debug.logHistory, ...debug.logHistory },
      logLevel: { ...base.debug.logLevel, ...debug.logLevel },
      trace: { ...trace, categories: [...trace.categories] },
    },
    registers: { ...base.registers, ...overrides.registers },
  };
}
