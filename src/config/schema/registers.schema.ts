/**
 * Registers Config Schema
 *
 * Runtime policy for parameter model construction.
 *
 * @module config/schema/registers
 */

/**
 * What to do with input names that resolve to no field.
 *
 * - error: throw UNKNOWN_NAME before validating anything
 * - ignore: drop the entry and log it at debug level
 */
export type UnknownNamePolicy = 'error' | 'ignore';

export interface RegistersConfigSchema {
  /** Handling of unmapped input names (default: 'error') */
  unknownNames: UnknownNamePolicy;
  /** Run cross-field checks (core mode, dendrite limits, ordered ranges) */
  strictChecks: boolean;
  /** Log a warning when a value is normalized (e.g. max pooling turned off) */
  normalizeWarnings: boolean;
}

/** Default registers configuration */
export const DEFAULT_REGISTERS_CONFIG: RegistersConfigSchema = {
  unknownNames: 'error',
  strictChecks: true,
  normalizeWarnings: true,
};
