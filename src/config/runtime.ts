/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current session.
 * Call setRuntimeConfig() before building models to apply overrides.
 *
 * @module config/runtime
 */

import type { RuntimeConfigOverrides, RuntimeConfigSchema } from './schema/index.js';
import { createRegisterLibConfig } from './schema/index.js';
import { applyDebugConfig } from '../debug/config.js';

let runtimeConfig: RuntimeConfigSchema = createRegisterLibConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults; the debug section is
 * applied to the logger immediately.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  runtimeConfig = createRegisterLibConfig(overrides);
  applyDebugConfig(runtimeConfig.debug);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRegisterLibConfig();
  applyDebugConfig(runtimeConfig.debug);
  return runtimeConfig;
}
