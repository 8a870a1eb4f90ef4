/**
 * neuroreg - register parameter models for neuromorphic cores
 *
 * @module neuroreg
 */

export const NEUROREG_VERSION = '0.1.0';

// Registers
export * from './registers/index.js';

// Hardware helpers
export * from './hw/index.js';

// Parameter documents
export * from './formats/params/index.js';

// Errors
export {
  ERROR_CODES,
  RegisterError,
  type RegisterErrorCode,
  type RegisterIssue,
  createRegisterError,
  isRegisterError,
  formatIssues,
} from './errors/register-error.js';

// Configuration
export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  type RegistersConfigSchema,
  type UnknownNamePolicy,
  DEFAULT_RUNTIME_CONFIG,
  createRegisterLibConfig,
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
} from './config/index.js';

// Logging
export {
  log,
  setLogLevel,
  getLogLevel,
  setTrace,
  enableModules,
  disableModules,
  resetModuleFilters,
  getLogHistory,
  clearLogHistory,
} from './debug/index.js';
