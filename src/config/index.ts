/**
 * Config Module
 *
 * @module config
 */

export * from './schema/index.js';

export {
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
} from './runtime.js';
