/**
 * Hardware Module
 *
 * @module hw
 */

export * from './constants.js';
export * from './coord.js';
export * from './core-mode.js';
