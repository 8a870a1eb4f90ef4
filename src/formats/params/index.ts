/**
 * Parameter document format.
 *
 * @module formats/params
 */

export * from './types.js';
export * from './validation.js';
export * from './parsing.js';
export * from './io/node.js';
