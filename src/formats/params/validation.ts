/**
 * Parameter Document Validation
 *
 * @module formats/params/validation
 */

import { PARAMS_DOCUMENT_VERSION, type ParamsDocument, type ValidationResult } from './types.js';

const HEX_PATTERN = /^(0[xX])?[0-9a-fA-F]+$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHex(value: unknown): value is string {
  return typeof value === 'string' && HEX_PATTERN.test(value);
}

/**
 * Check the document shape. Field values are checked later, against the
 * register schema.
 */
export function validateParamsDocument(doc: unknown): ValidationResult {
  const errors: string[] = [];
  if (!isObject(doc)) {
    return { valid: false, errors: ['document must be a JSON object'] };
  }

  if (doc.version !== undefined && doc.version !== PARAMS_DOCUMENT_VERSION) {
    errors.push(`unsupported version ${JSON.stringify(doc.version)}, expected ${PARAMS_DOCUMENT_VERSION}`);
  }
  if (typeof doc.kind !== 'string' || doc.kind.length === 0) {
    errors.push('kind must be a non-empty string');
  }

  const mode = doc.mode;
  if (mode !== undefined) {
    if (!isObject(mode)) {
      errors.push('mode must be an object');
    } else {
      for (const key of ['weightWidth', 'groupSize']) {
        const value = mode[key];
        if (value !== undefined && typeof value !== 'number') {
          errors.push(`mode.${key} must be a number`);
        }
      }
      if (mode.layout !== undefined && typeof mode.layout !== 'string') {
        errors.push('mode.layout must be a string');
      }
    }
  }

  if (doc.values === undefined && doc.image === undefined) {
    errors.push('document needs values or image');
  }
  if (doc.values !== undefined && !isObject(doc.values)) {
    errors.push('values must be an object');
  }
  if (doc.image !== undefined) {
    const images: unknown[] = Array.isArray(doc.image) ? doc.image : [doc.image];
    if (images.length === 0 || !images.every(isHex)) {
      errors.push('image must be a hex string or an array of hex strings');
    }
  }

  return { valid: errors.length === 0, errors };
}

export function isParamsDocument(doc: unknown): doc is ParamsDocument {
  return validateParamsDocument(doc).valid;
}
