/**
 * Field Descriptor Operations
 *
 * Validation of caller values against a field's domain, and conversion
 * between model values and the raw bits held in the register.
 *
 * @module registers/field
 */

import { coordToAddress, isCoord } from '../hw/coord.js';
import {
  ERROR_CODES,
  createRegisterError,
  type RegisterIssue,
} from '../errors/register-error.js';
import type {
  ChoiceDomain,
  FieldDescriptor,
  FieldDomain,
  FieldValue,
  ScalarValue,
} from './types.js';

export type FieldResult =
  | { ok: true; value: FieldValue }
  | { ok: false; issues: RegisterIssue[] };

export type DecodeResult =
  | { ok: true; value: ScalarValue }
  | { ok: false; issue: RegisterIssue };

// =============================================================================
// Domain Helpers
// =============================================================================

/** Full range representable in `bits` bits */
export function rawRange(type: 'uint' | 'int', bits: number): { min: number; max: number } {
  if (type === 'uint') {
    return { min: 0, max: 2 ** bits - 1 };
  }
  return { min: -(2 ** (bits - 1)), max: 2 ** (bits - 1) - 1 };
}

export function describeDomain(domain: FieldDomain): string {
  if (domain.type === 'choice') {
    return `one of ${domain.variants.map((v) => JSON.stringify(v.label)).join(', ')}`;
  }
  return `an integer in [${domain.min}, ${domain.max}]`;
}

function findChoice(domain: ChoiceDomain, value: unknown): ScalarValue | undefined {
  const byLabel = domain.variants.find((v) => v.label === value);
  if (byLabel) return byLabel.label;

  // String-labelled choices also take their register code
  const stringLabels = domain.variants.every((v) => typeof v.label === 'string');
  if (stringLabels && typeof value === 'number') {
    return domain.variants.find((v) => v.code === value)?.label;
  }

  // Enable flags take booleans
  const flag = domain.variants.every((v) => v.label === 0 || v.label === 1);
  if (flag && typeof value === 'boolean') {
    const wanted = value ? 1 : 0;
    return domain.variants.find((v) => v.label === wanted)?.label;
  }
  return undefined;
}

function normalizeScalar(field: FieldDescriptor, value: unknown): ScalarValue | undefined {
  const { domain } = field;
  if (domain.type === 'choice') {
    return findChoice(domain, value);
  }

  let candidate = value;
  if (field.coordinate && isCoord(candidate)) {
    candidate = coordToAddress(candidate);
  }
  if (typeof candidate !== 'number' || !Number.isInteger(candidate)) {
    return undefined;
  }
  return candidate >= domain.min && candidate <= domain.max ? candidate : undefined;
}

function outOfRange(field: FieldDescriptor, value: unknown, where = ''): RegisterIssue {
  return {
    code: ERROR_CODES.OUT_OF_RANGE,
    field: field.modelName,
    message: `${JSON.stringify(value)}${where} is not ${describeDomain(field.domain)}`,
    value,
  };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check a caller value against a field and return its normalized form.
 *
 * Choice values come back as their label, coordinates as their address.
 * Arrays are accepted only on arrayable fields and must hold exactly
 * `groupSize` elements; each element is checked on its own.
 */
export function validateFieldValue(
  field: FieldDescriptor,
  value: unknown,
  groupSize = 1
): FieldResult {
  if (Array.isArray(value)) {
    if (!field.arrayable) {
      return {
        ok: false,
        issues: [{
          code: ERROR_CODES.ARITY_MISMATCH,
          field: field.modelName,
          message: 'does not accept an array',
          value,
        }],
      };
    }
    if (value.length !== groupSize) {
      return {
        ok: false,
        issues: [{
          code: ERROR_CODES.ARITY_MISMATCH,
          field: field.modelName,
          message: `expected ${groupSize} values, got ${value.length}`,
          value,
        }],
      };
    }

    const normalized: ScalarValue[] = [];
    const issues: RegisterIssue[] = [];
    value.forEach((element: unknown, index: number) => {
      const scalar = normalizeScalar(field, element);
      if (scalar === undefined) {
        issues.push(outOfRange(field, element, ` at index ${index}`));
      } else {
        normalized.push(scalar);
      }
    });
    return issues.length > 0
      ? { ok: false, issues }
      : { ok: true, value: Object.freeze(normalized) };
  }

  const scalar = normalizeScalar(field, value);
  if (scalar === undefined) {
    return { ok: false, issues: [outOfRange(field, value)] };
  }
  return { ok: true, value: scalar };
}

/**
 * Throws READ_ONLY_VIOLATION for fields the caller may not write.
 */
export function checkWritable(field: FieldDescriptor): void {
  if (field.readOnly) {
    throw createRegisterError(
      ERROR_CODES.READ_ONLY_VIOLATION,
      `Field '${field.modelName}' is read-only`,
      [{ code: ERROR_CODES.READ_ONLY_VIOLATION, field: field.modelName, message: 'is read-only' }]
    );
  }
}

/**
 * Equality of two field values, with scalars broadcast against arrays.
 */
export function fieldValuesEqual(a: FieldValue, b: FieldValue, groupSize: number): boolean {
  for (let i = 0; i < groupSize; i++) {
    const left = typeof a === 'object' ? a[i] : a;
    const right = typeof b === 'object' ? b[i] : b;
    if (left !== right) return false;
  }
  return true;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Raw register bits for one scalar value.
 */
export function encodeField(field: FieldDescriptor, value: ScalarValue): bigint {
  const { domain } = field;
  if (domain.type === 'choice') {
    const variant = domain.variants.find((v) => v.label === value);
    if (!variant) {
      throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `${field.modelName}: ${outOfRange(field, value).message}`);
    }
    return BigInt(variant.code);
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < domain.min || value > domain.max) {
    throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `${field.modelName}: ${outOfRange(field, value).message}`);
  }
  const raw = BigInt(value);
  return raw < 0n ? (1n << BigInt(field.bits)) + raw : raw;
}

/**
 * Model value for raw register bits.
 */
export function decodeField(field: FieldDescriptor, raw: bigint): DecodeResult {
  const { domain } = field;
  if (domain.type === 'choice') {
    const variant = domain.variants.find((v) => BigInt(v.code) === raw);
    if (!variant) {
      return {
        ok: false,
        issue: {
          code: ERROR_CODES.OUT_OF_RANGE,
          field: field.modelName,
          message: `register code ${raw} is not a valid code (${describeDomain(domain)})`,
          value: Number(raw),
        },
      };
    }
    return { ok: true, value: variant.label };
  }

  const signBit = 1n << BigInt(field.bits - 1);
  const signed = domain.type === 'int' && (raw & signBit) !== 0n;
  const value = Number(signed ? raw - (1n << BigInt(field.bits)) : raw);
  if (value < domain.min || value > domain.max) {
    return { ok: false, issue: outOfRange(field, value) };
  }
  return { ok: true, value };
}
