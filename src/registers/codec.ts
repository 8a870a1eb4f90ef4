/**
 * Register Codec
 *
 * Packs parameter models into register images and back. Each field is
 * written into its span; reserved spans stay zero.
 *
 * @module registers/codec
 */

import { trace } from '../debug/index.js';
import {
  ERROR_CODES,
  aggregateIssues,
  createRegisterError,
  type RegisterIssue,
} from '../errors/register-error.js';
import { decodeField, encodeField, fieldValuesEqual } from './field.js';
import { RegisterImage } from './image.js';
import { ParameterModel } from './model.js';
import type { RegisterSchema } from './schema.js';
import type { FieldValue, ScalarValue } from './types.js';

function packNeuron(model: ParameterModel, index: number): RegisterImage {
  const { schema } = model;
  let value = 0n;
  for (const { field, lsb } of schema.spans) {
    if (field.reserved) continue;
    const raw = encodeField(field, model.valueAt(field.modelName, index));
    value |= raw << BigInt(lsb);
  }
  return new RegisterImage(schema.totalBits, value);
}

function checkLength(image: RegisterImage, schema: RegisterSchema): void {
  if (image.bitLength !== schema.totalBits) {
    throw createRegisterError(
      ERROR_CODES.LENGTH_MISMATCH,
      `${schema.layoutId} images are ${schema.totalBits} bits, got ${image.bitLength}`
    );
  }
}

/**
 * Decode every span of one image. Reserved spans must be zero.
 */
function decodeImage(
  image: RegisterImage,
  schema: RegisterSchema,
  issues: RegisterIssue[]
): Map<string, ScalarValue> {
  const values = new Map<string, ScalarValue>();
  for (const { field, lsb } of schema.spans) {
    const raw = image.slice(lsb, field.bits);
    if (field.reserved) {
      if (raw !== 0n) {
        issues.push({
          code: ERROR_CODES.OUT_OF_RANGE,
          field: field.modelName,
          message: `reserved bits hold 0x${raw.toString(16)}`,
        });
      }
      continue;
    }
    const decoded = decodeField(field, raw);
    if (decoded.ok) {
      values.set(field.modelName, decoded.value);
    } else {
      issues.push(decoded.issue);
    }
  }
  return values;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Pack a single-register model. Group models go through `packGroup`.
 */
export function pack(model: ParameterModel): RegisterImage {
  if (model.schema.groupSize !== 1) {
    throw createRegisterError(
      ERROR_CODES.ARITY_MISMATCH,
      `${model.schema.toString()} holds ${model.schema.groupSize} neurons; use packGroup`
    );
  }
  const image = packNeuron(model, 0);
  trace.codec(`packed ${model.schema.toString()} -> ${image.toHex()}`);
  return image;
}

/**
 * One image per neuron: array fields are indexed, scalars repeated.
 */
export function packGroup(model: ParameterModel): RegisterImage[] {
  const images: RegisterImage[] = [];
  for (let i = 0; i < model.schema.groupSize; i++) {
    images.push(packNeuron(model, i));
  }
  trace.codec(`packed ${images.length} x ${model.schema.toString()}`);
  return images;
}

export function unpack(image: RegisterImage, schema: RegisterSchema): ParameterModel {
  if (schema.groupSize !== 1) {
    throw createRegisterError(
      ERROR_CODES.ARITY_MISMATCH,
      `${schema.toString()} holds ${schema.groupSize} neurons; use unpackGroup`
    );
  }
  return unpackGroup([image], schema);
}

/**
 * Inverse of `packGroup`. Arrayable fields that differ between neurons
 * become arrays; any other field must be the same in every image.
 */
export function unpackGroup(images: readonly RegisterImage[], schema: RegisterSchema): ParameterModel {
  if (images.length !== schema.groupSize) {
    throw createRegisterError(
      ERROR_CODES.ARITY_MISMATCH,
      `${schema.toString()} expects ${schema.groupSize} images, got ${images.length}`
    );
  }
  for (const image of images) {
    checkLength(image, schema);
  }

  const issues: RegisterIssue[] = [];
  const decoded = images.map((image) => decodeImage(image, schema, issues));
  if (issues.length > 0) {
    throw aggregateIssues(`Invalid ${schema.layoutId} image`, issues);
  }

  const values = new Map<string, FieldValue>();
  for (const field of schema.parameters) {
    const perNeuron: ScalarValue[] = [];
    for (const neuron of decoded) {
      const value = neuron.get(field.modelName);
      if (value !== undefined) perNeuron.push(value);
    }
    const first = perNeuron[0];
    if (first === undefined) continue;

    if (fieldValuesEqual(perNeuron, first, perNeuron.length)) {
      values.set(field.modelName, first);
    } else if (field.arrayable) {
      values.set(field.modelName, Object.freeze(perNeuron));
    } else {
      issues.push({
        code: ERROR_CODES.ARITY_MISMATCH,
        field: field.modelName,
        message: 'differs between neurons of the group',
        value: perNeuron,
      });
    }
  }
  if (issues.length > 0) {
    throw aggregateIssues(`Invalid ${schema.layoutId} image group`, issues);
  }

  trace.codec(`unpacked ${images.length} x ${schema.toString()}`);
  return ParameterModel.fromDecoded(schema, values);
}

export interface SpanDescription {
  name: string;
  exportKey?: string;
  lsb: number;
  msb: number;
  bits: number;
  reserved: boolean;
}

/**
 * Bit span of every field, in wire order.
 */
export function describeLayout(schema: RegisterSchema): SpanDescription[] {
  return schema.spans.map(({ field, lsb, msb }) => ({
    name: field.modelName,
    exportKey: field.reserved ? undefined : field.exportKey,
    lsb,
    msb,
    bits: field.bits,
    reserved: field.reserved,
  }));
}
