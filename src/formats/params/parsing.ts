/**
 * Parameter Document Parsing and Serialization
 *
 * @module formats/params/parsing
 */

import { log } from '../../debug/index.js';
import { ERROR_CODES, createRegisterError } from '../../errors/register-error.js';
import { pack, packGroup, unpackGroup } from '../../registers/codec.js';
import { fieldValuesEqual } from '../../registers/field.js';
import { RegisterImage } from '../../registers/image.js';
import { ParameterModel, type ModelOptions } from '../../registers/model.js';
import { resolveSchema } from '../../registers/schema.js';
import {
  PARAMS_DOCUMENT_VERSION,
  type ParamsDocument,
  type SerializeOptions,
} from './types.js';
import { isParamsDocument, validateParamsDocument } from './validation.js';

/**
 * Build a model from a parsed document.
 */
export function modelFromDocument(doc: unknown, options: ModelOptions = {}): ParameterModel {
  if (!isParamsDocument(doc)) {
    const { errors } = validateParamsDocument(doc);
    throw createRegisterError(
      ERROR_CODES.VALIDATION_ERROR,
      `Invalid parameter document:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      errors.map((message) => ({ code: ERROR_CODES.VALIDATION_ERROR, field: 'document', message }))
    );
  }

  const schema = resolveSchema(doc.kind, doc.mode ?? {});
  if (doc.image !== undefined) {
    if (doc.values !== undefined) {
      log.debug('Params', `${schema.layoutId}: image present, named values not used`);
    }
    const hexes = typeof doc.image === 'string' ? [doc.image] : doc.image;
    const images = hexes.map((hex) => RegisterImage.fromHex(hex, schema.totalBits));
    return unpackGroup(images, schema);
  }
  return ParameterModel.fromNamedValues(schema, doc.values ?? {}, options);
}

/**
 * Parse JSON text into a model.
 */
export function parseParamsDocument(json: string, options: ModelOptions = {}): ParameterModel {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createRegisterError(ERROR_CODES.VALIDATION_ERROR, `Parameter document is not valid JSON: ${reason}`);
  }
  return modelFromDocument(doc, options);
}

/**
 * Read-only fields holding something other than their configured value,
 * e.g. a membrane potential reported by the hardware.
 */
function hasReportedState(model: ParameterModel): boolean {
  const { schema } = model;
  return schema.parameters.some((field) =>
    field.readOnly &&
    (field.default === undefined ||
      !fieldValuesEqual(model.get(field.modelName), field.default, schema.groupSize))
  );
}

/**
 * Document for a model: export keys, and optionally the packed image.
 * The image is always written when a read-only field carries reported
 * state, since named values cannot set it.
 */
export function createParamsDocument(model: ParameterModel, options: SerializeOptions = {}): ParamsDocument {
  const { schema } = model;
  const doc: ParamsDocument = {
    version: PARAMS_DOCUMENT_VERSION,
    kind: schema.kind,
    mode: schema.groupSize > 1
      ? { layout: schema.layoutId, groupSize: schema.groupSize }
      : { layout: schema.layoutId },
    values: model.export(),
  };
  if (options.image || hasReportedState(model)) {
    doc.image = schema.groupSize > 1
      ? packGroup(model).map((image) => image.toHex())
      : pack(model).toHex();
  }
  return doc;
}

export function serializeParamsDocument(model: ParameterModel, options: SerializeOptions = {}): string {
  return `${JSON.stringify(createParamsDocument(model, options), null, options.indent ?? 2)}\n`;
}
