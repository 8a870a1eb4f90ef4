/**
 * Registers Module
 *
 * @module registers
 */

export * from './types.js';
export {
  type FieldResult,
  type DecodeResult,
  validateFieldValue,
  checkWritable,
  encodeField,
  decodeField,
  fieldValuesEqual,
  describeDomain,
} from './field.js';
export {
  type RegisterLayout,
  parseLayoutDocument,
  registerLayout,
  getLayout,
  listLayouts,
  layoutsOfKind,
} from './layouts.js';
export { NameResolver } from './names.js';
export {
  RegisterSchema,
  type CoreModelView,
  resolveSchema,
  neuronSchemaFor,
} from './schema.js';
export {
  type CheckFinding,
  type CrossFieldCheck,
  checksFor,
} from './checks.js';
export { ParameterModel, type ModelOptions, type NamedValues } from './model.js';
export { RegisterImage } from './image.js';
export {
  type SpanDescription,
  pack,
  unpack,
  packGroup,
  unpackGroup,
  describeLayout,
} from './codec.js';
