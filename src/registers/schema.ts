/**
 * Register Schema
 *
 * A layout bound to a group size: ordered descriptors with their bit spans
 * and a name resolver. Schemas are built once per (layout, group size) and
 * shared.
 *
 * @module registers/schema
 */

import { log, trace } from '../debug/index.js';
import { ERROR_CODES, createRegisterError } from '../errors/register-error.js';
import { ONLINE_NEURON_WORD_BITS } from '../hw/constants.js';
import { getLayout, layoutsOfKind, listLayouts, type RegisterLayout } from './layouts.js';
import { NameResolver } from './names.js';
import {
  REGISTER_KINDS,
  isRegisterKind,
  type BitOrder,
  type FieldDescriptor,
  type FieldSpan,
  type FieldValue,
  type ModeOptions,
  type RegisterKind,
} from './types.js';

const CORE_KINDS: readonly RegisterKind[] = ['offline_core', 'online_core'];
const ONLINE_NEURON_KINDS: readonly RegisterKind[] = ['online_neuron', 'online_neuron_1bit'];
const WEIGHT_WIDTHS = [1, 2, 4, 8];

export class RegisterSchema {
  readonly kind: RegisterKind;
  readonly layoutId: string;
  readonly version: number;
  readonly bitOrder: BitOrder;
  readonly totalBits: number;
  readonly groupSize: number;
  readonly description: string;
  /** All fields in wire order, reserved spans included */
  readonly fields: readonly FieldDescriptor[];
  /** Fields that carry a value */
  readonly parameters: readonly FieldDescriptor[];
  readonly spans: readonly FieldSpan[];
  readonly names: NameResolver;

  private readonly spanByName: ReadonlyMap<string, FieldSpan>;

  constructor(layout: RegisterLayout, groupSize: number) {
    this.kind = layout.kind;
    this.layoutId = layout.id;
    this.version = layout.version;
    this.bitOrder = layout.bitOrder;
    this.totalBits = layout.totalBits;
    this.groupSize = groupSize;
    this.description = layout.description;
    this.fields = layout.fields;
    this.parameters = Object.freeze(layout.fields.filter((f) => !f.reserved));
    this.names = new NameResolver(layout.id, this.parameters);
    this.spans = Object.freeze(computeSpans(layout.fields, layout.bitOrder, layout.totalBits));
    this.spanByName = new Map(this.spans.map((span) => [span.field.modelName, span]));
    Object.freeze(this);
  }

  get isCore(): boolean {
    return CORE_KINDS.includes(this.kind);
  }

  /** Descriptor for any accepted name; throws UNKNOWN_NAME. */
  field(name: string): FieldDescriptor {
    return this.names.field(name);
  }

  span(name: string): FieldSpan {
    const modelName = this.names.toModelName(name);
    const span = this.spanByName.get(modelName);
    if (!span) {
      throw createRegisterError(ERROR_CODES.UNKNOWN_NAME, `${this.layoutId}: no span for '${name}'`);
    }
    return span;
  }

  toString(): string {
    return `${this.layoutId}@v${this.version}[${this.groupSize}]`;
  }
}

/**
 * Bit spans in field order. msb-first fills from the top of the image down,
 * lsb-first from bit 0 up.
 */
export function computeSpans(
  fields: readonly FieldDescriptor[],
  bitOrder: BitOrder,
  totalBits: number
): FieldSpan[] {
  const spans: FieldSpan[] = [];
  let cursor = bitOrder === 'msb-first' ? totalBits : 0;
  for (const field of fields) {
    if (bitOrder === 'msb-first') {
      const lsb = cursor - field.bits;
      spans.push({ field, lsb, msb: cursor - 1 });
      cursor = lsb;
    } else {
      spans.push({ field, lsb: cursor, msb: cursor + field.bits - 1 });
      cursor += field.bits;
    }
  }
  return spans;
}

// =============================================================================
// Schema Factory
// =============================================================================

const SCHEMA_CACHE = new Map<string, RegisterSchema>();

function unknownKind(message: string): never {
  throw createRegisterError(ERROR_CODES.UNKNOWN_KIND, message);
}

function schemaFor(layout: RegisterLayout, groupSize: number): RegisterSchema {
  const key = `${layout.id}@${groupSize}`;
  const cached = SCHEMA_CACHE.get(key);
  if (cached) {
    trace.schema(`cache hit ${key}`);
    return cached;
  }
  const schema = new RegisterSchema(layout, groupSize);
  SCHEMA_CACHE.set(key, schema);
  log.debug('Schema', `Built schema ${schema.toString()}`);
  return schema;
}

function selectLayout(kind: RegisterKind, mode: ModeOptions): RegisterLayout {
  if (mode.layout !== undefined) {
    const layout = getLayout(mode.layout);
    if (!layout) {
      return unknownKind(`Unknown layout '${mode.layout}'. Available: ${listLayouts().join(', ')}`);
    }
    const compatible = layout.kind === kind ||
      (kind === 'online_neuron' && ONLINE_NEURON_KINDS.includes(layout.kind));
    if (!compatible) {
      return unknownKind(`Layout '${layout.id}' is a ${layout.kind} layout, not ${kind}`);
    }
    return layout;
  }

  if (kind === 'online_neuron') {
    if (mode.weightWidth === undefined) {
      return unknownKind('online_neuron needs a weightWidth to pick its layout');
    }
    const words = mode.weightWidth === 1 ? 1 : 2;
    const bits = words * ONLINE_NEURON_WORD_BITS;
    const layout = ONLINE_NEURON_KINDS
      .flatMap((k) => layoutsOfKind(k))
      .find((candidate) => candidate.totalBits === bits);
    if (!layout) {
      return unknownKind(`No online neuron layout of ${bits} bits`);
    }
    return layout;
  }

  if (kind === 'online_neuron_1bit' && mode.weightWidth !== undefined && mode.weightWidth !== 1) {
    return unknownKind(`online_neuron_1bit does not hold ${mode.weightWidth}-bit weights`);
  }

  const builtin = getLayout(kind);
  const layout = builtin ?? layoutsOfKind(kind)[0];
  if (!layout) {
    return unknownKind(`No layout registered for ${kind}`);
  }
  return layout;
}

/**
 * Resolve the schema for a register kind.
 *
 * @example
 * ```typescript
 * const core = resolveSchema('offline_core');
 * const neurons = resolveSchema('online_neuron', { weightWidth: 8, groupSize: 4 });
 * ```
 */
export function resolveSchema(kind: string, mode: ModeOptions = {}): RegisterSchema {
  if (!isRegisterKind(kind)) {
    return unknownKind(`Unknown register kind '${kind}'. Available: ${REGISTER_KINDS.join(', ')}`);
  }

  const groupSize = mode.groupSize ?? 1;
  if (!Number.isInteger(groupSize) || groupSize < 1) {
    return unknownKind(`Invalid group size ${groupSize} for ${kind}`);
  }
  if (CORE_KINDS.includes(kind) && groupSize !== 1) {
    return unknownKind(`${kind} does not take a group size (got ${groupSize})`);
  }
  if (mode.weightWidth !== undefined && !WEIGHT_WIDTHS.includes(mode.weightWidth)) {
    return unknownKind(`Invalid weight width ${mode.weightWidth}; expected one of ${WEIGHT_WIDTHS.join(', ')}`);
  }

  return schemaFor(selectLayout(kind, mode), groupSize);
}

/**
 * What `neuronSchemaFor` needs from a core model.
 */
export interface CoreModelView {
  readonly schema: RegisterSchema;
  get(name: string): FieldValue;
}

/**
 * Neuron schema matching a core: offline cores use offline neurons, online
 * cores pick the online neuron layout from their weight width.
 */
export function neuronSchemaFor(
  core: CoreModelView,
  options: { groupSize?: number } = {}
): RegisterSchema {
  const { kind } = core.schema;
  if (kind === 'offline_core') {
    return resolveSchema('offline_neuron', { groupSize: options.groupSize });
  }
  if (kind === 'online_core') {
    const weightWidth = core.get('weightWidth');
    if (typeof weightWidth !== 'number') {
      return unknownKind(`online_core weight width ${JSON.stringify(weightWidth)} is not a number`);
    }
    return resolveSchema('online_neuron', { weightWidth, groupSize: options.groupSize });
  }
  return unknownKind(`${kind} is not a core register`);
}
