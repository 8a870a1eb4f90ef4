/**
 * Register Layout Registry
 *
 * Loads layout documents, validates them and keeps them by id. Built-in
 * layouts are registered when this module loads; further layouts can be
 * added once each and are never replaced.
 *
 * @module registers/layouts
 */

import { log, trace } from '../debug/index.js';
import {
  ERROR_CODES,
  createRegisterError,
  formatIssues,
  type RegisterIssue,
} from '../errors/register-error.js';
import { rawRange, validateFieldValue } from './field.js';
import { NameResolver } from './names.js';
import {
  isRegisterKind,
  type BitOrder,
  type ChoiceVariant,
  type FieldDescriptor,
  type FieldDomain,
  type RegisterKind,
  type ScalarValue,
} from './types.js';

// =============================================================================
// Built-in Layouts (imported at build time)
// =============================================================================

import offlineCore from './layouts/offline-core.json' with { type: 'json' };
import onlineCore from './layouts/online-core.json' with { type: 'json' };
import offlineNeuron from './layouts/offline-neuron.json' with { type: 'json' };
import onlineNeuron from './layouts/online-neuron.json' with { type: 'json' };
import onlineNeuron1bit from './layouts/online-neuron-1bit.json' with { type: 'json' };

export interface RegisterLayout {
  readonly id: string;
  readonly kind: RegisterKind;
  readonly version: number;
  readonly bitOrder: BitOrder;
  readonly totalBits: number;
  readonly description: string;
  /** All fields in wire order, reserved spans included */
  readonly fields: readonly FieldDescriptor[];
}

/** Numeric fields wider than this lose precision as JS numbers */
const MAX_VALUE_BITS = 32;

// =============================================================================
// Document Parsing
// =============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isScalar(value: unknown): value is ScalarValue {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Collects problems while a document is read, so one error reports them all.
 */
class LayoutReader {
  readonly issues: RegisterIssue[] = [];

  problem(field: string, message: string): void {
    this.issues.push({ code: ERROR_CODES.LAYOUT_INVALID, field, message });
  }

  optionalBoolean(obj: JsonObject, key: string, where: string): boolean {
    const value = obj[key];
    if (value === undefined) return false;
    if (typeof value !== 'boolean') {
      this.problem(where, `'${key}' must be a boolean`);
      return false;
    }
    return value;
  }

  domain(raw: unknown, bits: number, where: string): FieldDomain | undefined {
    if (!isObject(raw)) {
      this.problem(where, "'domain' must be an object");
      return undefined;
    }

    const type = raw.type;
    if (type === 'uint' || type === 'int') {
      const full = rawRange(type, bits);
      const min = raw.min ?? full.min;
      const max = raw.max ?? full.max;
      if (typeof min !== 'number' || !Number.isInteger(min) || min < full.min) {
        this.problem(where, `domain min must be an integer >= ${full.min}`);
        return undefined;
      }
      if (typeof max !== 'number' || !Number.isInteger(max) || max > full.max) {
        this.problem(where, `domain max must be an integer <= ${full.max}`);
        return undefined;
      }
      if (min > max) {
        this.problem(where, `domain min ${min} exceeds max ${max}`);
        return undefined;
      }
      return { type, min, max };
    }

    if (type === 'choice') {
      return this.choiceDomain(raw, bits, where);
    }

    this.problem(where, `unknown domain type ${JSON.stringify(type)}`);
    return undefined;
  }

  private choiceDomain(raw: JsonObject, bits: number, where: string): FieldDomain | undefined {
    const variants: ChoiceVariant[] = [];
    if (Array.isArray(raw.labels)) {
      raw.labels.forEach((label: unknown, code: number) => {
        if (isScalar(label)) variants.push({ label, code });
      });
      if (variants.length !== raw.labels.length) {
        this.problem(where, 'choice labels must be numbers or strings');
        return undefined;
      }
    } else if (Array.isArray(raw.variants)) {
      for (const entry of raw.variants) {
        if (!isObject(entry) || !isScalar(entry.label) || typeof entry.code !== 'number' ||
            !Number.isInteger(entry.code) || entry.code < 0) {
          this.problem(where, 'choice variants must be { label, code } with a non-negative integer code');
          return undefined;
        }
        variants.push({ label: entry.label, code: entry.code });
      }
    } else {
      this.problem(where, "choice domain needs 'labels' or 'variants'");
      return undefined;
    }

    if (variants.length === 0) {
      this.problem(where, 'choice domain is empty');
      return undefined;
    }
    const labels = new Set(variants.map((v) => v.label));
    const codes = new Set(variants.map((v) => v.code));
    if (labels.size !== variants.length || codes.size !== variants.length) {
      this.problem(where, 'choice labels and codes must be unique');
      return undefined;
    }
    const limit = 2 ** bits - 1;
    if (variants.some((v) => v.code > limit)) {
      this.problem(where, `choice code does not fit in ${bits} bits`);
      return undefined;
    }
    return { type: 'choice', variants };
  }

  field(raw: unknown, index: number): FieldDescriptor | undefined {
    const where = `fields[${index}]`;
    if (!isObject(raw)) {
      this.problem(where, 'must be an object');
      return undefined;
    }
    const name = raw.name;
    if (typeof name !== 'string' || name.length === 0) {
      this.problem(where, "'name' must be a non-empty string");
      return undefined;
    }
    const bits = raw.bits;
    if (!isPositiveInt(bits)) {
      this.problem(name, "'bits' must be a positive integer");
      return undefined;
    }

    if (this.optionalBoolean(raw, 'reserved', name)) {
      const reserved: FieldDescriptor = {
        modelName: name,
        manualNames: [],
        exportKey: name,
        bits,
        domain: { type: 'uint', min: 0, max: 0 },
        default: 0,
        readOnly: true,
        arrayable: false,
        reserved: true,
        coordinate: false,
        description: 'Reserved',
      };
      return Object.freeze(reserved);
    }

    if (bits > MAX_VALUE_BITS) {
      this.problem(name, `parameter fields are limited to ${MAX_VALUE_BITS} bits`);
      return undefined;
    }

    const manualNames = raw.manualNames ?? [];
    if (!Array.isArray(manualNames) || !manualNames.every((n): n is string => typeof n === 'string')) {
      this.problem(name, "'manualNames' must be an array of strings");
      return undefined;
    }
    const exportKey = raw.exportKey ?? name;
    if (typeof exportKey !== 'string' || exportKey.length === 0) {
      this.problem(name, "'exportKey' must be a non-empty string");
      return undefined;
    }
    const description = raw.description ?? '';
    if (typeof description !== 'string') {
      this.problem(name, "'description' must be a string");
      return undefined;
    }

    const domain = this.domain(raw.domain, bits, name);
    if (!domain) return undefined;

    const descriptor: FieldDescriptor = {
      modelName: name,
      manualNames: [...manualNames],
      exportKey,
      bits,
      domain,
      readOnly: this.optionalBoolean(raw, 'readOnly', name),
      arrayable: this.optionalBoolean(raw, 'arrayable', name),
      reserved: false,
      coordinate: this.optionalBoolean(raw, 'coordinate', name),
      description,
    };

    if (raw.default !== undefined) {
      const checked = validateFieldValue(descriptor, raw.default);
      const value = checked.ok ? checked.value : undefined;
      if (value === undefined || typeof value === 'object') {
        this.problem(name, `default ${JSON.stringify(raw.default)} is outside the domain`);
        return undefined;
      }
      const withDefault: FieldDescriptor = { ...descriptor, default: value };
      return Object.freeze(withDefault);
    }
    if (descriptor.readOnly) {
      this.problem(name, 'read-only fields need a default');
      return undefined;
    }
    return Object.freeze(descriptor);
  }
}

/**
 * Validate a layout document and build its field descriptors.
 *
 * Throws LAYOUT_INVALID listing every problem found.
 */
export function parseLayoutDocument(document: unknown): RegisterLayout {
  const reader = new LayoutReader();
  if (!isObject(document)) {
    throw createRegisterError(ERROR_CODES.LAYOUT_INVALID, 'Layout document must be an object');
  }

  const id = typeof document.id === 'string' && document.id.length > 0 ? document.id : undefined;
  if (!id) reader.problem('id', 'must be a non-empty string');
  const kind = isRegisterKind(document.kind) ? document.kind : undefined;
  if (!kind) reader.problem('kind', `unknown register kind ${JSON.stringify(document.kind)}`);
  const version = isPositiveInt(document.version) ? document.version : undefined;
  if (!version) reader.problem('version', 'must be a positive integer');
  const bitOrder = document.bitOrder === 'msb-first' || document.bitOrder === 'lsb-first'
    ? document.bitOrder
    : undefined;
  if (!bitOrder) reader.problem('bitOrder', "must be 'msb-first' or 'lsb-first'");
  const totalBits = isPositiveInt(document.totalBits) ? document.totalBits : undefined;
  if (!totalBits) reader.problem('totalBits', 'must be a positive integer');
  const description = typeof document.description === 'string' ? document.description : '';

  const fields: FieldDescriptor[] = [];
  if (!Array.isArray(document.fields) || document.fields.length === 0) {
    reader.problem('fields', 'must be a non-empty array');
  } else {
    document.fields.forEach((raw: unknown, index: number) => {
      const field = reader.field(raw, index);
      if (field) fields.push(field);
    });
  }

  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field.modelName)) {
      reader.problem(field.modelName, 'duplicate field name');
    }
    seen.add(field.modelName);
  }

  const width = fields.reduce((sum, field) => sum + field.bits, 0);
  if (totalBits !== undefined && reader.issues.length === 0 && width !== totalBits) {
    reader.problem('totalBits', `fields cover ${width} bits, layout declares ${totalBits}`);
  }

  const context = id ?? 'layout';
  if (reader.issues.length > 0 || !id || !kind || !version || !bitOrder || !totalBits) {
    throw createRegisterError(
      ERROR_CODES.LAYOUT_INVALID,
      `Invalid layout '${context}':\n${formatIssues(reader.issues)}`,
      reader.issues
    );
  }

  // Throws LAYOUT_INVALID when two fields share a name
  new NameResolver(context, fields.filter((f) => !f.reserved));

  const layout: RegisterLayout = {
    id,
    kind,
    version,
    bitOrder,
    totalBits,
    description,
    fields: Object.freeze(fields),
  };
  return Object.freeze(layout);
}

// =============================================================================
// Registry
// =============================================================================

const LAYOUT_REGISTRY = new Map<string, RegisterLayout>();

/**
 * Validate and add a layout. Each id can be registered once.
 */
export function registerLayout(document: unknown): RegisterLayout {
  const layout = parseLayoutDocument(document);
  if (LAYOUT_REGISTRY.has(layout.id)) {
    throw createRegisterError(
      ERROR_CODES.LAYOUT_INVALID,
      `Layout '${layout.id}' is already registered`
    );
  }
  LAYOUT_REGISTRY.set(layout.id, layout);
  trace.layouts(`registered ${layout.id} v${layout.version} (${layout.kind}, ${layout.totalBits} bits)`);
  return layout;
}

export function getLayout(id: string): RegisterLayout | null {
  return LAYOUT_REGISTRY.get(id) ?? null;
}

export function listLayouts(): string[] {
  return [...LAYOUT_REGISTRY.keys()];
}

/** Registered layouts of one kind, built-ins first. */
export function layoutsOfKind(kind: RegisterKind): RegisterLayout[] {
  return [...LAYOUT_REGISTRY.values()].filter((layout) => layout.kind === kind);
}

for (const document of [offlineCore, onlineCore, offlineNeuron, onlineNeuron, onlineNeuron1bit]) {
  registerLayout(document);
}
log.debug('Layouts', `Loaded ${LAYOUT_REGISTRY.size} built-in layouts`);
