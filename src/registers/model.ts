/**
 * Parameter Model
 *
 * A validated set of field values for one register schema. Built from named
 * values in any accepted naming, or from values decoded out of an image.
 * Changes only through `set`, which revalidates and rolls back on failure.
 *
 * @module registers/model
 */

import { getRuntimeConfig } from '../config/runtime.js';
import type { UnknownNamePolicy } from '../config/schema/index.js';
import { log, trace } from '../debug/index.js';
import {
  ERROR_CODES,
  aggregateIssues,
  createRegisterError,
  formatIssues,
  type RegisterIssue,
} from '../errors/register-error.js';
import { runCrossFieldChecks } from './checks.js';
import { checkWritable, fieldValuesEqual, validateFieldValue } from './field.js';
import type { RegisterSchema } from './schema.js';
import type { FieldValue, ScalarValue, ValueReader } from './types.js';

export interface ModelOptions {
  /** Overrides `registers.unknownNames` from the runtime config */
  unknownNames?: UnknownNamePolicy;
  /** Overrides `registers.strictChecks` from the runtime config */
  strictChecks?: boolean;
}

export type NamedValues = Readonly<Record<string, unknown>>;

interface ProvidedValue {
  name: string;
  value: unknown;
}

/**
 * Run cross-field checks over `values`, applying normalizations in place.
 * Throws the aggregate error when a constraint fails.
 */
function applyCrossFieldChecks(
  schema: RegisterSchema,
  values: Map<string, FieldValue>,
  strict: boolean,
  context: string
): void {
  const findings = runCrossFieldChecks(schema.kind, { get: (name) => values.get(name) }, strict);
  const issues: RegisterIssue[] = [];
  const warn = getRuntimeConfig().registers.normalizeWarnings;

  for (const finding of findings) {
    if (finding.type === 'issue') {
      issues.push(finding.issue);
      continue;
    }
    values.set(finding.field, finding.value);
    const message = `${schema.layoutId}.${finding.field}: ${finding.message}`;
    if (warn) {
      log.warn('Model', message);
    } else {
      log.debug('Model', message);
    }
  }

  if (issues.length > 0) {
    throw aggregateIssues(context, issues);
  }
}

function copyValue(value: FieldValue): FieldValue {
  return typeof value === 'object' ? [...value] : value;
}

export class ParameterModel implements ValueReader {
  readonly schema: RegisterSchema;
  private current: Map<string, FieldValue>;
  private readonly strict: boolean;

  private constructor(schema: RegisterSchema, values: Map<string, FieldValue>, strict: boolean) {
    this.schema = schema;
    this.current = values;
    this.strict = strict;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Validate named values against a schema.
   *
   * Every field is checked and all problems are reported together. Names
   * may be model names, manual names or export keys; missing fields take
   * their default.
   *
   * @example
   * ```typescript
   * const core = ParameterModel.fromNamedValues(resolveSchema('offline_core'), {
   *   weight_width: 8, LCN: 1, input_width: 1, spike_width: 1, neuron_num: 100,
   *   tick_wait_end: 100, SNN_EN: 1, target_LCN: 1, test_chip_addr: { x: 0, y: 0 },
   * });
   * ```
   */
  static fromNamedValues(
    schema: RegisterSchema,
    input: NamedValues,
    options: ModelOptions = {}
  ): ParameterModel {
    const config = getRuntimeConfig().registers;
    const unknownNames = options.unknownNames ?? config.unknownNames;
    const strict = options.strictChecks ?? config.strictChecks;
    const context = `Invalid ${schema.layoutId} parameters`;

    const provided = new Map<string, ProvidedValue[]>();
    for (const [name, value] of Object.entries(input)) {
      if (value === undefined) continue;
      const modelName = schema.names.lookup(name);
      if (modelName === undefined) {
        if (unknownNames === 'error') {
          throw createRegisterError(
            ERROR_CODES.UNKNOWN_NAME,
            `${schema.layoutId}: unknown parameter name '${name}'`,
            [{ code: ERROR_CODES.UNKNOWN_NAME, field: name, message: 'unknown name', value }]
          );
        }
        log.debug('Model', `Ignoring unknown name '${name}' for ${schema.layoutId}`);
        continue;
      }
      const entries = provided.get(modelName) ?? [];
      entries.push({ name, value });
      provided.set(modelName, entries);
    }

    const issues: RegisterIssue[] = [];
    const values = new Map<string, FieldValue>();

    for (const field of schema.parameters) {
      const entries = provided.get(field.modelName) ?? [];
      if (entries.length === 0) {
        if (field.default === undefined) {
          issues.push({ code: ERROR_CODES.MISSING_FIELD, field: field.modelName, message: 'is required' });
        } else {
          values.set(field.modelName, field.default);
        }
        continue;
      }

      let accepted: FieldValue | undefined;
      let acceptedFrom = '';
      let failed = false;
      for (const entry of entries) {
        const result = validateFieldValue(field, entry.value, schema.groupSize);
        if (!result.ok) {
          issues.push(...result.issues);
          failed = true;
        } else if (accepted === undefined) {
          accepted = result.value;
          acceptedFrom = entry.name;
        } else if (!fieldValuesEqual(accepted, result.value, schema.groupSize)) {
          issues.push({
            code: ERROR_CODES.DUPLICATE_FIELD,
            field: field.modelName,
            message: `'${acceptedFrom}' and '${entry.name}' give different values`,
            value: entry.value,
          });
          failed = true;
        }
      }
      if (failed || accepted === undefined) continue;

      if (field.readOnly) {
        const fixed = field.default;
        if (fixed === undefined || !fieldValuesEqual(accepted, fixed, schema.groupSize)) {
          issues.push({
            code: ERROR_CODES.READ_ONLY_VIOLATION,
            field: field.modelName,
            message: `is read-only and can only be ${JSON.stringify(fixed)}`,
            value: accepted,
          });
          continue;
        }
      }
      values.set(field.modelName, accepted);
    }

    if (issues.length > 0) {
      throw aggregateIssues(context, issues);
    }

    applyCrossFieldChecks(schema, values, strict, context);
    trace.model(`built ${schema.toString()} from ${provided.size} fields`);
    return new ParameterModel(schema, values, strict);
  }

  /**
   * Build a model from values decoded out of register images. Values are
   * assumed in-domain; read-only fields keep the reported value.
   */
  static fromDecoded(
    schema: RegisterSchema,
    values: ReadonlyMap<string, FieldValue>,
    options: Pick<ModelOptions, 'strictChecks'> = {}
  ): ParameterModel {
    const strict = options.strictChecks ?? getRuntimeConfig().registers.strictChecks;
    const copy = new Map<string, FieldValue>();
    const issues: RegisterIssue[] = [];
    for (const field of schema.parameters) {
      const value = values.get(field.modelName);
      if (value === undefined) {
        issues.push({ code: ERROR_CODES.MISSING_FIELD, field: field.modelName, message: 'is required' });
      } else {
        copy.set(field.modelName, value);
      }
    }
    const context = `Invalid ${schema.layoutId} image`;
    if (issues.length > 0) {
      throw aggregateIssues(context, issues);
    }
    applyCrossFieldChecks(schema, copy, strict, context);
    return new ParameterModel(schema, copy, strict);
  }

  // ===========================================================================
  // Access
  // ===========================================================================

  private stored(modelName: string): FieldValue {
    const value = this.current.get(modelName);
    if (value === undefined) {
      throw createRegisterError(ERROR_CODES.UNKNOWN_NAME, `${this.schema.layoutId}: no value for '${modelName}'`);
    }
    return value;
  }

  /** Value by any accepted name; throws UNKNOWN_NAME. */
  get(name: string): FieldValue {
    return copyValue(this.stored(this.schema.names.toModelName(name)));
  }

  has(name: string): boolean {
    return this.schema.names.lookup(name) !== undefined;
  }

  /**
   * Value seen by one neuron of the group; scalars are shared by all.
   */
  valueAt(name: string, index: number): ScalarValue {
    const modelName = this.schema.names.toModelName(name);
    if (!Number.isInteger(index) || index < 0 || index >= this.schema.groupSize) {
      throw createRegisterError(
        ERROR_CODES.OUT_OF_RANGE,
        `Neuron index ${index} is outside a group of ${this.schema.groupSize}`
      );
    }
    const value = this.stored(modelName);
    if (typeof value !== 'object') return value;
    const element = value[index];
    if (element === undefined) {
      throw createRegisterError(ERROR_CODES.ARITY_MISMATCH, `${modelName} has no value at index ${index}`);
    }
    return element;
  }

  /**
   * Replace one field's value. Read-only fields throw READ_ONLY_VIOLATION;
   * invalid values throw their validation code. Cross-field checks run on
   * the result and the model is left unchanged when anything fails.
   */
  set(name: string, value: unknown): void {
    const field = this.schema.field(name);
    checkWritable(field);

    const result = validateFieldValue(field, value, this.schema.groupSize);
    if (!result.ok) {
      throw createRegisterError(
        result.issues[0]?.code ?? ERROR_CODES.OUT_OF_RANGE,
        `Cannot set ${this.schema.layoutId}.${field.modelName}:\n${formatIssues(result.issues)}`,
        result.issues
      );
    }

    const next = new Map(this.current);
    next.set(field.modelName, result.value);
    applyCrossFieldChecks(this.schema, next, this.strict, `Cannot set ${this.schema.layoutId}.${field.modelName}`);
    this.current = next;
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  private mapKeys(keyOf: (modelName: string) => string): Record<string, FieldValue> {
    const out: Record<string, FieldValue> = {};
    for (const field of this.schema.parameters) {
      out[keyOf(field.modelName)] = copyValue(this.stored(field.modelName));
    }
    return out;
  }

  /** Values keyed by model name. */
  values(): Record<string, FieldValue> {
    return this.mapKeys((modelName) => modelName);
  }

  /** Values keyed by export key, every parameter exactly once. */
  export(): Record<string, FieldValue> {
    return this.mapKeys((modelName) => this.schema.names.toExportKey(modelName));
  }

  /** Values keyed by canonical manual name. */
  toManualValues(): Record<string, FieldValue> {
    return this.mapKeys((modelName) => this.schema.names.toManualName(modelName));
  }

  /**
   * Same layout, same group size and the same value seen by every neuron.
   */
  equals(other: ParameterModel): boolean {
    if (other.schema.layoutId !== this.schema.layoutId || other.schema.groupSize !== this.schema.groupSize) {
      return false;
    }
    return this.schema.parameters.every((field) =>
      fieldValuesEqual(
        this.stored(field.modelName),
        other.stored(field.modelName),
        this.schema.groupSize
      )
    );
  }

  clone(): ParameterModel {
    return new ParameterModel(this.schema, new Map(this.current), this.strict);
  }
}
