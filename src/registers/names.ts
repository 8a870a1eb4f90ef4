/**
 * Name Resolution
 *
 * Maps the names a field is known by (model name, manual names current and
 * legacy, export key) onto the model name. Several names may lead to one
 * field; going back yields one chosen name per direction.
 *
 * @module registers/names
 */

import { trace } from '../debug/index.js';
import { ERROR_CODES, createRegisterError } from '../errors/register-error.js';
import type { FieldDescriptor } from './types.js';

export class NameResolver {
  private readonly modelNameByAlias = new Map<string, string>();
  private readonly fieldByModelName = new Map<string, FieldDescriptor>();
  private readonly modelNameByExportKey = new Map<string, string>();
  private readonly context: string;

  /**
   * @param context - Used in error messages, usually the layout id
   * @param parameters - Non-reserved fields
   */
  constructor(context: string, parameters: readonly FieldDescriptor[]) {
    this.context = context;
    for (const field of parameters) {
      this.fieldByModelName.set(field.modelName, field);
      this.modelNameByExportKey.set(field.exportKey, field.modelName);
      for (const alias of [field.modelName, ...field.manualNames, field.exportKey]) {
        const owner = this.modelNameByAlias.get(alias);
        if (owner !== undefined && owner !== field.modelName) {
          throw createRegisterError(
            ERROR_CODES.LAYOUT_INVALID,
            `${context}: name '${alias}' maps to both '${owner}' and '${field.modelName}'`
          );
        }
        this.modelNameByAlias.set(alias, field.modelName);
      }
    }
  }

  /** Model name for any known name, or undefined. */
  lookup(name: string): string | undefined {
    return this.modelNameByAlias.get(name);
  }

  toModelName(name: string): string {
    const modelName = this.lookup(name);
    if (modelName === undefined) {
      throw createRegisterError(
        ERROR_CODES.UNKNOWN_NAME,
        `${this.context}: unknown parameter name '${name}'`
      );
    }
    if (modelName !== name) {
      trace.names(`${name} -> ${modelName}`);
    }
    return modelName;
  }

  field(name: string): FieldDescriptor {
    const field = this.fieldByModelName.get(this.toModelName(name));
    if (!field) {
      throw createRegisterError(ERROR_CODES.UNKNOWN_NAME, `${this.context}: unknown parameter name '${name}'`);
    }
    return field;
  }

  toExportKey(name: string): string {
    return this.field(name).exportKey;
  }

  /** The canonical (first) manual name. */
  toManualName(name: string): string {
    const field = this.field(name);
    return field.manualNames[0] ?? field.modelName;
  }

  /** Only export keys are accepted here. */
  fromExportKey(key: string): string {
    const modelName = this.modelNameByExportKey.get(key);
    if (modelName === undefined) {
      throw createRegisterError(
        ERROR_CODES.UNKNOWN_NAME,
        `${this.context}: unknown export key '${key}'`
      );
    }
    return modelName;
  }

  /** Every name that resolves to the same field, model name first. */
  aliasesOf(name: string): string[] {
    const field = this.field(name);
    return [...new Set([field.modelName, ...field.manualNames, field.exportKey])];
  }

  /** All accepted names. */
  knownNames(): string[] {
    return [...this.modelNameByAlias.keys()];
  }
}
