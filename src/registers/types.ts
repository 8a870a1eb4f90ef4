/**
 * Register Types
 *
 * Shared type definitions for field descriptors, schemas and values.
 *
 * @module registers/types
 */

// =============================================================================
// Register Kinds
// =============================================================================

export const REGISTER_KINDS = [
  'offline_core',
  'online_core',
  'offline_neuron',
  'online_neuron',
  'online_neuron_1bit',
] as const;

export type RegisterKind = (typeof REGISTER_KINDS)[number];

export function isRegisterKind(value: unknown): value is RegisterKind {
  return typeof value === 'string' && REGISTER_KINDS.some((kind) => kind === value);
}

/**
 * msb-first: the first field occupies the top bits of the image.
 * lsb-first: the first field starts at bit 0.
 */
export type BitOrder = 'msb-first' | 'lsb-first';

// =============================================================================
// Values
// =============================================================================

export type ScalarValue = number | string;

/** A scalar, or one value per neuron of the group for arrayable fields */
export type FieldValue = ScalarValue | readonly ScalarValue[];

/**
 * Read access to field values by model name.
 */
export interface ValueReader {
  get(modelName: string): FieldValue | undefined;
}

// =============================================================================
// Domains
// =============================================================================

export interface UintDomain {
  type: 'uint';
  min: number;
  max: number;
}

/** Two's complement signed integer */
export interface IntDomain {
  type: 'int';
  min: number;
  max: number;
}

export interface ChoiceVariant {
  /** Value seen by callers, e.g. weight width `8` or reset mode `'normal'` */
  label: ScalarValue;
  /** Value held in the register */
  code: number;
}

export interface ChoiceDomain {
  type: 'choice';
  variants: readonly ChoiceVariant[];
}

export type FieldDomain = UintDomain | IntDomain | ChoiceDomain;

// =============================================================================
// Field Descriptor
// =============================================================================

export interface FieldDescriptor {
  /** Canonical name used inside the model */
  readonly modelName: string;
  /** Names from the hardware manual, canonical first */
  readonly manualNames: readonly string[];
  /** Key written by `export()` */
  readonly exportKey: string;
  readonly bits: number;
  readonly domain: FieldDomain;
  readonly default?: ScalarValue;
  readonly readOnly: boolean;
  /** May hold one value per neuron of a group */
  readonly arrayable: boolean;
  /** Padding bits: always zero, never a parameter */
  readonly reserved: boolean;
  /** Accepts a `{ x, y }` core coordinate as input */
  readonly coordinate: boolean;
  readonly description: string;
}

/**
 * Position of a field inside the register image, inclusive bounds.
 */
export interface FieldSpan {
  readonly field: FieldDescriptor;
  readonly lsb: number;
  readonly msb: number;
}

/**
 * Selection input for schema resolution.
 */
export interface ModeOptions {
  /** Weight width in bits (1, 2, 4 or 8); required for online neurons */
  weightWidth?: number;
  /** Neurons sharing one model; neuron kinds only */
  groupSize?: number;
  /** Registered layout id, when more than one layout exists for the kind */
  layout?: string;
}
