/**
 * Parameter Document Types
 *
 * JSON documents holding one register's parameters, either as named values
 * or as a packed image.
 *
 * @module formats/params/types
 */

import type { FieldValue } from '../../registers/types.js';

export const PARAMS_DOCUMENT_VERSION = 1;

export interface ParamsDocumentMode {
  weightWidth?: number;
  groupSize?: number;
  layout?: string;
}

export interface ParamsDocument {
  version?: number;
  kind: string;
  mode?: ParamsDocumentMode;
  /** Named values in any accepted naming */
  values?: Record<string, FieldValue>;
  /** Hex image, or one per neuron for groups; wins over `values` */
  image?: string | string[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface SerializeOptions {
  /** Include the packed image as hex; implied when read-only fields hold reported state */
  image?: boolean;
  /** JSON indentation (default: 2) */
  indent?: number;
}
