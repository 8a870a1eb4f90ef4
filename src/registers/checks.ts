/**
 * Cross-field Checks
 *
 * Constraints between fields of one register, run after every field has
 * passed its own domain check. Constraint checks report issues; normalizing
 * checks rewrite a value the hardware would ignore anyway.
 *
 * @module registers/checks
 */

import { findCoreMode, maxDendrites } from '../hw/core-mode.js';
import { ERROR_CODES, type RegisterIssue } from '../errors/register-error.js';
import type { RegisterKind, ScalarValue, ValueReader } from './types.js';

export type CheckFinding =
  | { type: 'issue'; issue: RegisterIssue }
  | { type: 'normalize'; field: string; value: ScalarValue; message: string };

export interface CrossFieldCheck {
  name: string;
  /** Normalizing checks run even with strict checks off */
  normalizes: boolean;
  run(values: ValueReader): CheckFinding[];
}

function issue(field: string, message: string, value?: unknown): CheckFinding {
  return { type: 'issue', issue: { code: ERROR_CODES.VALIDATION_ERROR, field, message, value } };
}

function orderedRange(name: string, startField: string, endField: string): CrossFieldCheck {
  return {
    name,
    normalizes: false,
    run(values) {
      const start = values.get(startField);
      const end = values.get(endField);
      if (typeof start === 'number' && typeof end === 'number' && start > end) {
        return [issue(startField, `${startField} (${start}) must not exceed ${endField} (${end})`, start)];
      }
      return [];
    },
  };
}

// =============================================================================
// Offline Core
// =============================================================================

const coreModeCheck: CrossFieldCheck = {
  name: 'core-mode',
  normalizes: false,
  run(values) {
    const input = values.get('inputWidthFormat');
    const spike = values.get('spikeWidthFormat');
    const snn = values.get('snnModeEn');
    if (typeof input !== 'number' || typeof spike !== 'number' || typeof snn !== 'number') {
      return [];
    }
    if (findCoreMode(input, spike, snn) === undefined) {
      return [issue('snnModeEn', `SNN mode cannot be enabled with ${input}-bit input`, snn)];
    }
    return [];
  },
};

const dendriteLimitCheck: CrossFieldCheck = {
  name: 'dendrite-limit',
  normalizes: false,
  run(values) {
    const input = values.get('inputWidthFormat');
    const spike = values.get('spikeWidthFormat');
    const snn = values.get('snnModeEn');
    const dendrites = values.get('numDendrite');
    if (typeof input !== 'number' || typeof spike !== 'number' ||
        typeof snn !== 'number' || typeof dendrites !== 'number') {
      return [];
    }
    const mode = findCoreMode(input, spike, snn);
    if (mode === undefined) return [];
    const limit = maxDendrites(mode);
    if (dendrites > limit) {
      return [issue('numDendrite', `${dendrites} dendrites exceed the ${limit} available in ${mode} mode`, dendrites)];
    }
    return [];
  },
};

const maxPoolingCheck: CrossFieldCheck = {
  name: 'max-pooling-input',
  normalizes: true,
  run(values) {
    if (values.get('inputWidthFormat') === 1 && values.get('maxPoolingEn') === 1) {
      return [{
        type: 'normalize',
        field: 'maxPoolingEn',
        value: 0,
        message: 'max pooling needs 8-bit input; disabled',
      }];
    }
    return [];
  },
};

// =============================================================================
// Registry
// =============================================================================

const CHECKS: Record<RegisterKind, readonly CrossFieldCheck[]> = {
  offline_core: [coreModeCheck, dendriteLimitCheck, maxPoolingCheck],
  online_core: [
    orderedRange('neuron-range', 'neuronStart', 'neuronEnd'),
    orderedRange('weight-bounds', 'lowerWeight', 'upperWeight'),
  ],
  // Axon address limits live in the field domains
  offline_neuron: [],
  online_neuron: [orderedRange('plasticity-range', 'plasticityStart', 'plasticityEnd')],
  online_neuron_1bit: [orderedRange('plasticity-range', 'plasticityStart', 'plasticityEnd')],
};

export function checksFor(kind: RegisterKind): readonly CrossFieldCheck[] {
  return CHECKS[kind];
}

/**
 * Run the checks of a register kind. With `strict` off only normalizing
 * checks run.
 */
export function runCrossFieldChecks(
  kind: RegisterKind,
  values: ValueReader,
  strict: boolean
): CheckFinding[] {
  return checksFor(kind)
    .filter((check) => strict || check.normalizes)
    .flatMap((check) => check.run(values));
}
