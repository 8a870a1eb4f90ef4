/**
 * Core Working Modes
 *
 * A core's mode follows from its input width, output spike width and SNN
 * enable bit:
 *
 *   Mode                  input_width  spike_width  SNN_EN
 *   BANN                       1            1          0
 *   SNN                        1            1          1
 *   BANN_OR_SNN_TO_ANN         1            8          0
 *   BANN_OR_SNN_TO_SNN         1            8          1
 *   ANN_TO_BANN_OR_SNN         8            1          0
 *   ANN                        8            8          0
 *
 * @module hw/core-mode
 */

import { HW_LIMITS } from './constants.js';
import { ERROR_CODES, createRegisterError } from '../errors/register-error.js';
import type { RegisterKind, ValueReader } from '../registers/types.js';

export const CORE_MODES = {
  BANN: { inputWidth: 1, spikeWidth: 1, snnEn: 0 },
  SNN: { inputWidth: 1, spikeWidth: 1, snnEn: 1 },
  BANN_OR_SNN_TO_ANN: { inputWidth: 1, spikeWidth: 8, snnEn: 0 },
  BANN_OR_SNN_TO_SNN: { inputWidth: 1, spikeWidth: 8, snnEn: 1 },
  ANN_TO_BANN_OR_SNN: { inputWidth: 8, spikeWidth: 1, snnEn: 0 },
  ANN: { inputWidth: 8, spikeWidth: 8, snnEn: 0 },
} as const;

export type CoreMode = keyof typeof CORE_MODES;

const MODE_NAMES = Object.keys(CORE_MODES).filter(
  (name): name is CoreMode => name in CORE_MODES
);

/**
 * Mode for a width/enable combination, or undefined when the hardware
 * has no such mode (8-bit input with SNN enabled).
 */
export function findCoreMode(
  inputWidth: number,
  spikeWidth: number,
  snnEn: number | boolean
): CoreMode | undefined {
  const snn = snnEn === true || snnEn === 1 ? 1 : 0;
  return MODE_NAMES.find((name) => {
    const conf = CORE_MODES[name];
    return conf.inputWidth === inputWidth && conf.spikeWidth === spikeWidth && conf.snnEn === snn;
  });
}

export function getCoreMode(
  inputWidth: number,
  spikeWidth: number,
  snnEn: number | boolean
): CoreMode {
  const mode = findCoreMode(inputWidth, spikeWidth, snnEn);
  if (!mode) {
    throw createRegisterError(
      ERROR_CODES.OUT_OF_RANGE,
      `No core mode for input_width=${inputWidth}, spike_width=${spikeWidth}, SNN_EN=${Number(snnEn)}`
    );
  }
  return mode;
}

function numberValue(source: ValueReader, name: string): number {
  const value = source.get(name);
  if (typeof value !== 'number') {
    throw createRegisterError(
      ERROR_CODES.OUT_OF_RANGE,
      `Expected a number for '${name}', got ${JSON.stringify(value)}`
    );
  }
  return value;
}

/**
 * A model that knows its register kind.
 */
export interface KindedReader extends ValueReader {
  readonly schema: { readonly kind: RegisterKind };
}

/**
 * Mode of an offline core model.
 */
export function coreModeOf(core: KindedReader): CoreMode {
  if (core.schema.kind !== 'offline_core') {
    throw createRegisterError(
      ERROR_CODES.UNKNOWN_KIND,
      `Core modes apply to offline_core registers, not ${core.schema.kind}`
    );
  }
  return getCoreMode(
    numberValue(core, 'inputWidthFormat'),
    numberValue(core, 'spikeWidthFormat'),
    numberValue(core, 'snnModeEn')
  );
}

export function isSnnMode(mode: CoreMode): boolean {
  return mode === 'SNN' || mode === 'BANN_OR_SNN_TO_SNN';
}

/** 8-bit input modes */
export function isAnnInput(mode: CoreMode): boolean {
  return CORE_MODES[mode].inputWidth === 8;
}

/**
 * Dendrites available to a core in this mode.
 */
export function maxDendrites(mode: CoreMode): number {
  if (isAnnInput(mode) || CORE_MODES[mode].snnEn === 0) {
    return HW_LIMITS.N_DENDRITE_MAX_ANN;
  }
  return HW_LIMITS.N_DENDRITE_MAX_SNN;
}

export function fanInPerDendrite(mode: CoreMode): number {
  return isAnnInput(mode)
    ? HW_LIMITS.N_FANIN_PER_DENDRITE_ANN
    : HW_LIMITS.N_FANIN_PER_DENDRITE_MAX;
}

/**
 * How many times each neuron RAM word is repeated for a core: the fan-in
 * extension factor times the weight width, i.e. 2^(LCN code + weight code).
 */
export function neuronRepeat(core: ValueReader): number {
  return numberValue(core, 'lcnExtension') * numberValue(core, 'weightWidth');
}
