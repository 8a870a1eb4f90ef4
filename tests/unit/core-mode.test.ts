import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/register-error.js';
import {
  CORE_MODES,
  type CoreMode,
  type KindedReader,
  coreModeOf,
  fanInPerDendrite,
  findCoreMode,
  getCoreMode,
  isAnnInput,
  isSnnMode,
  maxDendrites,
  neuronRepeat,
} from '../../src/hw/core-mode.js';
import type { FieldValue, RegisterKind, ValueReader } from '../../src/registers/types.js';
import { ParameterModel } from '../../src/registers/model.js';
import { resolveSchema } from '../../src/registers/schema.js';
import { captureRegisterError } from '../helpers/errors.js';
import { ONLINE_CORE_VALUES } from '../helpers/fixtures.js';

function reader(values: Record<string, FieldValue>): ValueReader {
  return { get: (name) => values[name] };
}

function coreReader(values: Record<string, FieldValue>, kind: RegisterKind = 'offline_core'): KindedReader {
  return { schema: { kind }, get: (name) => values[name] };
}

describe('hw/core-mode', () => {
  const table: Array<[number, number, number, CoreMode]> = [
    [1, 1, 0, 'BANN'],
    [1, 1, 1, 'SNN'],
    [1, 8, 0, 'BANN_OR_SNN_TO_ANN'],
    [1, 8, 1, 'BANN_OR_SNN_TO_SNN'],
    [8, 1, 0, 'ANN_TO_BANN_OR_SNN'],
    [8, 8, 0, 'ANN'],
  ];

  it.each(table)('input %i, spike %i, SNN %i is %s', (input, spike, snn, mode) => {
    expect(findCoreMode(input, spike, snn)).toBe(mode);
    expect(getCoreMode(input, spike, snn === 1)).toBe(mode);
    expect(CORE_MODES[mode]).toEqual({ inputWidth: input, spikeWidth: spike, snnEn: snn });
  });

  it('has no mode for 8-bit input with SNN enabled', () => {
    expect(findCoreMode(8, 8, 1)).toBeUndefined();
    expect(findCoreMode(8, 1, true)).toBeUndefined();
    const error = captureRegisterError(() => getCoreMode(8, 1, 1));
    expect(error.code).toBe(ERROR_CODES.OUT_OF_RANGE);
    expect(error.message).toBe('No core mode for input_width=8, spike_width=1, SNN_EN=1');
  });

  const limits: Array<[CoreMode, number, number]> = [
    ['BANN', 4096, 1152],
    ['SNN', 512, 1152],
    ['BANN_OR_SNN_TO_ANN', 4096, 1152],
    ['BANN_OR_SNN_TO_SNN', 512, 1152],
    ['ANN_TO_BANN_OR_SNN', 4096, 144],
    ['ANN', 4096, 144],
  ];

  it.each(limits)('%s has %i dendrites of fan-in %i', (mode, dendrites, fanIn) => {
    expect(maxDendrites(mode)).toBe(dendrites);
    expect(fanInPerDendrite(mode)).toBe(fanIn);
  });

  it('classifies modes', () => {
    expect(isSnnMode('SNN')).toBe(true);
    expect(isSnnMode('BANN_OR_SNN_TO_SNN')).toBe(true);
    expect(isSnnMode('BANN')).toBe(false);
    expect(isAnnInput('ANN_TO_BANN_OR_SNN')).toBe(true);
    expect(isAnnInput('BANN_OR_SNN_TO_ANN')).toBe(false);
  });

  it('reads the mode of a core', () => {
    expect(coreModeOf(coreReader({ inputWidthFormat: 1, spikeWidthFormat: 8, snnModeEn: 1 }))).toBe('BANN_OR_SNN_TO_SNN');
    expect(captureRegisterError(() => coreModeOf(coreReader({ inputWidthFormat: 1 }))).code).toBe(ERROR_CODES.OUT_OF_RANGE);
  });

  it('reads modes of offline cores only', () => {
    const online = ParameterModel.fromNamedValues(resolveSchema('online_core'), ONLINE_CORE_VALUES);
    const error = captureRegisterError(() => coreModeOf(online));
    expect(error.code).toBe(ERROR_CODES.UNKNOWN_KIND);
    expect(error.message).toBe('Core modes apply to offline_core registers, not online_core');
    expect(captureRegisterError(() => coreModeOf(coreReader({}, 'offline_neuron'))).code).toBe(ERROR_CODES.UNKNOWN_KIND);
  });

  it('repeats neurons by fan-in extension and weight width', () => {
    expect(neuronRepeat(reader({ lcnExtension: 1, weightWidth: 8 }))).toBe(8);
    expect(neuronRepeat(reader({ lcnExtension: 4, weightWidth: 2 }))).toBe(8);
    expect(neuronRepeat(reader({ lcnExtension: 64, weightWidth: 1 }))).toBe(64);
  });
});
