import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/register-error.js';
import { ParameterModel } from '../../src/registers/model.js';
import { neuronSchemaFor, resolveSchema } from '../../src/registers/schema.js';
import { REGISTER_KINDS, type ModeOptions } from '../../src/registers/types.js';
import { captureRegisterError } from '../helpers/errors.js';
import {
  OFFLINE_CORE_VALUES,
  OFFLINE_NEURON_VALUES,
  ONLINE_CORE_VALUES,
} from '../helpers/fixtures.js';

const EXPECTED_BITS = {
  offline_core: 90,
  online_core: 150,
  offline_neuron: 256,
  online_neuron: 256,
  online_neuron_1bit: 128,
};

describe('registers/schema', () => {
  describe('resolveSchema', () => {
    it('covers every bit of every built-in layout', () => {
      for (const kind of REGISTER_KINDS) {
        const schema = resolveSchema(kind, kind === 'online_neuron' ? { weightWidth: 8 } : {});
        const width = schema.fields.reduce((sum, field) => sum + field.bits, 0);
        expect(schema.totalBits).toBe(EXPECTED_BITS[kind]);
        expect(width).toBe(schema.totalBits);
      }
    });

    it('lays out core fields from the top bit down', () => {
      const schema = resolveSchema('offline_core');
      expect(schema.bitOrder).toBe('msb-first');
      expect(schema.span('weight_width')).toMatchObject({ lsb: 88, msb: 89 });
      expect(schema.span('LCN')).toMatchObject({ lsb: 84, msb: 87 });
      expect(schema.span('neuron_num')).toMatchObject({ lsb: 69, msb: 81 });
      expect(schema.span('test_chip_addr')).toMatchObject({ lsb: 23, msb: 32 });
    });

    it('lays out neuron fields from bit 0 up', () => {
      const schema = resolveSchema('offline_neuron');
      expect(schema.bitOrder).toBe('lsb-first');
      expect(schema.span('vjt_pre')).toMatchObject({ lsb: 0, msb: 29 });
      expect(schema.span('leak_v')).toMatchObject({ lsb: 36, msb: 65 });
      expect(schema.span('addr_axon')).toMatchObject({ lsb: 195, msb: 205 });
      expect(schema.span('tick_relative')).toMatchObject({ lsb: 206, msb: 213 });
    });

    it('keeps reserved spans out of the parameters', () => {
      const schema = resolveSchema('offline_core');
      expect(schema.fields).toHaveLength(12);
      expect(schema.parameters).toHaveLength(11);
      expect(schema.parameters.some((field) => field.reserved)).toBe(false);
    });

    it('picks the online neuron layout from the weight width', () => {
      expect(resolveSchema('online_neuron', { weightWidth: 1 })).toMatchObject({
        kind: 'online_neuron_1bit',
        totalBits: 128,
      });
      expect(resolveSchema('online_neuron', { weightWidth: 2 })).toMatchObject({
        kind: 'online_neuron',
        totalBits: 256,
      });
      expect(resolveSchema('online_neuron', { weightWidth: 8 }).layoutId).toBe('online_neuron');
    });

    it('returns the same schema for the same layout and group size', () => {
      const a = resolveSchema('offline_neuron', { groupSize: 4 });
      const b = resolveSchema('offline_neuron', { groupSize: 4 });
      expect(a).toBe(b);
      expect(a).not.toBe(resolveSchema('offline_neuron'));
      expect(a.groupSize).toBe(4);
      expect(a.toString()).toBe('offline_neuron@v1[4]');
      expect(Object.isFrozen(a)).toBe(true);
    });

    it('knows which kinds are cores', () => {
      expect(resolveSchema('offline_core').isCore).toBe(true);
      expect(resolveSchema('online_core').isCore).toBe(true);
      expect(resolveSchema('offline_neuron').isCore).toBe(false);
    });

    const rejected: Array<[string, ModeOptions]> = [
      ['bogus', {}],
      ['offline_core', { groupSize: 2 }],
      ['offline_neuron', { groupSize: 0 }],
      ['offline_neuron', { groupSize: 1.5 }],
      ['online_neuron', {}],
      ['online_neuron', { weightWidth: 3 }],
      ['online_neuron_1bit', { weightWidth: 8 }],
      ['offline_core', { layout: 'no_such_layout' }],
      ['offline_neuron', { layout: 'offline_core' }],
    ];

    it.each(rejected)('rejects %s with %j', (kind, mode) => {
      const error = captureRegisterError(() => resolveSchema(kind, mode));
      expect(error.code).toBe(ERROR_CODES.UNKNOWN_KIND);
    });

    it('accepts an explicit compatible layout', () => {
      expect(resolveSchema('online_neuron', { layout: 'online_neuron_1bit' }).totalBits).toBe(128);
    });
  });

  describe('neuronSchemaFor', () => {
    it('pairs offline cores with offline neurons', () => {
      const core = ParameterModel.fromNamedValues(resolveSchema('offline_core'), OFFLINE_CORE_VALUES);
      expect(neuronSchemaFor(core).kind).toBe('offline_neuron');
      expect(neuronSchemaFor(core, { groupSize: 8 }).groupSize).toBe(8);
    });

    it('follows the weight width of online cores', () => {
      const schema = resolveSchema('online_core');
      const oneBit = ParameterModel.fromNamedValues(schema, ONLINE_CORE_VALUES);
      const eightBit = ParameterModel.fromNamedValues(schema, { ...ONLINE_CORE_VALUES, weight_width: 8 });
      expect(neuronSchemaFor(oneBit).kind).toBe('online_neuron_1bit');
      expect(neuronSchemaFor(eightBit).kind).toBe('online_neuron');
    });

    it('rejects neuron models', () => {
      const neuron = ParameterModel.fromNamedValues(resolveSchema('offline_neuron'), OFFLINE_NEURON_VALUES);
      expect(captureRegisterError(() => neuronSchemaFor(neuron)).code).toBe(ERROR_CODES.UNKNOWN_KIND);
    });
  });
});
