import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/register-error.js';
import { readParamsFile, writeParamsFile } from '../../src/formats/params/io/node.js';
import {
  createParamsDocument,
  modelFromDocument,
  parseParamsDocument,
  serializeParamsDocument,
} from '../../src/formats/params/parsing.js';
import { isParamsDocument, validateParamsDocument } from '../../src/formats/params/validation.js';
import { pack, unpack } from '../../src/registers/codec.js';
import { RegisterImage } from '../../src/registers/image.js';
import { ParameterModel } from '../../src/registers/model.js';
import { resolveSchema } from '../../src/registers/schema.js';
import { captureRegisterError } from '../helpers/errors.js';
import {
  OFFLINE_CORE_HEX,
  OFFLINE_CORE_VALUES,
  OFFLINE_NEURON_VALUES,
  ONLINE_NEURON_VALUES,
} from '../helpers/fixtures.js';

const coreModel = (): ParameterModel =>
  ParameterModel.fromNamedValues(resolveSchema('offline_core'), OFFLINE_CORE_VALUES);

describe('formats/params', () => {
  describe('createParamsDocument', () => {
    it('writes export keys and the layout', () => {
      const model = coreModel();
      expect(createParamsDocument(model)).toEqual({
        version: 1,
        kind: 'offline_core',
        mode: { layout: 'offline_core' },
        values: model.export(),
      });
    });

    it('adds the image on request', () => {
      expect(createParamsDocument(coreModel(), { image: true }).image).toBe(OFFLINE_CORE_HEX);
    });

    it('records group size and one image per neuron', () => {
      const schema = resolveSchema('offline_neuron', { groupSize: 2 });
      const model = ParameterModel.fromNamedValues(schema, { ...OFFLINE_NEURON_VALUES, leak_v: [1, 2] });
      const doc = createParamsDocument(model, { image: true });
      expect(doc.mode).toEqual({ layout: 'offline_neuron', groupSize: 2 });
      expect(doc.values?.leak_v).toEqual([1, 2]);
      expect(Array.isArray(doc.image) ? doc.image.length : 0).toBe(2);
    });
  });

  describe('serialize / parse', () => {
    it('ends with a newline and indents by two', () => {
      const text = serializeParamsDocument(coreModel());
      expect(text.endsWith('}\n')).toBe(true);
      expect(text.split('\n')[1]).toBe('  "version": 1,');
    });

    it('reads back an equal model', () => {
      const model = coreModel();
      expect(parseParamsDocument(serializeParamsDocument(model)).equals(model)).toBe(true);
      expect(parseParamsDocument(serializeParamsDocument(model, { image: true })).equals(model)).toBe(true);
    });

    it('reads image-only documents', () => {
      const model = parseParamsDocument(JSON.stringify({ kind: 'offline_core', image: OFFLINE_CORE_HEX }));
      expect(model.equals(coreModel())).toBe(true);
    });

    it('prefers the image over named values', () => {
      const model = modelFromDocument({
        kind: 'offline_core',
        values: { ...OFFLINE_CORE_VALUES, neuron_num: 200 },
        image: OFFLINE_CORE_HEX,
      });
      expect(model.get('neuron_num')).toBe(100);
    });

    it('writes the image for models with reported state', () => {
      const schema = resolveSchema('offline_neuron');
      const configured = ParameterModel.fromNamedValues(schema, OFFLINE_NEURON_VALUES);
      const reported = unpack(RegisterImage.fromBigInt(pack(configured).value | 5n, schema.totalBits), schema);
      expect(reported.get('vjt_pre')).toBe(5);

      const doc = createParamsDocument(reported);
      expect(doc.image).toBe(pack(reported).toHex());

      const restored = parseParamsDocument(serializeParamsDocument(reported));
      expect(restored.get('vjt_pre')).toBe(5);
      expect(restored.equals(reported)).toBe(true);
    });

    it('leaves the image out when read-only fields hold their defaults', () => {
      const schema = resolveSchema('offline_neuron');
      const configured = ParameterModel.fromNamedValues(schema, OFFLINE_NEURON_VALUES);
      expect(createParamsDocument(configured).image).toBeUndefined();
    });

    it('round-trips groups', () => {
      const schema = resolveSchema('offline_neuron', { groupSize: 2 });
      const model = ParameterModel.fromNamedValues(schema, { ...OFFLINE_NEURON_VALUES, leak_v: [1, 2] });
      const restored = parseParamsDocument(serializeParamsDocument(model, { image: true }));
      expect(restored.schema).toBe(schema);
      expect(restored.get('leak_v')).toEqual([1, 2]);
    });

    it('keeps the online neuron layout', () => {
      const schema = resolveSchema('online_neuron', { weightWidth: 4 });
      const model = ParameterModel.fromNamedValues(schema, ONLINE_NEURON_VALUES);
      const restored = parseParamsDocument(serializeParamsDocument(model));
      expect(restored.schema).toBe(schema);
      expect(restored.get('threshold')).toBe(100000);
    });

    it('resolves the schema from the weight width', () => {
      const doc = { kind: 'online_neuron', mode: { weightWidth: 2 }, values: ONLINE_NEURON_VALUES };
      expect(modelFromDocument(doc).schema.totalBits).toBe(256);
    });

    it('passes model options through', () => {
      const text = JSON.stringify({ kind: 'offline_core', values: { ...OFFLINE_CORE_VALUES, note: 'x' } });
      expect(captureRegisterError(() => parseParamsDocument(text)).code).toBe(ERROR_CODES.UNKNOWN_NAME);
      expect(parseParamsDocument(text, { unknownNames: 'ignore' }).get('LCN')).toBe(1);
    });
  });

  describe('validation', () => {
    it('rejects text that is not JSON', () => {
      const error = captureRegisterError(() => parseParamsDocument('{'));
      expect(error.code).toBe(ERROR_CODES.VALIDATION_ERROR);
      expect(error.message.startsWith('Parameter document is not valid JSON: ')).toBe(true);
    });

    it('requires values or an image', () => {
      const error = captureRegisterError(() => parseParamsDocument('{"kind": "offline_core"}'));
      expect(error.code).toBe(ERROR_CODES.VALIDATION_ERROR);
      expect(error.issues).toEqual([{
        code: ERROR_CODES.VALIDATION_ERROR,
        field: 'document',
        message: 'document needs values or image',
      }]);
    });

    it('lists every shape problem', () => {
      expect(validateParamsDocument({ kind: '', values: 3 })).toEqual({
        valid: false,
        errors: ['kind must be a non-empty string', 'values must be an object'],
      });
      expect(validateParamsDocument([])).toEqual({ valid: false, errors: ['document must be a JSON object'] });
      expect(validateParamsDocument({ version: 2, kind: 'offline_core', mode: { weightWidth: '8' }, image: ['0xg'] }))
        .toEqual({
          valid: false,
          errors: [
            'unsupported version 2, expected 1',
            'mode.weightWidth must be a number',
            'image must be a hex string or an array of hex strings',
          ],
        });
    });

    it('accepts well-formed documents', () => {
      expect(isParamsDocument({ kind: 'offline_core', values: {} })).toBe(true);
      expect(isParamsDocument({ kind: 'offline_neuron', image: ['0x00', '0X1f'] })).toBe(true);
    });
  });

  describe('files', () => {
    let dir = '';

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'neuroreg-params-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes and reads a document', async () => {
      const model = coreModel();
      const path = join(dir, 'nested', 'core.json');
      await writeParamsFile(path, model, { image: true });

      const text = await readFile(path, 'utf8');
      expect(JSON.parse(text)).toMatchObject({ kind: 'offline_core', image: OFFLINE_CORE_HEX });
      expect((await readParamsFile(path)).equals(model)).toBe(true);
    });

    it('propagates read failures', async () => {
      await expect(readParamsFile(join(dir, 'missing.json'))).rejects.toThrow();
    });
  });
});
