import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/register-error.js';
import { RegisterImage } from '../../src/registers/image.js';
import { captureRegisterError } from '../helpers/errors.js';
import { OFFLINE_CORE_HEX } from '../helpers/fixtures.js';

describe('registers/image', () => {
  const scenario = RegisterImage.fromHex(OFFLINE_CORE_HEX, 90);

  it('rejects values wider than the image', () => {
    expect(captureRegisterError(() => new RegisterImage(4, 16n)).code).toBe(ERROR_CODES.LENGTH_MISMATCH);
    expect(captureRegisterError(() => new RegisterImage(4, -1n)).code).toBe(ERROR_CODES.LENGTH_MISMATCH);
    expect(captureRegisterError(() => new RegisterImage(0, 0n)).code).toBe(ERROR_CODES.LENGTH_MISMATCH);
    expect(new RegisterImage(4, 15n).value).toBe(15n);
  });

  it('converts to and from big-endian bytes', () => {
    const bytes = scenario.toBytes();
    expect([...bytes]).toEqual([3, 0, 12, 128, 0, 32, 25, 32, 0, 0, 0, 0]);
    expect(RegisterImage.fromBytes(bytes, 90).equals(scenario)).toBe(true);
  });

  it('needs the exact byte count', () => {
    const error = captureRegisterError(() => RegisterImage.fromBytes(new Uint8Array(11), 90));
    expect(error.code).toBe(ERROR_CODES.LENGTH_MISMATCH);
    expect(error.message).toBe('Expected 12 bytes for 90 bits, got 11');
  });

  it('reads binary strings with separators', () => {
    const image = RegisterImage.fromBinaryString('10_10');
    expect(image.bitLength).toBe(4);
    expect(image.value).toBe(10n);
    expect(image.toBinaryString()).toBe('1010');
    expect(captureRegisterError(() => RegisterImage.fromBinaryString('102')).code).toBe(ERROR_CODES.OUT_OF_RANGE);
  });

  it('pads hex to the image length', () => {
    expect(new RegisterImage(8, 1n).toHex()).toBe('0x01');
    expect(new RegisterImage(10, 1n).toHex()).toBe('0x001');
    expect(RegisterImage.fromHex('ff', 8).value).toBe(255n);
    expect(captureRegisterError(() => RegisterImage.fromHex('0xzz', 8)).code).toBe(ERROR_CODES.OUT_OF_RANGE);
    expect(captureRegisterError(() => RegisterImage.fromHex('0x1ff', 8)).code).toBe(ERROR_CODES.LENGTH_MISMATCH);
  });

  it('splits words most significant first', () => {
    const image = new RegisterImage(6, 0b101101n);
    expect(image.toWords(4)).toEqual([2n, 13n]);
    expect(RegisterImage.fromWords([2n, 13n], 4, 6).equals(image)).toBe(true);
  });

  it('rejects word sizes below one bit', () => {
    const image = new RegisterImage(6, 0b101101n);
    for (const wordBits of [0, -4, 2.5, Number.NaN]) {
      expect(captureRegisterError(() => image.toWords(wordBits)).code).toBe(ERROR_CODES.OUT_OF_RANGE);
    }
  });

  it('joins words to the full width by default', () => {
    const image = RegisterImage.fromWords([1n, 2n], 4);
    expect(image.bitLength).toBe(8);
    expect(image.value).toBe(0x12n);
    expect(captureRegisterError(() => RegisterImage.fromWords([16n], 4)).code).toBe(ERROR_CODES.LENGTH_MISMATCH);
  });

  it('reads single bits and slices', () => {
    const image = new RegisterImage(8, 0b1010_0110n);
    expect(image.bit(0)).toBe(0);
    expect(image.bit(1)).toBe(1);
    expect(image.bit(7)).toBe(1);
    expect(image.slice(1, 3)).toBe(0b011n);
    expect(captureRegisterError(() => image.bit(8)).code).toBe(ERROR_CODES.OUT_OF_RANGE);
  });

  it('compares length and value', () => {
    expect(new RegisterImage(8, 1n).equals(new RegisterImage(8, 1n))).toBe(true);
    expect(new RegisterImage(8, 1n).equals(new RegisterImage(9, 1n))).toBe(false);
    expect(new RegisterImage(8, 1n).toString()).toBe('RegisterImage(8, 0x01)');
  });
});
