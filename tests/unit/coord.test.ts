import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/register-error.js';
import {
  addressToCoord,
  coord,
  coordEquals,
  coordToAddress,
  formatCoord,
  isCoord,
} from '../../src/hw/coord.js';
import { captureRegisterError } from '../helpers/errors.js';

describe('hw/coord', () => {
  it('packs x above y', () => {
    expect(coordToAddress({ x: 1, y: 2 })).toBe(34);
    expect(coordToAddress({ x: 31, y: 31 })).toBe(1023);
    expect(coordToAddress({ x: 0, y: 0 })).toBe(0);
  });

  it('unpacks addresses', () => {
    expect(addressToCoord(34)).toEqual({ x: 1, y: 2 });
    expect(addressToCoord(1023)).toEqual({ x: 31, y: 31 });
    expect(captureRegisterError(() => addressToCoord(1024)).code).toBe(ERROR_CODES.OUT_OF_RANGE);
    expect(captureRegisterError(() => addressToCoord(-1)).code).toBe(ERROR_CODES.OUT_OF_RANGE);
  });

  it('keeps coordinates on the grid', () => {
    expect(coord(28, 29)).toEqual({ x: 28, y: 29 });
    const error = captureRegisterError(() => coord(32, 0));
    expect(error.message).toBe('Coordinate (32, 0) is outside [0, 31] x [0, 31]');
  });

  it('recognizes coordinate objects', () => {
    expect(isCoord({ x: 1, y: 2 })).toBe(true);
    expect(isCoord({ x: 1 })).toBe(false);
    expect(isCoord({ x: -1, y: 0 })).toBe(false);
    expect(isCoord({ x: 1.5, y: 0 })).toBe(false);
    expect(isCoord(null)).toBe(false);
    expect(isCoord(34)).toBe(false);
  });

  it('compares and formats', () => {
    expect(coordEquals({ x: 1, y: 2 }, coord(1, 2))).toBe(true);
    expect(coordEquals({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
    expect(formatCoord({ x: 3, y: 4 })).toBe('(3, 4)');
  });
});
