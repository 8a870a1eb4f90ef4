/**
 * Core Coordinates
 *
 * A core is addressed by (x, y) on a 32 x 32 grid. The packed address puts
 * x in the upper five bits: `x << 5 | y`.
 *
 * @module hw/coord
 */

import { CORE_X_MAX, CORE_Y_MAX, N_BIT_CORE_Y } from './constants.js';
import { ERROR_CODES, createRegisterError } from '../errors/register-error.js';

export interface Coord {
  readonly x: number;
  readonly y: number;
}

export function isCoord(value: unknown): value is Coord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('x' in value) || !('y' in value)) return false;
  const { x, y } = value;
  return (
    typeof x === 'number' && Number.isInteger(x) && x >= 0 && x <= CORE_X_MAX &&
    typeof y === 'number' && Number.isInteger(y) && y >= 0 && y <= CORE_Y_MAX
  );
}

/**
 * Build a coordinate, rejecting values off the grid.
 */
export function coord(x: number, y: number): Coord {
  const c = { x, y };
  if (!isCoord(c)) {
    throw createRegisterError(
      ERROR_CODES.OUT_OF_RANGE,
      `Coordinate (${x}, ${y}) is outside [0, ${CORE_X_MAX}] x [0, ${CORE_Y_MAX}]`
    );
  }
  return c;
}

export function coordToAddress(c: Coord): number {
  return (c.x << N_BIT_CORE_Y) | c.y;
}

export function addressToCoord(address: number): Coord {
  const max = ((CORE_X_MAX + 1) << N_BIT_CORE_Y) - 1;
  if (!Number.isInteger(address) || address < 0 || address > max) {
    throw createRegisterError(
      ERROR_CODES.OUT_OF_RANGE,
      `Core address ${address} is outside [0, ${max}]`
    );
  }
  return { x: address >> N_BIT_CORE_Y, y: address & CORE_Y_MAX };
}

export function coordEquals(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

export function formatCoord(c: Coord): string {
  return `(${c.x}, ${c.y})`;
}
