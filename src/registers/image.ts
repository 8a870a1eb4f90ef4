/**
 * Register Image
 *
 * Fixed-length bit sequence produced by packing a model. Bit 0 is the least
 * significant bit; byte, word and string forms are most significant first.
 *
 * @module registers/image
 */

import { ERROR_CODES, createRegisterError } from '../errors/register-error.js';

function mask(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

export class RegisterImage {
  readonly bitLength: number;
  readonly value: bigint;

  constructor(bitLength: number, value: bigint) {
    if (!Number.isInteger(bitLength) || bitLength <= 0) {
      throw createRegisterError(ERROR_CODES.LENGTH_MISMATCH, `Invalid image length ${bitLength}`);
    }
    if (value < 0n || value > mask(bitLength)) {
      throw createRegisterError(
        ERROR_CODES.LENGTH_MISMATCH,
        `Value 0x${value.toString(16)} does not fit in ${bitLength} bits`
      );
    }
    this.bitLength = bitLength;
    this.value = value;
    Object.freeze(this);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  static fromBigInt(value: bigint, bitLength: number): RegisterImage {
    return new RegisterImage(bitLength, value);
  }

  /** Big-endian bytes; the byte count must be `ceil(bitLength / 8)`. */
  static fromBytes(bytes: Uint8Array, bitLength: number): RegisterImage {
    const expected = Math.ceil(bitLength / 8);
    if (bytes.length !== expected) {
      throw createRegisterError(
        ERROR_CODES.LENGTH_MISMATCH,
        `Expected ${expected} bytes for ${bitLength} bits, got ${bytes.length}`
      );
    }
    let value = 0n;
    for (const byte of bytes) {
      value = (value << 8n) | BigInt(byte);
    }
    return new RegisterImage(bitLength, value);
  }

  static fromBinaryString(bits: string): RegisterImage {
    const clean = bits.replace(/_/g, '');
    if (!/^[01]+$/.test(clean)) {
      throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `Not a binary string: '${bits}'`);
    }
    return new RegisterImage(clean.length, BigInt(`0b${clean}`));
  }

  /** Hex text with or without a 0x prefix. */
  static fromHex(hex: string, bitLength: number): RegisterImage {
    const clean = hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
    if (!/^[0-9a-fA-F]+$/.test(clean)) {
      throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `Not a hex string: '${hex}'`);
    }
    return new RegisterImage(bitLength, BigInt(`0x${clean}`));
  }

  /**
   * Join words, most significant first. The length defaults to
   * `words.length * wordBits`.
   */
  static fromWords(words: readonly bigint[], wordBits: number, bitLength = words.length * wordBits): RegisterImage {
    let value = 0n;
    for (const word of words) {
      if (word < 0n || word > mask(wordBits)) {
        throw createRegisterError(
          ERROR_CODES.LENGTH_MISMATCH,
          `Word 0x${word.toString(16)} does not fit in ${wordBits} bits`
        );
      }
      value = (value << BigInt(wordBits)) | word;
    }
    return new RegisterImage(bitLength, value);
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  bit(index: number): 0 | 1 {
    if (!Number.isInteger(index) || index < 0 || index >= this.bitLength) {
      throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `Bit ${index} is outside a ${this.bitLength}-bit image`);
    }
    return (this.value >> BigInt(index)) & 1n ? 1 : 0;
  }

  /** `width` bits starting at `lsb`. */
  slice(lsb: number, width: number): bigint {
    return (this.value >> BigInt(lsb)) & mask(width);
  }

  toBytes(): Uint8Array {
    const bytes = new Uint8Array(Math.ceil(this.bitLength / 8));
    let rest = this.value;
    for (let i = bytes.length - 1; i >= 0; i--) {
      bytes[i] = Number(rest & 0xffn);
      rest >>= 8n;
    }
    return bytes;
  }

  toBinaryString(): string {
    return this.value.toString(2).padStart(this.bitLength, '0');
  }

  toHex(): string {
    return `0x${this.value.toString(16).padStart(Math.ceil(this.bitLength / 4), '0')}`;
  }

  /**
   * Split into `wordBits`-bit words, most significant first. The top word
   * is zero-padded when the length is not a multiple of the word size.
   */
  toWords(wordBits: number): bigint[] {
    if (!Number.isInteger(wordBits) || wordBits < 1) {
      throw createRegisterError(ERROR_CODES.OUT_OF_RANGE, `Word size must be a positive integer, got ${wordBits}`);
    }
    const count = Math.ceil(this.bitLength / wordBits);
    const words: bigint[] = [];
    for (let i = count - 1; i >= 0; i--) {
      words.push((this.value >> BigInt(i * wordBits)) & mask(wordBits));
    }
    return words;
  }

  equals(other: RegisterImage): boolean {
    return this.bitLength === other.bitLength && this.value === other.value;
  }

  toString(): string {
    return `RegisterImage(${this.bitLength}, ${this.toHex()})`;
  }
}
