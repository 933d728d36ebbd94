/**
 * Fixed-width integer helpers and alignment for the chunked container format.
 */

import type { Endianness } from '../types/chunk.js';
import { SceneFormatError } from '../types/errors.js';

/**
 * Rounds `size` up to the nearest multiple of `stride`.
 * @throws {RangeError} If stride is not a positive integer
 */
export function align(size: number, stride: number): number {
  if (!Number.isInteger(stride) || stride <= 0) {
    throw new RangeError(`Alignment stride must be a positive integer, got ${stride}`);
  }
  const remainder: number = size % stride;
  return remainder === 0 ? size : size + stride - remainder;
}

/**
 * Reads an unsigned integer of 1, 2, 4 or 8 bytes.
 * 8-byte values above 2^53 - 1 cannot be represented and are rejected.
 */
export function readUInt(buffer: Buffer, offset: number, byteLength: number, endianness: Endianness): number {
  const bigEndian: boolean = endianness === 'big';
  switch (byteLength) {
    case 1:
      return buffer.readUInt8(offset);
    case 2:
      return bigEndian ? buffer.readUInt16BE(offset) : buffer.readUInt16LE(offset);
    case 4:
      return bigEndian ? buffer.readUInt32BE(offset) : buffer.readUInt32LE(offset);
    case 8: {
      const value: bigint = bigEndian ? buffer.readBigUInt64BE(offset) : buffer.readBigUInt64LE(offset);
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new SceneFormatError(`64-bit value at offset ${offset} exceeds the safe integer range`);
      }
      return Number(value);
    }
    default:
      throw new RangeError(`Unsupported integer width: ${byteLength}`);
  }
}

/**
 * Writes an unsigned integer of 1, 2, 4 or 8 bytes.
 */
export function writeUInt(buffer: Buffer, value: number, offset: number, byteLength: number, endianness: Endianness): void {
  const bigEndian: boolean = endianness === 'big';
  switch (byteLength) {
    case 1:
      buffer.writeUInt8(value, offset);
      return;
    case 2:
      if (bigEndian) buffer.writeUInt16BE(value, offset);
      else buffer.writeUInt16LE(value, offset);
      return;
    case 4:
      if (bigEndian) buffer.writeUInt32BE(value, offset);
      else buffer.writeUInt32LE(value, offset);
      return;
    case 8:
      if (bigEndian) buffer.writeBigUInt64BE(BigInt(value), offset);
      else buffer.writeBigUInt64LE(BigInt(value), offset);
      return;
    default:
      throw new RangeError(`Unsupported integer width: ${byteLength}`);
  }
}

/**
 * Packs a 4-character ASCII tag into its big-endian numeric form.
 */
export function fourCC(tag: string): number {
  if (tag.length !== 4) {
    throw new RangeError(`Tag must be exactly 4 characters: "${tag}"`);
  }
  return Buffer.from(tag, 'latin1').readUInt32BE(0);
}

/** Inverse of {@link fourCC}. */
export function tagToString(typeId: number): string {
  const buffer: Buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(typeId >>> 0, 0);
  return buffer.toString('latin1');
}
