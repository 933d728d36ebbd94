/**
 * Container variants and the well-known chunk tags of binary scene files.
 */
import type { ChunkFormat } from '../types/chunk.js';
import { fourCC } from '../utils/byte-order.js';

/** 32-bit container: 4-byte size field, 4-byte alignment. */
export const FORMAT_32: ChunkFormat = Object.freeze<ChunkFormat>({
  endianness: 'big',
  typeIdBytes: 4,
  sizeBytes: 4,
  headerAlignment: 4,
  chunkAlignment: 4,
});

/** 64-bit container: 8-byte size field, 8-byte alignment. */
export const FORMAT_64: ChunkFormat = Object.freeze<ChunkFormat>({
  endianness: 'big',
  typeIdBytes: 4,
  sizeBytes: 8,
  headerAlignment: 8,
  chunkAlignment: 8,
});

// Container chunks
export const FOR4 = fourCC('FOR4');
export const FOR8 = fourCC('FOR8');
export const LIS4 = fourCC('LIS4');
export const LIS8 = fourCC('LIS8');

// Form and list types
export const MAYA = fourCC('Maya');
export const HEAD = fourCC('HEAD');
export const FREF = fourCC('FREF');
export const CONN = fourCC('CONN');
export const CONS = fourCC('CONS');

// Header children
export const VERS = fourCC('VERS');
export const PLUG = fourCC('PLUG');
export const FINF = fourCC('FINF');
export const AUNI = fourCC('AUNI');
export const LUNI = fourCC('LUNI');
export const TUNI = fourCC('TUNI');

// Node children
export const CREA = fourCC('CREA');
export const SLCT = fourCC('SLCT');
export const FLGS = fourCC('FLGS');

// Attribute value kinds
export const STR_ = fourCC('STR ');
export const DBLE = fourCC('DBLE');
export const DBL3 = fourCC('DBL3');

/**
 * Bytes between a connection form's type and its plug names: a nested chunk
 * header followed by one flag byte.
 */
export const CONNECTION_PREAMBLE_32 = 9;
export const CONNECTION_PREAMBLE_64 = 17;

/** Magic signature to container variant. */
export const MAGIC_FORMATS: ReadonlyMap<number, ChunkFormat> = new Map([
  [FOR4, FORMAT_32],
  [FOR8, FORMAT_64],
]);
