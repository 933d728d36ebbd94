/**
 * Framing description and transient chunk record for the binary container format.
 */

export type Endianness = 'big' | 'little';

/**
 * Layout of a chunked container variant.
 */
export interface ChunkFormat {
  readonly endianness: Endianness;
  /** Width of the type identifier field in bytes. */
  readonly typeIdBytes: number;
  /** Width of the payload size field in bytes. */
  readonly sizeBytes: number;
  /** Each header field is padded up to this stride. */
  readonly headerAlignment: number;
  /** Payload lengths are rounded up to this stride to find the next sibling. */
  readonly chunkAlignment: number;
}

/**
 * One framed record. Only valid while the reader is positioned inside it.
 */
export interface Chunk {
  /** 4-character tag packed big-endian into an unsigned 32-bit number. */
  readonly typeId: number;
  readonly dataOffset: number;
  readonly dataLength: number;
}
