/**
 * Reader for the chunked binary container used by binary scene files.
 *
 * A chunk is a fixed-width header (type identifier, payload size; each field
 * padded to the format's header alignment) followed by its payload, which is
 * padded to the chunk alignment. Container chunks hold further chunks in their
 * payload. The reader tracks the active chunk so that every read is bounded by
 * the payload end, and always leaves a chunk at its aligned end.
 */
import type { Chunk, ChunkFormat } from './types/chunk.js';
import { SceneFormatError } from './types/errors.js';
import { align, readUInt } from './utils/byte-order.js';

export type ChunkHandler = (chunk: Chunk, reader: ChunkReader) => void;

export class ChunkReader {
  private offset = 0;
  private current: Chunk | null = null;
  private readonly headerSize: number;

  constructor(private readonly buffer: Buffer, readonly format: ChunkFormat) {
    this.headerSize = align(format.typeIdBytes, format.headerAlignment) + align(format.sizeBytes, format.headerAlignment);
  }

  /** Current absolute stream position. */
  get position(): number {
    return this.offset;
  }

  /** The chunk whose payload is being read, or null at the root level. */
  get activeChunk(): Chunk | null {
    return this.current;
  }

  /**
   * End of the readable region: the active payload end, never past the buffer.
   */
  get bound(): number {
    if (this.current === null) {
      return this.buffer.length;
    }
    return Math.min(this.current.dataOffset + this.current.dataLength, this.buffer.length);
  }

  isPastTheEnd(): boolean {
    return this.offset >= this.bound;
  }

  /**
   * Walks the root level from the start of the stream, handing every chunk to
   * `handler`. The handler descends into containers through {@link iterate}.
   */
  parse(handler: ChunkHandler): void {
    this.offset = 0;
    this.current = null;
    for (const chunk of this.iterate()) {
      handler(chunk, this);
    }
  }

  /**
   * Yields the chunks of the current nesting level in file order.
   *
   * While a chunk is yielded it is the active chunk. Once the consumer moves on,
   * breaks out, or throws, the parent chunk is restored and the position moves
   * to the aligned end of the yielded chunk, however much of it was read.
   *
   * @param types - Only yield chunks with one of these type identifiers
   */
  *iterate(types?: readonly number[]): Generator<Chunk, void, undefined> {
    while (!this.isPastTheEnd()) {
      const chunk: Chunk | null = this.readChunkHeader();
      if (chunk === null) {
        // Trailing bytes shorter than a header are padding, not an error.
        return;
      }
      const parent: Chunk | null = this.current;
      this.current = chunk;
      try {
        if (types === undefined || types.includes(chunk.typeId)) {
          yield chunk;
        }
      } finally {
        this.current = parent;
        this.offset = chunk.dataOffset + align(chunk.dataLength, this.format.chunkAlignment);
      }
    }
  }

  /**
   * Reads exactly the payload of `chunk`, leaving the position at the payload end.
   * @throws {SceneFormatError} If the stream ends before the declared length
   */
  readChunkData(chunk: Chunk): Buffer {
    const end: number = chunk.dataOffset + chunk.dataLength;
    if (end > this.buffer.length) {
      throw new SceneFormatError(
        `Chunk payload at offset ${chunk.dataOffset} declares ${chunk.dataLength} bytes but only ${this.buffer.length - chunk.dataOffset} remain`
      );
    }
    this.offset = end;
    return this.buffer.subarray(chunk.dataOffset, end);
  }

  /**
   * @throws {SceneFormatError} If the read would cross the active chunk end
   */
  readBytes(length: number): Buffer {
    const end: number = this.offset + length;
    if (length < 0 || end > this.bound) {
      throw new SceneFormatError(`Read of ${length} bytes at offset ${this.offset} overruns region end ${this.bound}`);
    }
    const bytes: Buffer = this.buffer.subarray(this.offset, end);
    this.offset = end;
    return bytes;
  }

  skip(length: number): void {
    this.readBytes(length);
  }

  /** Reads a 4-byte tag as a big-endian packed number. */
  readTypeId(): number {
    return this.readBytes(4).readUInt32BE(0);
  }

  /**
   * Reads a UTF-8 string up to the next NUL byte, consuming the NUL.
   * Without a terminator the string runs to the region end.
   */
  readNullTerminated(): string {
    const end: number = this.bound;
    const terminator: number = this.buffer.indexOf(0, this.offset);
    const stringEnd: number = terminator === -1 || terminator >= end ? end : terminator;
    const value: string = this.buffer.toString('utf8', this.offset, stringEnd);
    this.offset = stringEnd === end ? end : stringEnd + 1;
    return value;
  }

  readDouble(): number {
    return this.readBytes(8).readDoubleBE(0);
  }

  /** Moves forward to the next header-aligned offset. */
  realign(): void {
    this.offset = align(this.offset, this.format.headerAlignment);
  }

  private readChunkHeader(): Chunk | null {
    const start: number = this.offset;
    if (start + this.headerSize > this.bound) {
      return null;
    }
    const typeId: number = readUInt(this.buffer, start, this.format.typeIdBytes, 'big');
    const sizeOffset: number = start + align(this.format.typeIdBytes, this.format.headerAlignment);
    const dataLength: number = readUInt(this.buffer, sizeOffset, this.format.sizeBytes, this.format.endianness);
    this.offset = start + this.headerSize;
    return { typeId, dataOffset: this.offset, dataLength };
  }
}
