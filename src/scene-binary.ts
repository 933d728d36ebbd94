/**
 * Semantic decoder for binary scene files.
 *
 * Walks the chunk tree produced by {@link ChunkReader} and turns the well-known
 * forms into a {@link SceneDocument}: header (version, plugins, file info,
 * units), file references, connections, node creation and typed attribute
 * values. Unknown chunks are skipped.
 */
import { readFileSync } from 'node:fs';
import { ChunkReader } from './chunk-reader.js';
import {
  AUNI,
  CONN,
  CONNECTION_PREAMBLE_32,
  CONNECTION_PREAMBLE_64,
  CONS,
  CREA,
  DBL3,
  DBLE,
  FINF,
  FLGS,
  FOR4,
  FOR8,
  FORMAT_64,
  FREF,
  HEAD,
  LIS4,
  LIS8,
  LUNI,
  MAGIC_FORMATS,
  MAYA,
  PLUG,
  SLCT,
  STR_,
  TUNI,
  VERS,
} from './constants/chunk-tags.js';
import { TEXTURE_PATH_ATTRIBUTES } from './constants/scene-files.js';
import { TypeIdTable } from './type-id-table.js';
import type { Chunk, ChunkFormat } from './types/chunk.js';
import { SceneFormatError } from './types/errors.js';
import { createSceneDocument } from './types/scene-document.js';
import type { AttributeKind, AttributeValue, SceneDocument } from './types/scene-document.js';
import { attributeShortName, plugElementCount } from './utils/attribute-names.js';
import { tagToString } from './utils/byte-order.js';
import { logger } from './utils/logger.js';

export interface SceneBinaryDecoderOptions {
  readonly typeTable?: TypeIdTable;
}

/**
 * Picks the container variant from the first four bytes.
 * @throws {SceneFormatError} If the signature is not a known container tag
 */
export function detectChunkFormat(buffer: Buffer): ChunkFormat {
  if (buffer.length < 4) {
    throw new SceneFormatError(`Stream too short for a magic signature (${buffer.length} bytes)`);
  }
  const magic: number = buffer.readUInt32BE(0);
  const format: ChunkFormat | undefined = MAGIC_FORMATS.get(magic);
  if (format === undefined) {
    throw new SceneFormatError(`Unrecognized magic signature "${tagToString(magic)}"`);
  }
  return format;
}

/** True when the buffer starts with one of the binary container signatures. */
export function hasBinarySignature(buffer: Buffer): boolean {
  return buffer.length >= 4 && MAGIC_FORMATS.has(buffer.readUInt32BE(0));
}

/**
 * Reference paths followed by texture paths, each listed once in first-seen order.
 */
export function collectDependencyPaths(
  document: SceneDocument,
  textureAttributes: readonly string[] = TEXTURE_PATH_ATTRIBUTES
): string[] {
  const paths = new Set<string>(document.references);
  for (const attribute of document.attributes) {
    if (
      attribute.kind === 'string' &&
      typeof attribute.value === 'string' &&
      textureAttributes.includes(attributeShortName(attribute.name))
    ) {
      paths.add(attribute.value);
    }
  }
  return Array.from(paths);
}

function cString(data: Buffer): string {
  const terminator: number = data.indexOf(0);
  return data.toString('utf8', 0, terminator === -1 ? data.length : terminator);
}

/**
 * Decodes one binary scene buffer. One instance per parse.
 */
export class SceneBinaryDecoder {
  private readonly reader: ChunkReader;
  private readonly document: SceneDocument = createSceneDocument();
  private readonly typeTable: TypeIdTable;
  private readonly is64: boolean;
  private currentNode: string | null = null;

  /** Container chunk tag to handler. */
  private readonly containerHandlers: ReadonlyMap<number, () => void>;
  /** Form type to handler; form types not listed here are node definitions. */
  private readonly formHandlers: ReadonlyMap<number, () => void>;
  /** List type to handler. */
  private readonly listHandlers: ReadonlyMap<number, () => void>;

  constructor(buffer: Buffer, options: SceneBinaryDecoderOptions = {}) {
    const format: ChunkFormat = detectChunkFormat(buffer);
    this.is64 = format === FORMAT_64;
    this.reader = new ChunkReader(buffer, format);
    this.typeTable = options.typeTable ?? TypeIdTable.default();

    const handleForm = (): void => this.handleForm();
    const handleList = (): void => this.handleList();
    this.containerHandlers = new Map([
      [FOR4, handleForm],
      [FOR8, handleForm],
      [LIS4, handleList],
      [LIS8, handleList],
    ]);
    this.formHandlers = new Map([
      [MAYA, (): void => this.handleAllChunks()],
      [HEAD, (): void => this.parseHeader()],
      [FREF, (): void => this.parseFileReferences()],
      [CONN, (): void => this.parseConnection()],
    ]);
    this.listHandlers = new Map([[CONS, (): void => this.handleAllChunks()]]);
  }

  /**
   * Decodes a scene buffer in one call.
   * @throws {SceneFormatError} On a bad signature or a structurally broken chunk
   */
  static decode({ buffer, typeTable }: { readonly buffer: Buffer; readonly typeTable?: TypeIdTable }): SceneDocument {
    return new SceneBinaryDecoder(buffer, { typeTable }).decode();
  }

  static read({ filePath, typeTable }: { readonly filePath: string; readonly typeTable?: TypeIdTable }): SceneDocument {
    return SceneBinaryDecoder.decode({ buffer: readFileSync(filePath), typeTable });
  }

  decode(): SceneDocument {
    this.reader.parse((chunk: Chunk): void => this.handleChunk(chunk));
    return this.document;
  }

  private handleChunk(chunk: Chunk): void {
    const handler = this.containerHandlers.get(chunk.typeId);
    if (handler !== undefined) {
      handler();
    }
  }

  private handleAllChunks(): void {
    for (const chunk of this.reader.iterate()) {
      this.handleChunk(chunk);
    }
  }

  /** Form and list types are 32-bit in both variants, padded to the header stride. */
  private readContainerType(): number {
    const typeId: number = this.reader.readTypeId();
    this.reader.realign();
    return typeId;
  }

  private handleForm(): void {
    const formType: number = this.readContainerType();
    const handler = this.formHandlers.get(formType);
    if (handler !== undefined) {
      handler();
    } else {
      this.parseNode(formType);
    }
  }

  private handleList(): void {
    const listType: number = this.readContainerType();
    const handler = this.listHandlers.get(listType);
    if (handler !== undefined) {
      handler();
    }
  }

  private parseHeader(): void {
    let angle: string | null = null;
    let linear: string | null = null;
    let time: string | null = null;
    let unitsSeen = false;

    for (const chunk of this.reader.iterate()) {
      switch (chunk.typeId) {
        case VERS:
          this.document.version = cString(this.reader.readChunkData(chunk));
          break;
        case PLUG: {
          const [name = '', version = ''] = this.reader.readChunkData(chunk).toString('utf8').split('\0');
          this.document.plugins.push({ name, version });
          break;
        }
        case FINF: {
          const text: string = this.reader.readChunkData(chunk).toString('utf8');
          const separator: number = text.indexOf('\0');
          const key: string = separator === -1 ? text : text.slice(0, separator);
          const value: string = separator === -1 ? '' : text.slice(separator + 1).replace(/\0+$/, '');
          this.document.fileInfo.push({ key, value });
          break;
        }
        case AUNI:
          angle = cString(this.reader.readChunkData(chunk));
          break;
        case LUNI:
          linear = cString(this.reader.readChunkData(chunk));
          break;
        case TUNI:
          time = cString(this.reader.readChunkData(chunk));
          break;
        default:
          break;
      }

      if (angle !== null && linear !== null && time !== null) {
        this.document.units = { angle, linear, time };
        angle = null;
        linear = null;
        time = null;
        unitsSeen = true;
      }
    }

    if (!unitsSeen || angle !== null || linear !== null || time !== null) {
      logger.warn('Non-standard scene header: angle, linear and time units were not all declared');
    }
  }

  private parseFileReferences(): void {
    for (const chunk of this.reader.iterate([FREF])) {
      const path: string = cString(this.reader.readChunkData(chunk));
      if (path.length > 0) {
        this.document.references.push(path);
      }
    }
  }

  private parseConnection(): void {
    this.reader.skip(this.is64 ? CONNECTION_PREAMBLE_64 : CONNECTION_PREAMBLE_32);
    const source: string = this.reader.readNullTerminated();
    const destination: string = this.reader.readNullTerminated();
    this.document.connections.push({ source, destination });
  }

  private parseNode(formType: number): void {
    const typeName: string = this.typeTable.lookup(formType);
    this.currentNode = null;
    for (const chunk of this.reader.iterate()) {
      switch (chunk.typeId) {
        case CREA: {
          // First byte is a flag and the last the terminator of the final name.
          const data: Buffer = this.reader.readChunkData(chunk);
          const parts: string[] = data.subarray(1, Math.max(1, data.length - 1)).toString('utf8').split('\0');
          const name: string = parts[0] ?? '';
          const parent: string | null = parts.length > 1 && parts[1].length > 0 ? parts[1] : null;
          this.document.nodes.push({ typeName, name, parent });
          this.currentNode = name;
          break;
        }
        case SLCT:
        case FLGS:
          break;
        default:
          this.parseAttribute(chunk.typeId);
          break;
      }
    }
  }

  /**
   * Decodes one attribute value. A payload too short for its value type is
   * kept as an undecoded `extended` value; one without even a flag byte is
   * not an attribute and is skipped.
   */
  private parseAttribute(valueType: number): void {
    const name: string = this.reader.readNullTerminated();
    if (this.remaining() < 1) {
      logger.debug(`Skipping ${tagToString(valueType)} chunk without an attribute value`);
      return;
    }
    // Flag byte of unknown meaning.
    this.reader.skip(1);
    const count: number = plugElementCount(name);

    let kind: AttributeKind = 'extended';
    let value: AttributeValue = null;
    switch (valueType) {
      case STR_:
        kind = 'string';
        value = this.reader.readNullTerminated();
        break;
      case DBLE:
        if (this.remaining() >= count * 8) {
          kind = 'double';
          const values: number[] = this.readDoubles(count);
          value = count === 1 ? values[0] : values;
        }
        break;
      case DBL3:
        if (this.remaining() >= count * 24) {
          kind = 'double3';
          const values: number[] = this.readDoubles(count * 3);
          const triples: [number, number, number][] = [];
          for (let i = 0; i < values.length; i += 3) {
            triples.push([values[i], values[i + 1], values[i + 2]]);
          }
          value = triples;
        }
        break;
      default:
        // Extension data types are left undecoded.
        break;
    }

    this.document.attributes.push({ node: this.currentNode, name, value, kind });
  }

  private remaining(): number {
    return this.reader.bound - this.reader.position;
  }

  private readDoubles(count: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.reader.readDouble());
    }
    return values;
  }
}
