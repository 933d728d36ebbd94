/**
 * Lookup from binary node type identifiers to node type names.
 *
 * The table lives in `data/type-ids.json`. Keys are either a 4-character tag
 * (`"TRAN"`) or a hexadecimal identifier (`"0x47504354"`) for types whose
 * identifier is not printable.
 */
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fourCC } from './utils/byte-order.js';

export const DEFAULT_TYPE_TABLE_PATH: string = join(__dirname, '..', 'data', 'type-ids.json');

export class TypeIdTable {
  /** Name reported for identifiers missing from the table. */
  static readonly UNKNOWN = 'unknown';

  private static defaultTable: TypeIdTable | null = null;

  private constructor(private readonly entries: ReadonlyMap<number, string>) {}

  /**
   * Builds a table from tag/hex keys to type names.
   * @throws {RangeError} If a key is neither a 4-character tag nor a hex identifier
   */
  static fromRecord(record: Readonly<Record<string, string>>): TypeIdTable {
    const entries = new Map<number, string>();
    for (const [key, typeName] of Object.entries(record)) {
      entries.set(parseKey(key), typeName);
    }
    return new TypeIdTable(entries);
  }

  static load(filePath: string = DEFAULT_TYPE_TABLE_PATH): TypeIdTable {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new TypeError(`Type identifier table ${filePath} must be a JSON object`);
    }
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== 'string') {
        throw new TypeError(`Type identifier table ${filePath}: entry "${key}" is not a string`);
      }
      record[key] = value;
    }
    return TypeIdTable.fromRecord(record);
  }

  /** The bundled table, loaded on first use. */
  static default(): TypeIdTable {
    if (TypeIdTable.defaultTable === null) {
      TypeIdTable.defaultTable = TypeIdTable.load();
    }
    return TypeIdTable.defaultTable;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(typeId: number): string {
    return this.entries.get(typeId) ?? TypeIdTable.UNKNOWN;
  }
}

function parseKey(key: string): number {
  if (/^0x[0-9a-f]{1,8}$/i.test(key)) {
    return Number.parseInt(key.slice(2), 16);
  }
  return fourCC(key);
}
