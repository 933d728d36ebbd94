import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TypeIdTable } from '../type-id-table';
import { fourCC } from '../utils/byte-order';

describe('TypeIdTable', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'type-ids-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled table once', () => {
    const table = TypeIdTable.default();

    expect(TypeIdTable.default()).toBe(table);
    expect(table.lookup(fourCC('TRAN'))).toBe('transform');
    expect(table.lookup(0x47504354)).toBe('gpuCache');
    expect(table.lookup(fourCC('QQQQ'))).toBe(TypeIdTable.UNKNOWN);
  });

  it('accepts tag and hexadecimal keys', () => {
    const table = TypeIdTable.fromRecord({ ABCD: 'first', '0x00000010': 'second' });

    expect(table.size).toBe(2);
    expect(table.lookup(0x41424344)).toBe('first');
    expect(table.lookup(16)).toBe('second');
  });

  it('rejects keys that are neither tags nor identifiers', () => {
    expect(() => TypeIdTable.fromRecord({ toolong: 'x' })).toThrow(RangeError);
  });

  it('rejects files that are not a map of names', () => {
    const arrayFile = join(dir, 'array.json');
    const numberFile = join(dir, 'number.json');
    writeFileSync(arrayFile, '[1, 2]');
    writeFileSync(numberFile, '{"TRAN": 5}');

    expect(() => TypeIdTable.load(arrayFile)).toThrow(TypeError);
    expect(() => TypeIdTable.load(numberFile)).toThrow(`Type identifier table ${numberFile}: entry "TRAN" is not a string`);
  });
});
