import { align, fourCC, readUInt, tagToString, writeUInt } from '../utils/byte-order';
import { SceneFormatError } from '../types/errors';

describe('align', () => {
  it('rounds up to the smallest multiple of the stride', () => {
    for (const stride of [1, 2, 4, 8]) {
      for (let size = 0; size <= 40; size++) {
        const aligned = align(size, stride);
        expect(aligned % stride).toBe(0);
        expect(aligned).toBeGreaterThanOrEqual(size);
        expect(aligned - size).toBeLessThan(stride);
      }
    }
  });

  it('leaves multiples of the stride unchanged', () => {
    expect(align(0, 4)).toBe(0);
    expect(align(16, 8)).toBe(16);
    expect(align(12, 4)).toBe(12);
  });

  it('pads partial strides', () => {
    expect(align(1, 4)).toBe(4);
    expect(align(9, 8)).toBe(16);
    expect(align(13, 4)).toBe(16);
  });

  it('rejects non-positive strides', () => {
    expect(() => align(3, 0)).toThrow(RangeError);
    expect(() => align(3, -4)).toThrow(RangeError);
  });
});

describe('readUInt / writeUInt', () => {
  it('reads big- and little-endian values of every width', () => {
    const buffer = Buffer.from([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
    expect(readUInt(buffer, 0, 1, 'big')).toBe(0x01);
    expect(readUInt(buffer, 0, 2, 'big')).toBe(0x0102);
    expect(readUInt(buffer, 0, 2, 'little')).toBe(0x0201);
    expect(readUInt(buffer, 0, 4, 'big')).toBe(0x01020304);
    expect(readUInt(buffer, 0, 4, 'little')).toBe(0x04030201);
    expect(readUInt(buffer, 0, 8, 'big')).toBe(0x0102030405060708);
  });

  it('writes what it reads back', () => {
    const buffer = Buffer.alloc(8);
    writeUInt(buffer, 123456789, 0, 8, 'big');
    expect(readUInt(buffer, 0, 8, 'big')).toBe(123456789);
    writeUInt(buffer, 0xbeef, 2, 2, 'little');
    expect(buffer[2]).toBe(0xef);
    expect(buffer[3]).toBe(0xbe);
  });

  it('rejects 64-bit values beyond the safe integer range', () => {
    const buffer = Buffer.alloc(8, 0xff);
    expect(() => readUInt(buffer, 0, 8, 'big')).toThrow(SceneFormatError);
  });

  it('rejects unsupported widths', () => {
    expect(() => readUInt(Buffer.alloc(4), 0, 3, 'big')).toThrow(RangeError);
  });
});

describe('fourCC', () => {
  it('packs tags big-endian', () => {
    expect(fourCC('FOR4')).toBe(0x464f5234);
    expect(fourCC('STR ')).toBe(0x53545220);
  });

  it('unpacks to the same tag', () => {
    expect(tagToString(fourCC('HEAD'))).toBe('HEAD');
  });

  it('rejects tags that are not four characters', () => {
    expect(() => fourCC('FOR')).toThrow(RangeError);
  });
});
