import { describe, it, expect } from 'vitest';
import zlib from 'zlib';
import { crc32, solidColorPng } from '../../src/utils/png.js';

describe('png encoder', () => {
  it('computes the standard CRC-32 check value', () => {
    expect(crc32(Buffer.from('123456789'))).toBe(0xcbf43926);
  });

  it('writes a valid 100x100 red RGB image', () => {
    const png = solidColorPng(100, 100, [255, 0, 0]);
    expect(png.subarray(0, 8)).toEqual(
      Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    );
    // IHDR chunk: length(4) type(4) data(13) crc(4)
    expect(png.readUInt32BE(8)).toBe(13);
    expect(png.toString('ascii', 12, 16)).toBe('IHDR');
    expect(png.readUInt32BE(16)).toBe(100);
    expect(png.readUInt32BE(20)).toBe(100);
    expect(png[24]).toBe(8);
    expect(png[25]).toBe(2);
    expect(png.readUInt32BE(29)).toBe(crc32(png.subarray(12, 29)));

    const idatLen = png.readUInt32BE(33);
    expect(png.toString('ascii', 37, 41)).toBe('IDAT');
    const raw = zlib.inflateSync(png.subarray(41, 41 + idatLen));
    expect(raw.length).toBe(100 * (100 * 3 + 1));
    expect(raw[0]).toBe(0);
    expect(Array.from(raw.subarray(1, 4))).toEqual([255, 0, 0]);
    expect(png.toString('ascii', png.length - 8, png.length - 4)).toBe('IEND');
  });

  it('rejects empty dimensions', () => {
    expect(() => solidColorPng(0, 10, [0, 0, 0])).toThrow(RangeError);
  });
});
