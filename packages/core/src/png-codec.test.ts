import { describe, it, expect } from 'vitest';
import { zlibSync } from 'fflate';
import { InvalidInputError } from './errors';
import { grayImageFrom } from './gray-image';
import { decodePng, encodeGrayPng, isPng } from './png-codec';

const SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];

function u32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

/** A chunk with a zero CRC; the decoder does not check it. */
function chunk(type: string, data: ArrayLike<number>): number[] {
  return [...u32(data.length), ...[...type].map((c) => c.charCodeAt(0)), ...Array.from(data), 0, 0, 0, 0];
}

/** Build a PNG from raw (already filtered) scanlines. */
function buildPng(
  width: number,
  height: number,
  colorType: number,
  scanlines: number[],
  options: { bitDepth?: number; interlace?: number } = {},
): Uint8Array {
  const ihdr = [...u32(width), ...u32(height), options.bitDepth ?? 8, colorType, 0, 0, options.interlace ?? 0];
  return new Uint8Array([
    ...SIGNATURE,
    ...chunk('IHDR', ihdr),
    ...chunk('IDAT', zlibSync(new Uint8Array(scanlines))),
    ...chunk('IEND', []),
  ]);
}

describe('encodeGrayPng', () => {
  it('writes the signature and an 8-bit grayscale header', () => {
    const png = encodeGrayPng(grayImageFrom(3, 2, [0, 1, 2, 3, 4, 5]));
    expect([...png.subarray(0, 8)]).toEqual(SIGNATURE);
    // IHDR: length 13, type, width 3, height 2, depth 8, color type 0
    expect([...png.subarray(8, 26)]).toEqual([
      0, 0, 0, 13, 73, 72, 68, 82, 0, 0, 0, 3, 0, 0, 0, 2, 8, 0,
    ]);
  });

  it('writes the IHDR CRC', () => {
    const png = encodeGrayPng(grayImageFrom(1, 1, [0]));
    // CRC-32 over "IHDR" + 00000001 00000001 08 00 00 00 00
    expect([...png.subarray(29, 33)]).toEqual([0x3a, 0x7e, 0x9b, 0x55]);
  });

  it('decodes back to the same samples', () => {
    const image = grayImageFrom(3, 2, [0, 64, 128, 192, 255, 7]);
    const decoded = decodePng(encodeGrayPng(image));
    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect([...decoded.data]).toEqual([0, 64, 128, 192, 255, 7]);
  });
});

describe('isPng', () => {
  it('checks the signature', () => {
    expect(isPng(new Uint8Array(SIGNATURE))).toBe(true);
    expect(isPng(new Uint8Array([137, 80, 78]))).toBe(false);
    expect(isPng(new Uint8Array([0x50, 0x35, 0, 0, 0, 0, 0, 0]))).toBe(false);
  });
});

describe('decodePng', () => {
  it('reduces RGB with luma weights', () => {
    const png = buildPng(2, 1, 2, [0, 255, 0, 0, 0, 0, 255]);
    expect([...decodePng(png).data]).toEqual([76, 29]);
  });

  it('composites alpha over white', () => {
    const rgba = buildPng(2, 1, 6, [0, 0, 0, 0, 0, 0, 0, 0, 255]);
    expect([...decodePng(rgba).data]).toEqual([255, 0]);

    const grayAlpha = buildPng(1, 1, 4, [0, 0, 128]);
    expect([...decodePng(grayAlpha).data]).toEqual([127]);
  });

  it('reverses Sub and Up filters', () => {
    const png = buildPng(3, 2, 0, [1, 10, 5, 5, 2, 1, 1, 1]);
    expect([...decodePng(png).data]).toEqual([10, 15, 20, 11, 16, 21]);
  });

  it('reverses the Paeth filter', () => {
    // Both samples of row 2 predict from the pixel above
    const png = buildPng(2, 2, 0, [0, 10, 20, 4, 1, 1]);
    expect([...decodePng(png).data]).toEqual([10, 20, 11, 21]);
  });

  it('rejects a bad signature', () => {
    expect(() => decodePng(new Uint8Array(16))).toThrow('Invalid PNG signature');
  });

  it('rejects 16-bit and interlaced images', () => {
    expect(() => decodePng(buildPng(1, 1, 0, [0, 0, 0], { bitDepth: 16 }))).toThrow(
      InvalidInputError,
    );
    expect(() => decodePng(buildPng(1, 1, 0, [0, 0], { interlace: 1 }))).toThrow(
      InvalidInputError,
    );
  });

  it('rejects truncated image data', () => {
    expect(() => decodePng(buildPng(4, 4, 0, [0, 1, 2]))).toThrow('PNG image data is truncated');
  });
});
