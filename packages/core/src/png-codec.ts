/**
 * @module png-codec
 * Minimal PNG encoder/decoder using fflate for the zlib streams.
 * Pure JS, no native image libraries.
 *
 * Encoding always writes 8-bit grayscale. Decoding accepts 8-bit grayscale,
 * gray+alpha, RGB and RGBA and reduces everything to grayscale.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { GrayImage } from '@eink-composer/types';
import { InvalidInputError } from './errors';
import { assertGrayImage } from './gray-image';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

/** Write a chunk (length, type, data, CRC) at `offset`; returns the new offset. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const crcOffset = typeStart + 4 + data.length;
  write32(out, crcOffset, crc32(out, typeStart, crcOffset));
  return crcOffset + 4;
}

// PNG signature: 8 bytes
const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Samples per pixel for each supported color type. */
const CHANNELS: Record<number, number> = {
  0: 1, // grayscale
  2: 3, // RGB
  4: 2, // grayscale + alpha
  6: 4, // RGBA
};

/** True when `bytes` starts with the PNG signature. */
export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (bytes[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Encodes a grayscale image as an 8-bit grayscale PNG.
 * Uses filter type 0 (None) for simplicity.
 *
 * @param image - The image to encode.
 * @returns PNG file data.
 */
export function encodeGrayPng(image: GrayImage): Uint8Array {
  assertGrayImage(image, 'encodeGrayPng');
  const { data, width, height } = image;

  // Build raw scanlines with filter byte 0 (None) prepended to each row
  const rawData = new Uint8Array(height * (1 + width));
  for (let y = 0; y < height; y++) {
    rawData.set(data.subarray(y * width, (y + 1) * width), y * (1 + width) + 1);
  }
  const compressed = zlibSync(rawData);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 0; // color type: grayscale
  // compression, filter and interlace methods stay 0

  const totalLen = 8 + (12 + ihdr.length) + (12 + compressed.length) + 12;
  const out = new Uint8Array(totalLen);
  out.set(PNG_SIGNATURE, 0);
  let offset = 8;
  offset = writeChunk(out, offset, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Decodes a PNG file into a grayscale image.
 * Supports filter types 0-4 (None, Sub, Up, Average, Paeth). Color is reduced
 * with `0.299R + 0.587G + 0.114B`; alpha is composited over white.
 *
 * @param png - PNG file data.
 * @throws {InvalidInputError} For a bad signature, a missing header, or an
 *   unsupported bit depth, color type or interlace method.
 */
export function decodePng(png: Uint8Array): GrayImage {
  if (!isPng(png)) {
    throw new InvalidInputError('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    offset += 4;
    const typeStr = String.fromCharCode(png[offset], png[offset + 1], png[offset + 2], png[offset + 3]);
    offset += 4;

    if (typeStr === 'IHDR') {
      width = read32(png, offset);
      height = read32(png, offset + 4);
      const bitDepth = png[offset + 8];
      const colorType = png[offset + 9];
      const interlace = png[offset + 12];
      channels = CHANNELS[colorType] ?? 0;

      if (bitDepth !== 8 || channels === 0 || interlace !== 0) {
        throw new InvalidInputError(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}. ` +
            'Only non-interlaced 8-bit gray, gray+alpha, RGB and RGBA are supported.',
        );
      }
    } else if (typeStr === 'IDAT') {
      idatChunks.push(png.slice(offset, offset + length));
    } else if (typeStr === 'IEND') {
      break;
    }

    offset += length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0) {
    throw new InvalidInputError('PNG missing IHDR chunk');
  }

  // Concatenate IDAT chunks and inflate
  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const rawData = unzlibSync(combined);
  const rowBytes = width * channels;
  if (rawData.length < height * (1 + rowBytes)) {
    throw new InvalidInputError('PNG image data is truncated');
  }
  const pixels = unfilter(rawData, width, height, channels);
  return toGray(pixels, width, height, channels);
}

/** Reverse per-scanline filters into packed samples. */
function unfilter(rawData: Uint8Array, width: number, height: number, bpp: number): Uint8Array {
  const rowBytes = width * bpp;
  const data = new Uint8Array(rowBytes * height);

  for (let y = 0; y < height; y++) {
    const filterType = rawData[y * (1 + rowBytes)];
    const scanlineOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      const a = x >= bpp ? data[outOffset + x - bpp] : 0; // left
      const b = y > 0 ? data[outOffset - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? data[outOffset - rowBytes + x - bpp] : 0; // above-left

      let reconstructed: number;
      switch (filterType) {
        case 0: // None
          reconstructed = raw;
          break;
        case 1: // Sub
          reconstructed = (raw + a) & 0xff;
          break;
        case 2: // Up
          reconstructed = (raw + b) & 0xff;
          break;
        case 3: // Average
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4: // Paeth
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new InvalidInputError(`Unsupported PNG filter type: ${filterType}`);
      }

      data[outOffset + x] = reconstructed;
    }
  }
  return data;
}

/** Reduce packed samples with `channels` per pixel to one gray sample. */
function toGray(pixels: Uint8Array, width: number, height: number, channels: number): GrayImage {
  const out = new Uint8Array(width * height);
  for (let i = 0; i < out.length; i++) {
    const idx = i * channels;
    let lum: number;
    let alpha = 1;
    if (channels <= 2) {
      lum = pixels[idx];
      if (channels === 2) alpha = pixels[idx + 1] / 255;
    } else {
      lum = 0.299 * pixels[idx] + 0.587 * pixels[idx + 1] + 0.114 * pixels[idx + 2];
      if (channels === 4) alpha = pixels[idx + 3] / 255;
    }
    out[i] = Math.round(lum * alpha + 255 * (1 - alpha));
  }
  return { width, height, data: out };
}

/**
 * Paeth predictor function used in PNG filter type 4.
 */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
