/**
 * @module bmp-encoder
 * 1-bit monochrome BMP encoder.
 *
 * Produces an uncompressed Windows BMP (BI_RGB) with a two-entry palette
 * (index 0 = black, index 1 = white). Samples above 128 map to white.
 */

import type { GrayImage } from '@eink-composer/types';
import { THRESHOLD_LEVEL } from './dither';
import { assertGrayImage } from './gray-image';

const BMP_HEADER_SIZE = 14;
const DIB_HEADER_SIZE = 40;
const PALETTE_SIZE = 2 * 4; // two BGRA entries

/**
 * Encode a grayscale image as a 1-bit BMP file.
 *
 * @param image - Source image; non-binary samples are thresholded.
 * @returns Uint8Array containing the complete BMP file.
 */
export function encodeMonoBmp(image: GrayImage): Uint8Array {
  assertGrayImage(image, 'encodeMonoBmp');
  const { width, height, data } = image;

  // Each row is padded to a 4-byte boundary
  const rowBytes = Math.ceil(width / 8);
  const paddedRowBytes = (rowBytes + 3) & ~3;
  const pixelDataSize = paddedRowBytes * height;
  const dataOffset = BMP_HEADER_SIZE + DIB_HEADER_SIZE + PALETTE_SIZE;
  const fileSize = dataOffset + pixelDataSize;

  const buf = new Uint8Array(fileSize);
  const view = new DataView(buf.buffer);

  // --- BMP file header (14 bytes) ---
  buf[0] = 0x42; // 'B'
  buf[1] = 0x4d; // 'M'
  view.setUint32(2, fileSize, true);
  view.setUint32(10, dataOffset, true);

  // --- BITMAPINFOHEADER (40 bytes) ---
  view.setUint32(14, DIB_HEADER_SIZE, true);
  view.setInt32(18, width, true);
  view.setInt32(22, height, true); // positive = bottom-to-top row order
  view.setUint16(26, 1, true); // color planes
  view.setUint16(28, 1, true); // bits per pixel
  view.setUint32(30, 0, true); // compression: BI_RGB
  view.setUint32(34, pixelDataSize, true);
  view.setInt32(38, 2835, true); // 72 DPI
  view.setInt32(42, 2835, true);
  view.setUint32(46, 2, true); // colors in palette
  view.setUint32(50, 2, true); // important colors

  // --- Palette: black, then white ---
  const paletteOffset = BMP_HEADER_SIZE + DIB_HEADER_SIZE;
  buf[paletteOffset + 4] = 255;
  buf[paletteOffset + 5] = 255;
  buf[paletteOffset + 6] = 255;

  // --- Pixel data (bottom-to-top, MSB = leftmost pixel) ---
  for (let y = 0; y < height; y++) {
    const rowOffset = dataOffset + (height - 1 - y) * paddedRowBytes;
    for (let x = 0; x < width; x++) {
      if (data[y * width + x] > THRESHOLD_LEVEL) {
        buf[rowOffset + (x >> 3)] |= 0x80 >> (x & 7);
      }
    }
  }

  return buf;
}
