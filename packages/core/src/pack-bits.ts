/**
 * @module pack-bits
 * 1-bit-per-pixel packing for e-paper frame buffers.
 *
 * Layout: row-major, 8 horizontal pixels per byte, most significant bit
 * first. Every row starts on a byte boundary; unused low bits of the last
 * byte in a row are zero.
 */

import type { GrayImage } from '@eink-composer/types';
import { InvalidInputError } from './errors';
import { assertDimensions, assertGrayImage } from './gray-image';

/** Options for {@link packBits} and {@link unpackBits}. */
export interface PackBitsOptions {
  /**
   * When true a set bit means black. The default (false) sets the bit for
   * white pixels, which is what most monochrome panels expect.
   */
  invert?: boolean;
}

/** Bytes needed to store one row of `width` pixels. */
export function bytesPerRow(width: number): number {
  return Math.ceil(width / 8);
}

/**
 * Pack a binary image into a byte buffer.
 * Output length is `height * ceil(width / 8)`.
 *
 * @param image - Image whose samples are all 0 or 255 (i.e. already dithered).
 * @throws {InvalidInputError} When the grid is malformed or holds any other value.
 */
export function packBits(image: GrayImage, options: PackBitsOptions = {}): Uint8Array {
  assertGrayImage(image, 'packBits');
  const { width, height, data } = image;
  const invert = options.invert ?? false;
  const stride = bytesPerRow(width);
  const out = new Uint8Array(stride * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const value = data[y * width + x];
      if (value !== 0 && value !== 255) {
        throw new InvalidInputError(
          `packBits: pixel (${x}, ${y}) is ${value}; expected 0 or 255. Dither the image first.`,
        );
      }
      if (value > 127 !== invert) {
        out[y * stride + (x >> 3)] |= 0x80 >> (x & 7);
      }
    }
  }
  return out;
}

/**
 * Expand a packed buffer back into a binary image.
 *
 * @throws {InvalidDimensionError} When the size is not positive.
 * @throws {InvalidInputError} When the buffer length does not match the size.
 */
export function unpackBits(
  bytes: Uint8Array,
  width: number,
  height: number,
  options: PackBitsOptions = {},
): GrayImage {
  assertDimensions(width, height, 'Packed image');
  const stride = bytesPerRow(width);
  if (bytes.length !== stride * height) {
    throw new InvalidInputError(
      `unpackBits: expected ${stride * height} bytes for ${width}x${height}, got ${bytes.length}`,
    );
  }
  const invert = options.invert ?? false;
  const data = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const bit = (bytes[y * stride + (x >> 3)] & (0x80 >> (x & 7))) !== 0;
      data[y * width + x] = bit !== invert ? 255 : 0;
    }
  }
  return { width, height, data };
}
