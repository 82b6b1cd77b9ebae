/**
 * @module dither
 * Grayscale-to-monochrome reduction.
 *
 * Both algorithms return a grid containing only 0 and 255 and never modify
 * their input.
 */

import type { DitherMode, GrayImage } from '@eink-composer/types';
import { assertGrayImage, cloneGrayImage } from './gray-image';

/** Samples strictly above this value become white under {@link thresholdDither}. */
export const THRESHOLD_LEVEL = 128;

/**
 * Fixed-threshold dither: `p > 128 → 255`, otherwise 0.
 *
 * @param image - Source image.
 * @returns Binary image.
 * @throws {InvalidInputError} For an empty or malformed grid.
 */
export function thresholdDither(image: GrayImage): GrayImage {
  assertGrayImage(image, 'thresholdDither');
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let i = 0; i < src.length; i++) {
    dst[i] = src[i] > THRESHOLD_LEVEL ? 255 : 0;
  }
  return { width, height, data: dst };
}

/**
 * Floyd–Steinberg error diffusion.
 *
 * Pixels are visited left-to-right, top-to-bottom. Each one is quantised
 * (`v ≥ 128 → 255`) and its error pushed to unvisited neighbours:
 *
 * ```
 *          *    7/16
 *   3/16  5/16  1/16
 * ```
 *
 * Weights that would land outside the grid are dropped. The pass is
 * order-dependent: a pixel must see the error of every earlier pixel before
 * it is quantised.
 *
 * @param image - Source image.
 * @returns Binary image.
 * @throws {InvalidInputError} For an empty or malformed grid.
 */
export function floydSteinbergDither(image: GrayImage): GrayImage {
  assertGrayImage(image, 'floydSteinbergDither');
  const { width, height, data: src } = image;
  const work = Float32Array.from(src);
  const dst = new Uint8Array(src.length);

  for (let y = 0; y < height; y++) {
    const hasBelow = y + 1 < height;
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      const value = work[idx];
      const output = value >= THRESHOLD_LEVEL ? 255 : 0;
      dst[idx] = output;

      const error = value - output;
      if (error === 0) continue;

      if (x + 1 < width) {
        work[idx + 1] += (error * 7) / 16;
      }
      if (hasBelow) {
        const below = idx + width;
        if (x > 0) work[below - 1] += (error * 3) / 16;
        work[below] += (error * 5) / 16;
        if (x + 1 < width) work[below + 1] += error / 16;
      }
    }
  }

  return { width, height, data: dst };
}

/**
 * Run the dither selected by `mode`. `none` returns an unmodified copy.
 */
export function dither(image: GrayImage, mode: DitherMode): GrayImage {
  switch (mode) {
    case 'floyd-steinberg':
      return floydSteinbergDither(image);
    case 'threshold':
      return thresholdDither(image);
    case 'none':
      assertGrayImage(image, 'dither');
      return cloneGrayImage(image);
  }
}
