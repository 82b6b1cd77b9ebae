/**
 * @module filters/adjustments
 * Tone adjustments run on a layer before it is dithered.
 * All functions create a new GrayImage and do NOT modify the input.
 */

import type { GrayImage } from '@eink-composer/types';
import { clamp255 } from '../gray-image';

/**
 * Build a 256-entry lookup table from a per-sample mapping.
 * @param fn - Mapping applied to every possible input value.
 */
function buildLUT(fn: (v: number) => number): Uint8Array {
  const lut = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    lut[i] = clamp255(fn(i));
  }
  return lut;
}

/** Map every sample through a lookup table. */
function applyLUT(image: GrayImage, lut: Uint8Array): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let i = 0; i < src.length; i++) {
    dst[i] = lut[src[i]];
  }
  return { width, height, data: dst };
}

/**
 * Scale and offset every sample: `clamp(round(p * brightness + contrast * 255))`.
 *
 * @param image - Source image.
 * @param brightness - Multiplier (1 = unchanged).
 * @param contrast - Additive offset in 0-1 units (0 = unchanged).
 * @returns New image with the adjustment applied.
 */
export function adjustBrightnessContrast(
  image: GrayImage,
  brightness: number,
  contrast: number,
): GrayImage {
  const offset = contrast * 255;
  return applyLUT(image, buildLUT((v) => v * brightness + offset));
}

