/**
 * @module filters/basic
 * Basic grayscale filters.
 * All functions create a new GrayImage and do NOT modify the input.
 */

import type { GrayImage } from '@eink-composer/types';

/**
 * Invert every sample: `p → 255 − p`.
 * @param image - Source image.
 * @returns New image with inverted tones.
 */
export function invert(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let i = 0; i < src.length; i++) {
    dst[i] = 255 - src[i];
  }
  return { width, height, data: dst };
}

