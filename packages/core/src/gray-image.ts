/**
 * @module gray-image
 * Construction and validation helpers for {@link GrayImage}.
 */

import type { Gray, GrayImage } from '@eink-composer/types';
import { InvalidDimensionError, InvalidInputError } from './errors';

/**
 * Throws unless `width` and `height` are positive integers.
 * @param label - Used in the error message, e.g. "Canvas" or "Resize target".
 */
export function assertDimensions(width: number, height: number, label = 'Image'): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidDimensionError(
      `${label} dimensions must be positive integers, got ${width}x${height}`,
    );
  }
}

/**
 * Creates a new image filled with one value.
 *
 * @param width  - Width in pixels.
 * @param height - Height in pixels.
 * @param fill   - Initial sample value. Defaults to white.
 */
export function createGrayImage(width: number, height: number, fill: Gray = 255): GrayImage {
  assertDimensions(width, height);
  const data = new Uint8Array(width * height);
  data.fill(fill);
  return { width, height, data };
}

/** Wraps existing samples, checking the length against the shape. */
export function grayImageFrom(width: number, height: number, data: ArrayLike<number>): GrayImage {
  const image = { width, height, data: Uint8Array.from(data) };
  assertGrayImage(image);
  return image;
}

/** Deep copy. */
export function cloneGrayImage(image: GrayImage): GrayImage {
  return { width: image.width, height: image.height, data: new Uint8Array(image.data) };
}

/**
 * Throws {@link InvalidInputError} for an empty grid or one whose data does
 * not match its declared shape.
 *
 * @param operation - Name of the caller, included in the message.
 */
export function assertGrayImage(image: GrayImage, operation = 'image'): void {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidInputError(`${operation}: expected a non-empty 2D grid, got ${width}x${height}`);
  }
  if (data.length !== width * height) {
    throw new InvalidInputError(
      `${operation}: data length (${data.length}) does not match ${width}x${height}`,
    );
  }
}

/** True when every sample is 0 or 255. */
export function isBinary(image: GrayImage): boolean {
  const { data } = image;
  for (let i = 0; i < data.length; i++) {
    if (data[i] !== 0 && data[i] !== 255) return false;
  }
  return true;
}

/** Reads one sample. Out-of-bounds reads return undefined. */
export function getPixel(image: GrayImage, x: number, y: number): Gray | undefined {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return undefined;
  return image.data[y * image.width + x];
}

/** Writes one sample. Out-of-bounds writes are dropped. */
export function setPixel(image: GrayImage, x: number, y: number, value: Gray): void {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return;
  image.data[y * image.width + x] = value;
}

/** Clamp a value between 0 and 255 and round it to an integer sample. */
export function clamp255(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.round(v);
}
