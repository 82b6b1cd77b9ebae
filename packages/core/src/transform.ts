/**
 * @module transform
 * Geometric transforms on grayscale grids: resize, quarter-turn rotation,
 * flip and crop.
 * All functions create a new GrayImage and do NOT modify input.
 */

import type { GrayImage, ResizeMode } from '@eink-composer/types';
import { InvalidInputError } from './errors';
import { assertDimensions, assertGrayImage } from './gray-image';

/**
 * Nearest-neighbor resample to an exact size. Aspect ratio is not preserved.
 * Each destination pixel samples the source pixel under its center.
 *
 * @param image     - Source image.
 * @param newWidth  - Target width.
 * @param newHeight - Target height.
 */
export function scaleNearest(image: GrayImage, newWidth: number, newHeight: number): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(newWidth * newHeight);
  const sx = width / newWidth;
  const sy = height / newHeight;

  const srcCols = new Int32Array(newWidth);
  for (let x = 0; x < newWidth; x++) {
    srcCols[x] = Math.min(width - 1, Math.floor((x + 0.5) * sx));
  }

  for (let y = 0; y < newHeight; y++) {
    const srcRow = Math.min(height - 1, Math.floor((y + 0.5) * sy)) * width;
    const dstRow = y * newWidth;
    for (let x = 0; x < newWidth; x++) {
      dst[dstRow + x] = src[srcRow + srcCols[x]];
    }
  }
  return { width: newWidth, height: newHeight, data: dst };
}

/**
 * Resize an image into a target box using one of three policies.
 *
 * - `stretch`: fill the box exactly, ignoring aspect ratio.
 * - `fit`: scale to fit inside the box, centered on white.
 * - `crop`: scale to cover the box, then cut a window out of the result.
 *   The window origin is (`cropX`, `cropY`) in scaled coordinates, clamped
 *   so the window stays inside the scaled image. Null centers that axis.
 *
 * @throws {InvalidDimensionError} When the target size is not positive.
 */
export function resizeImage(
  image: GrayImage,
  targetWidth: number,
  targetHeight: number,
  mode: ResizeMode,
  cropX: number | null = null,
  cropY: number | null = null,
): GrayImage {
  assertDimensions(targetWidth, targetHeight, 'Resize target');
  assertGrayImage(image, 'resizeImage');
  const { width, height } = image;

  switch (mode) {
    case 'stretch':
      return scaleNearest(image, targetWidth, targetHeight);

    case 'fit': {
      const scale = Math.min(targetWidth / width, targetHeight / height);
      const scaledW = Math.max(1, Math.min(targetWidth, Math.round(width * scale)));
      const scaledH = Math.max(1, Math.min(targetHeight, Math.round(height * scale)));
      const scaled = scaleNearest(image, scaledW, scaledH);
      const offsetX = Math.floor((targetWidth - scaledW) / 2);
      const offsetY = Math.floor((targetHeight - scaledH) / 2);
      return pasteOnto(scaled, targetWidth, targetHeight, offsetX, offsetY, 255);
    }

    case 'crop': {
      const scale = Math.max(targetWidth / width, targetHeight / height);
      const scaledW = Math.max(targetWidth, Math.round(width * scale));
      const scaledH = Math.max(targetHeight, Math.round(height * scale));
      const scaled = scaleNearest(image, scaledW, scaledH);
      const left = cropOrigin(cropX, scaledW - targetWidth);
      const top = cropOrigin(cropY, scaledH - targetHeight);
      return cropImage(scaled, left, top, targetWidth, targetHeight);
    }
  }
}

/** Clamp a requested crop origin into [0, slack], or center it. */
function cropOrigin(requested: number | null, slack: number): number {
  if (requested === null) return Math.floor(slack / 2);
  return Math.max(0, Math.min(slack, Math.round(requested)));
}

/** Place `image` at (offsetX, offsetY) on a new filled canvas. */
function pasteOnto(
  image: GrayImage,
  canvasWidth: number,
  canvasHeight: number,
  offsetX: number,
  offsetY: number,
  fill: number,
): GrayImage {
  const dst = new Uint8Array(canvasWidth * canvasHeight);
  dst.fill(fill);
  for (let y = 0; y < image.height; y++) {
    const srcRow = y * image.width;
    dst.set(image.data.subarray(srcRow, srcRow + image.width), (y + offsetY) * canvasWidth + offsetX);
  }
  return { width: canvasWidth, height: canvasHeight, data: dst };
}

/**
 * Flip image horizontally (left-right).
 * @param image - Source image.
 * @returns Flipped image.
 */
export function flipHorizontal(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      dst[row + (width - 1 - x)] = src[row + x];
    }
  }
  return { width, height, data: dst };
}

/**
 * Flip image vertically (top-bottom).
 * @param image - Source image.
 * @returns Flipped image.
 */
export function flipVertical(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let y = 0; y < height; y++) {
    const srcRow = y * width;
    dst.set(src.subarray(srcRow, srcRow + width), (height - 1 - y) * width);
  }
  return { width, height, data: dst };
}

/**
 * Rotate image 90 degrees counter-clockwise.
 * The top-right corner becomes the top-left corner.
 * @param image - Source image.
 * @returns Rotated image (width/height swapped).
 */
export function rotate90CCW(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      dst[(width - 1 - x) * height + y] = src[y * width + x];
    }
  }
  return { width: height, height: width, data: dst };
}

/**
 * Rotate image 90 degrees clockwise.
 * @param image - Source image.
 * @returns Rotated image (width/height swapped).
 */
export function rotate90CW(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      dst[x * height + (height - 1 - y)] = src[y * width + x];
    }
  }
  return { width: height, height: width, data: dst };
}

/**
 * Rotate image 180 degrees.
 * @param image - Source image.
 * @returns Rotated image.
 */
export function rotate180(image: GrayImage): GrayImage {
  const { width, height, data: src } = image;
  const dst = new Uint8Array(src.length);
  const total = width * height;
  for (let i = 0; i < total; i++) {
    dst[total - 1 - i] = src[i];
  }
  return { width, height, data: dst };
}

/**
 * Rotate counter-clockwise by a multiple of 90 degrees.
 * Angles are normalised modulo 360, so -90 equals 270.
 *
 * @throws {InvalidInputError} When `degrees` is not a multiple of 90.
 */
export function rotateBy(image: GrayImage, degrees: number): GrayImage {
  if (!Number.isInteger(degrees) || degrees % 90 !== 0) {
    throw new InvalidInputError(`Rotation must be a multiple of 90 degrees, got ${degrees}`);
  }
  const turns = (((degrees % 360) + 360) % 360) / 90;
  let result = image;
  for (let i = 0; i < turns; i++) {
    result = rotate90CCW(result);
  }
  return turns === 0 ? { ...image, data: new Uint8Array(image.data) } : result;
}

/**
 * Crop image to a rectangular region.
 * Parts of the window outside the source are white.
 * @param image - Source image.
 * @param x - Left edge.
 * @param y - Top edge.
 * @param cropWidth - Crop width.
 * @param cropHeight - Crop height.
 * @returns Cropped image.
 */
export function cropImage(
  image: GrayImage,
  x: number,
  y: number,
  cropWidth: number,
  cropHeight: number,
): GrayImage {
  assertDimensions(cropWidth, cropHeight, 'Crop');
  const { width, height, data: src } = image;
  const dst = new Uint8Array(cropWidth * cropHeight);
  dst.fill(255);

  const srcStartX = Math.max(0, x);
  const srcEndX = Math.min(width, x + cropWidth);
  const rowCopyWidth = srcEndX - srcStartX;
  if (rowCopyWidth <= 0) return { width: cropWidth, height: cropHeight, data: dst };

  for (let dy = 0; dy < cropHeight; dy++) {
    const srcY = y + dy;
    if (srcY < 0 || srcY >= height) continue;
    const srcRow = srcY * width + srcStartX;
    dst.set(src.subarray(srcRow, srcRow + rowCopyWidth), dy * cropWidth + (srcStartX - x));
  }
  return { width: cropWidth, height: cropHeight, data: dst };
}
