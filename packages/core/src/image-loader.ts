/**
 * @module image-loader
 * Resolves an image layer's source into pixels.
 *
 * File sources are read synchronously and decoded as PNG or binary PGM (P5).
 * Every failure on that path surfaces as a {@link LoadError}; the loader
 * never retries.
 */

import * as fs from 'fs';
import type { GrayImage, ImageSource } from '@eink-composer/types';
import { InvalidInputError, LoadError } from './errors';
import { assertGrayImage } from './gray-image';
import { decodePng, isPng } from './png-codec';

/** Turns an image source into a grayscale grid. */
export interface ImageLoader {
  /**
   * @throws {LoadError} When a file source cannot be read or decoded.
   * @throws {InvalidInputError} When in-memory pixels are malformed.
   */
  load(source: ImageSource): GrayImage;
}

/** Synchronous byte reader; defaults to `fs.readFileSync`. */
export type ReadFileFn = (path: string) => Uint8Array;

/** Default loader: in-memory pixels pass through, paths are read from disk. */
export class FileImageLoader implements ImageLoader {
  private readonly readFile: ReadFileFn;

  constructor(readFile?: ReadFileFn) {
    this.readFile = readFile ?? ((path) => fs.readFileSync(path));
  }

  load(source: ImageSource): GrayImage {
    if (source.kind === 'pixels') {
      assertGrayImage(source.image, 'image layer source');
      return source.image;
    }

    try {
      return decodeImage(this.readFile(source.path));
    } catch (err) {
      throw new LoadError(source.path, err);
    }
  }
}

/**
 * Decode PNG or binary PGM bytes into a grayscale grid.
 * @throws {InvalidInputError} When the format is not recognised.
 */
export function decodeImage(bytes: Uint8Array): GrayImage {
  if (isPng(bytes)) return decodePng(bytes);
  if (bytes[0] === 0x50 && bytes[1] === 0x35) return decodePgm(bytes); // "P5"
  throw new InvalidInputError('Unrecognised image format (expected PNG or binary PGM)');
}

/** Parse a binary (P5) PGM with maxval ≤ 255. */
export function decodePgm(bytes: Uint8Array): GrayImage {
  const fields: number[] = [];
  let pos = 2;

  while (fields.length < 3) {
    // Skip whitespace and comments
    while (pos < bytes.length) {
      const ch = bytes[pos];
      if (ch === 0x23) {
        while (pos < bytes.length && bytes[pos] !== 0x0a) pos++;
      } else if (ch === 0x20 || ch === 0x09 || ch === 0x0a || ch === 0x0d) {
        pos++;
      } else {
        break;
      }
    }
    let value = 0;
    const start = pos;
    while (pos < bytes.length && bytes[pos] >= 0x30 && bytes[pos] <= 0x39) {
      value = value * 10 + (bytes[pos] - 0x30);
      pos++;
    }
    if (pos === start) {
      throw new InvalidInputError('Malformed PGM header');
    }
    fields.push(value);
  }
  pos++; // single whitespace before the raster

  const [width, height, maxVal] = fields;
  if (maxVal === 0 || maxVal > 255) {
    throw new InvalidInputError(`Unsupported PGM maxval ${maxVal}`);
  }
  const data = bytes.slice(pos, pos + width * height);
  const image = { width, height, data };
  assertGrayImage(image, 'decodePgm');
  if (maxVal !== 255) {
    for (let i = 0; i < data.length; i++) {
      data[i] = Math.round((data[i] * 255) / maxVal);
    }
  }
  return image;
}
