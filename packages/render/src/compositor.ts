/**
 * @module compositor
 * Monochrome layer compositor.
 *
 * Paints a Composition's layers, back to front, onto one grayscale canvas
 * owned by the render call, then runs the optional whole-canvas dither and
 * transforms.
 *
 * Key design decisions:
 * - An image layer's footprint is the canvas area from (x, y) to the
 *   bottom-right corner. The layer's declared width/height do not affect it.
 * - Layer geometry is applied before resizing: flipH, then flipV, then
 *   counter-clockwise rotation.
 * - Invisible layers are skipped before their source is loaded.
 *
 * @see {@link @eink-composer/types!RenderOptions}
 */

import type {
  CanvasTransform,
  Composition,
  GrayImage,
  ImageLayer,
  Layer,
  RectangleLayer,
  RenderOptions,
  TextLayer,
} from '@eink-composer/types';
import {
  FileImageLoader,
  InvalidInputError,
  adjustBrightnessContrast,
  assertDimensions,
  createGrayImage,
  dither,
  flipHorizontal,
  flipVertical,
  invert,
  renderText,
  resizeImage,
  rotate90CCW,
  rotateBy,
  type ImageLoader,
} from '@eink-composer/core';

/** Defaults for every render call. */
export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  backgroundColor: 255,
  finalDither: 'none',
  transforms: [],
};

const FINAL_DITHERS: ReadonlySet<string> = new Set(['none', 'floyd-steinberg', 'threshold']);
const CANVAS_TRANSFORMS: ReadonlySet<string> = new Set(['flip-h', 'flip-v', 'rotate-90', 'invert']);

/**
 * Merge caller options over {@link DEFAULT_RENDER_OPTIONS} and validate them.
 *
 * @throws {InvalidInputError} For a background outside 0–255, or an unknown
 *   dither or transform name.
 */
export function resolveRenderOptions(options?: Partial<RenderOptions>): RenderOptions {
  const resolved: RenderOptions = {
    backgroundColor: options?.backgroundColor ?? DEFAULT_RENDER_OPTIONS.backgroundColor,
    finalDither: options?.finalDither ?? DEFAULT_RENDER_OPTIONS.finalDither,
    transforms: [...(options?.transforms ?? DEFAULT_RENDER_OPTIONS.transforms)],
  };

  const bg = resolved.backgroundColor;
  if (!Number.isInteger(bg) || bg < 0 || bg > 255) {
    throw new InvalidInputError(`backgroundColor must be an integer in 0-255, got ${bg}`);
  }
  if (!FINAL_DITHERS.has(resolved.finalDither)) {
    throw new InvalidInputError(`Unknown finalDither "${resolved.finalDither}"`);
  }
  for (const transform of resolved.transforms) {
    if (!CANVAS_TRANSFORMS.has(transform)) {
      throw new InvalidInputError(`Unknown transform "${transform}"`);
    }
  }
  return resolved;
}

/**
 * Render a composition to a new grayscale grid.
 *
 * The layer list is read, never modified. Rendering twice without changes
 * in between gives byte-identical output, unless a file source changed on
 * disk.
 *
 * @param composition - Canvas size and layers.
 * @param options     - Background, final dither and transforms.
 * @param loader      - Resolves image sources. Defaults to {@link FileImageLoader}.
 * @returns The rendered grid. Width and height swap for an odd number of
 *   `rotate-90` transforms.
 * @throws {InvalidDimensionError} When the canvas size is not positive.
 * @throws {LoadError} When an image source cannot be read or decoded.
 */
export function renderComposition(
  composition: Composition,
  options?: Partial<RenderOptions>,
  loader: ImageLoader = new FileImageLoader(),
): GrayImage {
  assertDimensions(composition.width, composition.height, 'Canvas');
  const { backgroundColor, finalDither, transforms } = resolveRenderOptions(options);

  const canvas = createGrayImage(composition.width, composition.height, backgroundColor);

  for (const layer of composition.layers) {
    if (!layer.visible) continue;
    paintLayer(canvas, layer, loader);
  }

  let result = finalDither === 'none' ? canvas : dither(canvas, finalDither);
  for (const transform of transforms) {
    result = applyCanvasTransform(result, transform);
  }
  return result;
}

/**
 * Paint one layer onto the canvas in place, ignoring its visibility flag.
 */
export function paintLayer(canvas: GrayImage, layer: Layer, loader: ImageLoader): void {
  switch (layer.type) {
    case 'image':
      paintImageLayer(canvas, layer, loader);
      return;
    case 'text':
      paintTextLayer(canvas, layer);
      return;
    case 'rectangle':
      paintRectangleLayer(canvas, layer);
      return;
    default:
      assertNever(layer);
  }
}

function paintImageLayer(canvas: GrayImage, layer: ImageLayer, loader: ImageLoader): void {
  const footprintWidth = canvas.width - layer.x;
  const footprintHeight = canvas.height - layer.y;
  if (footprintWidth <= 0 || footprintHeight <= 0) return;

  let image = loader.load(layer.source);
  if (layer.flipH) image = flipHorizontal(image);
  if (layer.flipV) image = flipVertical(image);
  if (layer.rotate !== 0) image = rotateBy(image, layer.rotate);

  if (image.width !== footprintWidth || image.height !== footprintHeight) {
    image = resizeImage(
      image,
      footprintWidth,
      footprintHeight,
      layer.resizeMode,
      layer.cropX,
      layer.cropY,
    );
  }
  if (layer.brightness !== 1 || layer.contrast !== 0) {
    image = adjustBrightnessContrast(image, layer.brightness, layer.contrast);
  }
  if (layer.ditherMode !== 'none') {
    image = dither(image, layer.ditherMode);
  }

  blit(canvas, image, layer.x, layer.y);
}

function paintTextLayer(canvas: GrayImage, layer: TextLayer): void {
  if (layer.text.length === 0) return;
  renderText(canvas, layer.text, layer.x, layer.y, layer.color);
}

function paintRectangleLayer(canvas: GrayImage, layer: RectangleLayer): void {
  const x1 = Math.max(0, layer.x);
  const y1 = Math.max(0, layer.y);
  const x2 = Math.min(canvas.width, layer.x + layer.width);
  const y2 = Math.min(canvas.height, layer.y + layer.height);
  if (x1 >= x2 || y1 >= y2) return;

  const { data, width } = canvas;
  const { color } = layer;

  if (layer.filled) {
    for (let y = y1; y < y2; y++) {
      data.fill(color, y * width + x1, y * width + x2);
    }
    return;
  }

  // 1-px outline of the clipped box
  data.fill(color, y1 * width + x1, y1 * width + x2);
  data.fill(color, (y2 - 1) * width + x1, (y2 - 1) * width + x2);
  for (let y = y1; y < y2; y++) {
    data[y * width + x1] = color;
    data[y * width + x2 - 1] = color;
  }
}

/** Copy `image` onto `canvas` at (x, y), clipping on all four sides. */
function blit(canvas: GrayImage, image: GrayImage, x: number, y: number): void {
  const left = Math.max(0, x);
  const top = Math.max(0, y);
  const right = Math.min(canvas.width, x + image.width);
  const bottom = Math.min(canvas.height, y + image.height);
  if (left >= right || top >= bottom) return;

  for (let cy = top; cy < bottom; cy++) {
    const srcStart = (cy - y) * image.width + (left - x);
    canvas.data.set(
      image.data.subarray(srcStart, srcStart + (right - left)),
      cy * canvas.width + left,
    );
  }
}

function applyCanvasTransform(image: GrayImage, transform: CanvasTransform): GrayImage {
  switch (transform) {
    case 'flip-h':
      return flipHorizontal(image);
    case 'flip-v':
      return flipVertical(image);
    case 'rotate-90':
      return rotate90CCW(image);
    case 'invert':
      return invert(image);
  }
}

function assertNever(value: never): never {
  throw new InvalidInputError(`Unknown layer: ${JSON.stringify(value)}`);
}
