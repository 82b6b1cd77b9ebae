/**
 * @module layer-factory
 * Factory functions for creating layer instances.
 * Each function produces a properly initialized layer with default values.
 */

import type {
  DitherMode,
  ImageLayer,
  Gray,
  ImageSource,
  InkColor,
  LayerRotation,
  RectangleLayer,
  ResizeMode,
  TextLayer,
} from '@eink-composer/types';
import { generateId } from './uuid';

/** Placement options shared by every factory. */
export interface CreateLayerOptions {
  /** Explicit id. A UUID is generated when omitted. */
  id?: string;
  x?: number;
  y?: number;
  visible?: boolean;
}

/** Options for creating an image layer. */
export interface CreateImageLayerOptions extends CreateLayerOptions {
  resizeMode?: ResizeMode;
  ditherMode?: DitherMode;
  brightness?: number;
  contrast?: number;
  rotate?: LayerRotation;
  flipH?: boolean;
  flipV?: boolean;
  cropX?: number | null;
  cropY?: number | null;
  width?: number | null;
  height?: number | null;
}

/**
 * Creates a new image layer.
 *
 * @param source  - In-memory pixels or a file path.
 * @param options - Optional placement and processing settings.
 * @returns An ImageLayer that fits its source and error-diffuses it by default.
 */
export function createImageLayer(
  source: ImageSource,
  options?: CreateImageLayerOptions,
): ImageLayer {
  return {
    id: options?.id ?? generateId(),
    type: 'image',
    visible: options?.visible ?? true,
    x: options?.x ?? 0,
    y: options?.y ?? 0,
    source,
    resizeMode: options?.resizeMode ?? 'fit',
    ditherMode: options?.ditherMode ?? 'floyd-steinberg',
    brightness: options?.brightness ?? 1,
    contrast: options?.contrast ?? 0,
    rotate: options?.rotate ?? 0,
    flipH: options?.flipH ?? false,
    flipV: options?.flipV ?? false,
    cropX: options?.cropX ?? null,
    cropY: options?.cropY ?? null,
    width: options?.width ?? null,
    height: options?.height ?? null,
  };
}

/** Options for creating a text layer. */
export interface CreateTextLayerOptions extends CreateLayerOptions {
  color?: InkColor;
}

/**
 * Creates a new text layer.
 *
 * @param text    - Initial text content.
 * @param options - Optional placement and ink color (default black).
 */
export function createTextLayer(text: string, options?: CreateTextLayerOptions): TextLayer {
  return {
    id: options?.id ?? generateId(),
    type: 'text',
    visible: options?.visible ?? true,
    x: options?.x ?? 0,
    y: options?.y ?? 0,
    text,
    color: options?.color ?? 0,
  };
}

/** Options for creating a rectangle layer. */
export interface CreateRectangleLayerOptions extends CreateLayerOptions {
  width?: number;
  height?: number;
  filled?: boolean;
  /** Gray level 0-255 (default 0). */
  color?: Gray;
}

/**
 * Creates a new rectangle layer. Defaults to a filled black 10×10 box.
 */
export function createRectangleLayer(options?: CreateRectangleLayerOptions): RectangleLayer {
  return {
    id: options?.id ?? generateId(),
    type: 'rectangle',
    visible: options?.visible ?? true,
    x: options?.x ?? 0,
    y: options?.y ?? 0,
    width: options?.width ?? 10,
    height: options?.height ?? 10,
    filled: options?.filled ?? true,
    color: options?.color ?? 0,
  };
}
