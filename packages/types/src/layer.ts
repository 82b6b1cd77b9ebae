/**
 * @module layer
 * Layer type definitions for the composition model.
 * Layers form a flat, ordered list; index 0 is painted first (backmost).
 */

import type { Gray, InkColor } from './common';
import type { GrayImage } from './image';

/** Discriminator for layer types. */
export type LayerType = 'image' | 'text' | 'rectangle';

/** Properties shared by all layer types. */
export interface BaseLayer {
  /** Identifier. Uniqueness is not enforced; lookups take the last match. */
  id: string;
  /** Layer type discriminator. */
  type: LayerType;
  /** Whether the layer is painted. */
  visible: boolean;
  /** Left edge on the canvas. May be negative or past the right edge. */
  x: number;
  /** Top edge on the canvas. May be negative or past the bottom edge. */
  y: number;
}

/** How a source image is fitted into the layer footprint. */
export type ResizeMode = 'stretch' | 'fit' | 'crop';

/** Grayscale-to-binary reduction applied to a layer or the whole canvas. */
export type DitherMode = 'floyd-steinberg' | 'threshold' | 'none';

/** Quarter-turn rotations an image layer accepts. */
export type LayerRotation = 0 | 90 | 180 | 270;

/** Pixels held in memory. */
export interface PixelSource {
  kind: 'pixels';
  image: GrayImage;
}

/** Pixels read from disk at render time. */
export interface FileSource {
  kind: 'file';
  path: string;
}

/** Where an image layer gets its pixels. */
export type ImageSource = PixelSource | FileSource;

/** A bitmap layer resized into the canvas area below and right of its origin. */
export interface ImageLayer extends BaseLayer {
  type: 'image';
  source: ImageSource;
  resizeMode: ResizeMode;
  ditherMode: DitherMode;
  /** Multiplier applied to every sample (1 = unchanged). */
  brightness: number;
  /** Additive offset in 0-1 units, scaled by 255 (0 = unchanged). */
  contrast: number;
  /** Counter-clockwise rotation in degrees. */
  rotate: LayerRotation;
  flipH: boolean;
  flipV: boolean;
  /** Crop window origin in scaled-image coordinates. Null centers the window. */
  cropX: number | null;
  cropY: number | null;
  /**
   * Declared size, used for placeholder sizing and templates only.
   * The render footprint is always the canvas size minus the layer position.
   */
  width: number | null;
  height: number | null;
}

/** A line of bitmap-font text. */
export interface TextLayer extends BaseLayer {
  type: 'text';
  /** The text content. Empty text paints nothing. */
  text: string;
  /** Ink color for glyph pixels. Background pixels are left untouched. */
  color: InkColor;
}

/** An axis-aligned box, filled or outlined. */
export interface RectangleLayer extends BaseLayer {
  type: 'rectangle';
  width: number;
  height: number;
  filled: boolean;
  /** Any gray level; intermediate values are left for the final dither. */
  color: Gray;
}

/** Union type for all layer types. */
export type Layer = ImageLayer | TextLayer | RectangleLayer;

/** Fields every patch may carry. */
export interface BaseLayerPatch {
  visible?: boolean;
  x?: number;
  y?: number;
}

/** Editable fields of an image layer. */
export interface ImageLayerPatch extends BaseLayerPatch {
  source?: ImageSource;
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

/** Editable fields of a text layer. */
export interface TextLayerPatch extends BaseLayerPatch {
  text?: string;
  color?: InkColor;
}

/** Editable fields of a rectangle layer. */
export interface RectangleLayerPatch extends BaseLayerPatch {
  width?: number;
  height?: number;
  filled?: boolean;
  color?: Gray;
}

/** Maps each layer type to the patch shape it accepts. */
export interface LayerPatchMap {
  image: ImageLayerPatch;
  text: TextLayerPatch;
  rectangle: RectangleLayerPatch;
}

/** Any patch. Narrowed against the target layer before it is applied. */
export type LayerPatch = ImageLayerPatch | TextLayerPatch | RectangleLayerPatch;

/** Outcome of an id-keyed layer operation. Missing ids are not errors. */
export type LayerResult =
  | { ok: true }
  | { ok: false; reason: 'not-found' }
  | { ok: false; reason: 'invalid-patch'; field: string; message: string };
