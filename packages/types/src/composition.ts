/**
 * @module composition
 * Composition and render option types.
 * A Composition is the top-level container: canvas size plus ordered layers.
 */

import type { Gray } from './common';
import type { Layer } from './layer';

/** An ordered layer list over a fixed canvas. */
export interface Composition {
  /** Canvas width in pixels. */
  width: number;
  /** Canvas height in pixels. */
  height: number;
  /** Layers in paint order (first = back, last = front). */
  layers: Layer[];
}

/** Whole-canvas dither pass run after all layers are painted. */
export type FinalDither = 'floyd-steinberg' | 'threshold' | 'none';

/** Whole-canvas transforms, applied in the order given. */
export type CanvasTransform = 'flip-h' | 'flip-v' | 'rotate-90' | 'invert';

/** Options for a single render call. */
export interface RenderOptions {
  /** Value the canvas is cleared to before the first layer. */
  backgroundColor: Gray;
  /** Optional dither over the composited canvas. */
  finalDither: FinalDither;
  /** Transforms applied after the final dither, each feeding the next. */
  transforms: CanvasTransform[];
}

/** JSON-safe description of one layer, as returned by layer listings. */
export interface LayerInfo {
  id: string;
  type: Layer['type'];
  visible: boolean;
  x: number;
  y: number;
  /** Type-specific fields (text, color, resizeMode, ...). */
  details: Record<string, string | number | boolean | null>;
}
