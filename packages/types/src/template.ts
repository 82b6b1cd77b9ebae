/**
 * @module template
 * Serialization format for saved compositions.
 *
 * A template archive is a ZIP file containing:
 * - `template.json`: canvas size and the layer list
 * - `images/<index>.png`: grayscale PNG for each image layer held in memory
 */

import type { ImageLayer, RectangleLayer, TextLayer } from './layer';

/** Current template format version. */
export type TemplateVersion = 1;

/** Where a saved image layer finds its pixels. */
export type TemplateImageSource =
  | { kind: 'file'; path: string }
  /** A PNG inside the archive, by entry name. */
  | { kind: 'embedded'; file: string };

/** An image layer as written to `template.json`. */
export interface TemplateImageLayer extends Omit<ImageLayer, 'source'> {
  source: TemplateImageSource;
}

/** One layer entry in `template.json`. */
export type TemplateLayer = TemplateImageLayer | TextLayer | RectangleLayer;

/** Contents of `template.json`. */
export interface CompositionTemplate {
  version: TemplateVersion;
  width: number;
  height: number;
  layers: TemplateLayer[];
}

/** In-memory form of a template archive before zipping. */
export interface TemplateBundle {
  template: CompositionTemplate;
  /** Archive entries other than `template.json`, keyed by entry name. */
  files: Map<string, Uint8Array>;
}
