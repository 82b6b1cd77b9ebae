/**
 * @eink-composer/core
 *
 * Grid primitives, dithering, bit packing, codecs, text, and the layer
 * model with undo/redo.
 *
 * @packageDocumentation
 */

// Errors
export { ComposerError, InvalidDimensionError, InvalidInputError, LoadError } from './errors';

// Grid helpers
export {
  assertDimensions,
  assertGrayImage,
  clamp255,
  cloneGrayImage,
  createGrayImage,
  getPixel,
  grayImageFrom,
  isBinary,
  setPixel,
} from './gray-image';

// Transforms
export {
  cropImage,
  flipHorizontal,
  flipVertical,
  resizeImage,
  rotate180,
  rotate90CCW,
  rotate90CW,
  rotateBy,
  scaleNearest,
} from './transform';

// Filters
export { adjustBrightnessContrast, invert } from './filters';

// Dithering
export { THRESHOLD_LEVEL, dither, floydSteinbergDither, thresholdDither } from './dither';

// Bit packing
export { bytesPerRow, packBits, unpackBits } from './pack-bits';
export type { PackBitsOptions } from './pack-bits';

// Text
export { getDefaultFont, getGlyph, parseBitmapFont } from './font';
export type { BitmapFont, BitmapFontSource, GlyphBitmap } from './font';
export { measureText, renderText } from './text';

// Codecs
export { decodePng, encodeGrayPng, isPng } from './png-codec';
export { encodeMonoBmp } from './bmp-encoder';
export { FileImageLoader, decodeImage, decodePgm } from './image-loader';
export type { ImageLoader, ReadFileFn } from './image-loader';

// UUID generation
export { generateId } from './uuid';

// Layer factories
export { createImageLayer, createRectangleLayer, createTextLayer } from './layer-factory';
export type {
  CreateImageLayerOptions,
  CreateLayerOptions,
  CreateRectangleLayerOptions,
  CreateTextLayerOptions,
} from './layer-factory';

// Layer list operations
export {
  applyPatch,
  findLayerById,
  findLayerIndex,
  isImageSource,
  layerInfo,
  patchFields,
  snapshotFields,
  validatePatch,
} from './layer-list';

// Command history (undo/redo)
export { CommandHistoryImpl, DEFAULT_HISTORY_DEPTH } from './command-history';

// Event bus
export { EventBusImpl } from './event-bus';

// Concrete commands
export {
  AddLayerCommand,
  ClearLayersCommand,
  RemoveLayerCommand,
  ReorderLayerCommand,
  UpdateLayerCommand,
} from './commands';

// Templates
export {
  TEMPLATE_ENTRY,
  TEMPLATE_VERSION,
  compositionToTemplate,
  packTemplate,
  templateToComposition,
  unpackTemplate,
} from './template';
