/**
 * @eink-composer/types
 *
 * Shared type definitions for the e-paper composer.
 * This package contains no runtime code, only TypeScript interfaces
 * and types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Gray, InkColor, Size } from './common';

// Pixel grid
export type { GrayImage } from './image';

// Layer types
export type {
  BaseLayer,
  BaseLayerPatch,
  DitherMode,
  FileSource,
  ImageLayer,
  ImageLayerPatch,
  ImageSource,
  Layer,
  LayerPatch,
  LayerPatchMap,
  LayerResult,
  LayerRotation,
  LayerType,
  PixelSource,
  RectangleLayer,
  RectangleLayerPatch,
  ResizeMode,
  TextLayer,
  TextLayerPatch,
} from './layer';

// Composition & rendering
export type {
  CanvasTransform,
  Composition,
  FinalDither,
  LayerInfo,
  RenderOptions,
} from './composition';

// Command (undo/redo)
export type { Command, CommandHistory } from './command';

// Events
export type { EventBus, EventCallback, EventMap } from './events';

// Templates
export type {
  CompositionTemplate,
  TemplateBundle,
  TemplateImageLayer,
  TemplateImageSource,
  TemplateLayer,
  TemplateVersion,
} from './template';
