/**
 * @module composer
 * Stateful facade over a composition.
 *
 * A Composer owns one canvas-sized layer list together with its undo
 * history and event bus. Every mutation runs as a Command, so it can be
 * undone, and publishes an event when it is applied or reversed.
 *
 * Usage:
 * ```ts
 * const composer = new Composer({ width: 250, height: 128 });
 * composer.addRectangleLayer({ width: 250, height: 128 });
 * composer.addTextLayer('HELLO', { x: 10, y: 10, color: 255 });
 * const bytes = composer.renderBinary();
 * ```
 */

import type {
  Command,
  Composition,
  GrayImage,
  ImageSource,
  Layer,
  LayerInfo,
  LayerPatch,
  LayerPatchMap,
  LayerResult,
  RenderOptions,
} from '@eink-composer/types';
import {
  AddLayerCommand,
  ClearLayersCommand,
  CommandHistoryImpl,
  DEFAULT_HISTORY_DEPTH,
  EventBusImpl,
  FileImageLoader,
  InvalidInputError,
  RemoveLayerCommand,
  ReorderLayerCommand,
  UpdateLayerCommand,
  assertDimensions,
  createImageLayer,
  createRectangleLayer,
  createTextLayer,
  encodeGrayPng,
  encodeMonoBmp,
  findLayerById,
  layerInfo,
  packBits,
  packTemplate,
  unpackTemplate,
  validatePatch,
  type CreateImageLayerOptions,
  type CreateRectangleLayerOptions,
  type CreateTextLayerOptions,
  type ImageLoader,
  type PackBitsOptions,
} from '@eink-composer/core';
import { renderComposition } from './compositor';

/** Default canvas width, matching a 2.13" e-paper panel in landscape. */
export const DEFAULT_CANVAS_WIDTH = 250;

/** Default canvas height. */
export const DEFAULT_CANVAS_HEIGHT = 128;

/** Environment variable that turns on render timing output. */
export const DEBUG_ENV_VAR = 'EINK_COMPOSER_DEBUG';

/** Construction options for {@link Composer}. */
export interface ComposerOptions {
  /** Canvas width in pixels (default 250). */
  width?: number;
  /** Canvas height in pixels (default 128). */
  height?: number;
  /** Maximum undo depth (default 50). */
  historyDepth?: number;
  /** Resolves image sources at render time (default {@link FileImageLoader}). */
  loader?: ImageLoader;
  /**
   * Log render timings. Defaults to true when `EINK_COMPOSER_DEBUG=1`.
   */
  debug?: boolean;
  /**
   * Sink for debug lines (default `console.debug`). A stdio server must
   * point this at stderr, since stdout carries its protocol.
   */
  log?: (message: string) => void;
}

const logToConsole = (message: string): void => {
  // eslint-disable-next-line no-console
  console.debug(message);
};

/** Shallow copy; nested image sources stay shared. */
function copyLayer(layer: Layer): Layer {
  return { ...layer };
}

/** Owns a composition and exposes id-keyed layer editing plus rendering. */
export class Composer {
  /** Canvas width in pixels. */
  readonly width: number;
  /** Canvas height in pixels. */
  readonly height: number;
  /** Layer and render notifications. */
  readonly events = new EventBusImpl();
  /** Undo/redo stack for every layer mutation. */
  readonly history: CommandHistoryImpl;

  private readonly composition: Composition;
  private readonly loader: ImageLoader;
  private readonly debug: boolean;
  private readonly log: (message: string) => void;

  /**
   * @throws {InvalidDimensionError} When width or height is not a positive integer.
   * @throws {RangeError} When historyDepth is below 1.
   */
  constructor(options: ComposerOptions = {}) {
    this.width = options.width ?? DEFAULT_CANVAS_WIDTH;
    this.height = options.height ?? DEFAULT_CANVAS_HEIGHT;
    assertDimensions(this.width, this.height, 'Canvas');

    this.history = new CommandHistoryImpl(options.historyDepth ?? DEFAULT_HISTORY_DEPTH);
    this.loader = options.loader ?? new FileImageLoader();
    this.debug = options.debug ?? process.env[DEBUG_ENV_VAR] === '1';
    this.log = options.log ?? logToConsole;
    this.composition = { width: this.width, height: this.height, layers: [] };
  }

  /**
   * Create a composer holding copies of an existing composition's layers.
   * Edits through the new composer leave the source layers alone; image
   * sources (including in-memory pixels) are shared, never written.
   * The layers are not recorded in the history.
   */
  static fromComposition(
    composition: Composition,
    options: Omit<ComposerOptions, 'width' | 'height'> = {},
  ): Composer {
    const composer = new Composer({
      ...options,
      width: composition.width,
      height: composition.height,
    });
    composer.composition.layers.push(...composition.layers.map(copyLayer));
    return composer;
  }

  /**
   * Restore a composer from a template archive produced by {@link toTemplate}.
   * @throws {InvalidInputError} When the archive is malformed.
   */
  static fromTemplate(
    bytes: Uint8Array,
    options: Omit<ComposerOptions, 'width' | 'height'> = {},
  ): Composer {
    return Composer.fromComposition(unpackTemplate(bytes), options);
  }

  // ── Queries ──────────────────────────────────────────────────────────

  /** Layers in paint order. The array is a snapshot; the layers are live. */
  get layers(): Layer[] {
    return [...this.composition.layers];
  }

  /** Snapshot of the composition: canvas size plus a copy of the layer list. */
  toComposition(): Composition {
    return { width: this.width, height: this.height, layers: this.layers };
  }

  /** The last layer carrying `id`, or null. */
  getLayer(id: string): Layer | null {
    return findLayerById(this.composition.layers, id);
  }

  /** JSON-safe summary of every layer, in paint order. */
  getLayerInfo(): LayerInfo[] {
    return this.composition.layers.map(layerInfo);
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  /** What {@link undo} would reverse, e.g. `Add text layer "title"`; null when nothing. */
  get undoLabel(): string | null {
    return this.history.undoDescription;
  }

  /** What {@link redo} would reapply; null when nothing. */
  get redoLabel(): string | null {
    return this.history.redoDescription;
  }

  // ── Layer creation ───────────────────────────────────────────────────

  /**
   * Append an image layer.
   *
   * @param source  - A file path, or an explicit source.
   * @param options - Placement and processing settings.
   * @returns The layer id.
   * @throws {InvalidInputError} When an option is out of range.
   */
  addImageLayer(source: ImageSource | string, options?: CreateImageLayerOptions): string {
    const resolved: ImageSource =
      typeof source === 'string' ? { kind: 'file', path: source } : source;
    return this.addLayer(createImageLayer(resolved, options), options);
  }

  /**
   * Append a text layer.
   * @returns The layer id.
   * @throws {InvalidInputError} When an option is out of range.
   */
  addTextLayer(text: string, options?: CreateTextLayerOptions): string {
    return this.addLayer(createTextLayer(text, options), options);
  }

  /**
   * Append a rectangle layer (default: filled black 10×10 at the origin).
   * @returns The layer id.
   * @throws {InvalidInputError} When an option is out of range.
   */
  addRectangleLayer(options?: CreateRectangleLayerOptions): string {
    return this.addLayer(createRectangleLayer(options), options);
  }

  // ── Layer editing ────────────────────────────────────────────────────

  /**
   * Apply a patch to the last layer carrying `id`.
   *
   * The patch may only name fields of the layer's own type; an unknown
   * field or an out-of-range value leaves the layer untouched.
   */
  updateLayer(id: string, patch: LayerPatch | Record<string, unknown>): LayerResult {
    const layer = this.getLayer(id);
    if (!layer) return { ok: false, reason: 'not-found' };

    const check = validatePatch(layer, patch);
    if (!check.ok) return check;

    const command = new UpdateLayerCommand(layer, patch);
    if (command.fields.length === 0) return { ok: true };

    const notify = () =>
      this.events.emit('layer:updated', { layerId: layer.id, fields: command.fields });
    this.run(command, notify, notify);
    return { ok: true };
  }

  /** Typed variant of {@link updateLayer} that also checks the layer type. */
  updateLayerOfType<K extends keyof LayerPatchMap>(
    id: string,
    type: K,
    patch: LayerPatchMap[K],
  ): LayerResult {
    const layer = this.getLayer(id);
    if (!layer) return { ok: false, reason: 'not-found' };
    if (layer.type !== type) {
      return {
        ok: false,
        reason: 'invalid-patch',
        field: 'type',
        message: `layer "${id}" is a ${layer.type} layer, not ${type}`,
      };
    }
    return this.updateLayer(id, patch);
  }

  /**
   * Flip a layer's visibility.
   * @returns false when no layer carries `id`.
   */
  toggleLayer(id: string): boolean {
    const layer = this.getLayer(id);
    if (!layer) return false;

    const command = new UpdateLayerCommand(
      layer,
      { visible: !layer.visible },
      `Toggle layer "${layer.id}"`,
    );
    const notify = () =>
      this.events.emit('layer:updated', { layerId: layer.id, fields: ['visible'] });
    this.run(command, notify, notify);
    return true;
  }

  /**
   * Remove the last layer carrying `id`.
   * @returns false when no layer carries `id`.
   */
  removeLayer(id: string): boolean {
    const layer = this.getLayer(id);
    if (!layer) return false;

    const command = new RemoveLayerCommand(this.composition, layer);
    const index = command.originalIndex;
    this.run(
      command,
      () => this.events.emit('layer:removed', { layerId: layer.id, index }),
      () => this.events.emit('layer:added', { layer, index }),
    );
    return true;
  }

  /**
   * Move the last layer carrying `id` to a new paint position.
   * Indices past either end are clamped.
   */
  moveLayer(id: string, index: number): LayerResult {
    const layer = this.getLayer(id);
    if (!layer) return { ok: false, reason: 'not-found' };
    if (!Number.isInteger(index)) {
      return {
        ok: false,
        reason: 'invalid-patch',
        field: 'index',
        message: 'index must be an integer',
      };
    }

    const to = Math.max(0, Math.min(this.composition.layers.length - 1, index));
    const command = new ReorderLayerCommand(this.composition, layer, to);
    const from = command.fromIndex;
    if (from === to) return { ok: true };

    this.run(
      command,
      () => this.events.emit('layer:reordered', { layerId: layer.id, from, to }),
      () => this.events.emit('layer:reordered', { layerId: layer.id, from: to, to: from }),
    );
    return { ok: true };
  }

  /** Drop every layer. Undo restores them in order. */
  clear(): void {
    if (this.composition.layers.length === 0) return;
    const restored = this.layers;
    this.run(
      new ClearLayersCommand(this.composition),
      () => this.events.emit('composition:cleared'),
      () => restored.forEach((layer, index) => this.events.emit('layer:added', { layer, index })),
    );
  }

  /** @returns false when there is nothing to undo. */
  undo(): boolean {
    return this.history.undo();
  }

  /** @returns false when there is nothing to redo. */
  redo(): boolean {
    return this.history.redo();
  }

  // ── Rendering ────────────────────────────────────────────────────────

  /**
   * Render the composition to a grayscale grid.
   *
   * @throws {LoadError} When an image layer's source cannot be loaded.
   * @throws {InvalidInputError} For invalid render options.
   */
  render(options?: Partial<RenderOptions>): GrayImage {
    const start = performance.now();
    const image = renderComposition(this.composition, options, this.loader);
    const durationMs = performance.now() - start;
    const layerCount = this.composition.layers.length;

    if (this.debug) {
      this.log(
        `[render] ${durationMs.toFixed(2)}ms (${this.width}x${this.height}, ${layerCount} layers)`,
      );
    }
    this.events.emit('render:completed', {
      size: { width: image.width, height: image.height },
      layerCount,
      durationMs,
    });
    return image;
  }

  /**
   * Render and pack to 1 bit per pixel. `finalDither` defaults to
   * `threshold` so the packed grid is always binary.
   */
  renderBinary(options?: Partial<RenderOptions>, packOptions?: PackBitsOptions): Uint8Array {
    const image = this.render({ ...options, finalDither: options?.finalDither ?? 'threshold' });
    return packBits(image, packOptions);
  }

  /** Render and encode as an 8-bit grayscale PNG. */
  renderPng(options?: Partial<RenderOptions>): Uint8Array {
    return encodeGrayPng(this.render(options));
  }

  /** Render and encode as a 1-bit BMP (samples above 128 are white). */
  renderBmp(options?: Partial<RenderOptions>): Uint8Array {
    return encodeMonoBmp(this.render(options));
  }

  /** Pack the composition into a template archive. */
  toTemplate(): Uint8Array {
    return packTemplate(this.composition);
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private addLayer(layer: Layer, options: object | undefined): string {
    if (options) {
      const fields = Object.fromEntries(Object.entries(options).filter(([key]) => key !== 'id'));
      const check = validatePatch(layer, fields);
      if (!check.ok && check.reason === 'invalid-patch') {
        throw new InvalidInputError(`Invalid ${layer.type} layer: ${check.message}`);
      }
    }

    const command = new AddLayerCommand(this.composition, layer);
    const index = command.index;
    this.run(
      command,
      () => this.events.emit('layer:added', { layer, index }),
      () => this.events.emit('layer:removed', { layerId: layer.id, index }),
    );
    return layer.id;
  }

  /** Execute `command` through the history, notifying after each direction. */
  private run(command: Command, afterExecute: () => void, afterUndo: () => void): void {
    this.history.execute({
      description: command.description,
      execute: () => {
        command.execute();
        afterExecute();
      },
      undo: () => {
        command.undo();
        afterUndo();
      },
    });
  }
}
