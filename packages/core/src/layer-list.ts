/**
 * @module layer-list
 * Pure functions for operating on a composition's flat layer list.
 *
 * Ids are not required to be unique. Every lookup walks from the top of
 * the list downward, so the last layer carrying an id wins.
 */

import type {
  ImageSource,
  Layer,
  LayerInfo,
  LayerPatch,
  LayerResult,
  LayerType,
} from '@eink-composer/types';
import { measureText } from './text';

/**
 * Index of the last layer with the given id.
 *
 * @returns The index, or -1 if not found.
 */
export function findLayerIndex(layers: readonly Layer[], id: string): number {
  for (let i = layers.length - 1; i >= 0; i--) {
    if (layers[i].id === id) return i;
  }
  return -1;
}

/**
 * Finds a layer by id.
 *
 * @returns The matching layer, or `null` if not found.
 */
export function findLayerById(layers: readonly Layer[], id: string): Layer | null {
  const index = findLayerIndex(layers, id);
  return index === -1 ? null : layers[index];
}

// ---------------------------------------------------------------------------
// Patch validation
// ---------------------------------------------------------------------------

/** Returns an error message, or null when the value is acceptable. */
type FieldCheck = (value: unknown) => string | null;

const isBoolean: FieldCheck = (v) => (typeof v === 'boolean' ? null : 'must be a boolean');
const isString: FieldCheck = (v) => (typeof v === 'string' ? null : 'must be a string');
const isInteger: FieldCheck = (v) => (Number.isInteger(v) ? null : 'must be an integer');

const isInkColor: FieldCheck = (v) => (v === 0 || v === 255 ? null : 'must be 0 or 255');

const isGray: FieldCheck = (v) =>
  typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 255
    ? null
    : 'must be an integer in 0-255';

const isNonNegativeInteger: FieldCheck = (v) =>
  typeof v === 'number' && Number.isInteger(v) && v >= 0 ? null : 'must be an integer >= 0';

const isBrightness: FieldCheck = (v) =>
  typeof v === 'number' && Number.isFinite(v) && v >= 0 ? null : 'must be a finite number >= 0';

const isFiniteNumber: FieldCheck = (v) =>
  typeof v === 'number' && Number.isFinite(v) ? null : 'must be a finite number';

const isRotation: FieldCheck = (v) =>
  v === 0 || v === 90 || v === 180 || v === 270 ? null : 'must be one of 0, 90, 180, 270';

function oneOf(...values: string[]): FieldCheck {
  return (v) =>
    typeof v === 'string' && values.includes(v) ? null : `must be one of ${values.join(', ')}`;
}

function nullable(check: FieldCheck): FieldCheck {
  return (v) => (v === null ? null : check(v));
}

const isPositiveInteger: FieldCheck = (v) =>
  typeof v === 'number' && Number.isInteger(v) && v > 0 ? null : 'must be a positive integer';

/** Type guard for an {@link ImageSource} received from untyped callers. */
export function isImageSource(value: unknown): value is ImageSource {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (value.kind === 'file') {
    return 'path' in value && typeof value.path === 'string' && value.path.length > 0;
  }
  if (value.kind === 'pixels' && 'image' in value) {
    const image = value.image;
    return (
      typeof image === 'object' &&
      image !== null &&
      'width' in image &&
      'height' in image &&
      'data' in image &&
      image.data instanceof Uint8Array
    );
  }
  return false;
}

const isSource: FieldCheck = (v) =>
  isImageSource(v) ? null : 'must be { kind: "pixels", image } or { kind: "file", path }';

const BASE_FIELDS: Record<string, FieldCheck> = {
  visible: isBoolean,
  x: isInteger,
  y: isInteger,
};

/** Fields each layer type accepts in a patch, with their value checks. */
const PATCH_FIELDS: Record<LayerType, Record<string, FieldCheck>> = {
  image: {
    ...BASE_FIELDS,
    source: isSource,
    resizeMode: oneOf('stretch', 'fit', 'crop'),
    ditherMode: oneOf('floyd-steinberg', 'threshold', 'none'),
    brightness: isBrightness,
    contrast: isFiniteNumber,
    rotate: isRotation,
    flipH: isBoolean,
    flipV: isBoolean,
    cropX: nullable(isFiniteNumber),
    cropY: nullable(isFiniteNumber),
    width: nullable(isPositiveInteger),
    height: nullable(isPositiveInteger),
  },
  text: {
    ...BASE_FIELDS,
    text: isString,
    color: isInkColor,
  },
  rectangle: {
    ...BASE_FIELDS,
    width: isNonNegativeInteger,
    height: isNonNegativeInteger,
    filled: isBoolean,
    color: isGray,
  },
};

/**
 * Checks a patch against the fields the target layer's type supports.
 *
 * Fields set to `undefined` are ignored. The first field that is unknown for
 * the type, or whose value is out of range, is reported.
 *
 * @param layer - The layer the patch would be applied to.
 * @param patch - Candidate changes, possibly from an untyped caller.
 */
export function validatePatch(layer: Layer, patch: LayerPatch | object): LayerResult {
  const allowed = PATCH_FIELDS[layer.type];
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const check = Object.prototype.hasOwnProperty.call(allowed, field) ? allowed[field] : undefined;
    if (!check) {
      return {
        ok: false,
        reason: 'invalid-patch',
        field,
        message: `${layer.type} layers have no field "${field}"`,
      };
    }
    const message = check(value);
    if (message !== null) {
      return { ok: false, reason: 'invalid-patch', field, message: `${field} ${message}` };
    }
  }
  return { ok: true };
}

/** Names of the fields a patch actually sets. */
export function patchFields(patch: LayerPatch | object): string[] {
  return Object.entries(patch)
    .filter(([, value]) => value !== undefined)
    .map(([field]) => field);
}

/**
 * Copies the current values of `fields` off a layer or patch, for
 * restoring later with {@link applyPatch}.
 */
export function snapshotFields(
  source: object,
  fields: readonly string[],
): Record<string, unknown> {
  const current = new Map<string, unknown>(Object.entries(source));
  const snapshot: Record<string, unknown> = {};
  for (const field of fields) {
    snapshot[field] = current.get(field);
  }
  return snapshot;
}

/**
 * Writes the defined fields of a validated patch onto the layer in place.
 */
export function applyPatch(layer: Layer, patch: LayerPatch | Record<string, unknown>): void {
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    Object.assign(layer, { [field]: value });
  }
}

// ---------------------------------------------------------------------------
// Layer info
// ---------------------------------------------------------------------------

/**
 * JSON-safe summary of a layer. In-memory image pixels are reported by
 * their size only.
 */
export function layerInfo(layer: Layer): LayerInfo {
  const base = {
    id: layer.id,
    type: layer.type,
    visible: layer.visible,
    x: layer.x,
    y: layer.y,
  };

  switch (layer.type) {
    case 'image': {
      const { source } = layer;
      return {
        ...base,
        details: {
          source:
            source.kind === 'file'
              ? source.path
              : `<pixels ${source.image.width}x${source.image.height}>`,
          resizeMode: layer.resizeMode,
          ditherMode: layer.ditherMode,
          brightness: layer.brightness,
          contrast: layer.contrast,
          rotate: layer.rotate,
          flipH: layer.flipH,
          flipV: layer.flipV,
          cropX: layer.cropX,
          cropY: layer.cropY,
          width: layer.width,
          height: layer.height,
        },
      };
    }
    case 'text': {
      const size = measureText(layer.text);
      return {
        ...base,
        details: { text: layer.text, color: layer.color, width: size.width, height: size.height },
      };
    }
    case 'rectangle':
      return {
        ...base,
        details: {
          width: layer.width,
          height: layer.height,
          filled: layer.filled,
          color: layer.color,
        },
      };
  }
}
