/**
 * @module template
 * Saves and restores compositions as template archives.
 *
 * `compositionToTemplate` / `templateToComposition` convert between the
 * runtime model and a {@link TemplateBundle}; `packTemplate` /
 * `unpackTemplate` add the ZIP layer on top.
 *
 * Dependencies:
 * - fflate: ZIP compression/decompression (sync API)
 * - png-codec: grayscale PNG for in-memory image layers
 */

import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import type {
  Composition,
  ImageSource,
  Layer,
  TemplateBundle,
  TemplateImageSource,
  TemplateLayer,
} from '@eink-composer/types';
import { InvalidInputError } from './errors';
import { createImageLayer, createRectangleLayer, createTextLayer } from './layer-factory';
import { validatePatch } from './layer-list';
import { decodePng, encodeGrayPng } from './png-codec';

/** Archive entry holding the template JSON. */
export const TEMPLATE_ENTRY = 'template.json';

/** Format version written by this module. */
export const TEMPLATE_VERSION = 1;

/**
 * Converts a composition into its template form.
 * In-memory image sources become PNG entries named after the layer index.
 */
export function compositionToTemplate(composition: Composition): TemplateBundle {
  const files = new Map<string, Uint8Array>();

  const layers = composition.layers.map((layer, index): TemplateLayer => {
    if (layer.type !== 'image') return { ...layer };

    const { source, ...rest } = layer;
    let templateSource: TemplateImageSource;
    if (source.kind === 'file') {
      templateSource = { kind: 'file', path: source.path };
    } else {
      const file = `images/${index}.png`;
      files.set(file, encodeGrayPng(source.image));
      templateSource = { kind: 'embedded', file };
    }
    return { ...rest, source: templateSource };
  });

  return {
    template: {
      version: TEMPLATE_VERSION,
      width: composition.width,
      height: composition.height,
      layers,
    },
    files,
  };
}

/**
 * Rebuilds a composition from a template bundle.
 *
 * Missing layer fields take the factory defaults; every present field is
 * checked the same way `updateLayer` checks a patch.
 *
 * @throws {InvalidInputError} Naming the offending field when the template is malformed.
 */
export function templateToComposition(bundle: {
  template: unknown;
  files: ReadonlyMap<string, Uint8Array>;
}): Composition {
  const { template, files } = bundle;
  if (!isRecord(template)) {
    throw new InvalidInputError('Invalid template: expected an object');
  }
  if (template.version !== TEMPLATE_VERSION) {
    throw new InvalidInputError(`Invalid template: unsupported version ${String(template.version)}`);
  }
  const { width, height } = template;
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new InvalidInputError('Invalid template: width and height must be positive integers');
  }
  if (!Array.isArray(template.layers)) {
    throw new InvalidInputError('Invalid template: layers must be an array');
  }

  const layers = template.layers.map((entry: unknown, index: number) =>
    templateLayerToLayer(entry, `layers[${index}]`, files),
  );
  return { width, height, layers };
}

/**
 * Serializes a composition into a ZIP-based template archive.
 *
 * @returns ZIP file data.
 */
export function packTemplate(composition: Composition): Uint8Array {
  const { template, files } = compositionToTemplate(composition);

  const entries: Record<string, Uint8Array> = {
    [TEMPLATE_ENTRY]: strToU8(JSON.stringify(template, null, 2)),
  };
  for (const [path, data] of files) {
    entries[path] = data;
  }
  return zipSync(entries);
}

/**
 * Restores a composition from a template archive.
 *
 * @throws {InvalidInputError} When the data is not a ZIP, `template.json`
 *   is missing or unparsable, or a layer entry is invalid.
 */
export function unpackTemplate(data: Uint8Array): Composition {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (err) {
    throw new InvalidInputError('Invalid template archive: not a ZIP file', { cause: err });
  }

  const json = entries[TEMPLATE_ENTRY];
  if (!json) {
    throw new InvalidInputError(`Invalid template archive: missing ${TEMPLATE_ENTRY}`);
  }

  let template: unknown;
  try {
    template = JSON.parse(strFromU8(json));
  } catch (err) {
    throw new InvalidInputError(`Invalid template archive: ${TEMPLATE_ENTRY} is not JSON`, {
      cause: err,
    });
  }

  const files = new Map<string, Uint8Array>();
  for (const [path, fileData] of Object.entries(entries)) {
    if (path !== TEMPLATE_ENTRY) files.set(path, fileData);
  }
  return templateToComposition({ template, files });
}

// ── Deserialization helpers ──

function templateLayerToLayer(
  entry: unknown,
  where: string,
  files: ReadonlyMap<string, Uint8Array>,
): Layer {
  if (!isRecord(entry)) {
    throw new InvalidInputError(`Invalid template: ${where} must be an object`);
  }
  const { id, type, source, ...fields } = entry;
  if (typeof id !== 'string') {
    throw new InvalidInputError(`Invalid template: ${where}.id must be a string`);
  }

  let layer: Layer;
  switch (type) {
    case 'image':
      layer = createImageLayer(resolveSource(source, `${where}.source`, files), { id });
      break;
    case 'text':
      layer = createTextLayer('', { id });
      break;
    case 'rectangle':
      layer = createRectangleLayer({ id });
      break;
    default:
      throw new InvalidInputError(
        `Invalid template: ${where}.type must be one of image, text, rectangle`,
      );
  }

  if (layer.type !== 'image' && source !== undefined) {
    fields.source = source;
  }
  const result = validatePatch(layer, fields);
  if (!result.ok) {
    const detail = result.reason === 'invalid-patch' ? result.message : result.reason;
    throw new InvalidInputError(`Invalid template: ${where}: ${detail}`);
  }
  Object.assign(layer, fields);
  return layer;
}

function resolveSource(
  source: unknown,
  where: string,
  files: ReadonlyMap<string, Uint8Array>,
): ImageSource {
  if (isRecord(source)) {
    if (source.kind === 'file' && typeof source.path === 'string') {
      return { kind: 'file', path: source.path };
    }
    if (source.kind === 'embedded' && typeof source.file === 'string') {
      const png = files.get(source.file);
      if (!png) {
        throw new InvalidInputError(`Invalid template: ${where} refers to missing ${source.file}`);
      }
      return { kind: 'pixels', image: decodePng(png) };
    }
  }
  throw new InvalidInputError(
    `Invalid template: ${where} must be { kind: "file", path } or { kind: "embedded", file }`,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}
