/**
 * @module tools
 * MCP tool definitions and handlers for the composer session.
 *
 * Each tool has a JSON Schema input definition and a handler that reads its
 * arguments, calls the session {@link Composer}, and formats the response.
 * Failures are returned as `Error: …` text content; nothing is thrown to
 * the transport.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CanvasTransform, LayerResult, RenderOptions } from '@eink-composer/types';
import type { Composer } from '@eink-composer/render';
import { encodeGrayPng } from '@eink-composer/core';
import { getComposer } from './session.js';

const RESIZE_MODES = ['stretch', 'fit', 'crop'] as const;
const DITHER_MODES = ['floyd-steinberg', 'threshold', 'none'] as const;
const ROTATIONS = [0, 90, 180, 270] as const;
const INK_COLORS = [0, 255] as const;
const TRANSFORMS: readonly CanvasTransform[] = ['flip-h', 'flip-v', 'rotate-90', 'invert'];

/** Schema fragments shared by several tools. */
const POSITION_PROPS = {
  x: { type: 'integer', description: 'Left edge on the canvas (may be negative)' },
  y: { type: 'integer', description: 'Top edge on the canvas (may be negative)' },
};

const COLOR_PROP = {
  type: 'integer',
  enum: [...INK_COLORS],
  description: 'Ink color: 0 = black, 255 = white (default 0)',
};

const GRAY_PROP = {
  type: 'integer',
  minimum: 0,
  maximum: 255,
  description: 'Gray level: 0 = black, 255 = white (default 0)',
};

const IMAGE_PROPS = {
  resizeMode: {
    type: 'string',
    enum: [...RESIZE_MODES],
    description: 'How the image fills the area right of and below (x, y) (default fit)',
  },
  ditherMode: {
    type: 'string',
    enum: [...DITHER_MODES],
    description: 'Per-layer dither (default floyd-steinberg)',
  },
  brightness: { type: 'number', description: 'Sample multiplier, 1 = unchanged' },
  contrast: { type: 'number', description: 'Additive offset in 0-1 units, 0 = unchanged' },
  rotate: {
    type: 'integer',
    enum: [...ROTATIONS],
    description: 'Counter-clockwise rotation in degrees',
  },
  flipH: { type: 'boolean', description: 'Mirror left-right before rotating' },
  flipV: { type: 'boolean', description: 'Mirror top-bottom before rotating' },
  cropX: { type: 'number', description: 'Crop window left edge (crop mode; omit to center)' },
  cropY: { type: 'number', description: 'Crop window top edge (crop mode; omit to center)' },
};

const RENDER_PROPS = {
  backgroundColor: {
    type: 'integer',
    description: 'Canvas fill before layers, 0-255 (default 255)',
  },
  finalDither: {
    type: 'string',
    enum: [...DITHER_MODES],
    description: 'Dither over the whole canvas after compositing',
  },
  transforms: {
    type: 'array',
    items: { type: 'string', enum: [...TRANSFORMS] },
    description: 'Whole-canvas transforms applied in order',
  },
};

const LAYER_ID_PROP = { layerId: { type: 'string', description: 'Target layer ID' } };

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  // ── Read-only / Inspection ─────────────────────────────────────
  {
    name: 'get_composition',
    description:
      'Get the canvas size, the next undo/redo steps and every layer in paint order ' +
      '(first = back) with its type-specific properties.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },

  // ── Layer Creation ─────────────────────────────────────────────
  {
    name: 'add_text_layer',
    description: 'Add a line of 5x7 bitmap text. Use "\\n" for additional lines.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Text to draw (printable ASCII)' },
        id: { type: 'string', description: 'Layer ID (generated when omitted)' },
        ...POSITION_PROPS,
        color: COLOR_PROP,
      },
      required: ['text'],
    },
  },
  {
    name: 'add_rectangle_layer',
    description: 'Add a filled or outlined rectangle.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: { type: 'string', description: 'Layer ID (generated when omitted)' },
        ...POSITION_PROPS,
        width: { type: 'integer', description: 'Width in pixels (default 10)' },
        height: { type: 'integer', description: 'Height in pixels (default 10)' },
        filled: {
          type: 'boolean',
          description: 'Fill the box, or draw a 1px outline (default true)',
        },
        color: GRAY_PROP,
      },
    },
  },
  {
    name: 'add_image_layer',
    description:
      'Add an image layer from a PNG or binary PGM file. The image is resized into the ' +
      'canvas area to the right of and below (x, y), then dithered.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Image file path on the server' },
        id: { type: 'string', description: 'Layer ID (generated when omitted)' },
        ...POSITION_PROPS,
        ...IMAGE_PROPS,
      },
      required: ['path'],
    },
  },

  // ── Layer Modification ─────────────────────────────────────────
  {
    name: 'update_layer',
    description:
      'Change properties of a layer. Provide only the properties you want to change; ' +
      'they must belong to the layer type (text: text, color; rectangle: width, height, ' +
      'filled, color; image: path and the image settings; all: x, y, visible).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...LAYER_ID_PROP,
        ...POSITION_PROPS,
        visible: { type: 'boolean', description: 'Layer visibility' },
        text: { type: 'string', description: 'Text content (text layers)' },
        color: {
          type: 'integer',
          minimum: 0,
          maximum: 255,
          description: 'Ink color (text layers: 0 or 255; rectangle layers: 0-255)',
        },
        width: { type: 'integer', description: 'Width (rectangle layers)' },
        height: { type: 'integer', description: 'Height (rectangle layers)' },
        filled: { type: 'boolean', description: 'Filled or outlined (rectangle layers)' },
        path: { type: 'string', description: 'New image file (image layers)' },
        ...IMAGE_PROPS,
      },
      required: ['layerId'],
    },
  },
  {
    name: 'toggle_layer',
    description: 'Show a hidden layer or hide a visible one.',
    inputSchema: {
      type: 'object' as const,
      properties: { ...LAYER_ID_PROP },
      required: ['layerId'],
    },
  },
  {
    name: 'remove_layer',
    description: 'Remove a layer by ID.',
    inputSchema: {
      type: 'object' as const,
      properties: { ...LAYER_ID_PROP },
      required: ['layerId'],
    },
  },
  {
    name: 'move_layer',
    description:
      'Move a layer to a new paint position (0 = back). Out-of-range indices are clamped.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...LAYER_ID_PROP,
        index: { type: 'integer', description: 'Target index in the layer list' },
      },
      required: ['layerId', 'index'],
    },
  },
  {
    name: 'clear_layers',
    description: 'Remove every layer. Can be undone.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },

  // ── History ────────────────────────────────────────────────────
  {
    name: 'undo',
    description: 'Undo the last layer change.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
  {
    name: 'redo',
    description: 'Redo the last undone layer change.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },

  // ── Output ─────────────────────────────────────────────────────
  {
    name: 'render_preview',
    description: 'Render the composition and return it as a grayscale PNG image.',
    inputSchema: {
      type: 'object' as const,
      properties: { ...RENDER_PROPS },
    },
  },
  {
    name: 'render_binary',
    description:
      'Render the composition and return the packed 1-bit-per-pixel buffer (MSB first, ' +
      'rows padded to whole bytes, 1 = white) as base64. finalDither defaults to threshold.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...RENDER_PROPS,
        invert: { type: 'boolean', description: 'Emit 1 for black instead of white' },
      },
    },
  },
];

/**
 * Handle an MCP tool call against the session composer.
 *
 * @param toolName - Name from the CallTool request.
 * @param args     - Tool arguments (already JSON-decoded).
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
): Promise<ToolResult> {
  try {
    const composer = getComposer();

    switch (toolName) {
      case 'get_composition':
        return jsonResult(describeComposition(composer));

      case 'add_text_layer': {
        const id = composer.addTextLayer(requireString(args, 'text'), {
          id: optionalString(args, 'id'),
          x: optionalNumber(args, 'x'),
          y: optionalNumber(args, 'y'),
          color: optionalOneOf(args, 'color', INK_COLORS),
        });
        return jsonResult({ success: true, layerId: id });
      }

      case 'add_rectangle_layer': {
        const id = composer.addRectangleLayer({
          id: optionalString(args, 'id'),
          x: optionalNumber(args, 'x'),
          y: optionalNumber(args, 'y'),
          width: optionalNumber(args, 'width'),
          height: optionalNumber(args, 'height'),
          filled: optionalBoolean(args, 'filled'),
          color: optionalNumber(args, 'color'),
        });
        return jsonResult({ success: true, layerId: id });
      }

      case 'add_image_layer': {
        const id = composer.addImageLayer(requireString(args, 'path'), {
          id: optionalString(args, 'id'),
          x: optionalNumber(args, 'x'),
          y: optionalNumber(args, 'y'),
          resizeMode: optionalOneOf(args, 'resizeMode', RESIZE_MODES),
          ditherMode: optionalOneOf(args, 'ditherMode', DITHER_MODES),
          brightness: optionalNumber(args, 'brightness'),
          contrast: optionalNumber(args, 'contrast'),
          rotate: optionalOneOf(args, 'rotate', ROTATIONS),
          flipH: optionalBoolean(args, 'flipH'),
          flipV: optionalBoolean(args, 'flipV'),
          cropX: optionalNumber(args, 'cropX'),
          cropY: optionalNumber(args, 'cropY'),
        });
        return jsonResult({ success: true, layerId: id });
      }

      case 'update_layer': {
        const layerId = requireString(args, 'layerId');
        const { path, ...patch } = args;
        delete patch.layerId;
        if (path !== undefined) {
          if (typeof path !== 'string') return errorResult('path must be a string');
          patch.source = { kind: 'file', path };
        }
        return layerResult(composer.updateLayer(layerId, patch), layerId);
      }

      case 'toggle_layer': {
        const layerId = requireString(args, 'layerId');
        if (!composer.toggleLayer(layerId)) return notFound(layerId);
        return jsonResult({ success: true, visible: composer.getLayer(layerId)?.visible });
      }

      case 'remove_layer': {
        const layerId = requireString(args, 'layerId');
        if (!composer.removeLayer(layerId)) return notFound(layerId);
        return jsonResult({ success: true });
      }

      case 'move_layer': {
        const layerId = requireString(args, 'layerId');
        const index = optionalNumber(args, 'index');
        if (index === undefined) return errorResult('index is required');
        return layerResult(composer.moveLayer(layerId, index), layerId);
      }

      case 'clear_layers':
        composer.clear();
        return jsonResult({ success: true });

      case 'undo': {
        const step = composer.undoLabel;
        const success = composer.undo();
        return jsonResult({ success, undone: step, canUndo: composer.canUndo });
      }

      case 'redo': {
        const step = composer.redoLabel;
        const success = composer.redo();
        return jsonResult({ success, redone: step, canRedo: composer.canRedo });
      }

      case 'render_preview': {
        const image = composer.render(readRenderOptions(args));
        const png = encodeGrayPng(image);
        return {
          content: [
            { type: 'image', data: Buffer.from(png).toString('base64'), mimeType: 'image/png' },
            {
              type: 'text',
              text: `${image.width}x${image.height} preview, ${png.length} bytes`,
            },
          ],
        };
      }

      case 'render_binary': {
        const options = readRenderOptions(args);
        const invert = optionalBoolean(args, 'invert') ?? false;
        const bytes = composer.renderBinary(options, { invert });
        const quarterTurns = (options.transforms ?? []).filter((t) => t === 'rotate-90').length;
        const rotated = quarterTurns % 2 === 1;
        return jsonResult({
          width: rotated ? composer.height : composer.width,
          height: rotated ? composer.width : composer.height,
          byteLength: bytes.length,
          data: Buffer.from(bytes).toString('base64'),
        });
      }

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    return errorResult(e instanceof Error ? e.message : String(e));
  }
}

// ── Argument readers ───────────────────────────────────────────

/** A tool argument had the wrong type. */
class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') throw new ToolArgumentError(`${key} must be a string`);
  return value;
}

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  return args[key] === undefined ? undefined : requireString(args, key);
}

function optionalNumber(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new ToolArgumentError(`${key} must be a number`);
  return value;
}

function optionalBoolean(args: Record<string, unknown>, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ToolArgumentError(`${key} must be a boolean`);
  return value;
}

function optionalOneOf<T extends string | number>(
  args: Record<string, unknown>,
  key: string,
  values: readonly T[],
): T | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ToolArgumentError(`${key} must be one of ${values.join(', ')}`);
  }
  return match;
}

function readRenderOptions(args: Record<string, unknown>): Partial<RenderOptions> {
  const options: Partial<RenderOptions> = {
    backgroundColor: optionalNumber(args, 'backgroundColor'),
    finalDither: optionalOneOf(args, 'finalDither', DITHER_MODES),
  };
  const transforms = args.transforms;
  if (transforms !== undefined) {
    if (!Array.isArray(transforms)) throw new ToolArgumentError('transforms must be an array');
    options.transforms = transforms.map((entry: unknown, i: number) => {
      const match = TRANSFORMS.find((candidate) => candidate === entry);
      if (!match) {
        throw new ToolArgumentError(`transforms[${i}] must be one of ${TRANSFORMS.join(', ')}`);
      }
      return match;
    });
  }
  return options;
}

// ── Response formatters ────────────────────────────────────────

type ContentItem =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };
type ToolResult = { content: ContentItem[] };

function describeComposition(composer: Composer): Record<string, unknown> {
  return {
    width: composer.width,
    height: composer.height,
    canUndo: composer.canUndo,
    canRedo: composer.canRedo,
    nextUndo: composer.undoLabel,
    nextRedo: composer.redoLabel,
    layers: composer.getLayerInfo(),
  };
}

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function layerResult(result: LayerResult, layerId: string): ToolResult {
  if (result.ok) return jsonResult({ success: true });
  if (result.reason === 'not-found') return notFound(layerId);
  return errorResult(`Invalid ${result.field}: ${result.message}`);
}

function notFound(layerId: string): ToolResult {
  return errorResult(`Layer "${layerId}" not found`);
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }] };
}
