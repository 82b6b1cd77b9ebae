import { describe, it, expect } from 'vitest';
import { strToU8, zipSync } from 'fflate';
import type { Composition } from '@eink-composer/types';
import { InvalidInputError } from '../errors';
import { grayImageFrom } from '../gray-image';
import { createImageLayer, createRectangleLayer, createTextLayer } from '../layer-factory';
import {
  TEMPLATE_ENTRY,
  compositionToTemplate,
  packTemplate,
  templateToComposition,
  unpackTemplate,
} from '../template';

function sampleComposition(): Composition {
  return {
    width: 32,
    height: 16,
    layers: [
      createTextLayer('HI', { id: 'title', x: 2, y: 3 }),
      createImageLayer({ kind: 'file', path: 'logo.png' }, { id: 'logo', rotate: 90 }),
      createImageLayer(
        { kind: 'pixels', image: grayImageFrom(2, 2, [0, 85, 170, 255]) },
        { id: 'swatch', ditherMode: 'none', visible: false },
      ),
      createRectangleLayer({ id: 'frame', width: 32, height: 16, filled: false }),
    ],
  };
}

function archive(entries: Record<string, string>): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(entries)) files[name] = strToU8(text);
  return zipSync(files);
}

describe('compositionToTemplate', () => {
  it('keeps file paths and embeds in-memory pixels by layer index', () => {
    const { template, files } = compositionToTemplate(sampleComposition());

    expect(template.version).toBe(1);
    expect([template.width, template.height]).toEqual([32, 16]);
    expect(template.layers.map((l) => l.id)).toEqual(['title', 'logo', 'swatch', 'frame']);

    const [, logo, swatch] = template.layers;
    expect(logo.type === 'image' && logo.source).toEqual({ kind: 'file', path: 'logo.png' });
    expect(swatch.type === 'image' && swatch.source).toEqual({
      kind: 'embedded',
      file: 'images/2.png',
    });
    expect([...files.keys()]).toEqual(['images/2.png']);
  });
});

describe('packTemplate / unpackTemplate', () => {
  it('restores every layer', () => {
    const original = sampleComposition();
    const restored = unpackTemplate(packTemplate(original));
    expect(restored).toEqual(original);
  });
});

describe('templateToComposition', () => {
  it('fills missing fields with defaults', () => {
    const composition = templateToComposition({
      template: {
        version: 1,
        width: 10,
        height: 5,
        layers: [{ id: 't', type: 'text', text: 'Hi' }],
      },
      files: new Map(),
    });

    expect(composition.layers).toEqual([createTextLayer('Hi', { id: 't' })]);
  });

  function load(template: unknown) {
    return () => templateToComposition({ template, files: new Map() });
  }

  it('rejects an unsupported version', () => {
    expect(load({ version: 2, width: 1, height: 1, layers: [] })).toThrow(
      'Invalid template: unsupported version 2',
    );
  });

  it('rejects a bad canvas size', () => {
    expect(load({ version: 1, width: 0, height: 1, layers: [] })).toThrow(
      'Invalid template: width and height must be positive integers',
    );
  });

  it('rejects unknown layer types', () => {
    expect(
      load({ version: 1, width: 1, height: 1, layers: [{ id: 'c', type: 'circle' }] }),
    ).toThrow('Invalid template: layers[0].type must be one of image, text, rectangle');
  });

  it('names the offending field', () => {
    const template = {
      version: 1,
      width: 1,
      height: 1,
      layers: [
        { id: 'ok', type: 'rectangle' },
        { id: 'r', type: 'rectangle', color: 300 },
      ],
    };
    expect(load(template)).toThrow(
      'Invalid template: layers[1]: color must be an integer in 0-255',
    );
  });

  it('rejects a source on a non-image layer', () => {
    const template = {
      version: 1,
      width: 1,
      height: 1,
      layers: [{ id: 't', type: 'text', source: { kind: 'file', path: 'a.png' } }],
    };
    expect(load(template)).toThrow('Invalid template: layers[0]: text layers have no field "source"');
  });

  it('rejects a missing embedded image', () => {
    const template = {
      version: 1,
      width: 1,
      height: 1,
      layers: [{ id: 'i', type: 'image', source: { kind: 'embedded', file: 'images/0.png' } }],
    };
    expect(load(template)).toThrow(
      'Invalid template: layers[0].source refers to missing images/0.png',
    );
  });
});

describe('unpackTemplate errors', () => {
  it('rejects data that is not a ZIP', () => {
    expect(() => unpackTemplate(new Uint8Array(64))).toThrow(InvalidInputError);
    expect(() => unpackTemplate(new Uint8Array(64))).toThrow(
      'Invalid template archive: not a ZIP file',
    );
  });

  it('requires template.json', () => {
    expect(() => unpackTemplate(archive({ 'notes.txt': 'x' }))).toThrow(
      `Invalid template archive: missing ${TEMPLATE_ENTRY}`,
    );
  });

  it('requires template.json to be JSON', () => {
    expect(() => unpackTemplate(archive({ [TEMPLATE_ENTRY]: '{ nope' }))).toThrow(
      'Invalid template archive: template.json is not JSON',
    );
  });
});
