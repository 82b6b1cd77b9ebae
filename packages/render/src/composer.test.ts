import { describe, it, expect, vi, afterEach } from 'vitest';
import type { GrayImage, ImageSource } from '@eink-composer/types';
import {
  InvalidDimensionError,
  InvalidInputError,
  createGrayImage,
  decodePng,
  unpackBits,
} from '@eink-composer/core';
import { Composer } from './composer';

function layerIds(composer: Composer): string[] {
  return composer.layers.map((l) => l.id);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Composer construction', () => {
  it('defaults to a 250x128 canvas', () => {
    const composer = new Composer();
    expect([composer.width, composer.height]).toEqual([250, 128]);
    expect(composer.layers).toEqual([]);
    expect(composer.canUndo).toBe(false);
  });

  it('rejects invalid sizes', () => {
    expect(() => new Composer({ width: 0 })).toThrow(InvalidDimensionError);
    expect(() => new Composer({ height: 2.5 })).toThrow(InvalidDimensionError);
  });

  it('rejects a history depth below 1', () => {
    expect(() => new Composer({ historyDepth: 0 })).toThrow(RangeError);
  });
});

describe('layer editing', () => {
  it('adds layers in paint order and returns their ids', () => {
    const composer = new Composer({ width: 8, height: 8 });
    const rect = composer.addRectangleLayer({ id: 'bg' });
    const text = composer.addTextLayer('A');

    expect(rect).toBe('bg');
    expect(layerIds(composer)).toEqual(['bg', text]);
  });

  it('turns a path string into a file source', () => {
    const composer = new Composer();
    const id = composer.addImageLayer('logo.png');
    const layer = composer.getLayer(id);
    expect(layer?.type === 'image' && layer.source).toEqual({ kind: 'file', path: 'logo.png' });
  });

  it('rejects out-of-range options without adding a layer', () => {
    const composer = new Composer();
    expect(() => composer.addImageLayer('a.png', { brightness: -1 })).toThrow(
      'Invalid image layer: brightness must be a finite number >= 0',
    );
    expect(() => composer.addRectangleLayer({ width: -1 })).toThrow(InvalidInputError);
    expect(composer.layers).toEqual([]);
    expect(composer.canUndo).toBe(false);
  });

  it('updates fields of the layer type', () => {
    const composer = new Composer();
    composer.addTextLayer('old', { id: 't' });

    expect(composer.updateLayer('t', { text: 'new', x: 4 })).toEqual({ ok: true });
    expect(composer.getLayer('t')).toMatchObject({ text: 'new', x: 4 });
  });

  it('reports unknown ids and invalid patches without changing anything', () => {
    const composer = new Composer();
    composer.addTextLayer('a', { id: 't' });

    expect(composer.updateLayer('nope', { x: 1 })).toEqual({ ok: false, reason: 'not-found' });
    expect(composer.updateLayer('t', { color: 7 })).toEqual({
      ok: false,
      reason: 'invalid-patch',
      field: 'color',
      message: 'color must be 0 or 255',
    });
    expect(composer.getLayer('t')).toMatchObject({ color: 0 });
    expect(composer.history.undoDescription).toBe('Add text layer "t"');
  });

  it('checks the layer type in updateLayerOfType', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'r' });

    expect(composer.updateLayerOfType('r', 'rectangle', { filled: false })).toEqual({ ok: true });
    expect(composer.updateLayerOfType('r', 'text', { text: 'x' })).toMatchObject({ ok: false });
  });

  it('records nothing for an empty patch', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'r' });
    composer.updateLayer('r', {});
    expect(composer.history.undoDescription).toBe('Add rectangle layer "r"');
  });

  it('targets the last layer carrying a duplicate id', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'dup', x: 1 });
    composer.addRectangleLayer({ id: 'dup', x: 2 });

    composer.updateLayer('dup', { y: 5 });
    expect(composer.layers.map((l) => l.y)).toEqual([0, 5]);
  });

  it('toggles and removes layers', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'r' });

    expect(composer.toggleLayer('r')).toBe(true);
    expect(composer.getLayer('r')?.visible).toBe(false);
    expect(composer.toggleLayer('nope')).toBe(false);

    expect(composer.removeLayer('r')).toBe(true);
    expect(composer.removeLayer('r')).toBe(false);
    expect(composer.layers).toEqual([]);
  });

  it('moves layers with clamping', () => {
    const composer = new Composer();
    for (const id of ['a', 'b', 'c']) composer.addRectangleLayer({ id });

    expect(composer.moveLayer('a', 99)).toEqual({ ok: true });
    expect(layerIds(composer)).toEqual(['b', 'c', 'a']);

    expect(composer.moveLayer('a', -5)).toEqual({ ok: true });
    expect(layerIds(composer)).toEqual(['a', 'b', 'c']);

    expect(composer.moveLayer('a', 1.5)).toMatchObject({ ok: false, field: 'index' });
    expect(composer.moveLayer('nope', 0)).toEqual({ ok: false, reason: 'not-found' });
  });

  it('does not record a move to the same index', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'a' });
    composer.moveLayer('a', 0);
    expect(composer.history.undoDescription).toBe('Add rectangle layer "a"');
  });
});

describe('undo / redo', () => {
  it('reverses every kind of edit', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'a' });
    composer.addTextLayer('b', { id: 'b' });
    composer.updateLayer('a', { x: 3 });
    composer.toggleLayer('b');
    composer.moveLayer('b', 0);
    composer.removeLayer('a');
    composer.clear();
    expect(composer.layers).toEqual([]);

    composer.undo(); // clear
    expect(layerIds(composer)).toEqual(['b']);
    composer.undo(); // remove
    expect(layerIds(composer)).toEqual(['b', 'a']);
    composer.undo(); // move
    expect(layerIds(composer)).toEqual(['a', 'b']);
    composer.undo(); // toggle
    expect(composer.getLayer('b')?.visible).toBe(true);
    composer.undo(); // update
    expect(composer.getLayer('a')?.x).toBe(0);

    expect(composer.redo()).toBe(true);
    expect(composer.getLayer('a')?.x).toBe(3);
  });

  it('labels the next undo and redo steps', () => {
    const composer = new Composer();
    expect(composer.undoLabel).toBeNull();

    composer.addRectangleLayer({ id: 'box' });
    composer.updateLayer('box', { x: 2, filled: false });
    expect(composer.undoLabel).toBe('Update x, filled of layer "box"');
    expect(composer.redoLabel).toBeNull();

    composer.undo();
    expect(composer.undoLabel).toBe('Add rectangle layer "box"');
    expect(composer.redoLabel).toBe('Update x, filled of layer "box"');
  });

  it('returns false when there is nothing to do', () => {
    const composer = new Composer();
    expect(composer.undo()).toBe(false);
    expect(composer.redo()).toBe(false);
  });

  it('does not record clearing an empty composition', () => {
    const composer = new Composer();
    composer.clear();
    expect(composer.canUndo).toBe(false);
  });

  it('keeps at most historyDepth steps', () => {
    const composer = new Composer({ historyDepth: 2 });
    for (const id of ['a', 'b', 'c']) composer.addRectangleLayer({ id });

    expect(composer.undo()).toBe(true);
    expect(composer.undo()).toBe(true);
    expect(composer.undo()).toBe(false);
    expect(layerIds(composer)).toEqual(['a']);
  });
});

describe('events', () => {
  it('publishes add, update, reorder, remove and clear', () => {
    const composer = new Composer();
    const log: string[] = [];
    composer.events.on('layer:added', ({ layer, index }) => log.push(`added ${layer.id}@${index}`));
    composer.events.on('layer:updated', ({ layerId, fields }) =>
      log.push(`updated ${layerId} ${fields.join(',')}`),
    );
    composer.events.on('layer:reordered', ({ layerId, from, to }) =>
      log.push(`moved ${layerId} ${from}->${to}`),
    );
    composer.events.on('layer:removed', ({ layerId, index }) =>
      log.push(`removed ${layerId}@${index}`),
    );
    composer.events.on('composition:cleared', () => log.push('cleared'));

    composer.addRectangleLayer({ id: 'a' });
    composer.addRectangleLayer({ id: 'b' });
    composer.updateLayer('a', { x: 1, y: 2 });
    composer.toggleLayer('b');
    composer.moveLayer('b', 0);
    composer.removeLayer('a');
    composer.clear();

    expect(log).toEqual([
      'added a@0',
      'added b@1',
      'updated a x,y',
      'updated b visible',
      'moved b 1->0',
      'removed a@1',
      'cleared',
    ]);
  });

  it('publishes the inverse event on undo', () => {
    const composer = new Composer();
    composer.addRectangleLayer({ id: 'a' });
    composer.addRectangleLayer({ id: 'b' });
    composer.moveLayer('b', 0);

    const log: string[] = [];
    composer.events.on('layer:reordered', ({ from, to }) => log.push(`moved ${from}->${to}`));
    composer.events.on('layer:removed', ({ layerId }) => log.push(`removed ${layerId}`));
    composer.events.on('layer:added', ({ layer, index }) => log.push(`added ${layer.id}@${index}`));

    composer.undo();
    composer.undo();
    composer.clear();
    composer.undo();

    expect(log).toEqual(['moved 0->1', 'removed b', 'added a@0']);
  });

  it('reports render size and layer count', () => {
    const composer = new Composer({ width: 4, height: 2 });
    composer.addRectangleLayer({ visible: false });
    const listener = vi.fn();
    composer.events.on('render:completed', listener);

    composer.render({ transforms: ['rotate-90'] });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({
      size: { width: 2, height: 4 },
      layerCount: 1,
    });
    expect(listener.mock.calls[0][0].durationMs).toBeGreaterThanOrEqual(0);
  });
});

describe('rendering', () => {
  it('packs a 9x1 row MSB first', () => {
    const composer = new Composer({ width: 9, height: 1 });
    for (const x of [0, 2, 4, 6, 8]) {
      composer.addRectangleLayer({ x, width: 1, height: 1 });
    }

    expect([...composer.renderBinary()]).toEqual([0x55, 0x00]);
    expect([...composer.renderBinary({}, { invert: true })]).toEqual([0xaa, 0x80]);
  });

  it('thresholds grey layers before packing', () => {
    const image: GrayImage = createGrayImage(4, 1, 200);
    const source: ImageSource = { kind: 'pixels', image };
    const composer = new Composer({ width: 4, height: 1 });
    composer.addImageLayer(source, { ditherMode: 'none' });

    const bytes = composer.renderBinary();
    expect([...unpackBits(bytes, 4, 1).data]).toEqual([255, 255, 255, 255]);
  });

  it('loads file sources through the injected loader', () => {
    const load = vi.fn((): GrayImage => createGrayImage(2, 2, 0));
    const composer = new Composer({ width: 2, height: 2, loader: { load } });
    composer.addImageLayer('photo.png');

    expect([...composer.render().data]).toEqual([0, 0, 0, 0]);
    expect(load).toHaveBeenCalledWith({ kind: 'file', path: 'photo.png' });
  });

  it('encodes PNG and BMP', () => {
    const composer = new Composer({ width: 3, height: 2 });
    composer.addRectangleLayer({ width: 1, height: 1 });

    const png = decodePng(composer.renderPng());
    expect([...png.data]).toEqual([0, 255, 255, 255, 255, 255]);

    const bmp = composer.renderBmp();
    expect(String.fromCharCode(bmp[0], bmp[1])).toBe('BM');
  });

  it('logs render timings only in debug mode', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new Composer({ width: 4, height: 2, debug: false }).render();
    expect(debug).not.toHaveBeenCalled();

    const composer = new Composer({ width: 4, height: 2, debug: true });
    composer.addRectangleLayer();
    composer.render();
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatch(/^\[render\] \d+\.\d{2}ms \(4x2, 1 layers\)$/);
  });

  it('sends debug lines to the injected log', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const log = vi.fn();
    new Composer({ width: 3, height: 3, debug: true, log }).render();

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[render\] \d+\.\d{2}ms \(3x3, 0 layers\)$/);
  });

  it('accepts gray rectangles and thresholds them for packing', () => {
    const composer = new Composer({ width: 2, height: 1 });
    composer.addRectangleLayer({ width: 1, height: 1, color: 128 });
    composer.addRectangleLayer({ x: 1, width: 1, height: 1, color: 200 });

    expect([...composer.render().data]).toEqual([128, 200]);
    expect([...composer.renderBinary()]).toEqual([0x40]);
  });
});

describe('templates', () => {
  it('round-trips through a template archive', () => {
    const composer = new Composer({ width: 16, height: 8 });
    composer.addRectangleLayer({ id: 'frame', width: 16, height: 8, filled: false });
    composer.addTextLayer('OK', { id: 'label', x: 2, y: 1 });
    composer.addImageLayer({ kind: 'pixels', image: createGrayImage(2, 2, 0) }, { id: 'dot', x: 12 });

    const restored = Composer.fromTemplate(composer.toTemplate());

    expect([restored.width, restored.height]).toEqual([16, 8]);
    expect(restored.layers).toEqual(composer.layers);
    expect(restored.canUndo).toBe(false);
    expect(restored.render().data).toEqual(composer.render().data);
  });

  it('starts from an existing composition', () => {
    const source = new Composer({ width: 5, height: 5 });
    source.addRectangleLayer({ id: 'r' });
    const copy = Composer.fromComposition(source.toComposition());

    copy.removeLayer('r');
    expect(layerIds(source)).toEqual(['r']);
    expect(copy.layers).toEqual([]);
  });

  it('copies layers so edits do not reach the source', () => {
    const image = createGrayImage(2, 2, 0);
    const source = new Composer({ width: 5, height: 5 });
    source.addRectangleLayer({ id: 'r', color: 0 });
    source.addImageLayer({ kind: 'pixels', image }, { id: 'img' });
    const copy = Composer.fromComposition(source.toComposition());

    copy.updateLayer('r', { x: 2, color: 128 });
    expect(source.getLayer('r')).toMatchObject({ x: 0, color: 0 });
    expect(copy.getLayer('r')).toMatchObject({ x: 2, color: 128 });

    const shared = copy.getLayer('img');
    expect(shared?.type === 'image' && shared.source.kind === 'pixels' && shared.source.image).toBe(
      image,
    );
  });
});
