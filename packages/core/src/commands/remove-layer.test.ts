import { describe, it, expect } from 'vitest';
import type { Composition } from '@eink-composer/types';
import { RemoveLayerCommand } from './remove-layer';
import { createRectangleLayer } from '../layer-factory';

function compositionWith(...ids: string[]): Composition {
  return {
    width: 10,
    height: 10,
    layers: ids.map((id) => createRectangleLayer({ id })),
  };
}

describe('RemoveLayerCommand', () => {
  it('removes the layer', () => {
    const composition = compositionWith('a');
    new RemoveLayerCommand(composition, composition.layers[0]).execute();
    expect(composition.layers).toHaveLength(0);
  });

  it('undo re-inserts at the original position', () => {
    const composition = compositionWith('a', 'b', 'c');
    const b = composition.layers[1];
    const cmd = new RemoveLayerCommand(composition, b);

    cmd.execute();
    expect(composition.layers.map((l) => l.id)).toEqual(['a', 'c']);
    cmd.undo();
    expect(composition.layers.map((l) => l.id)).toEqual(['a', 'b', 'c']);
    expect(composition.layers[1]).toBe(b);
    expect(cmd.originalIndex).toBe(1);
  });

  it('throws if the layer is not part of the composition', () => {
    const composition = compositionWith('a');
    expect(() => new RemoveLayerCommand(composition, createRectangleLayer({ id: 'a' }))).toThrow(
      'Layer "a" is not part of the composition',
    );
  });

  it('describes the removal', () => {
    const composition = compositionWith('bg');
    const cmd = new RemoveLayerCommand(composition, composition.layers[0]);
    expect(cmd.description).toBe('Remove layer "bg"');
  });
});
