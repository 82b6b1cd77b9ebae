/**
 * @module commands/add-layer
 * Command for adding a layer to a composition.
 */

import type { Command, Composition, Layer } from '@eink-composer/types';

/**
 * Inserts a layer into the composition's layer list at a given index.
 * Undo removes the layer; redo re-inserts it at the same position.
 */
export class AddLayerCommand implements Command {
  readonly description: string;
  private readonly composition: Composition;
  private readonly layer: Layer;
  readonly index: number;

  /**
   * @param composition - The composition to add the layer to.
   * @param layer       - The layer to add.
   * @param index       - Insertion index within `composition.layers`.
   *                      Defaults to the end (front of the stack).
   */
  constructor(composition: Composition, layer: Layer, index?: number) {
    this.composition = composition;
    this.layer = layer;
    this.index = index ?? composition.layers.length;
    this.description = `Add ${layer.type} layer "${layer.id}"`;
  }

  /** Insert the layer. */
  execute(): void {
    this.composition.layers.splice(this.index, 0, this.layer);
  }

  /** Remove the layer again. */
  undo(): void {
    const pos = this.composition.layers.lastIndexOf(this.layer);
    if (pos !== -1) {
      this.composition.layers.splice(pos, 1);
    }
  }
}
