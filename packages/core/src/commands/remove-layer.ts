/**
 * @module commands/remove-layer
 * Command for removing a layer from a composition.
 */

import type { Command, Composition, Layer } from '@eink-composer/types';

/**
 * Removes a layer from the composition.
 * Undo re-inserts the layer at its original position.
 */
export class RemoveLayerCommand implements Command {
  readonly description: string;
  private readonly composition: Composition;
  private readonly layer: Layer;
  readonly originalIndex: number;

  /**
   * @param composition - The composition the layer belongs to.
   * @param layer       - The layer to remove.
   */
  constructor(composition: Composition, layer: Layer) {
    this.composition = composition;
    this.layer = layer;
    this.originalIndex = composition.layers.lastIndexOf(layer);
    if (this.originalIndex === -1) {
      throw new Error(`Layer "${layer.id}" is not part of the composition`);
    }
    this.description = `Remove layer "${layer.id}"`;
  }

  /** Remove the layer. */
  execute(): void {
    const pos = this.composition.layers.lastIndexOf(this.layer);
    if (pos !== -1) {
      this.composition.layers.splice(pos, 1);
    }
  }

  /** Re-insert the layer at its original position. */
  undo(): void {
    this.composition.layers.splice(this.originalIndex, 0, this.layer);
  }
}
