/**
 * @module commands/reorder-layer
 * Command for moving a layer to a new paint position.
 */

import type { Command, Composition, Layer } from '@eink-composer/types';

/**
 * Moves a layer from one index to another within the composition.
 * Undo restores the original position.
 */
export class ReorderLayerCommand implements Command {
  readonly description: string;
  private readonly composition: Composition;
  private readonly layer: Layer;
  readonly fromIndex: number;
  readonly toIndex: number;

  /**
   * @param composition - The composition containing the layer.
   * @param layer       - The layer to move.
   * @param toIndex     - The target index in `composition.layers`.
   */
  constructor(composition: Composition, layer: Layer, toIndex: number) {
    this.composition = composition;
    this.layer = layer;
    this.fromIndex = composition.layers.lastIndexOf(layer);
    if (this.fromIndex === -1) {
      throw new Error(`Layer "${layer.id}" is not part of the composition`);
    }
    this.toIndex = toIndex;
    this.description = `Move layer "${layer.id}" to ${toIndex}`;
  }

  /** Move the layer to the target index. */
  execute(): void {
    this.moveLayer(this.fromIndex, this.toIndex);
  }

  /** Restore the layer to its original index. */
  undo(): void {
    this.moveLayer(this.composition.layers.lastIndexOf(this.layer), this.fromIndex);
  }

  private moveLayer(from: number, to: number): void {
    const [removed] = this.composition.layers.splice(from, 1);
    this.composition.layers.splice(to, 0, removed);
  }
}
