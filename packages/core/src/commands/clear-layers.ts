/**
 * @module commands/clear-layers
 * Command for dropping every layer at once.
 */

import type { Command, Composition, Layer } from '@eink-composer/types';

/** Empties the layer list. Undo restores the list in its original order. */
export class ClearLayersCommand implements Command {
  readonly description = 'Clear all layers';
  private readonly composition: Composition;
  private removed: Layer[] = [];

  constructor(composition: Composition) {
    this.composition = composition;
  }

  execute(): void {
    this.removed = this.composition.layers.splice(0, this.composition.layers.length);
  }

  undo(): void {
    this.composition.layers.push(...this.removed);
    this.removed = [];
  }
}
