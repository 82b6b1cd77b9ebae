/**
 * @module commands/update-layer
 * Command for applying a validated patch to a layer.
 */

import type { Command, Layer, LayerPatch } from '@eink-composer/types';
import { applyPatch, patchFields, snapshotFields } from '../layer-list';

/**
 * Applies a patch to a layer, capturing the old values of every patched
 * field for undo. The patch must already have passed `validatePatch`.
 */
export class UpdateLayerCommand implements Command {
  readonly description: string;
  /** Names of the fields the patch sets. */
  readonly fields: string[];
  private readonly layer: Layer;
  private readonly newValues: Record<string, unknown>;
  private readonly oldValues: Record<string, unknown>;

  /**
   * @param layer       - The layer to modify.
   * @param patch       - Fields to change.
   * @param description - Overrides the default history label.
   */
  constructor(layer: Layer, patch: LayerPatch | Record<string, unknown>, description?: string) {
    this.layer = layer;
    this.fields = patchFields(patch);
    this.newValues = snapshotFields(patch, this.fields);
    this.oldValues = snapshotFields(layer, this.fields);
    this.description = description ?? `Update ${this.fields.join(', ')} of layer "${layer.id}"`;
  }

  /** Apply the new values. */
  execute(): void {
    applyPatch(this.layer, this.newValues);
  }

  /** Restore the old values. */
  undo(): void {
    applyPatch(this.layer, this.oldValues);
  }
}
