/**
 * @module commands
 * Re-exports all concrete Command implementations.
 */

export { AddLayerCommand } from './add-layer';
export { ClearLayersCommand } from './clear-layers';
export { RemoveLayerCommand } from './remove-layer';
export { ReorderLayerCommand } from './reorder-layer';
export { UpdateLayerCommand } from './update-layer';
