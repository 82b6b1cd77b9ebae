/**
 * @module filters
 * Tone filters applied before dithering.
 *
 * Adjustment filters: brightness/contrast.
 * Basic filters: invert.
 *
 * @packageDocumentation
 */

export { adjustBrightnessContrast } from './adjustments';
export { invert } from './basic';
