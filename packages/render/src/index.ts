/**
 * @eink-composer/render
 *
 * Layer compositing and the stateful Composer facade.
 *
 * @packageDocumentation
 */

// Compositor
export {
  DEFAULT_RENDER_OPTIONS,
  paintLayer,
  renderComposition,
  resolveRenderOptions,
} from './compositor';

// Composer
export {
  Composer,
  DEBUG_ENV_VAR,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
} from './composer';
export type { ComposerOptions } from './composer';
