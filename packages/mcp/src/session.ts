/**
 * @module session
 * The composer session shared by every tool call.
 *
 * The server keeps exactly one composition in memory for its lifetime.
 * Canvas size comes from `EINK_WIDTH` / `EINK_HEIGHT`; render timing output
 * from `EINK_COMPOSER_DEBUG=1`, written to stderr.
 */

import {
  Composer,
  DEBUG_ENV_VAR,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
} from '@eink-composer/render';

/** Environment variable holding the canvas width. */
export const WIDTH_ENV_VAR = 'EINK_WIDTH';

/** Environment variable holding the canvas height. */
export const HEIGHT_ENV_VAR = 'EINK_HEIGHT';

let current: Composer | null = null;

/**
 * Build a composer from environment variables. Unset variables fall back to
 * the 250×128 default; values that are not positive integers are rejected
 * by the Composer constructor.
 */
export function createComposerFromEnv(env: NodeJS.ProcessEnv = process.env): Composer {
  const width = env[WIDTH_ENV_VAR];
  const height = env[HEIGHT_ENV_VAR];
  return new Composer({
    width: width ? Number(width) : DEFAULT_CANVAS_WIDTH,
    height: height ? Number(height) : DEFAULT_CANVAS_HEIGHT,
    debug: env[DEBUG_ENV_VAR] === '1',
    // stdout carries the MCP stream
    log: (message) => console.error(message),
  });
}

/** The session composer, created from the environment on first use. */
export function getComposer(): Composer {
  if (!current) {
    current = createComposerFromEnv();
  }
  return current;
}

/** Replace the session composer. Passing nothing starts a fresh one on next use. */
export function resetSession(composer?: Composer): void {
  current = composer ?? null;
}
