/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/**
 * An 8-bit grayscale sample. 0 is black, 255 is white.
 * Monochrome layers use only the two extremes.
 */
export type Gray = number;

/** The two ink values an e-paper panel can show. */
export type InkColor = 0 | 255;
