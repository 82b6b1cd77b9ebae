/**
 * @module image
 * Grayscale pixel grid shared by every stage of the pipeline.
 */

/**
 * A single-channel 8-bit image.
 * Pixels are stored row-major, one byte each. Length = width * height.
 */
export interface GrayImage {
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
  /** Sample data, 0 (black) to 255 (white). */
  data: Uint8Array;
}
