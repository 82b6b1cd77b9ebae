/**
 * @module text
 * Bitmap text rasterizer.
 *
 * Draws straight onto a caller-owned canvas: ink pixels get the requested
 * color, background pixels are left as they are. Anything outside the
 * canvas is clipped.
 */

import type { Gray, GrayImage, Size } from '@eink-composer/types';
import { getDefaultFont, getGlyph, type BitmapFont } from './font';

/**
 * Render text onto `canvas` in place.
 *
 * Characters advance left-to-right by `font.advance`; `\n` starts a new line
 * `font.lineHeight` pixels lower at the original x. Characters the font does
 * not have are drawn as a hollow box.
 *
 * @param canvas - Target image, modified in place.
 * @param text   - Text to draw.
 * @param x      - Left edge of the first glyph.
 * @param y      - Top edge of the first line.
 * @param color  - Value written for ink pixels.
 * @param font   - Glyph table. Defaults to the built-in 5×7 font.
 */
export function renderText(
  canvas: GrayImage,
  text: string,
  x: number,
  y: number,
  color: Gray,
  font: BitmapFont = getDefaultFont(),
): void {
  const lines = text.split('\n');
  for (let lineIdx = 0; lineIdx < lines.length; lineIdx++) {
    let penX = x;
    const penY = y + lineIdx * font.lineHeight;
    for (const char of lines[lineIdx]) {
      const code = char.codePointAt(0) ?? 0;
      drawGlyph(canvas, getGlyph(font, code), font.width, font.height, penX, penY, color);
      penX += font.advance;
    }
  }
}

/**
 * Size of the ink box `renderText` would cover.
 * The trailing inter-character gap is not counted.
 */
export function measureText(text: string, font: BitmapFont = getDefaultFont()): Size {
  if (text.length === 0) return { width: 0, height: 0 };
  const lines = text.split('\n');
  let maxChars = 0;
  for (const line of lines) {
    maxChars = Math.max(maxChars, [...line].length);
  }
  const width = maxChars === 0 ? 0 : (maxChars - 1) * font.advance + font.width;
  const height = (lines.length - 1) * font.lineHeight + font.height;
  return { width, height };
}

/** Blit one glyph, clipping against the canvas. */
function drawGlyph(
  canvas: GrayImage,
  glyph: Uint8Array,
  glyphWidth: number,
  glyphHeight: number,
  originX: number,
  originY: number,
  color: Gray,
): void {
  const { width, height, data } = canvas;
  if (originX >= width || originY >= height) return;
  if (originX + glyphWidth <= 0 || originY + glyphHeight <= 0) return;

  for (let gy = 0; gy < glyphHeight; gy++) {
    const cy = originY + gy;
    if (cy < 0 || cy >= height) continue;
    for (let gx = 0; gx < glyphWidth; gx++) {
      if (!glyph[gy * glyphWidth + gx]) continue;
      const cx = originX + gx;
      if (cx < 0 || cx >= width) continue;
      data[cy * width + cx] = color;
    }
  }
}
