/**
 * @module font
 * Fixed-size bitmap fonts.
 *
 * Glyphs are stored in JSON as rows of `#` (ink) and `.` (background) and
 * decoded once into bit masks.
 */

import fontData from './font-5x7.json';
import { InvalidInputError } from './errors';

/** A single glyph: `height` rows of `width` ink flags, row-major. */
export type GlyphBitmap = Uint8Array;

/** A fixed-width bitmap font. */
export interface BitmapFont {
  readonly name: string;
  /** Glyph cell width in pixels. */
  readonly width: number;
  /** Glyph cell height in pixels. */
  readonly height: number;
  /** Horizontal distance between the origins of adjacent characters. */
  readonly advance: number;
  /** Vertical distance between the origins of adjacent lines. */
  readonly lineHeight: number;
  /** Glyphs keyed by code point. */
  readonly glyphs: ReadonlyMap<number, GlyphBitmap>;
  /** Drawn for characters missing from `glyphs`. */
  readonly placeholder: GlyphBitmap;
}

/** Font description as stored on disk. */
export interface BitmapFontSource {
  name: string;
  width: number;
  height: number;
  advance: number;
  lineHeight: number;
  placeholder: string[];
  glyphs: Record<string, string[]>;
}

/**
 * Decode a font description.
 * @throws {InvalidInputError} When a glyph does not match the declared cell size.
 */
export function parseBitmapFont(source: BitmapFontSource): BitmapFont {
  const { width, height } = source;

  const decodeGlyph = (label: string, rows: string[]): GlyphBitmap => {
    if (rows.length !== height || rows.some((row) => row.length !== width)) {
      throw new InvalidInputError(`Glyph ${label} in font "${source.name}" is not ${width}x${height}`);
    }
    const bitmap = new Uint8Array(width * height);
    rows.forEach((row, y) => {
      for (let x = 0; x < width; x++) {
        bitmap[y * width + x] = row[x] === '#' ? 1 : 0;
      }
    });
    return bitmap;
  };

  const glyphs = new Map<number, GlyphBitmap>();
  for (const [char, rows] of Object.entries(source.glyphs)) {
    const code = char.codePointAt(0);
    if (code === undefined) continue;
    glyphs.set(code, decodeGlyph(JSON.stringify(char), rows));
  }

  return {
    name: source.name,
    width,
    height,
    advance: source.advance,
    lineHeight: source.lineHeight,
    glyphs,
    placeholder: decodeGlyph('placeholder', source.placeholder),
  };
}

let defaultFont: BitmapFont | null = null;

/** The built-in 5×7 printable-ASCII font (advance 6, line height 8). */
export function getDefaultFont(): BitmapFont {
  if (!defaultFont) {
    defaultFont = parseBitmapFont(fontData);
  }
  return defaultFont;
}

/** Glyph for a code point, or the placeholder box when the font lacks it. */
export function getGlyph(font: BitmapFont, codePoint: number): GlyphBitmap {
  return font.glyphs.get(codePoint) ?? font.placeholder;
}
