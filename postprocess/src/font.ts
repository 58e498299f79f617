/**
 * 5×7 bitmap font for the software rasterizer.
 *
 * Each glyph is 7 rows of 5 bits, bit 4 being the leftmost pixel. Glyphs are
 * scaled by whole pixels: one step per 8px of requested font size.
 */

import * as fs from 'fs';

export interface FontData {
  width: number;
  height: number;
  advance: number;
  fallback: string;
  glyphs: Record<string, number[]>;
}

const FONT_FILE = new URL('./pixel-font.json', import.meta.url);

function isGlyph(rows: unknown, width: number, height: number): rows is number[] {
  return (
    Array.isArray(rows) &&
    rows.length === height &&
    rows.every((row: unknown) => typeof row === 'number' && Number.isInteger(row) && row >= 0 && row < 1 << width)
  );
}

function isFontData(value: unknown): value is FontData {
  if (typeof value !== 'object' || value === null) return false;
  if (!('width' in value && 'height' in value && 'advance' in value && 'fallback' in value && 'glyphs' in value)) {
    return false;
  }
  const { width, height, advance, fallback, glyphs } = value;
  if (typeof width !== 'number' || typeof height !== 'number' || typeof advance !== 'number') return false;
  if (typeof fallback !== 'string' || typeof glyphs !== 'object' || glyphs === null) return false;
  return Object.values(glyphs).every((rows: unknown) => isGlyph(rows, width, height));
}

export class BitmapFont {
  constructor(private readonly data: FontData) {
    if (!(data.fallback in data.glyphs)) {
      throw new Error(`Font has no glyph for its fallback character '${data.fallback}'`);
    }
  }

  get glyphHeight(): number {
    return this.data.height;
  }

  scale(size: number): number {
    return Math.max(1, Math.round(size / 8));
  }

  /** Rows of the glyph for `char`, or of the fallback glyph. */
  glyph(char: string): readonly number[] {
    return this.data.glyphs[char] ?? this.data.glyphs[this.data.fallback];
  }

  measure(text: string, size: number): number {
    return [...text].length * this.data.advance * this.scale(size);
  }

  /**
   * Visit every lit pixel of `text` laid out with its top-left corner at
   * (left, top).
   */
  forEachPixel(text: string, size: number, left: number, top: number, plot: (x: number, y: number) => void): void {
    const scale = this.scale(size);
    const { width, height, advance } = this.data;
    let cursor = left;

    for (const char of text) {
      const rows = this.glyph(char);
      for (let row = 0; row < height; row++) {
        for (let col = 0; col < width; col++) {
          if ((rows[row] & (1 << (width - 1 - col))) === 0) continue;
          for (let sy = 0; sy < scale; sy++) {
            for (let sx = 0; sx < scale; sx++) {
              plot(cursor + col * scale + sx, top + row * scale + sy);
            }
          }
        }
      }
      cursor += advance * scale;
    }
  }
}

let defaultFont: BitmapFont | null = null;

/**
 * The bundled font, read once from pixel-font.json beside this module.
 */
export function loadDefaultFont(): BitmapFont {
  if (!defaultFont) {
    const parsed: unknown = JSON.parse(fs.readFileSync(FONT_FILE, 'utf-8'));
    if (!isFontData(parsed)) {
      throw new Error(`Invalid font file: ${FONT_FILE.pathname}`);
    }
    defaultFont = new BitmapFont(parsed);
  }
  return defaultFont;
}
