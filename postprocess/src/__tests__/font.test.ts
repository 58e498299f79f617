import { describe, it, expect } from 'vitest';
import { BitmapFont, loadDefaultFont } from '../font.js';

function pixels(font: BitmapFont, text: string, size: number): string[] {
  const out: string[] = [];
  font.forEachPixel(text, size, 0, 0, (x, y) => out.push(`${x},${y}`));
  return out;
}

describe('loadDefaultFont', () => {
  it('loads the bundled glyphs once', () => {
    expect(loadDefaultFont()).toBe(loadDefaultFont());
    expect(loadDefaultFont().glyph('I')).toEqual([14, 4, 4, 4, 4, 4, 14]);
  });
});

describe('BitmapFont', () => {
  const font = new BitmapFont({
    width: 5,
    height: 7,
    advance: 6,
    fallback: '?',
    glyphs: {
      '?': [16, 0, 0, 0, 0, 0, 0],
      '.': [0, 0, 0, 0, 0, 0, 1],
    },
  });

  it('scales in whole pixels per 8px of font size', () => {
    expect(font.scale(4)).toBe(1);
    expect(font.scale(11)).toBe(1);
    expect(font.scale(12)).toBe(2);
    expect(font.scale(24)).toBe(3);
  });

  it('reads bit 4 as the leftmost column', () => {
    expect(pixels(font, '.', 8)).toEqual(['4,6']);
  });

  it('advances the cursor and substitutes unknown characters', () => {
    expect(pixels(font, '.~', 8)).toEqual(['4,6', '6,0']);
  });

  it('repeats each lit pixel as a scale-sized block', () => {
    expect(pixels(font, '?', 16)).toEqual(['0,0', '1,0', '0,1', '1,1']);
  });

  it('refuses a font without its fallback glyph', () => {
    expect(() => new BitmapFont({ width: 5, height: 7, advance: 6, fallback: '?', glyphs: {} })).toThrow(
      "Font has no glyph for its fallback character '?'"
    );
  });
});
