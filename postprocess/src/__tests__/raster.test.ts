import { describe, it, expect } from 'vitest';
import { PALETTE, composite, rectQuad } from '@iso-district/renderer';
import { RasterSurface, dashPolyline, parseColor, type RasterImage } from '../raster.js';

function litPixels(surface: RasterSurface): Array<[number, number]> {
  const lit: Array<[number, number]> = [];
  for (let y = 0; y < surface.height; y++) {
    for (let x = 0; x < surface.width; x++) {
      if (surface.pixelAt(x, y)[3] > 0) lit.push([x, y]);
    }
  }
  return lit;
}

describe('parseColor', () => {
  it('reads hex colours into 8-bit channels', () => {
    expect(parseColor('#1a1028')).toEqual({ r: 0x1a, g: 0x10, b: 0x28 });
  });
});

describe('RasterSurface fills', () => {
  it('covers the pixels whose centres fall inside a rectangle', () => {
    const surface = new RasterSurface(4, 4);
    surface.fillRect(1, 1, 2, 2, { color: '#ff0000' });

    expect(litPixels(surface)).toEqual([
      [1, 1],
      [2, 1],
      [1, 2],
      [2, 2],
    ]);
    expect(surface.pixelAt(1, 1)).toEqual([255, 0, 0, 255]);
  });

  it('blends translucent colour source-over', () => {
    const surface = new RasterSurface(2, 1);
    surface.fillRect(0, 0, 1, 1, { color: '#c8c8c8' });
    surface.fillRect(0, 0, 1, 1, { color: '#000000', alpha: 0.06 });
    surface.fillRect(1, 0, 1, 1, { color: '#ff0000', alpha: 0.25 });

    expect(surface.pixelAt(0, 0)).toEqual([188, 188, 188, 255]);
    expect(surface.pixelAt(1, 0)).toEqual([255, 0, 0, 64]);
  });

  it('fills polygons by pixel centre', () => {
    const surface = new RasterSurface(4, 4);
    surface.fillPolygon(
      [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
        { x: 0, y: 4 },
      ],
      { color: '#ffffff' }
    );

    expect(litPixels(surface)).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
      [0, 2],
    ]);
  });

  it('alternates dither colours on a checkerboard', () => {
    const surface = new RasterSurface(2, 2);
    surface.fillPattern(
      [
        { x: 0, y: 0 },
        { x: 2, y: 0 },
        { x: 2, y: 2 },
        { x: 0, y: 2 },
      ],
      { base: '#000000', alt: '#ffffff' }
    );

    expect(surface.pixelAt(0, 0)).toEqual([255, 255, 255, 255]);
    expect(surface.pixelAt(1, 0)).toEqual([0, 0, 0, 255]);
    expect(surface.pixelAt(0, 1)).toEqual([0, 0, 0, 255]);
    expect(surface.pixelAt(1, 1)).toEqual([255, 255, 255, 255]);
  });
});

describe('RasterSurface strokes', () => {
  it('draws hairlines with Bresenham steps', () => {
    const surface = new RasterSurface(4, 4);
    surface.strokePolyline(
      [
        { x: 0, y: 0 },
        { x: 3, y: 3 },
      ],
      { color: '#ffffff', width: 1 }
    );

    expect(litPixels(surface)).toEqual([
      [0, 0],
      [1, 1],
      [2, 2],
      [3, 3],
    ]);
  });

  it('sweeps wide lines and extends square caps by half the width', () => {
    const line = [
      { x: 1, y: 2 },
      { x: 7, y: 2 },
    ];
    const butt = new RasterSurface(8, 5);
    butt.strokePolyline(line, { color: '#ffffff', width: 2 });
    const square = new RasterSurface(8, 5);
    square.strokePolyline(line, { color: '#ffffff', width: 2, cap: 'square' });

    expect(litPixels(butt)).toHaveLength(12);
    expect(butt.pixelAt(0, 1)[3]).toBe(0);
    expect(litPixels(square)).toHaveLength(16);
    expect(square.pixelAt(0, 1)[3]).toBe(255);
  });

  it('paints overlapping stroke pieces once', () => {
    const surface = new RasterSurface(8, 8);
    surface.strokePolygon(
      [
        { x: 2, y: 2 },
        { x: 6, y: 2 },
        { x: 6, y: 6 },
        { x: 2, y: 6 },
      ],
      { color: '#ffffff', width: 2, alpha: 0.5, join: 'round' }
    );

    const alphas = new Set(litPixels(surface).map(([x, y]) => surface.pixelAt(x, y)[3]));
    expect([...alphas]).toEqual([128]);
  });

  it('splits polylines into dashes', () => {
    const pieces = dashPolyline(
      [
        { x: 0, y: 0 },
        { x: 8, y: 0 },
      ],
      [2, 2]
    );

    expect(pieces).toEqual([
      [
        { x: 0, y: 0 },
        { x: 2, y: 0 },
      ],
      [
        { x: 4, y: 0 },
        { x: 6, y: 0 },
      ],
    ]);
  });
});

describe('RasterSurface text', () => {
  it('draws glyphs resting on the baseline', () => {
    const surface = new RasterSurface(8, 8);
    surface.fillText('-', 0, 7, { color: '#ffffff', font: { size: 8 } });

    expect(litPixels(surface)).toEqual([
      [0, 3],
      [1, 3],
      [2, 3],
      [3, 3],
      [4, 3],
    ]);
  });

  it('centres text and thickens bold strokes', () => {
    const surface = new RasterSurface(16, 8);
    surface.fillText('-', 10, 7, { color: '#ffffff', font: { size: 8, bold: true }, align: 'center' });

    expect(litPixels(surface).map(([x]) => x)).toEqual([7, 8, 9, 10, 11, 12]);
  });

  it('measures by whole-pixel glyph advance', () => {
    const surface = new RasterSurface(1, 1);
    expect(surface.measureText('AB', { size: 8 })).toBe(12);
    expect(surface.measureText('AB', { size: 16 })).toBe(24);
  });
});

describe('RasterSurface images', () => {
  const twoPixels: RasterImage = {
    width: 2,
    height: 1,
    data: new Uint8ClampedArray([255, 0, 0, 255, 0, 0, 255, 255]),
  };

  it('upscales with nearest sampling into solid blocks', () => {
    const surface = new RasterSurface(6, 3);
    surface.drawImage(twoPixels, rectQuad(0, 0, 6, 3));

    for (let y = 0; y < 3; y++) {
      for (let x = 0; x < 6; x++) {
        expect(surface.pixelAt(x, y)).toEqual(x < 3 ? [255, 0, 0, 255] : [0, 0, 255, 255]);
      }
    }
  });

  it('takes a copy on snapshot', () => {
    const surface = new RasterSurface(1, 1);
    const before = surface.snapshot();
    surface.fillRect(0, 0, 1, 1, { color: '#ffffff' });
    expect([...before.data]).toEqual([0, 0, 0, 0]);
  });
});

describe('composite onto a raster display', () => {
  it('turns working pixels into blocks and darkens every third row', () => {
    const working = new RasterSurface(2, 2);
    working.fillRect(0, 0, 2, 2, { color: '#c8c8c8' });
    working.fillRect(0, 0, 1, 1, { color: '#ff0000' });
    const display = new RasterSurface(6, 6);

    composite(working, display, { pixelScale: 3, scanlines: { enabled: true, alpha: 0.06, spacing: 3 } });

    expect(display.pixelAt(1, 1)).toEqual([255, 0, 0, 255]);
    expect(display.pixelAt(4, 1)).toEqual([200, 200, 200, 255]);
    expect(display.pixelAt(4, 0)).toEqual([188, 188, 188, 255]);
    expect(display.pixelAt(4, 3)).toEqual([188, 188, 188, 255]);
    expect(display.pixelAt(4, 5)).toEqual([200, 200, 200, 255]);
  });

  it('keeps every block K pixels wide when the display is not a multiple of K', () => {
    const working = new RasterSurface(33, 1);
    for (let x = 0; x < 33; x++) {
      working.fillRect(x, 0, 1, 1, { color: x % 2 === 0 ? '#000000' : '#ffffff' });
    }
    const display = new RasterSurface(100, 3);

    composite(working, display, { pixelScale: 3, scanlines: { enabled: false, alpha: 0.06, spacing: 3 } });

    const runs: number[] = [];
    let previous = -1;
    for (let x = 0; x < 99; x++) {
      const red = display.pixelAt(x, 1)[0];
      if (red === previous) runs[runs.length - 1]++;
      else runs.push(1);
      previous = red;
    }
    expect(runs).toEqual(new Array(33).fill(3));

    const bg = parseColor(PALETTE.background);
    expect(display.pixelAt(99, 1)).toEqual([bg.r, bg.g, bg.b, 255]);
  });
});
