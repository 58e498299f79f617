import { describe, it, expect, vi } from 'vitest';
import { composite, workingSize } from '../compositor.js';
import { PALETTE } from '../palette.js';
import { RecordingSurface } from './recordingSurface.js';

describe('workingSize', () => {
  it('floors the display size divided by the pixel scale', () => {
    expect(workingSize(1000, 700, 3)).toEqual({ width: 333, height: 233 });
  });

  it('never goes below one pixel', () => {
    expect(workingSize(2, 1, 3)).toEqual({ width: 1, height: 1 });
  });
});

const scanlinesOff = { enabled: false, alpha: 0.06, spacing: 3 };

describe('composite', () => {
  it('scales the working snapshot by K without smoothing', () => {
    const working = new RecordingSurface(100, 50, 'working');
    const display = new RecordingSurface(300, 150, 'display');
    composite(working, display, { pixelScale: 3, scanlines: scanlinesOff });

    expect(display.calls).toEqual([
      { op: 'clear' },
      { op: 'fillRect', x: 0, y: 0, width: 300, height: 150, style: { color: PALETTE.background } },
      {
        op: 'drawImage',
        image: { width: 100, height: 50, label: 'working' },
        quad: { origin: { x: 0, y: 0 }, right: { x: 300, y: 0 }, down: { x: 0, y: 150 } },
        smoothing: false,
      },
    ]);
  });

  it('takes one working snapshot per frame and draws it straight away', () => {
    const working = new RecordingSurface(10, 5, 'working');
    const snapshot = vi.spyOn(working, 'snapshot');
    const display = new RecordingSurface(30, 15);
    composite(working, display, { pixelScale: 3, scanlines: scanlinesOff });

    expect(snapshot).toHaveBeenCalledTimes(1);
    expect(display.ofType('drawImage')[0].image).toBe(snapshot.mock.results[0].value);
  });

  it('keeps K×K blocks on a display that is not a multiple of K', () => {
    const display = new RecordingSurface(100, 50);
    const { width, height } = workingSize(display.width, display.height, 3);
    composite(new RecordingSurface(width, height), display, { pixelScale: 3, scanlines: scanlinesOff });

    expect(display.ofType('drawImage')[0].quad).toEqual({
      origin: { x: 0, y: 0 },
      right: { x: 99, y: 0 },
      down: { x: 0, y: 48 },
    });
  });

  it('darkens every third display row', () => {
    const working = new RecordingSurface(10, 4);
    const display = new RecordingSurface(30, 12);
    composite(working, display, { pixelScale: 3, scanlines: { enabled: true, alpha: 0.06, spacing: 3 } });

    const rows = display.ofType('fillRect').filter((r) => r.style.alpha !== undefined);
    expect(rows.map((r) => r.y)).toEqual([0, 3, 6, 9]);
    expect(rows[0]).toEqual({
      op: 'fillRect',
      x: 0,
      y: 0,
      width: 30,
      height: 1,
      style: { color: '#000000', alpha: 0.06 },
    });
  });
});
