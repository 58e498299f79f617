import { describe, it, expect, vi } from 'vitest';
import { PALETTE } from '@iso-district/renderer';
import { decodeTile } from '../decode.js';
import { encodePng } from '../export.js';
import { PRESETS } from '../options.js';
import { parseColor, type RasterImage } from '../raster.js';
import { renderScene, type RenderOptions } from '../render.js';

const checker: RasterImage = {
  width: 2,
  height: 2,
  data: new Uint8ClampedArray([
    255, 0, 0, 255, 0, 255, 0, 255,
    0, 0, 255, 255, 255, 255, 255, 128,
  ]),
};

describe('PNG export and tile decoding', () => {
  it('writes a PNG that decodes back to the same pixels', async () => {
    const png = await encodePng(checker);
    expect([...png.subarray(1, 4)].map((c) => String.fromCharCode(c)).join('')).toBe('PNG');

    const decoded = await decodeTile({ payload: png.toString('base64') });
    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(2);
    expect([...decoded.data]).toEqual([...checker.data]);
  });

  it('rejects payloads that are not images', async () => {
    await expect(decodeTile({ payload: Buffer.from('not an image').toString('base64') })).rejects.toThrow();
  });
});

describe('renderScene', () => {
  const square = [
    { x: -10, y: -10 },
    { x: 10, y: -10 },
    { x: 10, y: 10 },
    { x: -10, y: 10 },
  ];
  const payload = {
    buildings: [
      { name: 'Tower', height: 20, coords: square },
      { name: 'Flat', height: 0, coords: square },
    ],
    tiles: [{ x0: 0, y0: 0, x1: 10, y1: 0, x2: 0, y2: 10, data: Buffer.from('junk').toString('base64') }],
  };
  const options: RenderOptions = { ...PRESETS.crisp, width: 90, height: 60, zoom: null, pan: null, clicks: [] };

  it('renders the display at its full size over the background', async () => {
    const result = await renderScene(payload, options);
    const bg = parseColor(PALETTE.background);

    expect(result.image.width).toBe(90);
    expect(result.image.height).toBe(60);
    expect([...result.image.data.subarray(-4)]).toEqual([bg.r, bg.g, bg.b, 255]);
    expect(result.buildingCount).toBe(1);
    expect(result.report.dropped.buildings).toBe(1);
  });

  it('reports tiles that fail to decode and keeps going', async () => {
    const onTileError = vi.fn();
    const result = await renderScene(payload, options, onTileError);

    expect(result.imagery).toEqual({ decoded: 0, failed: 1 });
    expect(onTileError).toHaveBeenCalledTimes(1);
  });

  it('replays clicks through the controller', async () => {
    const hit = await renderScene(payload, { ...options, clicks: [{ x: 45, y: 30 }] });
    expect(hit.selection?.name).toBe('Tower');

    const missed = await renderScene(payload, { ...options, clicks: [{ x: 45, y: 30 }, { x: 1, y: 1 }] });
    expect(missed.selection).toBeNull();
  });

  it('draws one frame after the imagery settles, however many tiles decode', async () => {
    const data = (await encodePng(checker)).toString('base64');
    const tiles = Array.from({ length: 5 }, (_, i) => ({
      x0: i * 10,
      y0: 0,
      x1: i * 10 + 10,
      y1: 0,
      x2: i * 10,
      y2: 10,
      data,
    }));
    const result = await renderScene({ ...payload, tiles }, options);

    expect(result.imagery).toEqual({ decoded: 5, failed: 0 });
    expect(result.frameCount).toBe(1);
  });
});
