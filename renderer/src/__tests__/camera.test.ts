import { describe, it, expect } from 'vitest';
import {
  centerCameraOn,
  clampZoom,
  createCamera,
  liftHeight,
  panCamera,
  project,
  zoomCamera,
} from '../camera.js';
import { DEFAULT_RENDER_CONFIG } from '../config.js';

describe('project', () => {
  it('applies the 2:1 isometric basis, pan and pixel scale', () => {
    const camera = { x: 30, y: 60, zoom: 2 };
    const p = project({ x: 5, y: 1 }, camera, 3);

    expect(p.x).toBeCloseTo((4 * 0.70711 * 2 + 30) / 3, 10);
    expect(p.y).toBeCloseTo((6 * 0.35355 * 2 + 60) / 3, 10);
  });

  it('lands on the expected pixels at zoom 1 without pan', () => {
    const camera = { x: 0, y: 0, zoom: 1 };
    const cases: Array<[number, number, number, number]> = [
      [10, 0, 2.357, 1.179],
      [10, 10, 0, 2.357],
      [0, 10, -2.357, 1.179],
    ];
    for (const [x, y, sx, sy] of cases) {
      const p = project({ x, y }, camera, 3);
      expect(Math.abs(p.x - sx)).toBeLessThanOrEqual(0.001);
      expect(Math.abs(p.y - sy)).toBeLessThanOrEqual(0.001);
    }
  });

  it('maps the planar origin onto the pan offset', () => {
    expect(project({ x: 0, y: 0 }, { x: 90, y: -30, zoom: 1.3 }, 3)).toEqual({ x: 30, y: -10 });
  });

  it('is deterministic for identical inputs', () => {
    const camera = createCamera({ x: 12.5, y: -7 });
    const a = project({ x: 123.4, y: -56.7 }, camera, 3);
    const b = project({ x: 123.4, y: -56.7 }, camera, 3);
    expect(a).toEqual(b);
  });

  it('lifts roofs by height * zoom / K', () => {
    expect(liftHeight(30, createCamera({ zoom: 2 }), 3)).toBe(20);
  });
});

describe('zoom', () => {
  it('bottoms out at exactly the minimum after 30 forward steps', () => {
    let camera = createCamera();
    for (let i = 0; i < 30; i++) {
      camera = zoomCamera(camera, 100, DEFAULT_RENDER_CONFIG);
    }
    expect(camera.zoom).toBe(0.3);
  });

  it('tops out at exactly the maximum', () => {
    let camera = createCamera();
    for (let i = 0; i < 30; i++) {
      camera = zoomCamera(camera, -100, DEFAULT_RENDER_CONFIG);
    }
    expect(camera.zoom).toBe(5);
  });

  it('steps by 0.9 forward and 1.1 backward', () => {
    const camera = createCamera({ zoom: 2 });
    expect(zoomCamera(camera, 1, DEFAULT_RENDER_CONFIG).zoom).toBeCloseTo(1.8, 12);
    expect(zoomCamera(camera, -1, DEFAULT_RENDER_CONFIG).zoom).toBeCloseTo(2.2, 12);
  });

  it('ignores a zero delta', () => {
    const camera = createCamera({ zoom: 2 });
    expect(zoomCamera(camera, 0, DEFAULT_RENDER_CONFIG)).toBe(camera);
  });

  it('clamps arbitrary values into the limits', () => {
    expect(clampZoom(0.01, DEFAULT_RENDER_CONFIG)).toBe(0.3);
    expect(clampZoom(99, DEFAULT_RENDER_CONFIG)).toBe(5);
    expect(clampZoom(1.7, DEFAULT_RENDER_CONFIG)).toBe(1.7);
  });
});

describe('camera helpers', () => {
  it('starts at the origin with the default zoom', () => {
    expect(createCamera()).toEqual({ x: 0, y: 0, zoom: 1.3 });
  });

  it('pans by a display delta', () => {
    expect(panCamera({ x: 10, y: 20, zoom: 1 }, -4, 6)).toEqual({ x: 6, y: 26, zoom: 1 });
  });

  it('centers a planar point in the display', () => {
    const camera = centerCameraOn(createCamera(), { x: 40, y: 15 }, 900, 600);
    const p = project({ x: 40, y: 15 }, camera, 1);
    expect(p.x).toBeCloseTo(450, 9);
    expect(p.y).toBeCloseTo(300, 9);
    expect(camera.zoom).toBe(1.3);
  });
});
