import { describe, it, expect } from 'vitest';
import { DEFAULT_RENDER_CONFIG, resolveRenderConfig } from '../config.js';

describe('resolveRenderConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveRenderConfig()).toEqual(DEFAULT_RENDER_CONFIG);
  });

  it('merges scanline overrides field by field', () => {
    const config = resolveRenderConfig({ pixelScale: 4, scanlines: { enabled: false } });
    expect(config.pixelScale).toBe(4);
    expect(config.scanlines).toEqual({ enabled: false, alpha: 0.06, spacing: 3 });
  });

  it('rejects unusable values', () => {
    expect(() => resolveRenderConfig({ pixelScale: 0 })).toThrow('Invalid pixel scale: 0. Must be at least 1');
    expect(() => resolveRenderConfig({ minZoom: 2, maxZoom: 1 })).toThrow('Invalid zoom limits: [2, 1]');
    expect(() => resolveRenderConfig({ scanlines: { spacing: 0 } })).toThrow('Invalid scanline spacing: 0');
  });
});
