import type { RenderConfig } from './config.js';
import { PALETTE } from './palette.js';
import { rectQuad, type DrawingSurface, type ImageSource } from './surface.js';

/**
 * Working surface dimensions for a display of the given size.
 */
export function workingSize(
  displayWidth: number,
  displayHeight: number,
  pixelScale: number
): { width: number; height: number } {
  return {
    width: Math.max(1, Math.floor(displayWidth / pixelScale)),
    height: Math.max(1, Math.floor(displayHeight / pixelScale)),
  };
}

/**
 * Blow the working surface up onto the display with nearest-neighbour
 * sampling, so each working pixel becomes a crisp K×K block, then lay the
 * optional scanline overlay on top. A display that is not a multiple of K
 * keeps a background strip along its right and bottom edges.
 */
export function composite<TImage extends ImageSource>(
  working: DrawingSurface<TImage>,
  display: DrawingSurface<TImage>,
  config: Pick<RenderConfig, 'pixelScale' | 'scanlines'>
): void {
  const { pixelScale: k, scanlines } = config;
  display.clear();
  display.fillRect(0, 0, display.width, display.height, { color: PALETTE.background });
  display.drawImage(working.snapshot(), rectQuad(0, 0, working.width * k, working.height * k), {
    smoothing: false,
  });

  if (!scanlines.enabled) return;
  for (let y = 0; y < display.height; y += scanlines.spacing) {
    display.fillRect(0, y, display.width, 1, { color: '#000000', alpha: scanlines.alpha });
  }
}
