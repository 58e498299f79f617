import { decorationsVisible, type FrameContext } from './frame.js';
import { ringCentroid } from './geometry.js';
import { PALETTE } from './palette.js';
import type { ScrambleCrossing } from './scene.js';

export const PEDESTRIAN_COUNT = 40;

/**
 * Crossing area, zebra stripes across every crossing line, then the label.
 */
export function drawScrambleCrossing(frame: FrameContext, scramble: ScrambleCrossing): void {
  const { surface, camera } = frame;

  if (scramble.area) {
    surface.fillPolygon(scramble.area.map(frame.toScreen), { color: PALETTE.crossing });
  }

  const stripeWidth = Math.max(1, Math.floor(camera.zoom));
  const halfWidth = Math.max(1, Math.floor(2 * frame.detailScale));

  for (const crossing of scramble.crossings) {
    const pts = crossing.map(frame.toScreen);
    for (let i = 0; i < pts.length - 1; i++) {
      const dx = pts[i + 1].x - pts[i].x;
      const dy = pts[i + 1].y - pts[i].y;
      const len = Math.hypot(dx, dy);
      if (len === 0) continue;
      const nx = -dy / len;
      const ny = dx / len;
      const stripes = Math.floor(len / (stripeWidth + 1));

      for (let s = 0; s < stripes; s++) {
        const t = (s * (stripeWidth + 1)) / len;
        const cx = pts[i].x + dx * t;
        const cy = pts[i].y + dy * t;
        surface.strokePolyline(
          [
            { x: cx + nx * halfWidth, y: cy + ny * halfWidth },
            { x: cx - nx * halfWidth, y: cy - ny * halfWidth },
          ],
          { color: PALETTE.stripe, width: stripeWidth, cap: 'butt' }
        );
      }
    }
  }

  if (scramble.area && scramble.label) {
    const iso = frame.toScreen(ringCentroid(scramble.area));
    surface.fillText(scramble.label, iso.x, iso.y, {
      color: PALETTE.crossingLabel,
      font: { size: Math.max(5, Math.floor(5 * camera.zoom)), bold: true },
      align: 'center',
    });
  }
}

/**
 * Planar position of pedestrian `p`, scattered around the crossing centre by
 * a fixed trigonometric hash.
 */
export function pedestrianPosition(center: { x: number; y: number }, p: number) {
  return {
    x: center.x + Math.sin(p * 2.4) * 18 + Math.cos(p * 1.7) * 12,
    y: center.y + Math.cos(p * 3.1) * 14 + Math.sin(p * 0.9) * 10,
  };
}

export function drawPedestrians(frame: FrameContext, scramble: ScrambleCrossing): void {
  if (!decorationsVisible(frame) || !scramble.area) return;

  const center = ringCentroid(scramble.area);
  for (let p = 0; p < PEDESTRIAN_COUNT; p++) {
    const iso = frame.toScreen(pedestrianPosition(center, p));
    const x = Math.round(iso.x);
    const y = Math.round(iso.y);
    frame.surface.fillRect(x, y - 1, 1, 1, {
      color: PALETTE.pedestrians[p % PALETTE.pedestrians.length],
    });
    frame.surface.fillRect(x, y - 2, 1, 1, { color: PALETTE.pedestrianHead });
  }
}
