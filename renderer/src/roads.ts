import { decorationsVisible, type FrameContext } from './frame.js';
import { PALETTE } from './palette.js';
import type { Road } from './scene.js';

const NO_CENTER_LINE = new Set(['footway', 'pedestrian']);
const NO_KIOSKS = new Set(['footway', 'path']);
const TREE_LINED = new Set(['pedestrian', 'living_street']);

export function roadStrokeWidth(road: Road, detailScale: number): number {
  return Math.max(1, Math.floor(road.width * detailScale));
}

/**
 * Road bodies (edge, fill, dashed centre line), then the road names on top
 * of all of them.
 */
export function drawRoads(frame: FrameContext, roads: readonly Road[]): void {
  const { surface } = frame;

  for (const road of roads) {
    const points = road.path.map(frame.toScreen);
    const w = roadStrokeWidth(road, frame.detailScale);

    surface.strokePolyline(points, { color: PALETTE.roadEdge, width: w + 1, cap: 'square', join: 'miter' });
    surface.strokePolyline(points, { color: PALETTE.road, width: w, cap: 'square', join: 'miter' });

    if (!NO_CENTER_LINE.has(road.roadClass) && w > 2) {
      surface.strokePolyline(points, {
        color: PALETTE.roadCenterLine,
        width: 1,
        cap: 'square',
        join: 'miter',
        dash: [2, 3],
      });
    }
  }

  const font = { size: Math.max(4, Math.floor(3 * frame.camera.zoom)) };
  for (const road of roads) {
    if (!road.name || road.roadClass === 'footway') continue;
    const mid = frame.toScreen(road.path[Math.floor(road.path.length / 2)]);
    surface.fillText(road.name, mid.x, mid.y - 2, { color: PALETTE.roadName, font, align: 'center' });
  }
}

/**
 * Vending kiosks beside every third segment of vehicular roads, offset
 * perpendicular to the road by its width plus two.
 */
export function drawKiosks(frame: FrameContext, roads: readonly Road[]): void {
  if (!decorationsVisible(frame)) return;

  for (const road of roads) {
    if (NO_KIOSKS.has(road.roadClass)) continue;
    const pts = road.path;
    for (let i = 0; i < pts.length - 1; i += 3) {
      const dx = pts[i + 1].x - pts[i].x;
      const dy = pts[i + 1].y - pts[i].y;
      const len = Math.hypot(dx, dy);
      if (len < 1) continue;

      const offset = road.width + 2;
      const iso = frame.toScreen({
        x: (pts[i].x + pts[i + 1].x) / 2 + (-dy / len) * offset,
        y: (pts[i].y + pts[i + 1].y) / 2 + (dx / len) * offset,
      });
      const x = Math.round(iso.x);
      const y = Math.round(iso.y);
      const body = PALETTE.kiosks[(i * 7) % PALETTE.kiosks.length];

      frame.surface.fillRect(x, y - 2, 1, 2, { color: body });
      frame.surface.fillRect(x, y - 3, 1, 1, { color: PALETTE.kioskLight });
    }
  }
}

/**
 * Small trees on every fourth vertex of pedestrian streets.
 */
export function drawStreetTrees(frame: FrameContext, roads: readonly Road[]): void {
  if (!decorationsVisible(frame)) return;

  const { surface } = frame;
  for (const road of roads) {
    if (!TREE_LINED.has(road.roadClass)) continue;
    for (let i = 0; i < road.path.length - 1; i += 4) {
      const iso = frame.toScreen(road.path[i]);
      const x = Math.round(iso.x);
      const y = Math.round(iso.y);
      surface.fillRect(x, y - 4, 1, 1, { color: PALETTE.tree.canopyDark });
      surface.fillRect(x - 1, y - 3, 3, 1, { color: PALETTE.tree.canopyLight });
      surface.fillRect(x, y - 2, 1, 1, { color: PALETTE.tree.canopyDark });
      surface.fillRect(x, y - 1, 1, 1, { color: PALETTE.tree.trunk });
    }
  }
}
