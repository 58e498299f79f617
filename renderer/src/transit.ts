import type { FrameContext } from './frame.js';
import { PALETTE } from './palette.js';
import type { RailwaySegment, Station } from './scene.js';

/**
 * Rail lines: a dark bed first, then the line colour on top.
 */
export function drawRailways(frame: FrameContext, railways: readonly RailwaySegment[]): void {
  const bedWidth = Math.max(2, Math.floor(3 * frame.detailScale));
  const lineWidth = Math.max(1, Math.floor(2 * frame.detailScale));

  for (const rail of railways) {
    const points = rail.path.map(frame.toScreen);
    frame.surface.strokePolyline(points, {
      color: PALETTE.railBed,
      width: bedWidth,
      cap: 'round',
      join: 'round',
    });
    frame.surface.strokePolyline(points, {
      color: rail.color,
      width: lineWidth,
      cap: 'round',
      join: 'round',
    });
  }
}

export function drawStations(frame: FrameContext, stations: readonly Station[]): void {
  const size = Math.max(2, Math.floor(3 * frame.detailScale));
  const fontSize = Math.max(4, Math.floor(4 * frame.camera.zoom));

  for (const station of stations) {
    const pt = frame.toScreen(station.position);

    // White frame with the line colour inside
    frame.surface.fillRect(pt.x - size, pt.y - size, size * 2, size * 2, {
      color: PALETTE.station.frame,
    });
    frame.surface.fillRect(pt.x - size + 1, pt.y - size + 1, size * 2 - 2, size * 2 - 2, {
      color: station.color,
    });

    if (station.name) {
      frame.surface.fillText(station.name, pt.x, pt.y - size - 2, {
        color: PALETTE.station.label,
        font: { size: fontSize, bold: true },
        align: 'center',
      });
    }
  }
}
