import type { FrameContext } from './frame.js';
import { PALETTE } from './palette.js';
import type { GroundTile, Park } from './scene.js';
import type { ImageSource } from './surface.js';

export type TileImageLookup<TImage> = (tile: GroundTile) => TImage | undefined;

/**
 * Aerial tiles, mapped onto the isometric ground by their three projected
 * corners. Tiles without a decoded image are skipped.
 */
export function drawGroundTiles<TImage extends ImageSource>(
  frame: FrameContext<TImage>,
  tiles: readonly GroundTile[],
  imageFor: TileImageLookup<TImage>
): void {
  for (const tile of tiles) {
    const image = imageFor(tile);
    if (!image) continue;
    frame.surface.drawImage(
      image,
      {
        origin: frame.toScreen(tile.topLeft),
        right: frame.toScreen(tile.topRight),
        down: frame.toScreen(tile.bottomLeft),
      },
      { alpha: frame.config.groundOpacity }
    );
  }
}

function diamond(cx: number, cy: number, size: number) {
  return [
    { x: cx, y: cy - size },
    { x: cx + size * 1.5, y: cy },
    { x: cx, y: cy + size },
    { x: cx - size * 1.5, y: cy },
  ];
}

export function parkMarkerSize(park: Park, detailScale: number): number {
  return Math.max(2, Math.floor(Math.sqrt(park.area) * 0.008 * detailScale));
}

export function drawParks(frame: FrameContext, parks: readonly Park[]): void {
  const { surface } = frame;

  for (const park of parks) {
    const iso = frame.toScreen(park.position);
    const size = parkMarkerSize(park, frame.detailScale);
    const px = Math.round(iso.x);
    const py = Math.round(iso.y);

    surface.fillPolygon(diamond(px, py, size), { color: PALETTE.park.ground });

    if (size > 2) {
      surface.fillPolygon(diamond(px, py, size * 0.6), { color: PALETTE.park.inner });
    }

    if (size > 3) {
      for (let t = 0; t < Math.min(4, size); t++) {
        const tx = Math.round(px + Math.sin(t * 2.1) * size * 0.8);
        const ty = Math.round(py + Math.cos(t * 2.1) * size * 0.4);
        surface.fillRect(tx, ty - 2, 1, 1, { color: PALETTE.park.treeDark });
        surface.fillRect(tx - 1, ty - 1, 3, 1, { color: PALETTE.park.treeLight });
        surface.fillRect(tx, ty, 1, 1, { color: PALETTE.park.treeDark });
      }
    }

    if (park.name && park.area > 2000 && frame.detailScale > frame.config.decorationZoom) {
      surface.fillText(park.name, px, py - size - 2, {
        color: PALETTE.park.label,
        font: { size: Math.max(3, Math.floor(3 * frame.detailScale)) },
        align: 'center',
      });
    }
  }
}
