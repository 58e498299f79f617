import type { ScreenPoint } from './camera.js';
import type { FrameContext } from './frame.js';
import { bilinearPoint, polygonArea } from './geometry.js';
import type { HitTestIndex } from './hitTest.js';
import { PALETTE, adjustLightness, buildingTones, wallTone } from './palette.js';
import type { Billboard, Building, HeroDecoration, UsageCategory } from './scene.js';
import type { DrawingSurface } from './surface.js';

// Screen area a roof needs before it gets the checker texture
const DITHER_MIN_ROOF_AREA = 15;

const SHOP_LIKE: ReadonlySet<UsageCategory> = new Set(['shop', 'commercial', 'shop_house', 'shop_apartment']);

export function isShopLike(usage: UsageCategory): boolean {
  return SHOP_LIKE.has(usage);
}

export function windowsPerFloor(usage: UsageCategory): number {
  if (usage === 'office') return 3;
  return isShopLike(usage) ? 1 : 2;
}

/**
 * Lit/dim state of one window cell. A pure function of its indices so a
 * re-render of the same scene lights the same windows.
 */
export function isWindowLit(wall: number, floor: number, window: number): boolean {
  return (wall * 7 + floor * 3 + window) % 3 !== 0;
}

/**
 * Painter's order: far buildings first. Array.prototype.sort is stable, so
 * equal depth keys keep their input order.
 */
export function sortByDepth(buildings: readonly Building[]): Building[] {
  return [...buildings].sort((a, b) => a.anchor.x + a.anchor.y - (b.anchor.x + b.anchor.y));
}

export function detailsVisible(frame: FrameContext, building: Building): boolean {
  return frame.detailScale > frame.config.detailZoom && building.floors >= 2;
}

/** One wall quad in screen space, ground corners g1/g2 and roof corners r1/r2. */
interface WallQuad {
  index: number;
  g1: ScreenPoint;
  g2: ScreenPoint;
  r1: ScreenPoint;
  r2: ScreenPoint;
  tone: string;
}

function wallOutline(wall: WallQuad): ScreenPoint[] {
  return [wall.g1, wall.g2, wall.r2, wall.r1];
}

function wallPoint(wall: WallQuad, u: number, v: number): ScreenPoint {
  return bilinearPoint(wall.g1, wall.g2, wall.r1, wall.r2, u, v);
}

// ---------- Wall details ----------

function drawStorefront(surface: DrawingSurface, wall: WallQuad, building: Building): void {
  const shop = isShopLike(building.usage);
  const ratio = shop ? Math.min(0.3, 2 / building.floors) : 1 / building.floors;

  let fill: string;
  if (shop) {
    fill = adjustLightness(wall.tone, 14);
  } else if (building.usage === 'office') {
    fill = adjustLightness(PALETTE.window.ground, -10);
  } else {
    fill = adjustLightness(wall.tone, 8);
  }
  surface.fillPolygon([wall.g1, wall.g2, wallPoint(wall, 1, ratio), wallPoint(wall, 0, ratio)], {
    color: fill,
  });

  const entrance = wallPoint(wall, 0.5, ratio * 0.5);
  surface.fillRect(Math.round(entrance.x) - 1, Math.round(entrance.y), 2, 1, {
    color: shop ? PALETTE.shopEntrance : PALETTE.window.ground,
  });
}

function drawFloorLines(surface: DrawingSurface, wall: WallQuad, floors: number): void {
  for (let floor = 1; floor < floors; floor++) {
    const v = floor / floors;
    surface.strokePolyline([wallPoint(wall, 0, v), wallPoint(wall, 1, v)], {
      color: PALETTE.floorLine,
      width: 1,
    });
  }
}

function drawWindows(surface: DrawingSurface, wall: WallQuad, building: Building): void {
  const count = windowsPerFloor(building.usage);
  // The ground floor carries the storefront instead of windows
  for (let floor = 1; floor < building.floors; floor++) {
    for (let w = 0; w < count; w++) {
      const pt = wallPoint(wall, (w + 1) / (count + 1), (floor + 0.5) / building.floors);
      surface.fillRect(Math.round(pt.x), Math.round(pt.y), 1, 1, {
        color: isWindowLit(wall.index, floor, w) ? PALETTE.window.lit : PALETTE.window.dim,
      });
    }
  }
}

// ---------- Hero decoration ----------

function widestWall(walls: readonly WallQuad[]): WallQuad {
  let best = walls[0];
  let bestWidth = 0;
  for (const wall of walls) {
    const width = Math.abs(wall.g2.x - wall.g1.x) + Math.abs(wall.g2.y - wall.g1.y);
    if (width > bestWidth) {
      bestWidth = width;
      best = wall;
    }
  }
  return best;
}

function billboardQuad(wall: WallQuad, billboard: Billboard): ScreenPoint[] {
  const { u0, v0, u1, v1 } = billboard;
  return [wallPoint(wall, u0, v0), wallPoint(wall, u1, v0), wallPoint(wall, u1, v1), wallPoint(wall, u0, v1)];
}

function drawRooftopOrnament(surface: DrawingSurface, roof: readonly ScreenPoint[], hero: HeroDecoration): void {
  const cx = Math.round(roof.reduce((sum, p) => sum + p.x, 0) / roof.length);
  const cy = Math.round(roof.reduce((sum, p) => sum + p.y, 0) / roof.length);
  const fill = (x: number, y: number, w: number, h: number, color: string, alpha?: number) =>
    surface.fillRect(cx + x, cy + y, w, h, { color, alpha });
  const { ornament } = PALETTE;

  switch (hero.rooftop) {
    case 'antenna':
      fill(0, -8, 1, 8, ornament.mast);
      fill(-1, -7, 3, 1, ornament.crossbar);
      fill(-1, -5, 3, 1, ornament.crossbar);
      fill(0, -9, 1, 1, ornament.beacon);
      break;
    case 'helipad':
      fill(-3, -2, 6, 4, ornament.pad);
      fill(-2, -1, 1, 3, ornament.marking);
      fill(1, -1, 1, 3, ornament.marking);
      fill(-1, 0, 3, 1, ornament.marking);
      break;
    case 'screen':
      fill(-2, -2, 5, 3, hero.accent);
      fill(-1, -1, 3, 1, ornament.marking, 0.4);
      break;
    case 'billboard_top':
      fill(-1, -5, 1, 4, ornament.post);
      fill(1, -5, 1, 4, ornament.post);
      fill(-2, -7, 5, 3, hero.accent);
      break;
    case 'sign':
      fill(-2, -2, 4, 2, hero.accent);
      fill(-1, -1, 2, 1, ornament.marking);
      break;
    case null:
      break;
  }
}

// ---------- Building ----------

/**
 * Draw one extruded building and record its screen box in the hit index.
 */
export function drawBuilding(frame: FrameContext, building: Building, hitIndex: HitTestIndex): void {
  const { surface } = frame;
  const lift = frame.lift(building.height);
  const tones = buildingTones(building);
  const light = frame.config.lightDirection;
  const ring = building.footprint;

  const ground = ring.map(frame.toScreen);
  const roof = ground.map((p) => ({ x: p.x, y: p.y - lift }));
  hitIndex.add(building, [...ground, ...roof]);

  const details = detailsVisible(frame, building);

  const walls: WallQuad[] = ring.map((point, i) => {
    const j = (i + 1) % ring.length;
    return {
      index: i,
      g1: ground[i],
      g2: ground[j],
      r1: roof[i],
      r2: roof[j],
      tone: wallTone(ring[j].x - point.x, ring[j].y - point.y, tones, light),
    };
  });

  surface.fillPolygon(ground, { color: tones.shadow });

  for (const wall of walls) {
    surface.fillPolygon(wallOutline(wall), { color: wall.tone });
  }

  if (details) {
    for (const wall of walls) {
      drawStorefront(surface, wall, building);
      drawFloorLines(surface, wall, building.floors);
      drawWindows(surface, wall, building);
    }
  }

  if (details && building.hero && building.hero.billboards.length > 0) {
    const wall = widestWall(walls);
    for (const billboard of building.hero.billboards) {
      surface.fillPolygon(billboardQuad(wall, billboard), { color: billboard.color });
    }
  }

  for (const wall of walls) {
    surface.strokePolygon(wallOutline(wall), { color: adjustLightness(wall.tone, -20), width: 1 });
  }

  surface.fillPolygon(roof, { color: tones.roof });
  if (details && polygonArea(roof) > DITHER_MIN_ROOF_AREA) {
    surface.fillPattern(roof, { base: tones.roof, alt: adjustLightness(tones.roof, -6) });
  }
  surface.strokePolygon(roof, { color: adjustLightness(tones.roof, -20), width: 1 });

  if (details && building.hero) {
    drawRooftopOrnament(surface, roof, building.hero);
  }
}

/**
 * Name label floating above the roof at the building anchor.
 */
export function drawBuildingLabel(frame: FrameContext, building: Building): void {
  if (!building.name) return;
  const iso = frame.toScreen(building.anchor);
  frame.surface.fillText(building.name, iso.x, iso.y - frame.lift(building.height) - 4, {
    color: PALETTE.buildingLabel,
    font: { size: Math.max(5, Math.floor(4 * frame.camera.zoom)) },
    align: 'center',
  });
}
