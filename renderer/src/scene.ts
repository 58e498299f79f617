import type { PlanarPoint } from './camera.js';
import { openRing, ringCentroid } from './geometry.js';

export const USAGE_CATEGORIES = [
  'office',
  'shop',
  'hotel',
  'commercial',
  'house',
  'apartment',
  'shop_house',
  'shop_apartment',
  'workshop_house',
  'government',
  'school',
  'transport',
  'factory',
  'unknown',
] as const;

export type UsageCategory = (typeof USAGE_CATEGORIES)[number];

export const ROOFTOP_KINDS = ['antenna', 'helipad', 'screen', 'billboard_top', 'sign'] as const;

export type RooftopKind = (typeof ROOFTOP_KINDS)[number];

export interface Billboard {
  u0: number;
  v0: number;
  u1: number;
  v1: number;
  color: string;
}

export interface HeroDecoration {
  billboards: Billboard[];
  accent: string;
  rooftop: RooftopKind | null;
}

export interface Building {
  id: number;
  name: string;
  footprint: PlanarPoint[]; // open ring, >= 3 points
  anchor: PlanarPoint; // depth key and label position
  height: number; // render units
  surveyedHeight: number; // metres, for display
  floors: number;
  usage: UsageCategory;
  hero: HeroDecoration | null;
}

export interface Road {
  id: number;
  name: string;
  roadClass: string;
  width: number;
  path: PlanarPoint[];
}

export interface RailwaySegment {
  id: number;
  line: string;
  color: string;
  operator: string;
  path: PlanarPoint[];
}

export interface Station {
  id: number;
  name: string;
  line: string;
  color: string;
  position: PlanarPoint;
}

export interface Park {
  id: number;
  name: string;
  area: number;
  position: PlanarPoint;
}

export interface ScrambleCrossing {
  area: PlanarPoint[] | null;
  crossings: PlanarPoint[][];
  label: string;
}

export interface GroundTile {
  id: number;
  topLeft: PlanarPoint;
  topRight: PlanarPoint;
  bottomLeft: PlanarPoint;
  bottomRight: PlanarPoint;
  payload: string; // base64
  mimeType: string;
}

export interface Scene {
  buildings: Building[];
  roads: Road[];
  railways: RailwaySegment[];
  stations: Station[];
  parks: Park[];
  scramble: ScrambleCrossing;
  tiles: GroundTile[];
}

export interface AdmissionReport {
  dropped: {
    buildings: number;
    roads: number;
    railways: number;
    stations: number;
    parks: number;
    crossings: number;
    tiles: number;
  };
  totalDropped: number;
}

export const METERS_PER_FLOOR = 3.5;
export const DEFAULT_LINE_COLOR = '#888888';

const ROAD_WIDTHS: Record<string, number> = {
  primary: 12,
  trunk: 12,
  secondary: 8,
  tertiary: 8,
  pedestrian: 6,
  footway: 3,
  service: 4,
};

export function defaultRoadWidth(roadClass: string): number {
  return ROAD_WIDTHS[roadClass] ?? 5;
}

export function isUsageCategory(value: unknown): value is UsageCategory {
  return typeof value === 'string' && (USAGE_CATEGORIES as readonly string[]).includes(value);
}

function isRooftopKind(value: unknown): value is RooftopKind {
  return typeof value === 'string' && (ROOFTOP_KINDS as readonly string[]).includes(value);
}

// ---------- Untyped payload helpers ----------

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finite(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function text(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function toPoint(value: unknown): PlanarPoint | null {
  if (!isRecord(value)) return null;
  const x = finite(value.x);
  const y = finite(value.y);
  return x === null || y === null ? null : { x, y };
}

function cornerPoint(value: Json, suffix: string): PlanarPoint | null {
  return toPoint({ x: value[`x${suffix}`], y: value[`y${suffix}`] });
}

function toPath(value: unknown): PlanarPoint[] {
  return list(value)
    .map(toPoint)
    .filter((p): p is PlanarPoint => p !== null);
}

// ---------- Entity admission ----------

function admitHero(value: unknown): HeroDecoration | null {
  if (!isRecord(value)) return null;
  const billboards: Billboard[] = [];
  for (const raw of list(value.billboards)) {
    if (!isRecord(raw)) continue;
    const u0 = finite(raw.u0);
    const v0 = finite(raw.v0);
    const u1 = finite(raw.u1);
    const v1 = finite(raw.v1);
    if (u0 === null || v0 === null || u1 === null || v1 === null) continue;
    billboards.push({ u0, v0, u1, v1, color: text(raw.color, '#FFFFFF') });
  }
  return {
    billboards,
    accent: text(value.accent, '#FFFFFF'),
    rooftop: isRooftopKind(value.rooftop) ? value.rooftop : null,
  };
}

function admitBuilding(value: unknown, id: number): Building | null {
  if (!isRecord(value)) return null;
  const footprint = openRing(toPath(value.coords));
  if (footprint.length < 3) return null;

  const height = finite(value.height);
  if (height === null || height <= 0) return null;

  const surveyed = finite(value.height_m);
  const surveyedHeight = surveyed !== null && surveyed > 0 ? surveyed : height;
  const levels = finite(value.levels);
  const floors =
    levels !== null && levels >= 1
      ? Math.floor(levels)
      : Math.max(1, Math.floor(surveyedHeight / METERS_PER_FLOOR));

  const usageValue = value.usage ?? value.type;

  return {
    id,
    name: text(value.name),
    footprint,
    anchor: toPoint(value) ?? ringCentroid(footprint),
    height,
    surveyedHeight,
    floors,
    usage: isUsageCategory(usageValue) ? usageValue : 'unknown',
    hero: admitHero(value.hero),
  };
}

function admitRoad(value: unknown, id: number): Road | null {
  if (!isRecord(value)) return null;
  const path = toPath(value.coords);
  if (path.length < 2) return null;
  const roadClass = text(value.type, 'unclassified');
  const width = finite(value.width);
  return {
    id,
    name: text(value.name),
    roadClass,
    width: width !== null && width > 0 ? width : defaultRoadWidth(roadClass),
    path,
  };
}

function admitRailway(value: unknown, id: number): RailwaySegment | null {
  if (!isRecord(value)) return null;
  const path = toPath(value.coords);
  if (path.length < 2) return null;
  return {
    id,
    line: text(value.name),
    color: text(value.color, DEFAULT_LINE_COLOR),
    operator: text(value.operator),
    path,
  };
}

function admitStation(value: unknown, id: number): Station | null {
  const position = toPoint(value);
  if (!isRecord(value) || !position) return null;
  return {
    id,
    name: text(value.name),
    line: text(value.line),
    color: text(value.color, DEFAULT_LINE_COLOR),
    position,
  };
}

function admitPark(value: unknown, id: number): Park | null {
  const position = toPoint(value);
  if (!isRecord(value) || !position) return null;
  const area = finite(value.area);
  return {
    id,
    name: text(value.name),
    area: area !== null && area > 0 ? area : 0,
    position,
  };
}

function admitTile(value: unknown, id: number): GroundTile | null {
  if (!isRecord(value)) return null;
  const topLeft = cornerPoint(value, '0');
  const topRight = cornerPoint(value, '1');
  const bottomLeft = cornerPoint(value, '2');
  const payload = text(value.data);
  if (!topLeft || !topRight || !bottomLeft || payload.length === 0) return null;
  return {
    id,
    topLeft,
    topRight,
    bottomLeft,
    // Parallelogram completion when the fourth corner is omitted
    bottomRight: cornerPoint(value, '3') ?? {
      x: topRight.x + bottomLeft.x - topLeft.x,
      y: topRight.y + bottomLeft.y - topLeft.y,
    },
    payload,
    mimeType: text(value.mime, 'image/jpeg'),
  };
}

function admitAll<T>(
  values: unknown[],
  admit: (value: unknown, id: number) => T | null
): { admitted: T[]; dropped: number } {
  const admitted: T[] = [];
  let dropped = 0;
  values.forEach((value, index) => {
    const entity = admit(value, index);
    if (entity) {
      admitted.push(entity);
    } else {
      dropped++;
    }
  });
  return { admitted, dropped };
}

/**
 * Admit a scene payload delivered by the data-preparation pipeline.
 *
 * Structurally defective entities are dropped and counted; missing optional
 * attributes take their defaults. Throws only when the payload itself is not
 * an object.
 */
export function admitScene(input: unknown): { scene: Scene; report: AdmissionReport } {
  if (!isRecord(input)) {
    throw new Error('Scene payload must be a JSON object');
  }

  const buildings = admitAll(list(input.buildings), admitBuilding);
  const roads = admitAll(list(input.roads), admitRoad);
  const railways = admitAll(list(input.railways), admitRailway);
  const stations = admitAll(list(input.stations), admitStation);
  const parks = admitAll(list(input.parks), admitPark);
  const tiles = admitAll(list(input.tiles), admitTile);

  const scrambleInput = isRecord(input.scramble) ? input.scramble : {};
  const area = openRing(toPath(scrambleInput.area));
  const crossings = admitAll(list(scrambleInput.crossings), (value) => {
    const path = toPath(value);
    return path.length >= 2 ? path : null;
  });

  const dropped = {
    buildings: buildings.dropped,
    roads: roads.dropped,
    railways: railways.dropped,
    stations: stations.dropped,
    parks: parks.dropped,
    crossings: crossings.dropped,
    tiles: tiles.dropped,
  };

  return {
    scene: {
      buildings: buildings.admitted,
      roads: roads.admitted,
      railways: railways.admitted,
      stations: stations.admitted,
      parks: parks.admitted,
      scramble: {
        area: area.length >= 3 ? area : null,
        crossings: crossings.admitted,
        label: text(scrambleInput.label),
      },
      tiles: tiles.admitted,
    },
    report: {
      dropped,
      totalDropped: Object.values(dropped).reduce((sum, n) => sum + n, 0),
    },
  };
}

/**
 * Mean of all building anchors, used to center the initial view.
 */
export function sceneCenter(scene: Scene): PlanarPoint {
  if (scene.buildings.length === 0) return { x: 0, y: 0 };
  const sum = scene.buildings.reduce(
    (acc, b) => ({ x: acc.x + b.anchor.x, y: acc.y + b.anchor.y }),
    { x: 0, y: 0 }
  );
  return { x: sum.x / scene.buildings.length, y: sum.y / scene.buildings.length };
}
