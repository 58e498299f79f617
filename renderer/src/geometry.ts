import * as THREE from 'three';
import type { PlanarPoint, ScreenPoint } from './camera.js';
import type { Vec2 } from './config.js';

export function lerpPoint(a: Vec2, b: Vec2, t: number): Vec2 {
  return {
    x: THREE.MathUtils.lerp(a.x, b.x, t),
    y: THREE.MathUtils.lerp(a.y, b.y, t),
  };
}

/**
 * A point on a wall face: u runs along the wall, v from ground (0) to roof (1).
 * g1/g2 are the ground corners, r1/r2 the roof corners above them.
 */
export function bilinearPoint(
  g1: ScreenPoint,
  g2: ScreenPoint,
  r1: ScreenPoint,
  r2: ScreenPoint,
  u: number,
  v: number
): ScreenPoint {
  return lerpPoint(lerpPoint(g1, g2, u), lerpPoint(r1, r2, u), v);
}

/**
 * Drop the repeated closing point of a ring, if any.
 */
export function openRing(points: PlanarPoint[]): PlanarPoint[] {
  if (points.length < 2) return points;
  const first = points[0];
  const last = points[points.length - 1];
  return first.x === last.x && first.y === last.y ? points.slice(0, -1) : points;
}

export function ringCentroid(points: readonly Vec2[]): Vec2 {
  const sum = points.reduce((acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }), { x: 0, y: 0 });
  return { x: sum.x / points.length, y: sum.y / points.length };
}

/** Shoelace area, always positive. */
export function polygonArea(points: readonly Vec2[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i++) {
    const j = (i + 1) % points.length;
    area += points[i].x * points[j].y - points[j].x * points[i].y;
  }
  return Math.abs(area) / 2;
}

export function segmentLength(a: Vec2, b: Vec2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
