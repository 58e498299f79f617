import * as THREE from 'three';
import type { Vec2 } from './config.js';

export type PlanarPoint = Vec2;
export type ScreenPoint = Vec2;

export interface Camera {
  x: number; // pan offset, display pixels
  y: number;
  zoom: number;
}

export interface ZoomLimits {
  minZoom: number;
  maxZoom: number;
  zoomOutStep: number;
  zoomInStep: number;
}

// 2:1 isometric basis (cos 45°, and half of it for the squashed axis)
export const ISO_X = 0.70711;
export const ISO_Y = 0.35355;

export const DEFAULT_ZOOM = 1.3;

/**
 * Create a camera. Pan defaults to the origin, zoom to the classic 1.3.
 */
export function createCamera(init: Partial<Camera> = {}): Camera {
  return {
    x: init.x ?? 0,
    y: init.y ?? 0,
    zoom: init.zoom ?? DEFAULT_ZOOM,
  };
}

/**
 * Project a planar point onto the working surface.
 *
 * Every draw routine goes through this function; the result depends only on
 * its arguments so hit boxes and pixels are reproducible.
 */
export function project(point: PlanarPoint, camera: Camera, pixelScale: number): ScreenPoint {
  return {
    x: ((point.x - point.y) * ISO_X * camera.zoom + camera.x) / pixelScale,
    y: ((point.x + point.y) * ISO_Y * camera.zoom + camera.y) / pixelScale,
  };
}

/**
 * Vertical screen offset of a roof at the given height.
 */
export function liftHeight(height: number, camera: Camera, pixelScale: number): number {
  return (height * camera.zoom) / pixelScale;
}

export function clampZoom(zoom: number, limits: Pick<ZoomLimits, 'minZoom' | 'maxZoom'>): number {
  return THREE.MathUtils.clamp(zoom, limits.minZoom, limits.maxZoom);
}

/**
 * Apply one wheel step. Scrolling forward (positive delta) zooms out.
 */
export function zoomCamera(camera: Camera, deltaY: number, limits: ZoomLimits): Camera {
  if (deltaY === 0) return camera;
  const factor = deltaY > 0 ? limits.zoomOutStep : limits.zoomInStep;
  return { ...camera, zoom: clampZoom(camera.zoom * factor, limits) };
}

export function panCamera(camera: Camera, dx: number, dy: number): Camera {
  return { ...camera, x: camera.x + dx, y: camera.y + dy };
}

/**
 * Pan the camera so a planar point lands in the middle of the display.
 */
export function centerCameraOn(
  camera: Camera,
  point: PlanarPoint,
  displayWidth: number,
  displayHeight: number
): Camera {
  return {
    ...camera,
    x: displayWidth / 2 - (point.x - point.y) * ISO_X * camera.zoom,
    y: displayHeight / 2 - (point.x + point.y) * ISO_Y * camera.zoom,
  };
}
