import type { Vec2 } from './config.js';

export type LineCap = 'butt' | 'round' | 'square';
export type LineJoin = 'miter' | 'round' | 'bevel';
export type TextAlign = 'left' | 'center' | 'right';

export interface FillStyle {
  color: string; // '#rrggbb'
  alpha?: number;
}

export interface StrokeStyle {
  color: string;
  width: number;
  cap?: LineCap;
  join?: LineJoin;
  dash?: readonly number[];
  alpha?: number;
}

export interface FontSpec {
  size: number; // pixels
  bold?: boolean;
}

export interface TextStyle {
  color: string;
  font: FontSpec;
  align?: TextAlign;
  alpha?: number;
}

/** Two colours of a 2×2 checker; `alt` lands on (0,0) and (1,1). */
export interface DitherPattern {
  base: string;
  alt: string;
}

/**
 * Target parallelogram of an image blit: the source's top-left corner lands
 * on `origin`, its top-right on `right` and its bottom-left on `down`.
 */
export interface ImageQuad {
  origin: Vec2;
  right: Vec2;
  down: Vec2;
}

export interface ImageSource {
  width: number;
  height: number;
}

/**
 * Raster drawing target. The renderer draws through this contract only, so
 * the same frame can land on a browser canvas or on an in-memory RGBA buffer.
 */
export interface DrawingSurface<TImage extends ImageSource = ImageSource> {
  readonly width: number;
  readonly height: number;

  resize(width: number, height: number): void;
  /** Reset every pixel to transparent. */
  clear(): void;

  fillRect(x: number, y: number, width: number, height: number, style: FillStyle): void;
  strokeRect(x: number, y: number, width: number, height: number, style: StrokeStyle): void;
  fillPolygon(points: readonly Vec2[], style: FillStyle): void;
  strokePolygon(points: readonly Vec2[], style: StrokeStyle): void;
  strokePolyline(points: readonly Vec2[], style: StrokeStyle): void;
  /** Fill the polygon with a repeating 2×2 pattern anchored at the surface origin. */
  fillPattern(clip: readonly Vec2[], pattern: DitherPattern): void;

  fillText(text: string, x: number, y: number, style: TextStyle): void;
  measureText(text: string, font: FontSpec): number;

  drawImage(image: TImage, quad: ImageQuad, options?: { alpha?: number; smoothing?: boolean }): void;
  /**
   * The current pixels as an image another surface can draw. Backends may
   * hand out a live view, so draw it before drawing here again.
   */
  snapshot(): TImage;
}

/**
 * Axis-aligned destination quad for a plain rectangle blit.
 */
export function rectQuad(x: number, y: number, width: number, height: number): ImageQuad {
  return {
    origin: { x, y },
    right: { x: x + width, y },
    down: { x, y: y + height },
  };
}
