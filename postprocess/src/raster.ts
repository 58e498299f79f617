/**
 * Software RGBA rasterizer implementing the renderer's DrawingSurface.
 *
 * Coverage follows pixel centres: a pixel is painted when its centre falls
 * inside the shape. Colours are straight (non-premultiplied) RGBA composited
 * source-over.
 */

import * as THREE from 'three';
import type {
  DitherPattern,
  DrawingSurface,
  FillStyle,
  FontSpec,
  ImageQuad,
  StrokeStyle,
  TextStyle,
  Vec2,
} from '@iso-district/renderer';
import { loadDefaultFont, type BitmapFont } from './font.js';

export interface RasterImage {
  width: number;
  height: number;
  data: Uint8ClampedArray; // RGBA, row-major
}

interface Rgb {
  r: number;
  g: number;
  b: number;
}

const DISC_SEGMENTS = 16;

const colorCache = new Map<string, Rgb>();

/**
 * Parse a CSS colour into 8-bit sRGB channels.
 */
export function parseColor(color: string): Rgb {
  let rgb = colorCache.get(color);
  if (!rgb) {
    const hex = new THREE.Color(color).getHex();
    rgb = { r: (hex >> 16) & 0xff, g: (hex >> 8) & 0xff, b: hex & 0xff };
    colorCache.set(color, rgb);
  }
  return rgb;
}

// ---------- Coverage ----------

/** First pixel whose centre is at or after `edge`. */
function firstCovered(edge: number): number {
  return Math.ceil(edge - 0.5);
}

type Plot = (x: number, y: number) => void;

function scanPolygon(points: readonly Vec2[], width: number, height: number, plot: Plot): void {
  if (points.length < 3) return;

  let minY = Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minY = Math.min(minY, p.y);
    maxY = Math.max(maxY, p.y);
  }

  const rowStart = Math.max(0, firstCovered(minY));
  const rowEnd = Math.min(height, firstCovered(maxY));
  const crossings: number[] = [];

  for (let py = rowStart; py < rowEnd; py++) {
    const sy = py + 0.5;
    crossings.length = 0;
    for (let i = 0; i < points.length; i++) {
      const a = points[i];
      const b = points[(i + 1) % points.length];
      if ((a.y <= sy && b.y > sy) || (b.y <= sy && a.y > sy)) {
        crossings.push(a.x + ((sy - a.y) * (b.x - a.x)) / (b.y - a.y));
      }
    }
    crossings.sort((m, n) => m - n);

    for (let k = 0; k + 1 < crossings.length; k += 2) {
      const x0 = Math.max(0, firstCovered(crossings[k]));
      const x1 = Math.min(width, firstCovered(crossings[k + 1]));
      for (let px = x0; px < x1; px++) plot(px, py);
    }
  }
}

function bresenham(a: Vec2, b: Vec2, plot: Plot): void {
  let x0 = Math.floor(a.x);
  let y0 = Math.floor(a.y);
  const x1 = Math.floor(b.x);
  const y1 = Math.floor(b.y);
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;

  for (;;) {
    plot(x0, y0);
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x0 += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y0 += sy;
    }
  }
}

function disc(center: Vec2, radius: number): Vec2[] {
  const points: Vec2[] = [];
  for (let i = 0; i < DISC_SEGMENTS; i++) {
    const angle = (i / DISC_SEGMENTS) * Math.PI * 2;
    points.push({ x: center.x + Math.cos(angle) * radius, y: center.y + Math.sin(angle) * radius });
  }
  return points;
}

/**
 * Split a polyline into its "on" pieces under a dash pattern.
 */
export function dashPolyline(points: readonly Vec2[], pattern: readonly number[]): Vec2[][] {
  if (pattern.reduce((sum, n) => sum + n, 0) <= 0) return [[...points]];

  const pieces: Vec2[][] = [];
  let index = 0;
  let remaining = pattern[0];
  let on = true;
  let current: Vec2[] = [points[0]];

  for (let i = 0; i + 1 < points.length; i++) {
    const a = points[i];
    const b = points[i + 1];
    const len = Math.hypot(b.x - a.x, b.y - a.y);
    let travelled = 0;

    while (len - travelled > remaining) {
      travelled += remaining;
      const t = travelled / len;
      const p = { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
      if (on) {
        current.push(p);
        pieces.push(current);
      } else {
        current = [p];
      }
      on = !on;
      index = (index + 1) % pattern.length;
      remaining = pattern[index];
    }

    remaining -= len - travelled;
    if (on) current.push(b);
  }

  if (on && current.length >= 2) pieces.push(current);
  return pieces;
}

// ---------- Surface ----------

export class RasterSurface implements DrawingSurface<RasterImage> {
  private pixels: Uint8ClampedArray;

  constructor(
    private w: number,
    private h: number,
    private readonly font: BitmapFont = loadDefaultFont()
  ) {
    this.pixels = new Uint8ClampedArray(w * h * 4);
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  resize(width: number, height: number): void {
    this.w = width;
    this.h = height;
    this.pixels = new Uint8ClampedArray(width * height * 4);
  }

  clear(): void {
    this.pixels.fill(0);
  }

  /** RGBA of one pixel, for inspection. */
  pixelAt(x: number, y: number): [number, number, number, number] {
    const i = (y * this.w + x) * 4;
    const d = this.pixels;
    return [d[i], d[i + 1], d[i + 2], d[i + 3]];
  }

  private blend(x: number, y: number, rgb: Rgb, alpha: number): void {
    if (x < 0 || y < 0 || x >= this.w || y >= this.h || alpha <= 0) return;
    const d = this.pixels;
    const i = (y * this.w + x) * 4;

    if (alpha >= 1) {
      d[i] = rgb.r;
      d[i + 1] = rgb.g;
      d[i + 2] = rgb.b;
      d[i + 3] = 255;
      return;
    }

    const dstA = d[i + 3] / 255;
    const keep = dstA * (1 - alpha);
    const outA = alpha + keep;
    d[i] = (rgb.r * alpha + d[i] * keep) / outA;
    d[i + 1] = (rgb.g * alpha + d[i + 1] * keep) / outA;
    d[i + 2] = (rgb.b * alpha + d[i + 2] * keep) / outA;
    d[i + 3] = outA * 255;
  }

  /** Paint a set of pixel indices once each, so overlapping pieces don't double the alpha. */
  private paintMask(mask: Set<number>, color: string, alpha = 1): void {
    const rgb = parseColor(color);
    for (const index of mask) {
      this.blend(index % this.w, Math.floor(index / this.w), rgb, alpha);
    }
  }

  private collector(mask: Set<number>): Plot {
    return (x, y) => {
      if (x >= 0 && y >= 0 && x < this.w && y < this.h) mask.add(y * this.w + x);
    };
  }

  fillRect(x: number, y: number, width: number, height: number, style: FillStyle): void {
    const rgb = parseColor(style.color);
    const alpha = style.alpha ?? 1;
    const x0 = Math.max(0, firstCovered(x));
    const x1 = Math.min(this.w, firstCovered(x + width));
    const y0 = Math.max(0, firstCovered(y));
    const y1 = Math.min(this.h, firstCovered(y + height));
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) this.blend(px, py, rgb, alpha);
    }
  }

  strokeRect(x: number, y: number, width: number, height: number, style: StrokeStyle): void {
    this.strokePolygon(
      [
        { x, y },
        { x: x + width, y },
        { x: x + width, y: y + height },
        { x, y: y + height },
      ],
      style
    );
  }

  fillPolygon(points: readonly Vec2[], style: FillStyle): void {
    const rgb = parseColor(style.color);
    const alpha = style.alpha ?? 1;
    scanPolygon(points, this.w, this.h, (x, y) => this.blend(x, y, rgb, alpha));
  }

  strokePolygon(points: readonly Vec2[], style: StrokeStyle): void {
    this.strokePath(points, true, style);
  }

  strokePolyline(points: readonly Vec2[], style: StrokeStyle): void {
    this.strokePath(points, false, style);
  }

  private strokePath(points: readonly Vec2[], closed: boolean, style: StrokeStyle): void {
    if (points.length < 2) return;
    const path = closed ? [...points, points[0]] : [...points];
    const pieces = style.dash && style.dash.length > 0 ? dashPolyline(path, style.dash) : [path];
    const mask = new Set<number>();
    const plot = this.collector(mask);

    for (const piece of pieces) {
      if (style.width <= 1 && style.cap !== 'round') {
        for (let i = 0; i + 1 < piece.length; i++) bresenham(piece[i], piece[i + 1], plot);
      } else {
        this.thickPiece(piece, closed && pieces.length === 1, style, plot);
      }
    }
    this.paintMask(mask, style.color, style.alpha);
  }

  private thickPiece(piece: readonly Vec2[], closed: boolean, style: StrokeStyle, plot: Plot): void {
    const half = style.width / 2;
    const cap = style.cap ?? 'butt';
    const normals: Array<Vec2 | null> = [];

    for (let i = 0; i + 1 < piece.length; i++) {
      const a = piece[i];
      const b = piece[i + 1];
      const len = Math.hypot(b.x - a.x, b.y - a.y);
      if (len === 0) {
        normals.push(null);
        continue;
      }
      const ux = (b.x - a.x) / len;
      const uy = (b.y - a.y) / len;
      const nx = -uy * half;
      const ny = ux * half;
      normals.push({ x: nx, y: ny });

      const squareCaps = cap === 'square' && !closed;
      const startExt = squareCaps && i === 0 ? half : 0;
      const endExt = squareCaps && i === piece.length - 2 ? half : 0;
      const s = { x: a.x - ux * startExt, y: a.y - uy * startExt };
      const e = { x: b.x + ux * endExt, y: b.y + uy * endExt };

      scanPolygon(
        [
          { x: s.x + nx, y: s.y + ny },
          { x: e.x + nx, y: e.y + ny },
          { x: e.x - nx, y: e.y - ny },
          { x: s.x - nx, y: s.y - ny },
        ],
        this.w,
        this.h,
        plot
      );
    }

    // Joins between consecutive segments
    const joins = closed ? piece.length - 1 : piece.length - 2;
    for (let j = 0; j < joins; j++) {
      const vertex = piece[j + 1];
      const before = normals[j];
      const after = normals[(j + 1) % normals.length];
      if (style.join === 'round') {
        scanPolygon(disc(vertex, half), this.w, this.h, plot);
      } else if (before && after) {
        for (const side of [1, -1]) {
          scanPolygon(
            [
              vertex,
              { x: vertex.x + before.x * side, y: vertex.y + before.y * side },
              { x: vertex.x + after.x * side, y: vertex.y + after.y * side },
            ],
            this.w,
            this.h,
            plot
          );
        }
      }
    }

    if (cap === 'round' && !closed) {
      scanPolygon(disc(piece[0], half), this.w, this.h, plot);
      scanPolygon(disc(piece[piece.length - 1], half), this.w, this.h, plot);
    }
  }

  fillPattern(clip: readonly Vec2[], pattern: DitherPattern): void {
    const base = parseColor(pattern.base);
    const alt = parseColor(pattern.alt);
    scanPolygon(clip, this.w, this.h, (x, y) => this.blend(x, y, (x & 1) === (y & 1) ? alt : base, 1));
  }

  fillText(text: string, x: number, y: number, style: TextStyle): void {
    const { size, bold } = style.font;
    const width = this.font.measure(text, size);
    let left = x;
    if (style.align === 'center') left -= width / 2;
    else if (style.align === 'right') left -= width;

    // y is the baseline; glyphs sit on it
    const top = Math.round(y) - this.font.glyphHeight * this.font.scale(size);
    const mask = new Set<number>();
    const plot = this.collector(mask);
    this.font.forEachPixel(text, size, Math.round(left), top, (px, py) => {
      plot(px, py);
      if (bold) plot(px + 1, py);
    });
    this.paintMask(mask, style.color, style.alpha);
  }

  measureText(text: string, font: FontSpec): number {
    return this.font.measure(text, font.size);
  }

  drawImage(image: RasterImage, quad: ImageQuad, options: { alpha?: number; smoothing?: boolean } = {}): void {
    const alpha = options.alpha ?? 1;
    const { origin, right, down } = quad;
    const e1 = { x: right.x - origin.x, y: right.y - origin.y };
    const e2 = { x: down.x - origin.x, y: down.y - origin.y };
    const det = e1.x * e2.y - e1.y * e2.x;
    if (det === 0 || image.width === 0 || image.height === 0) return;

    const corners = [origin, right, down, { x: right.x + e2.x, y: right.y + e2.y }];
    const x0 = Math.max(0, Math.floor(Math.min(...corners.map((c) => c.x))));
    const x1 = Math.min(this.w, Math.ceil(Math.max(...corners.map((c) => c.x))));
    const y0 = Math.max(0, Math.floor(Math.min(...corners.map((c) => c.y))));
    const y1 = Math.min(this.h, Math.ceil(Math.max(...corners.map((c) => c.y))));
    const rgb: Rgb = { r: 0, g: 0, b: 0 };

    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        const qx = px + 0.5 - origin.x;
        const qy = py + 0.5 - origin.y;
        const u = (qx * e2.y - qy * e2.x) / det;
        const v = (e1.x * qy - e1.y * qx) / det;
        if (u < 0 || u >= 1 || v < 0 || v >= 1) continue;

        const a = options.smoothing
          ? sampleBilinear(image, u * image.width - 0.5, v * image.height - 0.5, rgb)
          : sampleNearest(image, u * image.width, v * image.height, rgb);
        this.blend(px, py, rgb, a * alpha);
      }
    }
  }

  snapshot(): RasterImage {
    return { width: this.w, height: this.h, data: this.pixels.slice() };
  }
}

// ---------- Sampling ----------

function sampleNearest(image: RasterImage, sx: number, sy: number, out: Rgb): number {
  const x = Math.min(image.width - 1, Math.floor(sx));
  const y = Math.min(image.height - 1, Math.floor(sy));
  const i = (y * image.width + x) * 4;
  out.r = image.data[i];
  out.g = image.data[i + 1];
  out.b = image.data[i + 2];
  return image.data[i + 3] / 255;
}

function sampleBilinear(image: RasterImage, sx: number, sy: number, out: Rgb): number {
  const clampX = (x: number) => THREE.MathUtils.clamp(x, 0, image.width - 1);
  const clampY = (y: number) => THREE.MathUtils.clamp(y, 0, image.height - 1);
  const x0 = clampX(Math.floor(sx));
  const y0 = clampY(Math.floor(sy));
  const x1 = clampX(x0 + 1);
  const y1 = clampY(y0 + 1);
  const fx = THREE.MathUtils.clamp(sx - Math.floor(sx), 0, 1);
  const fy = THREE.MathUtils.clamp(sy - Math.floor(sy), 0, 1);

  const channel = (c: number) => {
    const at = (x: number, y: number) => image.data[(y * image.width + x) * 4 + c];
    const top = THREE.MathUtils.lerp(at(x0, y0), at(x1, y0), fx);
    const bottom = THREE.MathUtils.lerp(at(x0, y1), at(x1, y1), fx);
    return THREE.MathUtils.lerp(top, bottom, fy);
  };

  out.r = channel(0);
  out.g = channel(1);
  out.b = channel(2);
  return channel(3) / 255;
}
