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

export type CanvasImage = HTMLCanvasElement | ImageBitmap;

const FONT_FAMILY = '"Courier New", monospace';

function fontString(font: FontSpec): string {
  return `${font.bold ? 'bold ' : ''}${font.size}px ${FONT_FAMILY}`;
}

function createCanvas(width: number, height: number): HTMLCanvasElement {
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  return canvas;
}

function context2d(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('Canvas 2D context is not available');
  return ctx;
}

/**
 * DrawingSurface over a browser canvas.
 */
export class CanvasSurface implements DrawingSurface<CanvasImage> {
  readonly canvas: HTMLCanvasElement;
  private readonly ctx: CanvasRenderingContext2D;
  private readonly patterns = new Map<string, CanvasPattern>();

  constructor(canvas: HTMLCanvasElement = createCanvas(1, 1)) {
    this.canvas = canvas;
    this.ctx = context2d(canvas);
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  resize(width: number, height: number): void {
    if (this.canvas.width === width && this.canvas.height === height) return;
    this.canvas.width = width;
    this.canvas.height = height;
  }

  clear(): void {
    this.ctx.clearRect(0, 0, this.canvas.width, this.canvas.height);
  }

  fillRect(x: number, y: number, width: number, height: number, style: FillStyle): void {
    const { ctx } = this;
    ctx.globalAlpha = style.alpha ?? 1;
    ctx.fillStyle = style.color;
    ctx.fillRect(x, y, width, height);
  }

  strokeRect(x: number, y: number, width: number, height: number, style: StrokeStyle): void {
    this.applyStroke(style);
    this.ctx.strokeRect(x, y, width, height);
  }

  fillPolygon(points: readonly Vec2[], style: FillStyle): void {
    if (points.length < 3) return;
    const { ctx } = this;
    this.tracePath(points, true);
    ctx.globalAlpha = style.alpha ?? 1;
    ctx.fillStyle = style.color;
    ctx.fill('evenodd');
  }

  strokePolygon(points: readonly Vec2[], style: StrokeStyle): void {
    if (points.length < 2) return;
    this.tracePath(points, true);
    this.applyStroke(style);
    this.ctx.stroke();
  }

  strokePolyline(points: readonly Vec2[], style: StrokeStyle): void {
    if (points.length < 2) return;
    this.tracePath(points, false);
    this.applyStroke(style);
    this.ctx.stroke();
  }

  fillPattern(clip: readonly Vec2[], pattern: DitherPattern): void {
    if (clip.length < 3) return;
    const { ctx } = this;
    this.tracePath(clip, true);
    ctx.globalAlpha = 1;
    ctx.fillStyle = this.patternFor(pattern);
    ctx.fill('evenodd');
  }

  fillText(text: string, x: number, y: number, style: TextStyle): void {
    const { ctx } = this;
    ctx.globalAlpha = style.alpha ?? 1;
    ctx.font = fontString(style.font);
    ctx.textAlign = style.align ?? 'left';
    ctx.textBaseline = 'alphabetic';
    ctx.fillStyle = style.color;
    ctx.fillText(text, x, y);
  }

  measureText(text: string, font: FontSpec): number {
    this.ctx.font = fontString(font);
    return this.ctx.measureText(text).width;
  }

  drawImage(image: CanvasImage, quad: ImageQuad, options: { alpha?: number; smoothing?: boolean } = {}): void {
    if (image.width === 0 || image.height === 0) return;
    const { ctx } = this;
    const { origin, right, down } = quad;

    ctx.save();
    ctx.globalAlpha = options.alpha ?? 1;
    ctx.imageSmoothingEnabled = options.smoothing ?? false;
    // Map the unit image square onto the quad
    ctx.setTransform(
      (right.x - origin.x) / image.width,
      (right.y - origin.y) / image.width,
      (down.x - origin.x) / image.height,
      (down.y - origin.y) / image.height,
      origin.x,
      origin.y
    );
    ctx.drawImage(image, 0, 0);
    ctx.restore();
  }

  /** The canvas itself, not a copy: it changes with the next draw call. */
  snapshot(): HTMLCanvasElement {
    return this.canvas;
  }

  // ---------- Helpers ----------

  private tracePath(points: readonly Vec2[], closed: boolean): void {
    const { ctx } = this;
    ctx.beginPath();
    ctx.moveTo(points[0].x, points[0].y);
    for (let i = 1; i < points.length; i++) ctx.lineTo(points[i].x, points[i].y);
    if (closed) ctx.closePath();
  }

  private applyStroke(style: StrokeStyle): void {
    const { ctx } = this;
    ctx.globalAlpha = style.alpha ?? 1;
    ctx.strokeStyle = style.color;
    ctx.lineWidth = style.width;
    ctx.lineCap = style.cap ?? 'butt';
    ctx.lineJoin = style.join ?? 'miter';
    ctx.setLineDash(style.dash ? [...style.dash] : []);
  }

  /** 2×2 checker tile: alt on the diagonal starting at the origin. */
  private patternFor({ base, alt }: DitherPattern): CanvasPattern {
    const key = `${base}|${alt}`;
    let pattern = this.patterns.get(key);
    if (!pattern) {
      const tile = createCanvas(2, 2);
      const tctx = context2d(tile);
      tctx.fillStyle = base;
      tctx.fillRect(0, 0, 2, 2);
      tctx.fillStyle = alt;
      tctx.fillRect(0, 0, 1, 1);
      tctx.fillRect(1, 1, 1, 1);
      const created = this.ctx.createPattern(tile, 'repeat');
      if (!created) throw new Error('Could not create dither pattern');
      pattern = created;
      this.patterns.set(key, pattern);
    }
    return pattern;
  }
}
