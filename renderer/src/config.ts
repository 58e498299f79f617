/**
 * Render configuration shared by the renderer, compositor and controller.
 */

export interface Vec2 {
  x: number;
  y: number;
}

export interface ScanlineOptions {
  enabled: boolean;
  alpha: number;
  spacing: number; // display rows between scanlines
}

export interface RenderConfig {
  pixelScale: number; // display pixels per working pixel (K)
  detailZoom: number; // zoom / K above which wall details are drawn
  decorationZoom: number; // zoom / K below which ambient decoration is skipped
  lightDirection: Vec2;
  groundOpacity: number;
  minZoom: number;
  maxZoom: number;
  zoomOutStep: number;
  zoomInStep: number;
  clickThreshold: number; // display pixels
  chromeOffset: Vec2; // display offset of the canvas inside its page
  scanlines: ScanlineOptions;
}

/**
 * Single sun direction for every wall in the scene (top-left light).
 */
export const LIGHT_DIRECTION: Readonly<Vec2> = Object.freeze({ x: -0.7071, y: -0.7071 });

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  pixelScale: 3,
  detailZoom: 0.3,
  decorationZoom: 0.35,
  lightDirection: LIGHT_DIRECTION,
  groundOpacity: 0.5,
  minZoom: 0.3,
  maxZoom: 5,
  zoomOutStep: 0.9,
  zoomInStep: 1.1,
  clickThreshold: 5,
  chromeOffset: { x: 0, y: 0 },
  scanlines: {
    enabled: true,
    alpha: 0.06,
    spacing: 3,
  },
};

export type RenderConfigOverrides = Partial<Omit<RenderConfig, 'scanlines'>> & {
  scanlines?: Partial<ScanlineOptions>;
};

/**
 * Merge overrides onto the defaults.
 */
export function resolveRenderConfig(overrides: RenderConfigOverrides = {}): RenderConfig {
  const { scanlines, ...rest } = overrides;
  const config: RenderConfig = {
    ...DEFAULT_RENDER_CONFIG,
    ...rest,
    scanlines: { ...DEFAULT_RENDER_CONFIG.scanlines, ...scanlines },
  };

  if (!(config.pixelScale >= 1)) {
    throw new Error(`Invalid pixel scale: ${config.pixelScale}. Must be at least 1`);
  }
  if (!(config.minZoom > 0) || config.maxZoom < config.minZoom) {
    throw new Error(`Invalid zoom limits: [${config.minZoom}, ${config.maxZoom}]`);
  }
  if (!(config.scanlines.spacing >= 1)) {
    throw new Error(`Invalid scanline spacing: ${config.scanlines.spacing}`);
  }

  return config;
}
