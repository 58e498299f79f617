import { liftHeight, project, type Camera, type PlanarPoint, type ScreenPoint } from './camera.js';
import type { RenderConfig } from './config.js';
import type { DrawingSurface, ImageSource } from './surface.js';

/**
 * Everything a layer needs to draw one frame. Built fresh per frame so the
 * layers stay stateless.
 */
export interface FrameContext<TImage extends ImageSource = ImageSource> {
  surface: DrawingSurface<TImage>;
  camera: Camera;
  config: RenderConfig;
  /** zoom / pixel scale, the ratio every size threshold is expressed in */
  detailScale: number;
  toScreen(point: PlanarPoint): ScreenPoint;
  lift(height: number): number;
}

export function createFrameContext<TImage extends ImageSource>(
  surface: DrawingSurface<TImage>,
  camera: Camera,
  config: RenderConfig
): FrameContext<TImage> {
  const k = config.pixelScale;
  return {
    surface,
    camera,
    config,
    detailScale: camera.zoom / k,
    toScreen: (point) => project(point, camera, k),
    lift: (height) => liftHeight(height, camera, k),
  };
}

/** Ambient decoration (kiosks, trees, pedestrians) is skipped when zoomed out. */
export function decorationsVisible(frame: FrameContext): boolean {
  return frame.detailScale >= frame.config.decorationZoom;
}
