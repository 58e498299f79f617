import {
  CameraController,
  DistrictView,
  admitScene,
  clampZoom,
  createCamera,
  resolveRenderConfig,
  type AdmissionReport,
  type Building,
  type GroundTile,
  type ImageryLoadResult,
} from '@iso-district/renderer';
import { decodeTile } from './decode.js';
import { configOverrides, type CliOptions } from './options.js';
import { RasterSurface, type RasterImage } from './raster.js';

export interface RenderResult {
  image: RasterImage;
  report: AdmissionReport;
  imagery: ImageryLoadResult;
  selection: Building | null;
  buildingCount: number;
  frameCount: number;
}

export type RenderOptions = Omit<CliOptions, 'scenePath' | 'outPath'>;

/**
 * Render a scene payload headlessly: admit it, decode its ground imagery,
 * frame the camera, replay clicks, and return the composed display image.
 */
export async function renderScene(
  payload: unknown,
  options: RenderOptions,
  onTileError: (tile: GroundTile, error: unknown) => void = () => undefined
): Promise<RenderResult> {
  const { scene, report } = admitScene(payload);
  const config = resolveRenderConfig(configOverrides(options));

  const view = new DistrictView<RasterImage>({
    scene,
    config,
    working: new RasterSurface(1, 1),
    display: new RasterSurface(options.width, options.height),
    camera: createCamera({ zoom: clampZoom(options.zoom ?? createCamera().zoom, config) }),
    decodeImage: decodeTile,
    onImageryError: onTileError,
    // Decoded tiles don't trigger renders; one frame is drawn once they have all settled
    schedule: () => undefined,
  });

  if (options.pan) {
    view.setCamera({ ...view.camera, ...options.pan });
  } else {
    view.centerOn(scene);
  }

  const imagery = await view.loadImagery();
  view.render();

  const controller = new CameraController(view);
  for (const click of options.clicks) {
    controller.pointerDown(click.x, click.y);
    controller.pointerUp(click.x, click.y);
  }

  return {
    image: view.snapshot(),
    report,
    imagery,
    selection: view.selection,
    buildingCount: scene.buildings.length,
    frameCount: view.frameCount,
  };
}
