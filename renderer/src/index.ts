/**
 * Isometric district renderer
 *
 * Draws a pixel-art isometric city district from pre-projected planar
 * geometry onto any DrawingSurface, and handles picking and camera input.
 * Backends live elsewhere: a canvas surface in the viewer, an RGBA buffer in
 * the postprocess package.
 */

export {
  DEFAULT_RENDER_CONFIG,
  LIGHT_DIRECTION,
  resolveRenderConfig,
  type RenderConfig,
  type RenderConfigOverrides,
  type ScanlineOptions,
  type Vec2,
} from './config.js';
export {
  ISO_X,
  ISO_Y,
  DEFAULT_ZOOM,
  createCamera,
  project,
  liftHeight,
  clampZoom,
  zoomCamera,
  panCamera,
  centerCameraOn,
  type Camera,
  type PlanarPoint,
  type ScreenPoint,
  type ZoomLimits,
} from './camera.js';
export {
  admitScene,
  defaultRoadWidth,
  sceneCenter,
  USAGE_CATEGORIES,
  ROOFTOP_KINDS,
  type AdmissionReport,
  type Billboard,
  type Building,
  type GroundTile,
  type HeroDecoration,
  type Park,
  type RailwaySegment,
  type Road,
  type RooftopKind,
  type Scene,
  type ScrambleCrossing,
  type Station,
  type UsageCategory,
} from './scene.js';
export { bilinearPoint, lerpPoint, polygonArea } from './geometry.js';
export {
  rectQuad,
  type DitherPattern,
  type DrawingSurface,
  type FillStyle,
  type FontSpec,
  type ImageQuad,
  type ImageSource,
  type LineCap,
  type LineJoin,
  type StrokeStyle,
  type TextAlign,
  type TextStyle,
} from './surface.js';
export { PALETTE, adjustLightness, buildingTones, wallTone, type BuildingTones } from './palette.js';
export { HitTestIndex, type HitBox } from './hitTest.js';
export { isWindowLit, sortByDepth, windowsPerFloor } from './buildings.js';
export { LayeredRenderer } from './renderer.js';
export { composite, workingSize } from './compositor.js';
export { USAGE_LABELS, drawInspector, inspectorLines, layoutInspector, type InspectorLayout } from './inspector.js';
export { GroundImagery, type ImageDecoder, type ImageryLoadResult } from './imagery.js';
export { DistrictView, type DistrictViewOptions, type RenderScheduler, type ViewState } from './view.js';
export { CameraController, type ControllerState, type ControllerTarget, type PointerOutcome } from './controller.js';
