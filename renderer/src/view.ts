import { centerCameraOn, createCamera, type Camera, type ScreenPoint } from './camera.js';
import { composite, workingSize } from './compositor.js';
import { DEFAULT_RENDER_CONFIG, type RenderConfig } from './config.js';
import { GroundImagery, type ImageDecoder, type ImageryLoadResult } from './imagery.js';
import { drawInspector } from './inspector.js';
import { LayeredRenderer } from './renderer.js';
import { sceneCenter, type Building, type GroundTile, type Scene } from './scene.js';
import type { DrawingSurface, ImageSource } from './surface.js';

/** The only state that changes while the view is up. */
export interface ViewState {
  camera: Camera;
  selection: Building | null;
}

export type RenderScheduler = (frame: () => void) => void;

export interface DistrictViewOptions<TImage extends ImageSource> {
  scene: Scene;
  working: DrawingSurface<TImage>;
  display: DrawingSurface<TImage>;
  config?: RenderConfig;
  camera?: Camera;
  decodeImage?: ImageDecoder<TImage>;
  onImageryError?: (tile: GroundTile, error: unknown) => void;
  /** Defers requested renders, e.g. to the next animation frame. Renders inline by default. */
  schedule?: RenderScheduler;
}

/**
 * Owns the view state, both surfaces, the renderer and the ground imagery,
 * and turns them into composed frames.
 */
export class DistrictView<TImage extends ImageSource = ImageSource> {
  readonly config: RenderConfig;
  readonly state: ViewState;

  private readonly working: DrawingSurface<TImage>;
  private readonly display: DrawingSurface<TImage>;
  private readonly renderer: LayeredRenderer<TImage>;
  private readonly imagery: GroundImagery<TImage> | null;
  private readonly schedule: RenderScheduler;
  private renderQueued = false;
  private frames = 0;

  constructor(options: DistrictViewOptions<TImage>) {
    this.config = options.config ?? DEFAULT_RENDER_CONFIG;
    this.working = options.working;
    this.display = options.display;
    this.schedule = options.schedule ?? ((frame) => frame());

    const { decodeImage } = options;
    this.imagery = decodeImage
      ? new GroundImagery(options.scene.tiles, decodeImage, {
          onDecoded: () => this.requestRender(),
          onError: options.onImageryError,
        })
      : null;
    this.renderer = new LayeredRenderer(options.scene, this.config, (tile) => this.imagery?.imageFor(tile));

    this.state = {
      camera: options.camera ?? createCamera(),
      selection: null,
    };
    this.fitWorkingSurface();
  }

  /**
   * Center the camera on the scene, keeping its zoom.
   */
  centerOn(scene: Scene): void {
    this.state.camera = centerCameraOn(this.state.camera, sceneCenter(scene), this.display.width, this.display.height);
  }

  loadImagery(): Promise<ImageryLoadResult> {
    return this.imagery ? this.imagery.load() : Promise.resolve({ decoded: 0, failed: 0 });
  }

  get camera(): Camera {
    return this.state.camera;
  }

  setCamera(camera: Camera): void {
    this.state.camera = camera;
  }

  get selection(): Building | null {
    return this.state.selection;
  }

  select(building: Building | null): void {
    this.state.selection = building;
  }

  /** Building under a working-surface point in the last rendered frame. */
  pick(point: ScreenPoint): Building | null {
    return this.renderer.hitIndex.pick(point);
  }

  get hitIndex() {
    return this.renderer.hitIndex;
  }

  get frameCount(): number {
    return this.frames;
  }

  resize(displayWidth: number, displayHeight: number): void {
    this.display.resize(displayWidth, displayHeight);
    this.fitWorkingSurface();
  }

  render(): void {
    this.renderQueued = false;
    this.renderer.renderFrame(this.working, this.state.camera);
    composite(this.working, this.display, this.config);
    if (this.state.selection) {
      drawInspector(this.display, this.state.selection);
    }
    this.frames++;
  }

  /** Copy of the composed display surface. */
  snapshot(): TImage {
    return this.display.snapshot();
  }

  /** Queue a render; requests made before it runs collapse into one frame. */
  requestRender(): void {
    if (this.renderQueued) return;
    this.renderQueued = true;
    this.schedule(() => this.render());
  }

  private fitWorkingSurface(): void {
    const size = workingSize(this.display.width, this.display.height, this.config.pixelScale);
    this.working.resize(size.width, size.height);
  }
}
