import { panCamera, zoomCamera, type Camera, type ScreenPoint } from './camera.js';
import type { RenderConfig, Vec2 } from './config.js';
import type { Building } from './scene.js';

/**
 * What the controller needs from the view. DistrictView satisfies it; tests
 * can hand in a plain object.
 */
export interface ControllerTarget {
  readonly config: RenderConfig;
  readonly camera: Camera;
  setCamera(camera: Camera): void;
  pick(point: ScreenPoint): Building | null;
  select(building: Building | null): void;
  resize(width: number, height: number): void;
  render(): void;
}

export type ControllerState = 'idle' | 'dragging';

export type PointerOutcome = 'click' | 'drag' | 'none';

/**
 * Pointer and wheel state machine. A press and release closer together than
 * the click threshold select whatever lies under the pointer; anything
 * further is a pan.
 */
export class CameraController {
  private state: ControllerState = 'idle';
  private pressPosition: Vec2 = { x: 0, y: 0 };
  private lastPosition: Vec2 = { x: 0, y: 0 };

  constructor(private readonly target: ControllerTarget) {}

  get current(): ControllerState {
    return this.state;
  }

  pointerDown(x: number, y: number): void {
    this.state = 'dragging';
    this.pressPosition = { x, y };
    this.lastPosition = { x, y };
  }

  pointerMove(x: number, y: number): void {
    if (this.state !== 'dragging') return;
    const { target } = this;
    target.setCamera(panCamera(target.camera, x - this.lastPosition.x, y - this.lastPosition.y));
    this.lastPosition = { x, y };
    target.render();
  }

  pointerUp(x: number, y: number): PointerOutcome {
    if (this.state !== 'dragging') return 'none';
    this.state = 'idle';

    const { config } = this.target;
    const distance = Math.hypot(x - this.pressPosition.x, y - this.pressPosition.y);
    if (distance >= config.clickThreshold) return 'drag';

    const k = config.pixelScale;
    const hit = this.target.pick({
      x: (x - config.chromeOffset.x) / k,
      y: (y - config.chromeOffset.y) / k,
    });
    this.target.select(hit);
    this.target.render();
    return 'click';
  }

  /** Pointer left the canvas: abandon any drag, keep the selection. */
  pointerLeave(): void {
    this.state = 'idle';
  }

  wheel(deltaY: number): void {
    if (deltaY === 0) return;
    const { target } = this;
    target.setCamera(zoomCamera(target.camera, deltaY, target.config));
    target.render();
  }

  resize(width: number, height: number): void {
    this.target.resize(width, height);
    this.target.render();
  }
}
