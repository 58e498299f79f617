import { describe, it, expect, vi } from 'vitest';
import {
  CameraController,
  DEFAULT_RENDER_CONFIG,
  createCamera,
  type Camera,
  type ControllerTarget,
} from '@iso-district/renderer';
import { canvasInputHandlers } from '../canvasInput.js';

class FakeView implements ControllerTarget {
  readonly config = DEFAULT_RENDER_CONFIG;
  camera: Camera = createCamera();
  readonly pick = vi.fn(() => null);
  readonly select = vi.fn();
  readonly resize = vi.fn();
  readonly render = vi.fn();

  setCamera(camera: Camera): void {
    this.camera = camera;
  }
}

function setup() {
  const view = new FakeView();
  const controller = new CameraController(view);
  const onDragChange = vi.fn();
  return { view, controller, onDragChange, handlers: canvasInputHandlers(controller, onDragChange) };
}

describe('canvasInputHandlers', () => {
  it('pans by pointer movement while dragging', () => {
    const { view, handlers } = setup();
    handlers.pointerdown({ offsetX: 10, offsetY: 10 });
    handlers.pointermove({ offsetX: 30, offsetY: 20 });

    expect(view.camera).toEqual({ x: 20, y: 10, zoom: 1.3 });
  });

  it('ends a drag when the pointer leaves the canvas', () => {
    const { view, controller, onDragChange, handlers } = setup();
    handlers.pointerdown({ offsetX: 10, offsetY: 10 });
    handlers.pointerleave();
    handlers.pointermove({ offsetX: 200, offsetY: 200 });

    expect(controller.current).toBe('idle');
    expect(view.camera).toEqual(createCamera());
    expect(onDragChange.mock.calls).toEqual([[true], [false]]);
  });

  it('selects on a click release', () => {
    const { view, handlers } = setup();
    handlers.pointerdown({ offsetX: 30, offsetY: 30 });
    handlers.pointerup({ offsetX: 31, offsetY: 30 });

    expect(view.pick).toHaveBeenCalledWith({ x: 31 / 3, y: 10 });
    expect(view.select).toHaveBeenCalledWith(null);
  });

  it('zooms on the wheel without scrolling the page', () => {
    const { view, handlers } = setup();
    const preventDefault = vi.fn();
    handlers.wheel({ deltaY: 100, preventDefault });

    expect(preventDefault).toHaveBeenCalledTimes(1);
    expect(view.camera.zoom).toBeCloseTo(1.3 * 0.9, 10);
  });
});
