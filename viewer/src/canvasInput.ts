import type { CameraController } from '@iso-district/renderer';

interface PointerPosition {
  offsetX: number;
  offsetY: number;
}

interface WheelInput {
  deltaY: number;
  preventDefault(): void;
}

export interface CanvasInputHandlers {
  pointerdown(e: PointerPosition): void;
  pointermove(e: PointerPosition): void;
  pointerup(e: PointerPosition): void;
  pointerleave(): void;
  wheel(e: WheelInput): void;
}

/**
 * DOM event handlers for the district canvas. The pointer is not captured,
 * so leaving the canvas mid-drag ends the drag.
 */
export function canvasInputHandlers(
  controller: CameraController,
  onDragChange: (dragging: boolean) => void = () => undefined
): CanvasInputHandlers {
  return {
    pointerdown(e) {
      controller.pointerDown(e.offsetX, e.offsetY);
      onDragChange(true);
    },
    pointermove(e) {
      controller.pointerMove(e.offsetX, e.offsetY);
    },
    pointerup(e) {
      controller.pointerUp(e.offsetX, e.offsetY);
      onDragChange(false);
    },
    pointerleave() {
      controller.pointerLeave();
      onDragChange(false);
    },
    wheel(e) {
      e.preventDefault();
      controller.wheel(e.deltaY);
    },
  };
}
