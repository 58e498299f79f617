import { useCallback, useEffect, useRef, useState } from 'react';
import {
  CameraController,
  DistrictView,
  createCamera,
  type RenderConfig,
  type Scene,
} from '@iso-district/renderer';
import { canvasInputHandlers } from '../canvasInput.js';
import { CanvasSurface, type CanvasImage } from '../canvasSurface.js';
import { decodeImage } from '../decodeImage.js';
import Controls from './Controls.js';
import './DistrictCanvas.css';

interface DistrictCanvasProps {
  scene: Scene;
  config: RenderConfig;
}

function DistrictCanvas({ scene, config }: DistrictCanvasProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const viewRef = useRef<DistrictView<CanvasImage> | null>(null);
  const controllerRef = useRef<CameraController | null>(null);
  const [isDragging, setIsDragging] = useState(false);

  // Build the view once per scene
  useEffect(() => {
    const container = containerRef.current;
    const canvas = canvasRef.current;
    if (!container || !canvas) return;

    let disposed = false;
    canvas.width = Math.max(1, container.clientWidth);
    canvas.height = Math.max(1, container.clientHeight);

    const view = new DistrictView<CanvasImage>({
      scene,
      config,
      working: new CanvasSurface(),
      display: new CanvasSurface(canvas),
      decodeImage,
      onImageryError: (tile, err) => {
        console.warn(`Ground tile ${tile.id} failed to decode:`, err);
      },
      schedule: (frame) => {
        requestAnimationFrame(() => {
          if (!disposed) frame();
        });
      },
    });
    view.centerOn(scene);
    view.render();

    const controller = new CameraController(view);
    viewRef.current = view;
    controllerRef.current = controller;

    view.loadImagery().catch((err) => {
      console.error('Ground imagery failed to load:', err);
    });

    const handlers = canvasInputHandlers(controller, setIsDragging);
    canvas.addEventListener('pointerdown', handlers.pointerdown);
    canvas.addEventListener('pointermove', handlers.pointermove);
    canvas.addEventListener('pointerup', handlers.pointerup);
    canvas.addEventListener('pointerleave', handlers.pointerleave);
    // Non-passive so the wheel doesn't scroll the page
    canvas.addEventListener('wheel', handlers.wheel, { passive: false });

    const observer = new ResizeObserver(() => {
      controller.resize(Math.max(1, container.clientWidth), Math.max(1, container.clientHeight));
    });
    observer.observe(container);

    return () => {
      disposed = true;
      observer.disconnect();
      canvas.removeEventListener('pointerdown', handlers.pointerdown);
      canvas.removeEventListener('pointermove', handlers.pointermove);
      canvas.removeEventListener('pointerup', handlers.pointerup);
      canvas.removeEventListener('pointerleave', handlers.pointerleave);
      canvas.removeEventListener('wheel', handlers.wheel);
      viewRef.current = null;
      controllerRef.current = null;
    };
  }, [scene, config]);

  const handleResetView = useCallback(() => {
    const view = viewRef.current;
    if (!view) return;
    view.setCamera(createCamera());
    view.centerOn(scene);
    view.select(null);
    view.render();
  }, [scene]);

  return (
    <div ref={containerRef} className="district-canvas">
      <canvas ref={canvasRef} style={{ cursor: isDragging ? 'grabbing' : 'grab' }} />
      <Controls
        onZoomIn={() => controllerRef.current?.wheel(-1)}
        onZoomOut={() => controllerRef.current?.wheel(1)}
        onResetView={handleResetView}
      />
    </div>
  );
}

export default DistrictCanvas;
