import { drawBuilding, drawBuildingLabel, sortByDepth } from './buildings.js';
import type { Camera } from './camera.js';
import type { RenderConfig } from './config.js';
import { drawPedestrians, drawScrambleCrossing } from './crossing.js';
import { createFrameContext } from './frame.js';
import { drawGroundTiles, drawParks, type TileImageLookup } from './ground.js';
import { HitTestIndex } from './hitTest.js';
import { PALETTE } from './palette.js';
import { drawKiosks, drawRoads, drawStreetTrees } from './roads.js';
import type { Building, Scene } from './scene.js';
import type { DrawingSurface, ImageSource } from './surface.js';
import { drawRailways, drawStations } from './transit.js';

/**
 * Draws complete frames of a scene onto the working surface.
 *
 * Buildings are depth-sorted once, since the scene is immutable. The hit
 * index is the only thing that outlives a frame, and it is rebuilt by each one.
 */
export class LayeredRenderer<TImage extends ImageSource = ImageSource> {
  readonly hitIndex = new HitTestIndex();
  private readonly paintOrder: Building[];

  constructor(
    private readonly scene: Scene,
    private readonly config: RenderConfig,
    private readonly imageFor: TileImageLookup<TImage> = () => undefined
  ) {
    this.paintOrder = sortByDepth(scene.buildings);
  }

  renderFrame(surface: DrawingSurface<TImage>, camera: Camera): void {
    const { scene } = this;
    const frame = createFrameContext(surface, camera, this.config);

    this.hitIndex.clear();

    surface.clear();
    surface.fillRect(0, 0, surface.width, surface.height, { color: PALETTE.background });

    drawGroundTiles(frame, scene.tiles, this.imageFor);
    drawParks(frame, scene.parks);
    drawRailways(frame, scene.railways);
    drawRoads(frame, scene.roads);
    drawKiosks(frame, scene.roads);
    drawStreetTrees(frame, scene.roads);
    drawScrambleCrossing(frame, scene.scramble);
    drawPedestrians(frame, scene.scramble);

    for (const building of this.paintOrder) {
      drawBuilding(frame, building, this.hitIndex);
    }
    for (const building of this.paintOrder) {
      drawBuildingLabel(frame, building);
    }

    drawStations(frame, scene.stations);
  }
}
