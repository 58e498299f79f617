import type { GroundTile } from './scene.js';
import type { ImageSource } from './surface.js';

/** Turns a tile's encoded payload into something a surface can draw. */
export type ImageDecoder<TImage> = (tile: GroundTile) => Promise<TImage>;

export interface GroundImageryHooks {
  onDecoded?: (tile: GroundTile) => void;
  onError?: (tile: GroundTile, error: unknown) => void;
}

export interface ImageryLoadResult {
  decoded: number;
  failed: number;
}

/**
 * Decoded aerial imagery, keyed by tile. Every tile is requested once; a
 * tile that fails to decode is left out of the ground layer for good.
 */
export class GroundImagery<TImage extends ImageSource> {
  private readonly images = new Map<number, TImage>();
  private pending: Promise<ImageryLoadResult> | null = null;

  constructor(
    private readonly tiles: readonly GroundTile[],
    private readonly decode: ImageDecoder<TImage>,
    private readonly hooks: GroundImageryHooks = {}
  ) {}

  /**
   * Request every decode. Resolves when all requests have settled; repeated
   * calls share the first load.
   */
  load(): Promise<ImageryLoadResult> {
    if (!this.pending) {
      this.pending = this.loadAll();
    }
    return this.pending;
  }

  private async loadAll(): Promise<ImageryLoadResult> {
    const outcomes = await Promise.all(this.tiles.map((tile) => this.loadTile(tile)));
    const decoded = outcomes.filter(Boolean).length;
    return { decoded, failed: outcomes.length - decoded };
  }

  private async loadTile(tile: GroundTile): Promise<boolean> {
    try {
      const image = await this.decode(tile);
      this.images.set(tile.id, image);
    } catch (error) {
      this.hooks.onError?.(tile, error);
      return false;
    }
    this.hooks.onDecoded?.(tile);
    return true;
  }

  imageFor(tile: GroundTile): TImage | undefined {
    return this.images.get(tile.id);
  }

  get decodedCount(): number {
    return this.images.size;
  }
}
