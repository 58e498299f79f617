import sharp from 'sharp';
import type { GroundTile } from '@iso-district/renderer';
import type { RasterImage } from './raster.js';

/**
 * Decode a tile's base64 payload into RGBA pixels.
 */
export async function decodeTile(tile: Pick<GroundTile, 'payload'>): Promise<RasterImage> {
  const input = Buffer.from(tile.payload, 'base64');
  const { data, info } = await sharp(input).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.length),
  };
}
