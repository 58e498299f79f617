import type { GroundTile } from '@iso-district/renderer';

/**
 * Decode a ground tile's base64 payload into a bitmap the canvas can draw.
 */
export function decodeImage(tile: GroundTile): Promise<ImageBitmap> {
  const binary = atob(tile.payload);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
  return createImageBitmap(new Blob([bytes], { type: tile.mimeType }));
}
