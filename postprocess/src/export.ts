import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import type { RasterImage } from './raster.js';

export function encodePng(image: RasterImage): Promise<Buffer> {
  const raw = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return sharp(raw, { raw: { width: image.width, height: image.height, channels: 4 } })
    .png()
    .toBuffer();
}

/** Encode and write, creating the parent directory. Returns the byte count. */
export async function writePng(image: RasterImage, outputPath: string): Promise<number> {
  const png = await encodePng(image);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, png);
  return png.length;
}
