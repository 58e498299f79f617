#!/usr/bin/env node
/**
 * Render a district scene to a PNG.
 *
 * Usage:
 *   tsx src/index.ts --scene scene.json --out district.png
 *   tsx src/index.ts --preset crisp --zoom 2 --pan 400,120
 *   tsx src/index.ts --click 480,300 --click 120,80
 */

import * as fs from 'fs';
import * as path from 'path';
import { writePng } from './export.js';
import { describeOptions, parseArgs, printHelp } from './options.js';
import { renderScene } from './render.js';

// ---------- Main ----------

async function main() {
  const options = parseArgs(process.argv);
  if (!options) {
    printHelp();
    return;
  }

  console.log('Isometric District Renderer');
  console.log('='.repeat(50));

  const scenePath = path.resolve(options.scenePath);
  if (!fs.existsSync(scenePath)) {
    throw new Error(`Scene file not found: ${scenePath}`);
  }
  const payload: unknown = JSON.parse(fs.readFileSync(scenePath, 'utf-8'));

  console.log(`Scene: ${scenePath}`);
  console.log(`Options: ${describeOptions(options)}`);
  console.log();

  const result = await renderScene(payload, options, (tile, err) => {
    console.warn(`Warning: could not decode ground tile ${tile.id}:`, err);
  });

  const { dropped, totalDropped } = result.report;
  console.log(`Admitted ${result.buildingCount} buildings`);
  if (totalDropped > 0) {
    const kinds = Object.entries(dropped)
      .filter(([, count]) => count > 0)
      .map(([kind, count]) => `${kind}: ${count}`);
    console.log(`  Dropped ${totalDropped} malformed entities (${kinds.join(', ')})`);
  }
  console.log(`Ground tiles: ${result.imagery.decoded} decoded, ${result.imagery.failed} failed`);
  if (options.clicks.length > 0) {
    console.log(`Selection: ${result.selection ? result.selection.name : 'none'}`);
  }

  const bytes = await writePng(result.image, path.resolve(options.outPath));

  console.log();
  console.log('Render complete!');
  console.log(`  Size: ${result.image.width}x${result.image.height}`);
  console.log(`  Output: ${path.resolve(options.outPath)} (${(bytes / 1024).toFixed(1)} KB)`);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
