import type { RenderConfigOverrides, Vec2 } from '@iso-district/renderer';

export interface RenderPreset {
  width: number; // display pixels
  height: number;
  pixelScale: number;
  scanlines: boolean;
  scanlineAlpha: number;
}

export interface CliOptions extends RenderPreset {
  scenePath: string;
  outPath: string;
  zoom: number | null;
  pan: Vec2 | null; // null centres on the scene
  clicks: Vec2[]; // display coordinates, replayed in order
}

// ---------- Presets ----------

export const PRESETS: Record<string, RenderPreset> = {
  crisp: {
    width: 960,
    height: 640,
    pixelScale: 3,
    scanlines: false,
    scanlineAlpha: 0.06,
  },
  crt: {
    width: 960,
    height: 640,
    pixelScale: 3,
    scanlines: true,
    scanlineAlpha: 0.06,
  },
  chunky: {
    width: 960,
    height: 640,
    pixelScale: 5,
    scanlines: true,
    scanlineAlpha: 0.1,
  },
  hires: {
    width: 1920,
    height: 1280,
    pixelScale: 2,
    scanlines: false,
    scanlineAlpha: 0.06,
  },
};

export const DEFAULT_PRESET = 'crt';

// ---------- CLI arg parsing ----------

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new Error(`Invalid value for ${flag}: ${value}`);
  }
  return n;
}

function parsePositiveInt(flag: string, value: string): number {
  const n = parseNumber(flag, value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid value for ${flag}: ${value}. Must be a positive integer`);
  }
  return n;
}

function parsePoint(flag: string, value: string): Vec2 {
  const parts = value.split(',');
  if (parts.length !== 2) {
    throw new Error(`Invalid value for ${flag}: ${value}. Expected x,y`);
  }
  return { x: parseNumber(flag, parts[0]), y: parseNumber(flag, parts[1]) };
}

/**
 * Parse process.argv. Returns null when help was requested.
 */
export function parseArgs(argv: string[]): CliOptions | null {
  const args = argv.slice(2);
  const options: CliOptions = {
    ...PRESETS[DEFAULT_PRESET],
    scenePath: 'scene.json',
    outPath: 'district.png',
    zoom: null,
    pan: null,
    clicks: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = () => {
      i++;
      if (i >= args.length) throw new Error(`Missing value for ${arg}`);
      return args[i];
    };

    switch (arg) {
      case '--preset': {
        const name = next();
        if (!(name in PRESETS)) {
          throw new Error(`Unknown preset: ${name}. Available: ${Object.keys(PRESETS).join(', ')}`);
        }
        Object.assign(options, PRESETS[name]);
        break;
      }
      case '--scene':
        options.scenePath = next();
        break;
      case '--out':
        options.outPath = next();
        break;
      case '--width':
        options.width = parsePositiveInt(arg, next());
        break;
      case '--height':
        options.height = parsePositiveInt(arg, next());
        break;
      case '--pixel-scale':
        options.pixelScale = parsePositiveInt(arg, next());
        break;
      case '--zoom':
        options.zoom = parseNumber(arg, next());
        break;
      case '--pan':
        options.pan = parsePoint(arg, next());
        break;
      case '--scanlines':
        options.scanlines = true;
        break;
      case '--no-scanlines':
        options.scanlines = false;
        break;
      case '--scanline-alpha': {
        const alpha = parseNumber(arg, next());
        if (alpha < 0 || alpha > 1) {
          throw new Error(`Invalid scanline alpha: ${alpha}. Must be between 0 and 1`);
        }
        options.scanlineAlpha = alpha;
        options.scanlines = true;
        break;
      }
      case '--click':
        options.clicks.push(parsePoint(arg, next()));
        break;
      case '--help':
      case '-h':
        return null;
      default:
        throw new Error(`Unknown argument: ${arg}. Use --help for usage.`);
    }
  }

  return options;
}

export function configOverrides(
  options: Pick<RenderPreset, 'pixelScale' | 'scanlines' | 'scanlineAlpha'>
): RenderConfigOverrides {
  return {
    pixelScale: options.pixelScale,
    scanlines: { enabled: options.scanlines, alpha: options.scanlineAlpha },
  };
}

export function printHelp(): void {
  console.log(`
Isometric District Renderer

Usage: render-scene [options]

Options:
  --scene <file>           Scene JSON to render (default: scene.json)
  --out <file>             Output PNG (default: district.png)
  --preset <name>          Use a preset: crisp, crt (default), chunky, hires
  --width <n>              Display width in pixels
  --height <n>             Display height in pixels
  --pixel-scale <n>        Display pixels per art pixel (default: 3)
  --zoom <n>               Camera zoom, clamped to [0.3, 5] (default: 1.3)
  --pan <x,y>              Camera pan in display pixels (default: centre on scene)
  --scanlines              Overlay scanlines
  --no-scanlines           Disable scanlines
  --scanline-alpha <n>     Scanline opacity, 0 to 1 (default: 0.06)
  --click <x,y>            Click at a display point; repeatable
  -h, --help               Show this help

Presets:
  crisp    960x640, 3x pixels, no scanlines
  crt      960x640, 3x pixels, scanlines at 0.06
  chunky   960x640, 5x pixels, scanlines at 0.1
  hires    1920x1280, 2x pixels, no scanlines
`.trim());
}

export function describeOptions(opts: CliOptions): string {
  const parts: string[] = [];
  parts.push(`size: ${opts.width}x${opts.height}`);
  parts.push(`pixel scale: ${opts.pixelScale}x`);
  parts.push(`scanlines: ${opts.scanlines ? `on (alpha ${opts.scanlineAlpha})` : 'off'}`);
  if (opts.zoom !== null) parts.push(`zoom: ${opts.zoom}`);
  parts.push(opts.pan ? `pan: ${opts.pan.x},${opts.pan.y}` : 'pan: centred');
  if (opts.clicks.length > 0) parts.push(`clicks: ${opts.clicks.length}`);
  return parts.join(', ');
}
