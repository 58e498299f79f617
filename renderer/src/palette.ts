import * as THREE from 'three';
import type { Vec2 } from './config.js';
import type { Building } from './scene.js';

// ---------- Palette ----------

export const PALETTE = {
  background: '#1a1028',

  road: '#2d2d40',
  roadEdge: '#3d3d50',
  roadCenterLine: '#444455',
  roadName: '#777788',

  railBed: '#111111',

  crossing: '#222233',
  stripe: '#aaaaaa',
  crossingLabel: '#999999',

  window: { lit: '#FFEE88', dim: '#665544', ground: '#88DDFF' },
  shopEntrance: '#FFCC44',
  floorLine: '#111111',
  buildingLabel: '#dddddd',

  park: { ground: '#1E4D1E', inner: '#2D6B2D', treeDark: '#226622', treeLight: '#338833', label: '#66AA44' },
  tree: { canopyDark: '#336633', canopyLight: '#448844', trunk: '#554433' },
  kiosks: ['#CC2222', '#2244CC', '#22AA44', '#DD8822'],
  kioskLight: '#FFFFFF',

  pedestrians: ['#DDDDDD', '#AAAAAA', '#997766', '#334455', '#CC8866', '#667788', '#BBAA99', '#445566'],
  pedestrianHead: '#EEDDCC',

  station: { frame: '#ffffff', label: '#ffffff' },

  ornament: {
    mast: '#888888',
    crossbar: '#AAAAAA',
    beacon: '#FF3333',
    pad: '#333333',
    marking: '#FFFFFF',
    post: '#444444',
  },

  inspector: {
    background: '#1a1028',
    backgroundAlpha: 0xee / 0xff,
    accent: '#ff7799',
    frame: '#554466',
    label: '#aa99bb',
    value: '#eeddff',
    hint: '#665577',
  },
} as const;

// ---------- Building tones ----------

export interface BuildingTones {
  lit: string; // walls facing the light
  shadow: string; // walls facing away, and the ground fill
  roof: string;
}

function hslHex(saturation: number, lightness: number): string {
  const color = new THREE.Color().setHSL(
    0,
    THREE.MathUtils.clamp(saturation / 100, 0, 1),
    THREE.MathUtils.clamp(lightness / 100, 0, 1),
    THREE.SRGBColorSpace
  );
  return `#${color.getHexString()}`;
}

/**
 * Grey tones for a building. Taller buildings read slightly darker, and a
 * position hash varies neighbours by a few lightness steps.
 */
export function buildingTones(building: Pick<Building, 'anchor' | 'surveyedHeight'>): BuildingTones {
  const seed = Math.abs(Math.floor(building.anchor.x * 73 + building.anchor.y * 137)) % 360;
  const heightFactor = Math.min(1, building.surveyedHeight / 150);
  const lightness = 58 - heightFactor * 14 + (seed % 8);

  return {
    lit: hslHex(0, lightness),
    shadow: hslHex(3, lightness - 12),
    roof: hslHex(0, lightness + 14),
  };
}

/**
 * Shift the HSL lightness of a hex colour by `delta` percentage points.
 */
export function adjustLightness(color: string, delta: number): string {
  const hsl = { h: 0, s: 0, l: 0 };
  new THREE.Color(color).getHSL(hsl, THREE.SRGBColorSpace);
  const adjusted = new THREE.Color().setHSL(
    hsl.h,
    hsl.s,
    THREE.MathUtils.clamp(hsl.l + delta / 100, 0, 1),
    THREE.SRGBColorSpace
  );
  return `#${adjusted.getHexString()}`;
}

/**
 * Tone of the wall whose planar edge runs (dx, dy). The outward normal is
 * (-dy, dx); a positive dot with the light picks the lit tone.
 */
export function wallTone(dx: number, dy: number, tones: BuildingTones, light: Vec2): string {
  const dot = -dy * light.x + dx * light.y;
  return dot > 0 ? tones.lit : tones.shadow;
}
