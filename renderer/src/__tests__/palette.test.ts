import { describe, it, expect } from 'vitest';
import { isWindowLit, windowsPerFloor } from '../buildings.js';
import { LIGHT_DIRECTION } from '../config.js';
import { adjustLightness, buildingTones, wallTone } from '../palette.js';

const tones = { lit: 'lit', shadow: 'shadow', roof: 'roof' };

describe('wallTone', () => {
  it('lights walls whose outward normal faces the top-left sun', () => {
    // edge running +y has normal (-1, 0)
    expect(wallTone(0, 10, tones, LIGHT_DIRECTION)).toBe('lit');
    // edge running -x has normal (0, -1)
    expect(wallTone(-10, 0, tones, LIGHT_DIRECTION)).toBe('lit');
    expect(wallTone(10, 0, tones, LIGHT_DIRECTION)).toBe('shadow');
    expect(wallTone(0, -10, tones, LIGHT_DIRECTION)).toBe('shadow');
  });

  it('shades walls edge-on to the light', () => {
    expect(wallTone(-10, -10, tones, LIGHT_DIRECTION)).toBe('shadow');
  });
});

describe('buildingTones', () => {
  it('derives greys whose roof is lighter than the lit wall and the shadow darker', () => {
    const t = buildingTones({ anchor: { x: 0, y: 0 }, surveyedHeight: 0 });
    const lightness = (hex: string) => parseInt(hex.slice(1, 3), 16);

    expect(lightness(t.roof)).toBeGreaterThan(lightness(t.lit));
    expect(lightness(t.lit)).toBeGreaterThan(lightness(t.shadow));
    expect(t.lit).toMatch(/^#([0-9a-f]{2})\1\1$/);
  });

  it('is a pure function of anchor and height', () => {
    const building = { anchor: { x: 12.5, y: -3 }, surveyedHeight: 80 };
    expect(buildingTones(building)).toEqual(buildingTones({ ...building }));
  });

  it('darkens taller buildings', () => {
    const low = buildingTones({ anchor: { x: 0, y: 0 }, surveyedHeight: 10 });
    const high = buildingTones({ anchor: { x: 0, y: 0 }, surveyedHeight: 150 });
    expect(parseInt(high.lit.slice(1, 3), 16)).toBeLessThan(parseInt(low.lit.slice(1, 3), 16));
  });
});

describe('adjustLightness', () => {
  it('clamps to black and white', () => {
    expect(adjustLightness('#808080', -100)).toBe('#000000');
    expect(adjustLightness('#808080', 100)).toBe('#ffffff');
  });

  it('leaves a colour unchanged for a zero delta', () => {
    expect(adjustLightness('#ff0000', 0)).toBe('#ff0000');
  });
});

describe('window rules', () => {
  it('counts windows per floor by usage', () => {
    expect(windowsPerFloor('office')).toBe(3);
    expect(windowsPerFloor('shop_house')).toBe(1);
    expect(windowsPerFloor('apartment')).toBe(2);
  });

  it('dims every cell whose index hash is divisible by three', () => {
    expect(isWindowLit(0, 1, 0)).toBe(false);
    expect(isWindowLit(0, 1, 1)).toBe(true);
    expect(isWindowLit(1, 4, 2)).toBe(false);
  });
});
