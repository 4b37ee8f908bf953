import { describe, test, expect } from '@jest/globals';
import { ChargerSpec, DEFAULT_PARAMS, PhoneSpec } from '../../types';
import { autoBinUnits, computeBinSpec, computeTrayLayout } from './layout';

const phone: PhoneSpec = { length: 152.1, width: 74, height: 9.95, curve: 35.25, smoothness: 5 };
const charger: ChargerSpec = { diameter: 55.5, depth: 4.37, cableDiameter: 2.85, plugWidth: 8, cableAngle: 0 };

describe('computeTrayLayout', () => {
  const layout = computeTrayLayout(phone, charger, DEFAULT_PARAMS);

  test('region lengths', () => {
    expect(layout.wedgeLength).toBeCloseTo(43.3, 9);
    expect(layout.bayLength).toBeCloseTo(65.5, 9);
    expect(layout.cameraLength).toBeCloseTo(43.3, 9);
  });

  test('the three lengths add up to the phone', () => {
    const total = layout.wedgeLength + layout.bayLength + layout.cameraLength;
    expect(Math.abs(total - phone.length)).toBeLessThan(0.02);
  });

  test('regions tile the phone from end to end', () => {
    expect(layout.wedge[0]).toBeCloseTo(-76.05, 9);
    expect(layout.wedge[1]).toBeCloseTo(layout.bay[0], 9);
    expect(layout.bay[1]).toBeCloseTo(27.75, 9);
    expect(layout.padding).toEqual([27.75, 32.75]);
    expect(layout.camera[0]).toBeCloseTo(32.75, 9);
    expect(layout.camera[1]).toBeCloseTo(76.05, 9);
  });

  test('tray height is the tallest of charger, ramp and camera relief', () => {
    expect(layout.trayHeight).toBe(4.37);
    expect(computeTrayLayout(phone, charger, { ...DEFAULT_PARAMS, wedgeHeight: 6 }).trayHeight).toBe(6);
    expect(computeTrayLayout(phone, charger, { ...DEFAULT_PARAMS, cameraHeight: 7 }).trayHeight).toBe(7);
  });

  test('a large charger leaves no room for the ramp', () => {
    const wide = computeTrayLayout(phone, { ...charger, diameter: 160 }, DEFAULT_PARAMS);
    expect(wide.wedgeLength).toBeCloseTo(-8.95, 9);
    expect(wide.cameraLength).toBeCloseTo(-8.95, 9);
  });
});

describe('autoBinUnits', () => {
  const layout = computeTrayLayout(phone, charger, DEFAULT_PARAMS);

  test('rounds the stack up to whole units', () => {
    expect(autoBinUnits(layout, phone, charger)).toBe(3);
  });

  test('a thicker phone needs another unit', () => {
    const thick = { ...phone, height: 24 };
    expect(autoBinUnits(layout, thick, charger)).toBe(4);
  });
});

describe('computeBinSpec', () => {
  const layout = computeTrayLayout(phone, charger, DEFAULT_PARAMS);

  test('sizes the footprint on the grid pitch', () => {
    const spec = computeBinSpec(DEFAULT_PARAMS, layout, phone, charger, (units) => units * 7);
    expect(spec).toEqual({
      gridX: 4,
      gridY: 2,
      units: 3,
      height: 21,
      size: [167.5, 83.5],
      stackingLip: true,
      magnetHoles: false,
    });
  });

  test('an explicit unit count wins', () => {
    const spec = computeBinSpec({ ...DEFAULT_PARAMS, binUnits: 6 }, layout, phone, charger, (units) => units * 7);
    expect(spec.units).toBe(6);
    expect(spec.height).toBe(42);
  });
});
