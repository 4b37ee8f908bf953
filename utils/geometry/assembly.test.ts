import { describe, test, expect } from '@jest/globals';
import { booleans, measurements, primitives } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import { DEFAULT_PARAMS, TrayParams } from '../../types';
import { resolveModel } from '../model';
import { exitFace } from './cutoutGeometry';
import { checkFit, generateChargerBin, generateParts, generateTrayInsert } from './assembly';
import { gridBin } from './binGeometry';

const modelFor = (overrides: Partial<TrayParams> = {}) =>
  resolveModel({ ...DEFAULT_PARAMS, segments: 16, ...overrides });

/** Volume of the solid inside a 0.5 mm cube at the given point. */
const volumeAt = (solid: Geom3, center: [number, number, number]): number =>
  measurements.measureVolume(booleans.intersect(solid, primitives.cuboid({ size: [0.5, 0.5, 0.5], center })));

const autoUnits = (phoneHeight: number) => Math.ceil((Math.max(3.0, 4.37, 4.0) + 2.85 + phoneHeight / 2 + 2) / 7);

describe('generateTrayInsert', () => {
  test('rests on z = 0 inside the phone silhouette', () => {
    const [min, max] = measurements.measureBoundingBox(generateTrayInsert(modelFor()));
    expect(min[0]).toBeCloseTo(-76.05, 3);
    expect(max[0]).toBeCloseTo(76.05, 3);
    expect(min[1]).toBeCloseTo(-37, 3);
    expect(max[1]).toBeCloseTo(37, 3);
    expect(min[2]).toBeCloseTo(0, 3);
    expect(max[2]).toBeCloseTo(11.025, 3);
  });
});

describe('generateChargerBin', () => {
  const model = modelFor();
  const bin = generateChargerBin(model);

  test('keeps the bin envelope', () => {
    const [min, max] = measurements.measureBoundingBox(bin);
    expect(min[0]).toBeCloseTo(-83.75, 3);
    expect(max[0]).toBeCloseTo(83.75, 3);
    expect(min[1]).toBeCloseTo(-41.75, 3);
    expect(max[1]).toBeCloseTo(41.75, 3);
    expect(min[2]).toBeCloseTo(0, 3);
    expect(max[2]).toBeCloseTo(25.4, 3);
  });

  test('is carved out of the plain container', () => {
    const container = gridBin.container(model.bin, model.segments);
    expect(measurements.measureVolume(bin)).toBeLessThan(measurements.measureVolume(container));
  });

  test('angled top exit cuts through the +x wall and the floor', () => {
    const angled = modelFor({ cableAngle: 315 });
    expect(exitFace(angled.charger.cableAngle)).toBe('top');
    expect(angled.bin.units).toBe(autoUnits(angled.phone.height));
    expect(angled.bin.units).toBe(3);

    const carved = generateChargerBin(angled);
    const y = 27.75 * Math.sin((315 * Math.PI) / 180);
    expect(volumeAt(carved, [83.5, y, angled.trayBottom])).toBeCloseTo(0, 3);
    expect(volumeAt(carved, [-83.5, y, angled.trayBottom])).toBeCloseTo(0.125, 3);
    expect(volumeAt(carved, [0, 0, 0.3])).toBeCloseTo(0, 3);
  });

  test('bottom exit cuts through the -x wall instead', () => {
    const reversed = modelFor({ cableAngle: 200 });
    expect(exitFace(reversed.charger.cableAngle)).toBe('bottom');
    expect(reversed.bin.units).toBe(autoUnits(reversed.phone.height));

    const carved = generateChargerBin(reversed);
    const y = 27.75 * Math.sin((200 * Math.PI) / 180);
    expect(volumeAt(carved, [-83.5, y, reversed.trayBottom])).toBeCloseTo(0, 3);
    expect(volumeAt(carved, [83.5, y, reversed.trayBottom])).toBeCloseTo(0.125, 3);
  });
});

describe('generateParts', () => {
  test('builds only the requested parts, in order', () => {
    const parts = generateParts(modelFor(), ['tray_insert']);
    expect(parts.map((part) => part.name)).toEqual(['tray_insert']);
  });
});

describe('checkFit', () => {
  test('the default phone fits', () => {
    expect(checkFit(modelFor())).toEqual([]);
  });

  test('warns when the phone is longer than the bin opening', () => {
    expect(checkFit(modelFor({ gridX: 3 }))).toEqual([
      'phone footprint 152.10 x 74.00 mm exceeds the 3x2 bin opening 120.30 x 78.30 mm',
    ]);
  });

  test('warns when a low bin leaves too little under the cable', () => {
    const warnings = checkFit(modelFor({ binUnits: 2 }));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^bin height 14 mm leaves 1\.8\d mm under the cable channel \(minimum 2 mm\)$/);
  });

  test('warns when the charger is wider than the phone', () => {
    const warnings = checkFit(
      modelFor({ chargerPreset: 0, chargerDiameter: 80, chargerDepth: 4, cableDiameter: 3, plugWidth: 8 })
    );
    expect(warnings).toContain('charger diameter 80 mm is wider than the phone (74.00 mm)');
  });

  test('warns when the charger leaves no room for the ramp or camera relief', () => {
    const model = modelFor({ chargerPreset: 0, chargerDiameter: 160, chargerDepth: 4, cableDiameter: 3, plugWidth: 8 });
    expect(model.layout.wedgeLength).toBeLessThan(0);
    expect(model.layout.cameraLength).toBeLessThan(0);
    expect(checkFit(model)).toEqual([
      'charger diameter 160 mm is wider than the phone (74.00 mm)',
      'charger and bottom padding leave no room for the wedge',
      'charger and top padding leave no room for the camera relief',
    ]);
  });
});
