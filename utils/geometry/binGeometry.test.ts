import { describe, test, expect } from '@jest/globals';
import { measurements } from '@jscad/modeling';
import { BinSpec } from '../../types';
import { cellCenters, gridBin } from './binGeometry';

const spec = (overrides: Partial<BinSpec> = {}): BinSpec => ({
  gridX: 1,
  gridY: 1,
  units: 2,
  height: 14,
  size: [41.5, 41.5],
  stackingLip: false,
  magnetHoles: false,
  ...overrides,
});

describe('cellCenters', () => {
  test('centres the grid on the origin', () => {
    expect(cellCenters({ gridX: 1, gridY: 1 })).toEqual([[0, 0]]);
    expect(cellCenters({ gridX: 2, gridY: 1 })).toEqual([[-21, 0], [21, 0]]);
    expect(cellCenters({ gridX: 3, gridY: 2 })).toHaveLength(6);
    expect(cellCenters({ gridX: 3, gridY: 2 })[0]).toEqual([-42, -21]);
  });
});

describe('gridBin', () => {
  test('height is whole units', () => {
    expect(gridBin.height(3)).toBe(21);
  });

  test('height breakdown', () => {
    expect(gridBin.heightBreakdown(spec({ height: 21, stackingLip: true }))).toEqual({
      base: 5,
      interior: 16,
      lip: 4.4,
      total: 21,
    });
    expect(gridBin.heightBreakdown(spec()).lip).toBe(0);
  });

  test('a single cell stands on z = 0 with the full footprint', () => {
    const [min, max] = measurements.measureBoundingBox(gridBin.container(spec(), 16));
    expect(min[0]).toBeCloseTo(-20.75, 6);
    expect(max[0]).toBeCloseTo(20.75, 6);
    expect(min[2]).toBeCloseTo(0, 6);
    expect(max[2]).toBeCloseTo(14, 6);
  });

  test('the stacking lip rises above the body', () => {
    const bin = gridBin.container(
      spec({ gridX: 4, gridY: 2, units: 3, height: 21, size: [167.5, 83.5], stackingLip: true }),
      16
    );
    const [min, max] = measurements.measureBoundingBox(bin);
    expect(min[0]).toBeCloseTo(-83.75, 3);
    expect(max[0]).toBeCloseTo(83.75, 3);
    expect(min[1]).toBeCloseTo(-41.75, 3);
    expect(max[1]).toBeCloseTo(41.75, 3);
    expect(max[2]).toBeCloseTo(25.4, 3);
  });

  test('render leaves the body alone without magnet holes', () => {
    const body = gridBin.container(spec(), 16);
    expect(gridBin.render(spec(), body, 16)).toBe(body);
  });

  test('render sinks four magnet holes per cell', () => {
    const body = gridBin.container(spec(), 16);
    const holed = gridBin.render(spec({ magnetHoles: true }), body, 16);

    const holeArea = 0.5 * 16 * 3.25 ** 2 * Math.sin((2 * Math.PI) / 16);
    const removed = measurements.measureVolume(body) - measurements.measureVolume(holed);
    expect(removed).toBeCloseTo(4 * holeArea * 2.4, 2);
  });
});
