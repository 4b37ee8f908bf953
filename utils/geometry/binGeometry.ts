/**
 * HOST BIN MODULE
 *
 * The storage-grid bin the tray is embedded in. The assembly only talks to
 * the BinProvider contract; gridBin is the built-in provider for the
 * 42mm grid with 7mm height units.
 *
 * Bin coordinates: footprint centred on the origin, feet on z = 0,
 * solid body from BASE_HEIGHT up to the bin height, optional stacking lip
 * above that.
 */

import { booleans, extrusions, hulls, primitives, transforms } from '@jscad/modeling';
import type { Geom2, Geom3 } from '@jscad/modeling/src/geometries/types';
import { BinHeightBreakdown, BinSpec } from '../../types';
import {
  BASE_BOTTOM_INSET,
  BASE_HEIGHT,
  BIN_CORNER_RADIUS,
  GRID_CLEARANCE,
  GRID_PITCH,
  HEIGHT_UNIT,
  LIP_HEIGHT,
  LIP_WIDTH,
  MAGNET_DEPTH,
  MAGNET_DIAMETER,
  MAGNET_OFFSET,
  OVERLAP,
  PIERCE,
} from './constants';
import { Vec2, roundRect } from './primitives';

export interface BinProvider {
  /** Solid bin for the grid counts and height in the spec. */
  container(spec: BinSpec, segments: number): Geom3;
  /** Final pass over the carved bin. */
  render(spec: BinSpec, body: Geom3, segments: number): Geom3;
  heightBreakdown(spec: BinSpec): BinHeightBreakdown;
  /** Body height in mm for a number of height units. */
  height(units: number): number;
}

export const cellCenters = (spec: Pick<BinSpec, 'gridX' | 'gridY'>): Vec2[] => {
  const centers: Vec2[] = [];
  for (let i = 0; i < spec.gridX; i++) {
    for (let j = 0; j < spec.gridY; j++) {
      centers.push([
        (i - (spec.gridX - 1) / 2) * GRID_PITCH,
        (j - (spec.gridY - 1) / 2) * GRID_PITCH,
      ]);
    }
  }
  return centers;
};

const slab = (outline: Geom2, z: number, height: number): Geom3 =>
  transforms.translate([0, 0, z], extrusions.extrudeLinear({ height }, outline));

/** Chamfered foot: hull of a narrow bottom outline and the full cell outline. */
const foot = (center: Vec2, segments: number): Geom3 => {
  const cell = GRID_PITCH - GRID_CLEARANCE;
  const bottom = roundRect(
    [cell - 2 * BASE_BOTTOM_INSET, cell - 2 * BASE_BOTTOM_INSET],
    BIN_CORNER_RADIUS - BASE_BOTTOM_INSET,
    center,
    segments
  );
  const top = roundRect([cell, cell], BIN_CORNER_RADIUS, center, segments);

  return hulls.hull(slab(bottom, 0, PIERCE), slab(top, BASE_HEIGHT - PIERCE, PIERCE + OVERLAP));
};

const stackingLip = (spec: BinSpec, segments: number): Geom3 => {
  const [w, h] = spec.size;
  const ring = booleans.subtract(
    roundRect([w, h], BIN_CORNER_RADIUS, [0, 0], segments),
    roundRect([w - 2 * LIP_WIDTH, h - 2 * LIP_WIDTH], BIN_CORNER_RADIUS - LIP_WIDTH, [0, 0], segments)
  );
  return slab(ring, spec.height - OVERLAP, LIP_HEIGHT + OVERLAP);
};

export const gridBin: BinProvider = {
  container(spec, segments) {
    const parts = cellCenters(spec).map((center) => foot(center, segments));

    const outline = roundRect(spec.size, BIN_CORNER_RADIUS, [0, 0], segments);
    parts.push(slab(outline, BASE_HEIGHT, spec.height - BASE_HEIGHT));

    if (spec.stackingLip) parts.push(stackingLip(spec, segments));

    return booleans.union(parts);
  },

  render(spec, body, segments) {
    if (!spec.magnetHoles) return body;

    const radius = MAGNET_DIAMETER / 2;
    const holes: Geom3[] = [];
    for (const [cx, cy] of cellCenters(spec)) {
      for (const [sx, sy] of [[1, 1], [-1, 1], [-1, -1], [1, -1]]) {
        holes.push(
          primitives.cylinder({
            radius,
            height: MAGNET_DEPTH + PIERCE,
            center: [cx + sx * MAGNET_OFFSET, cy + sy * MAGNET_OFFSET, (MAGNET_DEPTH - PIERCE) / 2],
            segments,
          })
        );
      }
    }
    return booleans.subtract(body, holes);
  },

  heightBreakdown(spec) {
    return {
      base: BASE_HEIGHT,
      interior: spec.height - BASE_HEIGHT,
      lip: spec.stackingLip ? LIP_HEIGHT : 0,
      total: spec.height,
    };
  },

  height(units) {
    return units * HEIGHT_UNIT;
  },
};
