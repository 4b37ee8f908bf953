/**
 * PRIMITIVE SHAPES
 *
 * 2D profiles and the one non-box solid the tray is built from:
 * - superellipse: Lp-norm ellipse sampled at fixed 5° steps
 * - phone2dShape: rounded phone silhouette (hull of four superellipse corners)
 * - roundRect:    rectangle with clamped circular corners
 * - wedge:        right-triangle ramp extruded along the width axis
 */

import { extrusions, hulls, primitives, transforms } from '@jscad/modeling';
import type { Geom2, Geom3 } from '@jscad/modeling/src/geometries/types';
import { SUPERELLIPSE_STEP } from './constants';

export type Vec2 = [number, number];

const DEG = Math.PI / 180;

/**
 * Boundary points of |x/a|^n + |y/b|^n = 1, one every SUPERELLIPSE_STEP degrees.
 * n = 2 is an ellipse, larger n approaches a rectangle.
 */
export const superellipsePoints = (a: number, b: number, n: number): Vec2[] => {
  const points: Vec2[] = [];
  const exponent = 2 / n;

  for (let deg = 0; deg < 360; deg += SUPERELLIPSE_STEP) {
    const c = Math.cos(deg * DEG);
    const s = Math.sin(deg * DEG);
    points.push([
      a * Math.pow(Math.abs(c), exponent) * Math.sign(c),
      b * Math.pow(Math.abs(s), exponent) * Math.sign(s),
    ]);
  }

  return points;
};

export const superellipse = (a: number, b: number, n: number): Geom2 =>
  primitives.polygon({ points: superellipsePoints(a, b, n) });

export const phone2dShape = (
  length: number,
  width: number,
  curve: number,
  smoothness: number
): Geom2 => {
  const dx = length / 2 - curve;
  const dy = width / 2 - curve;
  const corner = superellipse(curve, curve, smoothness);

  const corners: Vec2[] = [[dx, dy], [-dx, dy], [-dx, -dy], [dx, -dy]];
  return hulls.hull(corners.map(([x, y]) => transforms.translate([x, y, 0], corner)));
};

/** Corner radius roundRect actually uses for a requested radius. */
export const clampCornerRadius = (size: Vec2, radius: number): number =>
  Math.max(0, Math.min(radius, Math.min(size[0], size[1]) / 2));

export const roundRect = (
  size: Vec2,
  radius: number,
  center: Vec2 = [0, 0],
  resolution = 32
): Geom2 => {
  if (size.length !== 2 || !(size[0] > 0) || !(size[1] > 0)) {
    throw new Error(`roundRect: size must be two positive numbers (got [${size.join(', ')}])`);
  }

  const r = clampCornerRadius(size, radius);
  if (r === 0) return primitives.rectangle({ size, center });

  const dx = size[0] / 2 - r;
  const dy = size[1] / 2 - r;
  const corners: Vec2[] = [[dx, dy], [-dx, dy], [-dx, -dy], [dx, -dy]];

  return hulls.hull(
    corners.map(([x, y]) =>
      primitives.circle({ radius: r, center: [center[0] + x, center[1] + y], segments: resolution })
    )
  );
};

/**
 * Ramp with legs length (x) × height (z), hypotenuse sqrt(length² + height²).
 * The high end faces +x. Centred on the origin.
 */
export const wedge = (length: number, width: number, height: number): Geom3 => {
  const profile = primitives.polygon({ points: [[0, 0], [length, 0], [length, height]] });
  const solid = extrusions.extrudeLinear({ height: width }, profile);
  return transforms.center({ relativeTo: [0, 0, 0] }, transforms.rotateX(Math.PI / 2, solid));
};
