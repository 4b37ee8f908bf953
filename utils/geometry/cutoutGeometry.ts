/**
 * CUTOUT GEOMETRY MODULE
 *
 * The single solid subtracted from the tray, in tray-local coordinates:
 * 1. Charger cylinder, top open above the tray
 * 2. Maintenance slot: hull of a plug-wide cylinder at the bay centre and one
 *    at the cable-exit azimuth, running down through the bin bottom so the
 *    charger can be pushed out from below
 * 3. Cable channel: hull of three stacked cable-wide cylinders running along
 *    x from the bay wall to the exit face
 *
 * Exit face selection (the only branch in the model):
 *   top    angle in [0°, 90°) ∪ (270°, 360°)   → channel runs towards +x
 *   bottom angle in [90°, 270°]                → channel runs towards -x
 */

import { booleans, hulls, primitives, transforms } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import { ChargerSpec, ExitFace, TrayLayout } from '../../types';
import { normalizeAngle } from '../parameters';
import { CHARGER_CLEARANCE, OVERLAP, PIERCE } from './constants';

const DEG = Math.PI / 180;

export interface CutoutOptions {
  depthBelowTray: number;    // Distance from the tray bottom down to the bin bottom
  exitReach: number;         // Distance from the bay centre to the exit face
  segments: number;
}

export const exitFace = (angle: number): ExitFace => {
  const a = normalizeAngle(angle);
  return a < 90 || a > 270 ? 'top' : 'bottom';
};

/** Angle between the cable exit and the exit face's axis, in [0°, 90°]. */
export const clampedExitAngle = (angle: number, face: ExitFace): number => {
  const a = normalizeAngle(angle);
  if (face === 'bottom') return Math.abs(180 - a);
  return a <= 90 ? a : 360 - a;
};

/**
 * Run of the channel from the bay wall to the exit face. The
 * radius·(1 − cos) term adds the part of the radius the curved wall gives
 * back at shallow exit angles.
 */
export const cableChannelLength = (radius: number, reach: number, clampedDeg: number): number =>
  reach - radius + radius * (1 - Math.cos(clampedDeg * DEG));

/** Vertical centres of the three channel cylinders, top to bottom. */
export const cableChannelLevels = (layout: TrayLayout, charger: ChargerSpec): number[] => {
  const chargerBottom = layout.trayHeight - charger.depth;
  const half = charger.cableDiameter / 2;
  return [chargerBottom + half, 0, -half];
};

const verticalCylinder = (
  radius: number,
  x: number,
  y: number,
  z: [number, number],
  segments: number
): Geom3 =>
  primitives.cylinder({
    radius,
    height: z[1] - z[0],
    center: [x, y, (z[0] + z[1]) / 2],
    segments,
  });

export const generateCableChannel = (
  layout: TrayLayout,
  charger: ChargerSpec,
  exitReach: number,
  segments: number
): Geom3 => {
  const face = exitFace(charger.cableAngle);
  const dir = face === 'top' ? 1 : -1;
  const clamped = clampedExitAngle(charger.cableAngle, face);
  const r = charger.diameter / 2;
  const inset = charger.cableDiameter / 2;

  const length = cableChannelLength(r, exitReach, clamped);
  const span = length + inset + PIERCE;
  const start = dir * (r * Math.cos(clamped * DEG) - inset);
  const end = dir * (exitReach + PIERCE);
  const y = r * Math.sin(charger.cableAngle * DEG);

  const rod = transforms.rotateY(
    Math.PI / 2,
    primitives.cylinder({ radius: charger.cableDiameter / 2, height: span, segments })
  );

  return hulls.hull(
    cableChannelLevels(layout, charger).map((z) =>
      transforms.translate([(start + end) / 2, y, z], rod)
    )
  );
};

export const generateCutoutSolid = (
  layout: TrayLayout,
  charger: ChargerSpec,
  options: CutoutOptions
): Geom3 => {
  const { depthBelowTray, exitReach, segments } = options;
  const r = charger.diameter / 2;
  const chargerBottom = layout.trayHeight - charger.depth;

  // 1. Charger
  const bay = verticalCylinder(
    r,
    0,
    0,
    [chargerBottom, layout.trayHeight + CHARGER_CLEARANCE],
    segments
  );

  // 2. Maintenance slot, kept inside the charger footprint
  const slotRadius = charger.plugWidth / 2;
  const reach = r - slotRadius;
  const angle = charger.cableAngle * DEG;
  const slotZ: [number, number] = [-depthBelowTray - PIERCE, chargerBottom + OVERLAP];
  const slot = hulls.hull(
    verticalCylinder(slotRadius, 0, 0, slotZ, segments),
    verticalCylinder(slotRadius, reach * Math.cos(angle), reach * Math.sin(angle), slotZ, segments)
  );

  // 3. Cable channel
  const channel = generateCableChannel(layout, charger, exitReach, segments);

  return booleans.union(bay, slot, channel);
};
