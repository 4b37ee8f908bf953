/**
 * TRAY GEOMETRY MODULE
 *
 * Builds the solid insert that sits under the phone, in tray-local
 * coordinates: x along the phone, y across it, tray bottom on z = 0.
 *
 * Regions (see layout.ts):
 * 1. Wedge ramp, rising towards the charger
 * 2. Filler box under the ramp
 * 3. Charger bay box (the charger cutter is subtracted later)
 * 4. Top padding box
 * 5. Camera relief box, cameraHeight tall
 * 6. Bottom fill, from the bin floor up to z = 0
 */

import { booleans, primitives, transforms } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import { TrayLayout } from '../../types';
import { OVERLAP } from './constants';
import { wedge } from './primitives';

/**
 * Axis-aligned box spanning the full tray width, grown by OVERLAP at both
 * x ends so neighbouring regions fuse.
 */
const regionBox = (x: [number, number], z: [number, number], width: number): Geom3 =>
  primitives.cuboid({
    size: [x[1] - x[0] + 2 * OVERLAP, width, z[1] - z[0]],
    center: [(x[0] + x[1]) / 2, 0, (z[0] + z[1]) / 2],
  });

const hasLength = (range: [number, number]): boolean => range[1] - range[0] > 0;

export const generateTraySolid = (layout: TrayLayout, fillHeight: number): Geom3 => {
  const { phoneLength, phoneWidth: width, trayHeight, wedgeHeight, cameraHeight } = layout;
  const parts: Geom3[] = [];

  // 1 + 2. Ramp, with the filler under it when the tray is taller than the ramp
  if (hasLength(layout.wedge)) {
    const ramp = wedge(layout.wedgeLength + 2 * OVERLAP, width, wedgeHeight);
    const center = (layout.wedge[0] + layout.wedge[1]) / 2;
    parts.push(transforms.translate([center, 0, trayHeight - wedgeHeight / 2], ramp));

    const fillerTop = trayHeight - wedgeHeight;
    if (fillerTop > 0) {
      parts.push(regionBox(layout.wedge, [-OVERLAP, fillerTop + OVERLAP], width));
    }
  }

  // 3. Bay
  parts.push(regionBox(layout.bay, [-OVERLAP, trayHeight], width));

  // 4. Top padding
  if (hasLength(layout.padding)) {
    parts.push(regionBox(layout.padding, [-OVERLAP, trayHeight], width));
  }

  // 5. Camera relief: bottom aligned with the tray bottom
  if (hasLength(layout.camera)) {
    parts.push(regionBox(layout.camera, [-OVERLAP, cameraHeight], width));
  }

  // 6. Bottom fill under the whole footprint
  if (fillHeight > 0) {
    parts.push(
      primitives.cuboid({
        size: [phoneLength, width, fillHeight],
        center: [0, 0, -fillHeight / 2],
      })
    );
  }

  return booleans.union(parts);
};
