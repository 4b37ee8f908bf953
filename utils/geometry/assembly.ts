/**
 * ASSEMBLY MODULE
 *
 * Places the tray and its cutter in the host bin:
 *
 *   bin = render((container ∖ phoneCutout ∪ tray) ∖ chargerCutout)
 *
 * The phone cutout is the phone silhouette extruded from the tray bottom
 * through trayHeight + phoneHeight, which clears the bin top by half a phone.
 */

import { booleans, extrusions, transforms } from '@jscad/modeling';
import type { Geom3 } from '@jscad/modeling/src/geometries/types';
import { ChargerModel } from '../../types';
import { BinProvider, gridBin } from './binGeometry';
import { BOTTOM_CLEARANCE, LIP_WIDTH, PIERCE } from './constants';
import { generateCutoutSolid } from './cutoutGeometry';
import { phone2dShape } from './primitives';
import { generateTraySolid } from './trayGeometry';

export type PartName = 'charger_bin' | 'tray_insert';

export interface Part {
  name: PartName;
  solid: Geom3;
}

export const PART_NAMES: PartName[] = ['charger_bin', 'tray_insert'];

const phoneSilhouette = (model: ChargerModel) => {
  const { length, width, curve, smoothness } = model.phone;
  return phone2dShape(length, width, curve, smoothness);
};

export const generateChargerBin = (model: ChargerModel, provider: BinProvider = gridBin): Geom3 => {
  const { phone, charger, layout, bin, trayBottom, fillHeight, segments } = model;

  const container = provider.container(bin, segments);
  const phoneCutout = extrusions.extrudeLinear(
    { height: layout.trayHeight + phone.height },
    phoneSilhouette(model)
  );
  const tray = generateTraySolid(layout, fillHeight);
  const cutout = generateCutoutSolid(layout, charger, {
    depthBelowTray: trayBottom,
    exitReach: bin.size[0] / 2,
    segments,
  });

  const place = (solid: Geom3) => transforms.translate([0, 0, trayBottom], solid);
  const body = booleans.subtract(
    booleans.union(booleans.subtract(container, place(phoneCutout)), place(tray)),
    place(cutout)
  );

  return provider.render(bin, body, segments);
};

/**
 * The tray on its own, trimmed to the phone silhouette and resting on z = 0,
 * for printing as a drop-in insert.
 */
export const generateTrayInsert = (model: ChargerModel): Geom3 => {
  const { phone, charger, layout, fillHeight, segments } = model;

  const tray = generateTraySolid(layout, fillHeight);
  const cutout = generateCutoutSolid(layout, charger, {
    depthBelowTray: fillHeight,
    exitReach: phone.length / 2,
    segments,
  });
  const outline = transforms.translate(
    [0, 0, -fillHeight - PIERCE],
    extrusions.extrudeLinear(
      { height: fillHeight + layout.trayHeight + 2 * PIERCE },
      phoneSilhouette(model)
    )
  );

  const insert = booleans.intersect(booleans.subtract(tray, cutout), outline);
  return transforms.translate([0, 0, fillHeight], insert);
};

export const generateParts = (
  model: ChargerModel,
  names: PartName[] = PART_NAMES,
  provider: BinProvider = gridBin
): Part[] =>
  names.map((name) => ({
    name,
    solid: name === 'charger_bin' ? generateChargerBin(model, provider) : generateTrayInsert(model),
  }));

/**
 * Parameter combinations that still build but give a part that will not
 * work as intended.
 */
export const checkFit = (model: ChargerModel): string[] => {
  const { phone, charger, layout, bin, trayBottom } = model;
  const warnings: string[] = [];

  const opening: [number, number] = [bin.size[0] - 2 * LIP_WIDTH, bin.size[1] - 2 * LIP_WIDTH];
  if (phone.length > opening[0] || phone.width > opening[1]) {
    warnings.push(
      `phone footprint ${phone.length.toFixed(2)} x ${phone.width.toFixed(2)} mm exceeds the ` +
        `${bin.gridX}x${bin.gridY} bin opening ${opening[0].toFixed(2)} x ${opening[1].toFixed(2)} mm`
    );
  }

  if (charger.diameter > phone.width) {
    warnings.push(`charger diameter ${charger.diameter} mm is wider than the phone (${phone.width.toFixed(2)} mm)`);
  }

  if (layout.wedgeLength <= 0) warnings.push('charger and bottom padding leave no room for the wedge');
  if (layout.cameraLength <= 0) warnings.push('charger and top padding leave no room for the camera relief');

  const channelFloor = trayBottom - charger.cableDiameter;
  if (channelFloor < BOTTOM_CLEARANCE) {
    warnings.push(
      `bin height ${bin.height} mm leaves ${channelFloor.toFixed(2)} mm under the cable channel ` +
        `(minimum ${BOTTOM_CLEARANCE} mm)`
    );
  }

  return warnings;
};
