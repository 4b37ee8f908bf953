/**
 * TRAY LAYOUT
 *
 * Splits the phone's long axis into the tray regions, from the phone's bottom
 * edge (-x) to the camera end (+x):
 *
 *   | wedge | bay (charger + bottom margin) | top padding | camera relief |
 *
 * The charger is centred on x = 0, under the phone's centre.
 */

import { BinSpec, ChargerSpec, PhoneSpec, TrayLayout, TrayParams } from '../../types';
import { BOTTOM_CLEARANCE, GRID_CLEARANCE, GRID_PITCH, HEIGHT_UNIT } from './constants';

export const computeTrayLayout = (
  phone: PhoneSpec,
  charger: ChargerSpec,
  params: Pick<TrayParams, 'bottomPadding' | 'topPadding' | 'wedgeHeight' | 'cameraHeight'>
): TrayLayout => {
  const { bottomPadding, topPadding, wedgeHeight, cameraHeight } = params;
  const half = phone.length / 2;
  const r = charger.diameter / 2;

  const wedgeLength = half - r - bottomPadding / 2;
  const cameraLength = half - r - topPadding;
  const bayLength = charger.diameter + bottomPadding / 2 + topPadding;

  return {
    phoneLength: phone.length,
    phoneWidth: phone.width,
    wedgeLength,
    bayLength,
    cameraLength,
    bottomPadding,
    topPadding,
    wedgeHeight,
    cameraHeight,
    trayHeight: Math.max(cameraHeight, charger.depth, wedgeHeight),
    wedge: [-half, -half + wedgeLength],
    bay: [-half + wedgeLength, r],
    padding: [r, r + topPadding],
    camera: [half - cameraLength, half],
  };
};

/**
 * Smallest whole number of height units that holds the stack, from the bin
 * floor up: clearance, cable, tray, and the lower half of the phone.
 */
export const autoBinUnits = (layout: TrayLayout, phone: PhoneSpec, charger: ChargerSpec): number =>
  Math.ceil((layout.trayHeight + charger.cableDiameter + phone.height / 2 + BOTTOM_CLEARANCE) / HEIGHT_UNIT);

export const computeBinSpec = (
  params: Pick<TrayParams, 'gridX' | 'gridY' | 'binUnits' | 'stackingLip' | 'magnetHoles'>,
  layout: TrayLayout,
  phone: PhoneSpec,
  charger: ChargerSpec,
  height: (units: number) => number
): BinSpec => {
  const units = params.binUnits > 0 ? params.binUnits : autoBinUnits(layout, phone, charger);

  return {
    gridX: params.gridX,
    gridY: params.gridY,
    units,
    height: height(units),
    size: [
      params.gridX * GRID_PITCH - GRID_CLEARANCE,
      params.gridY * GRID_PITCH - GRID_CLEARANCE,
    ],
    stackingLip: params.stackingLip,
    magnetHoles: params.magnetHoles,
  };
};
