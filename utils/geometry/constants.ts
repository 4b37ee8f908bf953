/**
 * Fixed dimensions shared by the geometry builders, in mm.
 */

/**
 * Growth applied to solids at faces they share with a neighbour, so unions
 * never meet on exactly coincident planes.
 */
export const OVERLAP = 0.02;

/** Offset used where a cutter must pass cleanly through a surface. */
export const PIERCE = 0.01;

/** Headroom above the charger so the cutter clears the tray top. */
export const CHARGER_CLEARANCE = 1.0;

/** Solid kept under the cable channel when the bin height is computed. */
export const BOTTOM_CLEARANCE = 2.0;

/** Angular step of the superellipse sampling, in degrees (72 points). */
export const SUPERELLIPSE_STEP = 5;

// Storage grid
export const GRID_PITCH = 42;
export const GRID_CLEARANCE = 0.5;
export const HEIGHT_UNIT = 7;
export const BASE_HEIGHT = 5;
export const BASE_BOTTOM_INSET = 2.95;
export const BIN_CORNER_RADIUS = 3.75;
export const LIP_HEIGHT = 4.4;
export const LIP_WIDTH = 2.6;
export const MAGNET_DIAMETER = 6.5;
export const MAGNET_DEPTH = 2.4;
export const MAGNET_OFFSET = 13;
