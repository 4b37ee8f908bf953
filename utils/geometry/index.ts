/**
 * GEOMETRY MODULE INDEX
 *
 * Re-exports all geometry generation functions.
 *
 * Structure:
 * - constants.ts:      Overlap margins and storage-grid dimensions
 * - primitives.ts:     superellipse, phone silhouette, roundRect, wedge
 * - layout.ts:         Tray regions along the phone, bin height
 * - trayGeometry.ts:   Solid tray insert
 * - cutoutGeometry.ts: Charger bay, maintenance slot, cable channel
 * - binGeometry.ts:    Host bin contract and the grid bin provider
 * - assembly.ts:       Bin ∖ phone ∪ tray ∖ cutout, fit warnings
 * - meshExport.ts:     BufferGeometry, STL and zip output
 */

export * from './constants';
export { superellipse, superellipsePoints, phone2dShape, roundRect, clampCornerRadius, wedge, type Vec2 } from './primitives';
export { computeTrayLayout, computeBinSpec, autoBinUnits } from './layout';
export { generateTraySolid } from './trayGeometry';
export {
  generateCutoutSolid,
  generateCableChannel,
  exitFace,
  clampedExitAngle,
  cableChannelLength,
  cableChannelLevels,
  type CutoutOptions,
} from './cutoutGeometry';
export { gridBin, cellCenters, type BinProvider } from './binGeometry';
export {
  generateChargerBin,
  generateTrayInsert,
  generateParts,
  checkFit,
  PART_NAMES,
  type Part,
  type PartName,
} from './assembly';
export { toBufferGeometry, triangleCount, exportStl, exportBundle, type ExportedFile } from './meshExport';
