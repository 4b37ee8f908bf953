export type ExitFace = 'top' | 'bottom';

export interface TrayParams {
  // Phone (preset 0 = use the custom fields below)
  phonePreset: number;
  phoneLength: number;
  phoneWidth: number;
  phoneHeight: number;       // Thickness of the bare phone
  phoneCurve: number;        // Corner radius of the silhouette
  phoneSmoothness: number;   // Superellipse exponent of the corners (2 = circular)
  coverThickness: number;    // Case thickness, added on every face
  tolerance: number;         // Extra play per side

  // Charger (preset 0 = use the custom fields below)
  chargerPreset: number;
  chargerDiameter: number;
  chargerDepth: number;      // Puck thickness, also the bay depth
  cableDiameter: number;
  plugWidth: number;         // Widest part of the cable strain relief
  cableAngle: number;        // Azimuth of the cable exit in degrees (0 = towards the camera end)

  // Tray
  bottomPadding: number;     // Solid margin between the wedge and the charger
  topPadding: number;        // Solid margin between the charger and the camera relief
  wedgeHeight: number;       // Rise of the insertion ramp
  cameraHeight: number;      // Solid left under the camera bump

  // Host bin
  gridX: number;             // Cells along the phone's long axis
  gridY: number;
  binUnits: number;          // Height in 7mm units, 0 = auto
  stackingLip: boolean;
  magnetHoles: boolean;

  // Output
  segments: number;          // Facets per full circle
}

export const DEFAULT_PARAMS: TrayParams = {
  phonePreset: 1,
  phoneLength: 149.6,
  phoneWidth: 71.5,
  phoneHeight: 7.95,
  phoneCurve: 34.0,
  phoneSmoothness: 5,
  coverThickness: 1.0,
  tolerance: 0.25,

  chargerPreset: 1,
  chargerDiameter: 55.5,
  chargerDepth: 4.37,
  cableDiameter: 2.85,
  plugWidth: 8.0,
  cableAngle: 0,

  bottomPadding: 10,
  topPadding: 5,
  wedgeHeight: 4.0,
  cameraHeight: 3.0,

  gridX: 4,
  gridY: 2,
  binUnits: 0,
  stackingLip: true,
  magnetHoles: false,

  segments: 64,
};

/** Phone envelope after cover and tolerance are applied. */
export interface PhoneSpec {
  length: number;
  width: number;
  height: number;
  curve: number;
  smoothness: number;
}

export interface ChargerSpec {
  diameter: number;
  depth: number;
  cableDiameter: number;
  plugWidth: number;
  cableAngle: number;        // Normalised into [0, 360)
}

/**
 * Tray regions along the phone's long axis (x), charger centred on x = 0.
 * All extents are [start, end] in mm, before the overlap margin is applied.
 */
export interface TrayLayout {
  phoneLength: number;
  phoneWidth: number;
  wedgeLength: number;
  bayLength: number;
  cameraLength: number;
  bottomPadding: number;
  topPadding: number;
  wedgeHeight: number;
  cameraHeight: number;
  trayHeight: number;
  wedge: [number, number];
  bay: [number, number];       // Charger box only
  padding: [number, number];   // Top padding box
  camera: [number, number];
}

export interface BinSpec {
  gridX: number;
  gridY: number;
  units: number;
  height: number;              // Body height in mm, lip excluded
  size: [number, number];      // Outer footprint in mm
  stackingLip: boolean;
  magnetHoles: boolean;
}

export interface BinHeightBreakdown {
  base: number;                // Feet
  interior: number;            // Solid body above the feet
  lip: number;
  total: number;               // Body height, lip excluded
}

/** Everything the builders need, resolved once per run. */
export interface ChargerModel {
  phone: PhoneSpec;
  charger: ChargerSpec;
  layout: TrayLayout;
  bin: BinSpec;
  trayBottom: number;          // Bin z of the tray's bottom face
  fillHeight: number;          // Bottom fill between bin floor and tray
  segments: number;
}
