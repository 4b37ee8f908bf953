/**
 * Measured device presets, all in mm.
 *
 * Phones:   [length, width, height, curve, smoothness?]
 * Chargers: [diameter, depth, cableDiameter, plugWidth]
 *
 * Key 0 is reserved for the custom fields of TrayParams.
 */

export type PhoneDimensions = [number, number, number, number, number?];

export type ChargerDimensions = [number, number, number, number];

export interface Preset<T> {
  name: string;
  dimensions: T;
}

export const CUSTOM_PRESET = 0;

export const PHONE_PRESETS: Record<number, Preset<PhoneDimensions>> = {
  1: { name: 'iPhone 17', dimensions: [149.6, 71.5, 7.95, 34.0] },
  2: { name: 'iPhone 17 Pro', dimensions: [150.0, 71.9, 8.75, 34.0] },
  3: { name: 'iPhone 17 Pro Max', dimensions: [163.4, 78.0, 8.75, 36.5] },
  4: { name: 'iPhone Air', dimensions: [156.2, 74.7, 5.64, 35.0, 4] },
  5: { name: 'iPhone 16', dimensions: [147.6, 71.6, 7.80, 33.0] },
  6: { name: 'iPhone 16 Pro', dimensions: [149.6, 71.5, 8.25, 34.0] },
  7: { name: 'iPhone 16 Pro Max', dimensions: [163.0, 77.6, 8.25, 36.0] },
  8: { name: 'iPhone 15', dimensions: [147.6, 71.6, 7.80, 33.0] },
  9: { name: 'iPhone 15 Pro Max', dimensions: [159.9, 76.7, 8.25, 35.0] },
};

export const CHARGER_PRESETS: Record<number, Preset<ChargerDimensions>> = {
  1: { name: 'MagSafe 25W', dimensions: [55.5, 4.37, 2.85, 8.0] },
  2: { name: 'MagSafe 15W', dimensions: [55.9, 5.25, 3.0, 8.5] },
  3: { name: 'Qi2 puck', dimensions: [58.0, 6.0, 3.5, 9.0] },
};

export const listPresets = (): { phones: string[]; chargers: string[] } => {
  const describe = <T>(table: Record<number, Preset<T>>) =>
    Object.entries(table).map(([key, preset]) => `${key}: ${preset.name}`);

  return {
    phones: [`${CUSTOM_PRESET}: custom`, ...describe(PHONE_PRESETS)],
    chargers: [`${CUSTOM_PRESET}: custom`, ...describe(CHARGER_PRESETS)],
  };
};
