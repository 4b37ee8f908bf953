/**
 * PARAMETER RESOLVER
 *
 * Turns the flat parameter table into the phone and charger envelopes the
 * geometry builders consume. Presets are looked up, custom fields are used
 * for preset 0, and the phone envelope is grown by the cover and tolerance.
 */

import { z } from 'zod';
import { ChargerSpec, DEFAULT_PARAMS, PhoneSpec, TrayParams } from '../types';
import {
  CHARGER_PRESETS,
  CUSTOM_PRESET,
  ChargerDimensions,
  PHONE_PRESETS,
  PhoneDimensions,
} from './presets';
import { ParameterError } from './errors';

export type PresetResolution<T> =
  | { kind: 'resolved'; spec: T }
  | { kind: 'unknown-preset'; preset: number };

export const normalizeAngle = (degrees: number): number => ((degrees % 360) + 360) % 360;

export const resolvePhone = (params: TrayParams): PresetResolution<PhoneSpec> => {
  let dimensions: PhoneDimensions;

  if (params.phonePreset === CUSTOM_PRESET) {
    dimensions = [
      params.phoneLength,
      params.phoneWidth,
      params.phoneHeight,
      params.phoneCurve,
      params.phoneSmoothness,
    ];
  } else {
    const preset = PHONE_PRESETS[params.phonePreset];
    if (!preset) return { kind: 'unknown-preset', preset: params.phonePreset };
    dimensions = preset.dimensions;
  }

  const [length, width, height, curve, smoothness = params.phoneSmoothness] = dimensions;
  const grow = params.coverThickness + params.tolerance;

  return {
    kind: 'resolved',
    spec: {
      length: length + 2 * grow,
      width: width + 2 * grow,
      height: height + 2 * params.coverThickness,
      curve: curve + grow,
      smoothness,
    },
  };
};

export const resolveCharger = (params: TrayParams): PresetResolution<ChargerSpec> => {
  let dimensions: ChargerDimensions;

  if (params.chargerPreset === CUSTOM_PRESET) {
    dimensions = [
      params.chargerDiameter,
      params.chargerDepth,
      params.cableDiameter,
      params.plugWidth,
    ];
  } else {
    const preset = CHARGER_PRESETS[params.chargerPreset];
    if (!preset) return { kind: 'unknown-preset', preset: params.chargerPreset };
    dimensions = preset.dimensions;
  }

  const [diameter, depth, cableDiameter, plugWidth] = dimensions;

  return {
    kind: 'resolved',
    spec: {
      diameter,
      depth,
      cableDiameter,
      plugWidth,
      cableAngle: normalizeAngle(params.cableAngle),
    },
  };
};

export const validatePhone = (phone: PhoneSpec): string[] => {
  const issues: string[] = [];
  if (!(phone.width > 0)) issues.push(`phone width must be positive (got ${phone.width})`);
  if (!(phone.length > phone.width)) {
    issues.push(`phone length ${phone.length} must exceed its width ${phone.width}`);
  }
  if (!(phone.height > 0)) issues.push(`phone height must be positive (got ${phone.height})`);
  const maxCurve = Math.min(phone.length, phone.width) / 2;
  if (!(phone.curve > 0 && phone.curve <= maxCurve)) {
    issues.push(`phone curve ${phone.curve} must be in (0, ${maxCurve}]`);
  }
  if (!(phone.smoothness > 0)) issues.push(`phone smoothness must be positive (got ${phone.smoothness})`);
  return issues;
};

export const validateCharger = (charger: ChargerSpec): string[] => {
  const issues: string[] = [];
  if (!(charger.cableDiameter > 0)) {
    issues.push(`cable diameter must be positive (got ${charger.cableDiameter})`);
  }
  if (!(charger.plugWidth > charger.cableDiameter)) {
    issues.push(`plug width ${charger.plugWidth} must exceed the cable diameter ${charger.cableDiameter}`);
  }
  if (!(charger.diameter > charger.plugWidth)) {
    issues.push(`charger diameter ${charger.diameter} must exceed the plug width ${charger.plugWidth}`);
  }
  if (!(charger.depth > 0)) issues.push(`charger depth must be positive (got ${charger.depth})`);
  return issues;
};

// --- Parameter table parsing ---

const length = z.number().positive();

const paramsSchema = z
  .object({
    phonePreset: z.number().int().nonnegative(),
    phoneLength: length,
    phoneWidth: length,
    phoneHeight: length,
    phoneCurve: length,
    phoneSmoothness: length,
    coverThickness: z.number().nonnegative(),
    tolerance: z.number().nonnegative(),

    chargerPreset: z.number().int().nonnegative(),
    chargerDiameter: length,
    chargerDepth: length,
    cableDiameter: length,
    plugWidth: length,
    cableAngle: z.number().finite(),

    bottomPadding: z.number().nonnegative(),
    topPadding: z.number().nonnegative(),
    wedgeHeight: length,
    cameraHeight: length,

    gridX: z.number().int().min(1),
    gridY: z.number().int().min(1),
    binUnits: z.number().int().nonnegative(),
    stackingLip: z.boolean(),
    magnetHoles: z.boolean(),

    segments: z.number().int().min(8).max(512),
  })
  .partial()
  .strict();

/**
 * Validates an untrusted parameter table and fills the gaps from DEFAULT_PARAMS.
 */
export const parseParams = (input: unknown): TrayParams => {
  const result = paramsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ParameterError('Invalid parameter table', issues);
  }
  return { ...DEFAULT_PARAMS, ...result.data };
};
