import { ChargerModel, TrayParams } from '../types';
import { ParameterError, UnknownPresetError } from './errors';
import { resolveCharger, resolvePhone, validateCharger, validatePhone } from './parameters';
import { computeBinSpec, computeTrayLayout } from './geometry/layout';
import { BinProvider, gridBin } from './geometry/binGeometry';

/**
 * Resolves a parameter table into the immutable model every builder reads.
 * The tray is stacked so that its top plus half the phone meets the bin top;
 * everything between the bin floor and the tray becomes bottom fill.
 */
export const resolveModel = (params: TrayParams, provider: BinProvider = gridBin): ChargerModel => {
  const phoneResult = resolvePhone(params);
  if (phoneResult.kind === 'unknown-preset') {
    throw new UnknownPresetError('phone', phoneResult.preset);
  }
  const chargerResult = resolveCharger(params);
  if (chargerResult.kind === 'unknown-preset') {
    throw new UnknownPresetError('charger', chargerResult.preset);
  }

  const phone = phoneResult.spec;
  const charger = chargerResult.spec;
  const issues = [...validatePhone(phone), ...validateCharger(charger)];
  if (issues.length > 0) throw new ParameterError('Invalid device dimensions', issues);

  const layout = computeTrayLayout(phone, charger, params);
  const bin = computeBinSpec(params, layout, phone, charger, (units) => provider.height(units));
  const { base } = provider.heightBreakdown(bin);

  const trayBottom = bin.height - phone.height / 2 - layout.trayHeight;

  return {
    phone,
    charger,
    layout,
    bin,
    trayBottom,
    fillHeight: Math.max(0, trayBottom - base),
    segments: params.segments,
  };
};
