#!/usr/bin/env node
/**
 * CHARGER TRAY GENERATOR
 *
 * Usage: generate [options]
 *
 *   -c, --config <file>   JSON file: { "output": "dir", "params": {...}, "parts": [...] }
 *   -o, --out <dir>       Output directory (default: out)
 *   -s, --set key=value   Override one parameter, repeatable (e.g. --set cableAngle=315)
 *   -p, --part <name>     Only build this part, repeatable (charger_bin, tray_insert)
 *   -z, --zip             Also bundle every STL into one zip
 *       --presets         List phone and charger presets and exit
 */

import * as fs from 'fs';
import * as path from 'path';
import minimist from 'minimist';
import { z } from 'zod';
import { ChargerModel, TrayParams } from '../types';
import { ParameterError } from '../utils/errors';
import { parseParams } from '../utils/parameters';
import { listPresets } from '../utils/presets';
import { resolveModel } from '../utils/model';
import {
  ExportedFile,
  PART_NAMES,
  PartName,
  checkFit,
  exitFace,
  exportBundle,
  exportStl,
  generateParts,
  gridBin,
} from '../utils/geometry';

const configSchema = z
  .object({
    output: z.string().min(1).optional(),
    params: z.record(z.unknown()).optional(),
    parts: z.array(z.enum(['charger_bin', 'tray_insert'])).optional(),
  })
  .strict();

export type GeneratorConfig = z.infer<typeof configSchema>;

export const loadConfig = (file: string): GeneratorConfig => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParameterError(`Cannot read config ${file}: ${reason}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ParameterError(
      `Invalid config ${file}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
};

/** Turns repeated `key=value` flags into a parameter table, values read as JSON. */
export const parseSetOptions = (values: string[]): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  for (const entry of values) {
    const eq = entry.indexOf('=');
    if (eq <= 0) throw new ParameterError(`Expected key=value, got "${entry}"`);

    const key = entry.slice(0, eq).trim();
    const text = entry.slice(eq + 1).trim();
    try {
      overrides[key] = JSON.parse(text);
    } catch {
      overrides[key] = text;
    }
  }
  return overrides;
};

const toList = (value: unknown): string[] => {
  if (value === undefined || value === false) return [];
  return (Array.isArray(value) ? value : [value]).map(String).filter((item) => item.length > 0);
};

const isPartName = (name: string): name is PartName =>
  PART_NAMES.some((part) => part === name);

const getTimestamp = () => {
  const now = new Date();
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
};

export const describeModel = (model: ChargerModel): string[] => {
  const { phone, charger, layout, bin, fillHeight } = model;
  const breakdown = gridBin.heightBreakdown(bin);
  const mm = (n: number) => n.toFixed(2);

  return [
    `Phone   ${mm(phone.length)} x ${mm(phone.width)} x ${mm(phone.height)} mm, curve ${mm(phone.curve)}`,
    `Charger ø${charger.diameter} x ${charger.depth} mm, cable ø${charger.cableDiameter} at ${charger.cableAngle}° (${exitFace(charger.cableAngle)} exit)`,
    `Tray    wedge ${mm(layout.wedgeLength)} | bay ${mm(layout.bayLength)} | camera ${mm(layout.cameraLength)} mm, height ${mm(layout.trayHeight)}`,
    `Bin     ${bin.gridX}x${bin.gridY}x${bin.units} (${mm(bin.size[0])} x ${mm(bin.size[1])} mm)`,
    `Height  base ${mm(breakdown.base)} + interior ${mm(breakdown.interior)} = ${mm(breakdown.total)} mm, lip ${mm(breakdown.lip)}, fill ${mm(fillHeight)}`,
  ];
};

export const run = async (argv: string[]): Promise<number> => {
  const args = minimist(argv, {
    string: ['config', 'out', 'set', 'part'],
    boolean: ['zip', 'presets', 'help'],
    alias: { c: 'config', o: 'out', s: 'set', p: 'part', z: 'zip', h: 'help' },
  });

  if (args.help) {
    console.log('Usage: generate [--config file.json] [--out dir] [--set key=value] [--part name] [--zip] [--presets]');
    return 0;
  }

  if (args.presets) {
    const { phones, chargers } = listPresets();
    console.log('Phones:');
    phones.forEach((line) => console.log(`  ${line}`));
    console.log('Chargers:');
    chargers.forEach((line) => console.log(`  ${line}`));
    return 0;
  }

  try {
    const config: GeneratorConfig = args.config ? loadConfig(args.config) : {};
    const params: TrayParams = parseParams({
      ...config.params,
      ...parseSetOptions(toList(args.set)),
    });

    const requested = toList(args.part);
    const unknown = requested.filter((name) => !isPartName(name));
    if (unknown.length > 0) {
      throw new ParameterError(`Unknown part(s): ${unknown.join(', ')} (expected ${PART_NAMES.join(', ')})`);
    }
    const parts = requested.length > 0 ? requested.filter(isPartName) : config.parts ?? PART_NAMES;

    const model = resolveModel(params);
    describeModel(model).forEach((line) => console.log(line));
    checkFit(model).forEach((warning) => console.warn(`Warning: ${warning}`));

    const outDir = path.resolve(args.out || config.output || 'out');
    fs.mkdirSync(outDir, { recursive: true });

    const files: ExportedFile[] = [];
    for (const part of generateParts(model, parts)) {
      const file = { filename: `${part.name}.stl`, data: exportStl(part.solid) };
      fs.writeFileSync(path.join(outDir, file.filename), file.data);
      console.log(`Wrote ${path.join(outDir, file.filename)} (${file.data.byteLength} bytes)`);
      files.push(file);
    }

    if (args.zip) {
      const zipPath = path.join(outDir, `charger_tray_set_${getTimestamp()}.zip`);
      fs.writeFileSync(zipPath, await exportBundle(files));
      console.log(`Wrote ${zipPath}`);
    }

    return 0;
  } catch (err) {
    console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
};

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
