import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { splitLines } from './gcodeFields.js';
import { buildScanSettings, DEFAULT_CONFIG, resolveConfig } from './settings.js';
import { resolveSpoolWeight } from './spoolWeight.js';
import { processGcode, toOutputLines } from './tracker.js';
import type {
  ColorChangeConfig,
  ColorChangeOptions,
  ColorChangeResult,
  ScanObserver,
} from './types.js';

export interface PipelineHooks {
  onEvent?: ScanObserver;
  /** Config the options are merged onto. Defaults to `DEFAULT_CONFIG`. */
  baseConfig?: ColorChangeConfig;
}

// ─────────────────────────────────────────────────────────────
// Main API
// ─────────────────────────────────────────────────────────────

/**
 * Inject color change commands into a G-code program held in memory.
 *
 * @example
 * const result = applyColorChanges(gcode, { spoolWeight: 1000, material: 'PETG' });
 * console.log(result.colorChanges, result.totalWeight);
 */
export function applyColorChanges(
  gcode: string,
  options: ColorChangeOptions = {},
  hooks: PipelineHooks = {}
): ColorChangeResult {
  const lines = splitLines(gcode);
  const spool = resolveSpoolWeight(options.spoolWeight, lines);
  const config = resolveConfig(options, hooks.baseConfig ?? DEFAULT_CONFIG);
  const settings = buildScanSettings(config, spool.weight);

  const result = processGcode(lines, settings, hooks.onEvent);
  const output = toOutputLines(result).map(line => line + '\n').join('');

  return {
    ...result,
    output,
    spoolWeight: spool.weight,
    spoolWeightSource: spool.source,
    conversionFactor: settings.conversionFactor,
    triggerWeight: settings.triggerWeight,
  };
}

/**
 * Read `inputPath`, inject color changes and write `outputPath`,
 * creating its directory if needed. Nothing is written when the
 * settings are rejected.
 */
export async function processGcodeFile(
  inputPath: string,
  outputPath: string,
  options: ColorChangeOptions = {},
  hooks: PipelineHooks = {}
): Promise<ColorChangeResult> {
  // latin1 maps bytes 1:1, so comments in any encoding pass through unchanged
  const gcode = await readFile(inputPath, 'latin1');
  const result = applyColorChanges(gcode, options, hooks);

  const outputDir = dirname(outputPath);
  if (!existsSync(outputDir)) {
    await mkdir(outputDir, { recursive: true });
  }
  await writeFile(outputPath, result.output, 'latin1');

  return result;
}

// Re-exports
export { ColorChangeConfigError } from './errors.js';
export {
  extractExtrusionValue,
  extractFeedrate,
  formatColorChangeLine,
  formatSummaryLine,
  hasPositionalAxis,
  isExtrusionMove,
  isExtrusionReset,
  isLayerMarker,
  splitLines,
} from './gcodeFields.js';
export { applyMaterial, getAvailableMaterials, getMaterial } from './materials.js';
export {
  buildScanSettings,
  calculateConversionFactor,
  calculateTriggerWeight,
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  resolveConfig,
  validateConfig,
} from './settings.js';
export { findSpoolWeightInHeader, resolveSpoolWeight } from './spoolWeight.js';
export { MAX_CROSSINGS_PER_MOVE, processGcode, toOutputLines } from './tracker.js';
export type * from './types.js';
