import { ColorChangeConfigError } from './errors.js';
import { applyMaterial } from './materials.js';
import type { ColorChangeConfig, ColorChangeOptions, ExtrusionMode, ScanSettings } from './types.js';

// ─────────────────────────────────────────────────────────────
// Defaults
// ─────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: ColorChangeConfig = {
  filamentDiameter: 1.75,
  filamentDensity: 1.25,
  extrusionMode: 'relative',
  colorChangeCommand: 'M600',
  safetyMargin: 0.03, // trigger at 97% usage
  feedrateThreshold: 3000,
  scale: 1.0,
  layerBased: false,
  axisFilter: true,
  debugInterval: 100,
};

export const EXTRUSION_MODES: readonly ExtrusionMode[] = ['relative', 'absolute'];

export function isExtrusionMode(value: unknown): value is ExtrusionMode {
  return value === 'relative' || value === 'absolute';
}

/**
 * Overlay environment variables on the defaults.
 * `FEEDRATE_THRESHOLD=off` disables feedrate filtering.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ColorChangeConfig {
  const config: ColorChangeConfig = { ...DEFAULT_CONFIG };

  if (env.FILAMENT_DIAMETER) config.filamentDiameter = parseFloat(env.FILAMENT_DIAMETER);
  if (env.FILAMENT_DENSITY) config.filamentDensity = parseFloat(env.FILAMENT_DENSITY);
  if (env.COLOR_CHANGE_COMMAND) config.colorChangeCommand = env.COLOR_CHANGE_COMMAND;
  if (env.SAFETY_MARGIN) config.safetyMargin = parseFloat(env.SAFETY_MARGIN);
  if (env.WEIGHT_SCALE) config.scale = parseFloat(env.WEIGHT_SCALE);
  if (env.DEBUG_INTERVAL) config.debugInterval = parseInt(env.DEBUG_INTERVAL, 10);

  if (env.EXTRUSION_MODE) {
    const mode = env.EXTRUSION_MODE.toLowerCase();
    if (!isExtrusionMode(mode)) {
      throw new ColorChangeConfigError(
        `Invalid EXTRUSION_MODE: ${env.EXTRUSION_MODE}. Expected one of: ${EXTRUSION_MODES.join(', ')}`
      );
    }
    config.extrusionMode = mode;
  }

  if (env.FEEDRATE_THRESHOLD) {
    config.feedrateThreshold = env.FEEDRATE_THRESHOLD.toLowerCase() === 'off'
      ? undefined
      : parseFloat(env.FEEDRATE_THRESHOLD);
  }

  return config;
}

/**
 * Merge per-run overrides onto a base config. A material preset is
 * applied first so an explicit density or diameter still wins over it.
 */
export function resolveConfig(
  options: ColorChangeOptions,
  base: ColorChangeConfig = DEFAULT_CONFIG
): ColorChangeConfig {
  const config = options.material ? applyMaterial(base, options.material) : { ...base };

  return {
    filamentDiameter: options.filamentDiameter ?? config.filamentDiameter,
    filamentDensity: options.filamentDensity ?? config.filamentDensity,
    extrusionMode: options.extrusionMode ?? config.extrusionMode,
    colorChangeCommand: options.colorChangeCommand ?? config.colorChangeCommand,
    safetyMargin: options.safetyMargin ?? config.safetyMargin,
    feedrateThreshold: options.feedrateThreshold === null
      ? undefined
      : options.feedrateThreshold ?? config.feedrateThreshold,
    scale: options.scale ?? config.scale,
    layerBased: options.layerBased ?? config.layerBased,
    axisFilter: options.axisFilter ?? config.axisFilter,
    debugInterval: options.debugInterval ?? config.debugInterval,
  };
}

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

function requirePositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ColorChangeConfigError(`${label} must be a positive number (got ${value})`);
  }
}

export function validateConfig(config: ColorChangeConfig): void {
  requirePositive(config.filamentDiameter, 'Filament diameter');
  requirePositive(config.filamentDensity, 'Filament density');
  requirePositive(config.scale, 'Scale');

  if (!Number.isFinite(config.safetyMargin) || config.safetyMargin < 0 || config.safetyMargin >= 1) {
    throw new ColorChangeConfigError(
      `Safety margin must be at least 0 and below 1 (got ${config.safetyMargin})`
    );
  }
  if (!isExtrusionMode(config.extrusionMode)) {
    throw new ColorChangeConfigError(`Unknown extrusion mode: ${String(config.extrusionMode)}`);
  }
  if (config.colorChangeCommand.trim() === '') {
    throw new ColorChangeConfigError('Color change command must not be empty');
  }
  if (config.feedrateThreshold !== undefined) {
    requirePositive(config.feedrateThreshold, 'Feedrate threshold');
  }
  if (!Number.isInteger(config.debugInterval) || config.debugInterval <= 0) {
    throw new ColorChangeConfigError(
      `Debug interval must be a positive integer (got ${config.debugInterval})`
    );
  }
}

// ─────────────────────────────────────────────────────────────
// Derived values
// ─────────────────────────────────────────────────────────────

/**
 * Grams of filament per millimetre of E travel.
 * Diameter in mm and density in g/cm³, so mm³ → cm³ is /1000.
 *
 * @example
 * calculateConversionFactor(1.75, 1.25); // ≈ 0.003007
 */
export function calculateConversionFactor(
  diameter: number,
  density: number,
  scale: number = 1.0
): number {
  const area = Math.PI * Math.pow(diameter / 2, 2);
  return (area * density) / 1000 * scale;
}

export function calculateTriggerWeight(spoolWeight: number, safetyMargin: number): number {
  return spoolWeight * (1 - safetyMargin);
}

export function buildScanSettings(config: ColorChangeConfig, spoolWeight: number): ScanSettings {
  validateConfig(config);
  requirePositive(spoolWeight, 'Spool weight');

  return {
    conversionFactor: calculateConversionFactor(
      config.filamentDiameter,
      config.filamentDensity,
      config.scale
    ),
    triggerWeight: calculateTriggerWeight(spoolWeight, config.safetyMargin),
    extrusionMode: config.extrusionMode,
    colorChangeCommand: config.colorChangeCommand,
    feedrateThreshold: config.feedrateThreshold,
    layerBased: config.layerBased,
    axisFilter: config.axisFilter,
    debugInterval: config.debugInterval,
  };
}
