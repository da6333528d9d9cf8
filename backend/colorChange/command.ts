import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { processGcodeFile } from './index.js';
import { ColorChangeConfigError } from './errors.js';
import { getAvailableMaterials, getMaterial } from './materials.js';
import { createLogger, logScanEvent, type Logger } from './logger.js';
import { DEFAULT_CONFIG, EXTRUSION_MODES, isExtrusionMode } from './settings.js';
import type { ColorChangeConfig, ColorChangeOptions, ExtrusionMode } from './types.js';

export interface CliOptions {
  input?: string;
  output?: string;
  spoolWeight?: number;
  filamentDiameter?: number;
  filamentDensity?: number;
  material?: string;
  extrusionMode?: ExtrusionMode;
  colorChangeCommand?: string;
  safetyMargin?: number;
  layerBased?: boolean;
  axisFilter: boolean;
  feedrateThreshold?: number;
  feedrateFilter: boolean;
  scale?: number;
  debug?: boolean;
  debugInterval?: number;
}

function parseNumber(value: string): number {
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseExtrusionMode(value: string): ExtrusionMode {
  if (!isExtrusionMode(value)) {
    throw new InvalidArgumentError(`Expected one of: ${EXTRUSION_MODES.join(', ')}.`);
  }
  return value;
}

export function toColorChangeOptions(options: CliOptions): ColorChangeOptions {
  return {
    spoolWeight: options.spoolWeight,
    filamentDiameter: options.filamentDiameter,
    filamentDensity: options.filamentDensity,
    material: options.material,
    extrusionMode: options.extrusionMode,
    colorChangeCommand: options.colorChangeCommand,
    safetyMargin: options.safetyMargin,
    layerBased: options.layerBased,
    axisFilter: options.axisFilter,
    feedrateThreshold: options.feedrateFilter ? options.feedrateThreshold : null,
    scale: options.scale,
    debugInterval: options.debugInterval,
  };
}

/**
 * Run one file through the pipeline and return the process exit code.
 */
export async function runColorChange(
  options: CliOptions & { input: string; output: string },
  logger: Logger,
  baseConfig: ColorChangeConfig = DEFAULT_CONFIG
): Promise<number> {
  logger.debug('Debug mode enabled.');

  try {
    const result = await processGcodeFile(options.input, options.output, toColorChangeOptions(options), {
      baseConfig,
      onEvent: event => logScanEvent(logger, event),
    });

    if (result.spoolWeightSource === 'header') {
      logger.debug(`Extracted spool weight: ${result.spoolWeight}g from header`);
    }
    logger.debug(`Conversion factor: ${result.conversionFactor.toFixed(6)} g/mm`);
    logger.info(`Processed G-code has been saved to ${options.output}`);
    logger.info(`Total filament weight used for model: ${result.totalWeight.toFixed(2)}g`);
    if (result.colorChanges > 0) {
      logger.info(`Inserted ${result.colorChanges} color change(s) every ~${result.triggerWeight.toFixed(2)}g`);
    }
    return 0;
  } catch (err) {
    if (err instanceof ColorChangeConfigError) {
      logger.error(err.message);
    } else {
      logger.error(`An error occurred: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 2;
  }
}

/**
 * Build the `spoolswap` program. `onExit` receives the exit code of the
 * main action.
 */
export function createProgram(
  baseConfig: ColorChangeConfig = DEFAULT_CONFIG,
  onExit: (code: number) => void = code => { process.exitCode = code; }
): Command {
  const program: Command = new Command();

  program
    .name('spoolswap')
    .description(
      'Injects a color change command (default: M600) into G-code based on filament weight usage.'
    )
    .version('1.0.0');

  program
    .option('-i, --input <path>', 'Input G-code file path (required)')
    .option('-o, --output <path>', 'Output G-code file path (required)')
    .option('-w, --spool-weight <grams>', 'Filament spool weight in grams (read from the G-code header when omitted)', parseNumber)
    .option('--filament-diameter <mm>', `Filament diameter in mm (default: ${baseConfig.filamentDiameter})`, parseNumber)
    .option('--filament-density <g/cm3>', `Filament density in g/cm³ (default: ${baseConfig.filamentDensity})`, parseNumber)
    .option('-m, --material <name>', 'Material preset that sets density and diameter (see `spoolswap materials`)')
    .option('--extrusion-mode <mode>', `Extrusion mode: relative or absolute (default: ${baseConfig.extrusionMode})`, parseExtrusionMode)
    .option('--color-change-command <gcode>', `G-code command to trigger a color change (default: ${baseConfig.colorChangeCommand})`)
    .option('--safety-margin <fraction>', `Fraction of spool weight to leave unused (default: ${baseConfig.safetyMargin})`, parseNumber)
    .option('--layer-based', 'Only insert the color change command at layer change markers')
    .option('--no-axis-filter', 'Count extrusion moves that have no X, Y or Z coordinate')
    .option('--feedrate-threshold <mm/min>', `Feedrate above which extrusion moves are not counted (default: ${baseConfig.feedrateThreshold ?? 'off'})`, parseNumber)
    .option('--no-feedrate-filter', 'Count extrusion moves at any feedrate')
    .option('--scale <factor>', `Scaling factor for the computed filament weight (default: ${baseConfig.scale})`, parseNumber)
    .option('-d, --debug', 'Enable debug logging output')
    .option('--debug-interval <lines>', `Lines between sampled debug messages (default: ${baseConfig.debugInterval})`, parseInteger)
    .action(async (options: CliOptions) => {
      // Checked here rather than with requiredOption so `materials` runs without them.
      const { input, output } = options;
      if (!input || !output) {
        program.error(`error: required option '${input ? '-o, --output' : '-i, --input'} <path>' not specified`);
      }
      const logger = createLogger({ debug: options.debug });
      onExit(await runColorChange({ ...options, input, output }, logger, baseConfig));
    });

  program
    .command('materials')
    .description('List material presets')
    .action(() => {
      console.log(chalk.bold('\nMaterial presets:\n'));
      for (const key of getAvailableMaterials()) {
        const material = getMaterial(key);
        if (!material) continue;
        console.log(`  ${chalk.yellow(key.padEnd(8))} ${material.fullName} ${chalk.gray(`(${material.density} g/cm³, ${material.diameter} mm)`)}`);
      }
      console.log('');
    });

  return program;
}
