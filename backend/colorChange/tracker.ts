import { ColorChangeConfigError } from './errors.js';
import {
  extractExtrusionValue,
  extractFeedrate,
  formatColorChangeLine,
  formatSummaryLine,
  hasPositionalAxis,
  isExtrusionMove,
  isExtrusionReset,
  isLayerMarker,
} from './gcodeFields.js';
import type { ScanObserver, ScanResult, ScanSettings } from './types.js';

/**
 * A single move worth more spools than this is treated as a bad E value
 * and counted as zero.
 */
export const MAX_CROSSINGS_PER_MOVE = 1000;

/**
 * Single forward pass over a G-code program.
 *
 * Tracks filament weight from E moves and injects the color change
 * command each time the accumulated weight reaches the trigger weight.
 * In layer-based mode the command is only injected in front of a
 * `; layer` marker, at most once per marker.
 *
 * Pure apart from `onEvent`; performs no I/O.
 *
 * @example
 * const result = processGcode(lines, buildScanSettings(config, 1000));
 * console.log(result.colorChanges, result.summaryLine);
 */
export function processGcode(
  lines: string[],
  settings: ScanSettings,
  onEvent?: ScanObserver
): ScanResult {
  const { conversionFactor, triggerWeight, colorChangeCommand } = settings;
  if (!Number.isFinite(triggerWeight) || triggerWeight <= 0) {
    throw new ColorChangeConfigError(`Trigger weight must be positive (got ${triggerWeight})`);
  }

  const output: string[] = [];
  let cumulativeWeight = 0; // resets by triggerWeight on each color change
  let totalWeight = 0; // never reset
  let lastExtrusion = 0; // absolute mode only
  let colorChanges = 0;

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];

    if (settings.layerBased && isLayerMarker(line)) {
      if (cumulativeWeight >= triggerWeight) {
        onEvent?.({
          type: 'color-change',
          lineIndex: idx,
          cumulativeWeight,
          triggerWeight,
          atLayerChange: true,
        });
        output.push(formatColorChangeLine(colorChangeCommand, triggerWeight, true));
        cumulativeWeight -= triggerWeight;
        colorChanges++;
      }
      output.push(line);
      continue;
    }

    if (isExtrusionReset(line)) {
      lastExtrusion = extractExtrusionValue(line.trim());
      onEvent?.({ type: 'extrusion-reset', lineIndex: idx, position: lastExtrusion });
      output.push(line);
      continue;
    }

    if (isExtrusionMove(line)) {
      const trimmed = line.trim();

      if (settings.axisFilter && !hasPositionalAxis(trimmed)) {
        onEvent?.({ type: 'move-skipped', lineIndex: idx, reason: 'no-axis' });
        output.push(line);
        continue;
      }

      const feedrate = extractFeedrate(trimmed);
      if (
        feedrate !== undefined &&
        settings.feedrateThreshold !== undefined &&
        feedrate > settings.feedrateThreshold
      ) {
        onEvent?.({ type: 'move-skipped', lineIndex: idx, reason: 'feedrate', feedrate });
        output.push(line);
        continue;
      }

      const eValue = extractExtrusionValue(trimmed);
      let extrusionDelta: number;
      if (settings.extrusionMode === 'relative') {
        extrusionDelta = eValue;
      } else {
        extrusionDelta = eValue - lastExtrusion;
        lastExtrusion = eValue;
      }

      if (extrusionDelta > 0) {
        const weightDelta = extrusionDelta * conversionFactor;
        if (!Number.isFinite(weightDelta) || weightDelta / triggerWeight > MAX_CROSSINGS_PER_MOVE) {
          onEvent?.({ type: 'move-skipped', lineIndex: idx, reason: 'malformed' });
          output.push(line);
          continue;
        }
        cumulativeWeight += weightDelta;
        totalWeight += weightDelta;

        if (idx % settings.debugInterval === 0) {
          onEvent?.({ type: 'extrusion', lineIndex: idx, extrusionDelta, weightDelta, cumulativeWeight });
        }

        if (!settings.layerBased) {
          // cumulativeWeight < triggerWeight before this move, so at most
          // MAX_CROSSINGS_PER_MOVE + 1 passes.
          for (let n = 0; cumulativeWeight >= triggerWeight && n <= MAX_CROSSINGS_PER_MOVE; n++) {
            onEvent?.({
              type: 'color-change',
              lineIndex: idx,
              cumulativeWeight,
              triggerWeight,
              atLayerChange: false,
            });
            output.push(formatColorChangeLine(colorChangeCommand, triggerWeight));
            cumulativeWeight -= triggerWeight;
            colorChanges++;
          }
        }
      }
    }

    output.push(line);
  }

  onEvent?.({ type: 'scan-complete', cumulativeWeight, totalWeight, colorChanges });

  return {
    lines: output,
    summaryLine: formatSummaryLine(totalWeight),
    totalWeight,
    cumulativeWeight,
    colorChanges,
  };
}

/**
 * Body followed by the summary line.
 */
export function toOutputLines(result: ScanResult): string[] {
  return [...result.lines, result.summaryLine];
}
