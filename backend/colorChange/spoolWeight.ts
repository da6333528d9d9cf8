import { ColorChangeConfigError } from './errors.js';
import type { SpoolWeightMatch, SpoolWeightSource } from './types.js';

const NUMBER_PATTERN = /(\d+(\.\d+)?)/;

/**
 * Look for a header comment such as `; spool weight: 1 kg`.
 * The first line mentioning "spool weight" with a number wins;
 * a "kg" on the same line converts the value to grams.
 */
export function findSpoolWeightInHeader(lines: string[]): SpoolWeightMatch | null {
  for (let i = 0; i < lines.length; i++) {
    const lower = lines[i].toLowerCase();
    if (!lower.includes('spool weight')) {
      continue;
    }

    const match = lines[i].match(NUMBER_PATTERN);
    if (!match) {
      continue;
    }

    let weight = parseFloat(match[1]);
    if (lower.includes('kg')) {
      weight *= 1000;
    }
    return { weight, lineIndex: i, line: lines[i].trim() };
  }
  return null;
}

/**
 * Explicit value first, then the header. Throws when neither is available.
 */
export function resolveSpoolWeight(
  explicit: number | undefined,
  lines: string[]
): { weight: number; source: SpoolWeightSource; match?: SpoolWeightMatch } {
  if (explicit !== undefined) {
    return { weight: explicit, source: 'explicit' };
  }

  const match = findSpoolWeightInHeader(lines);
  if (!match) {
    throw new ColorChangeConfigError(
      'Spool weight not provided and not found in G-code header. Please supply --spool-weight.'
    );
  }
  return { weight: match.weight, source: 'header', match };
}
