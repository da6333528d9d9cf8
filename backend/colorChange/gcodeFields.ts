// ─────────────────────────────────────────────────────────────
// Line classification
// ─────────────────────────────────────────────────────────────

export const LAYER_MARKER = '; layer';

const EXTRUSION_PATTERN = /(?<=\sE)(-?\d+\.?\d*)/;
const FEEDRATE_PATTERN = /F(\d+\.?\d*)/;
const AXES = ['X', 'Y', 'Z'];

export function isLayerMarker(line: string): boolean {
  return line.trim().startsWith(LAYER_MARKER);
}

/**
 * `G92 ... E` resets the extrusion counter.
 */
export function isExtrusionReset(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('G92') && trimmed.includes('E');
}

export function isExtrusionMove(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('G1') && trimmed.includes('E');
}

export function hasPositionalAxis(line: string): boolean {
  return AXES.some(axis => line.includes(axis));
}

// ─────────────────────────────────────────────────────────────
// Field extraction
// ─────────────────────────────────────────────────────────────

/**
 * Value of the first whitespace-delimited `E` field.
 * Returns 0 when the field is missing or does not parse.
 *
 * @example
 * extractExtrusionValue('G1 X10 Y5 E0.42'); // 0.42
 * extractExtrusionValue('G1 X10 Y5');       // 0
 */
export function extractExtrusionValue(line: string): number {
  const match = line.match(EXTRUSION_PATTERN);
  if (!match) {
    return 0;
  }
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Value of the first `F` field, or undefined when the line has none.
 */
export function extractFeedrate(line: string): number | undefined {
  const match = line.match(FEEDRATE_PATTERN);
  if (!match) {
    return undefined;
  }
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

// ─────────────────────────────────────────────────────────────
// Text helpers
// ─────────────────────────────────────────────────────────────

/**
 * Split a G-code program into lines without their terminators.
 * A final newline does not produce a trailing empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function formatColorChangeLine(
  command: string,
  triggerWeight: number,
  atLayerChange: boolean = false
): string {
  const suffix = atLayerChange ? ' at layer change' : '';
  return `${command} ; Color change triggered after ~${triggerWeight.toFixed(2)}g used${suffix}`;
}

export function formatSummaryLine(totalWeight: number): string {
  return `; TOTAL FILAMENT WEIGHT USED: ${totalWeight.toFixed(2)}g`;
}
