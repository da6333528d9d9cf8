import { isExtrusionMode } from './settings.js';
import type { ColorChangeOptions } from './types.js';

export interface ColorChangeRequest {
  gcode: string;
  options: ColorChangeOptions;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const NUMBER_FIELDS = [
  'spoolWeight',
  'filamentDiameter',
  'filamentDensity',
  'safetyMargin',
  'scale',
  'debugInterval',
] as const;

const BOOLEAN_FIELDS = ['layerBased', 'axisFilter'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a JSON body for the color change endpoints.
 * Body: { gcode: string, spoolWeight?, material?, ...config fields }
 */
export function parseColorChangeRequest(body: unknown): ParseResult<ColorChangeRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }
  if (typeof body.gcode !== 'string') {
    return { ok: false, error: 'Missing required field: gcode' };
  }

  const options: ColorChangeOptions = {};

  for (const field of NUMBER_FIELDS) {
    const value = body[field];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return { ok: false, error: `Field ${field} must be a number` };
    }
    options[field] = value;
  }

  for (const field of BOOLEAN_FIELDS) {
    const value = body[field];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      return { ok: false, error: `Field ${field} must be a boolean` };
    }
    options[field] = value;
  }

  if (body.feedrateThreshold !== undefined) {
    if (body.feedrateThreshold !== null && typeof body.feedrateThreshold !== 'number') {
      return { ok: false, error: 'Field feedrateThreshold must be a number or null' };
    }
    options.feedrateThreshold = body.feedrateThreshold;
  }

  if (body.extrusionMode !== undefined) {
    if (!isExtrusionMode(body.extrusionMode)) {
      return { ok: false, error: 'Field extrusionMode must be "relative" or "absolute"' };
    }
    options.extrusionMode = body.extrusionMode;
  }

  if (body.colorChangeCommand !== undefined) {
    if (typeof body.colorChangeCommand !== 'string') {
      return { ok: false, error: 'Field colorChangeCommand must be a string' };
    }
    options.colorChangeCommand = body.colorChangeCommand;
  }

  if (body.material !== undefined) {
    if (typeof body.material !== 'string') {
      return { ok: false, error: 'Field material must be a string' };
    }
    options.material = body.material;
  }

  return { ok: true, value: { gcode: body.gcode, options } };
}
