import { describe, it, expect } from 'vitest';
import { findSpoolWeightInHeader, resolveSpoolWeight } from '../../backend/colorChange/spoolWeight.js';
import { ColorChangeConfigError } from '../../backend/colorChange/errors.js';

describe('spool weight', () => {
  describe('findSpoolWeightInHeader', () => {
    it('should convert kilograms to grams', () => {
      const match = findSpoolWeightInHeader(['; generated by slicer', '; spool weight: 1 kg', 'G28']);
      expect(match).toEqual({ weight: 1000, lineIndex: 1, line: '; spool weight: 1 kg' });
    });

    it('should read grams as-is', () => {
      expect(findSpoolWeightInHeader(['; spool weight: 500g'])?.weight).toBe(500);
    });

    it('should match the phrase case-insensitively', () => {
      expect(findSpoolWeightInHeader(['; Spool Weight = 750.5 g'])?.weight).toBe(750.5);
      expect(findSpoolWeightInHeader(['; SPOOL WEIGHT 0.8KG'])?.weight).toBeCloseTo(800);
    });

    it('should skip mentions without a number', () => {
      const match = findSpoolWeightInHeader(['; spool weight: unknown', '; spool weight 250']);
      expect(match?.weight).toBe(250);
      expect(match?.lineIndex).toBe(1);
    });

    it('should return null when no line mentions it', () => {
      expect(findSpoolWeightInHeader(['G28', 'G1 X1 E1'])).toBeNull();
    });
  });

  describe('resolveSpoolWeight', () => {
    const lines = ['; spool weight: 500g', 'G1 X1 E1'];

    it('should prefer the explicit value', () => {
      expect(resolveSpoolWeight(1200, lines)).toEqual({ weight: 1200, source: 'explicit' });
    });

    it('should fall back to the header', () => {
      const resolved = resolveSpoolWeight(undefined, lines);
      expect(resolved.weight).toBe(500);
      expect(resolved.source).toBe('header');
    });

    it('should throw when neither is available', () => {
      expect(() => resolveSpoolWeight(undefined, ['G28'])).toThrow(ColorChangeConfigError);
      expect(() => resolveSpoolWeight(undefined, ['G28'])).toThrow(
        'Spool weight not provided and not found in G-code header. Please supply --spool-weight.'
      );
    });
  });
});
