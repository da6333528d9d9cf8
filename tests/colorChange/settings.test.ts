import { describe, it, expect } from 'vitest';
import {
  buildScanSettings,
  calculateConversionFactor,
  calculateTriggerWeight,
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  resolveConfig,
  validateConfig,
} from '../../backend/colorChange/settings.js';
import { applyMaterial, getAvailableMaterials, getMaterial } from '../../backend/colorChange/materials.js';
import { ColorChangeConfigError } from '../../backend/colorChange/errors.js';

describe('settings', () => {
  describe('derived values', () => {
    it('should compute grams per mm from diameter and density', () => {
      expect(calculateConversionFactor(1.75, 1.25)).toBeCloseTo(0.0030066, 7);
    });

    it('should apply the scale factor', () => {
      expect(calculateConversionFactor(1.75, 1.25, 2)).toBeCloseTo(0.0060132, 7);
    });

    it('should leave the safety margin unused', () => {
      expect(calculateTriggerWeight(1000, 0.03)).toBeCloseTo(970);
      expect(calculateTriggerWeight(1000, 0)).toBe(1000);
    });

    it('should build scan settings from the defaults', () => {
      const settings = buildScanSettings(DEFAULT_CONFIG, 1000);
      expect(settings.triggerWeight).toBeCloseTo(970);
      expect(settings.conversionFactor).toBeCloseTo(0.0030066, 7);
      expect(settings.feedrateThreshold).toBe(3000);
      expect(settings.extrusionMode).toBe('relative');
      expect(settings.axisFilter).toBe(true);
    });
  });

  describe('validation', () => {
    it('should accept the defaults', () => {
      expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
    });

    it('should reject a safety margin of 1 or more', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, safetyMargin: 1 })).toThrow(ColorChangeConfigError);
      expect(() => validateConfig({ ...DEFAULT_CONFIG, safetyMargin: -0.1 })).toThrow(ColorChangeConfigError);
    });

    it('should reject non-positive filament values', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, filamentDiameter: 0 })).toThrow(
        'Filament diameter must be a positive number (got 0)'
      );
      expect(() => validateConfig({ ...DEFAULT_CONFIG, filamentDensity: Number.NaN })).toThrow(ColorChangeConfigError);
      expect(() => validateConfig({ ...DEFAULT_CONFIG, scale: -1 })).toThrow(ColorChangeConfigError);
    });

    it('should reject a fractional debug interval', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, debugInterval: 1.5 })).toThrow(ColorChangeConfigError);
    });

    it('should reject an empty command', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, colorChangeCommand: '  ' })).toThrow(
        'Color change command must not be empty'
      );
    });

    it('should reject a non-positive spool weight', () => {
      expect(() => buildScanSettings(DEFAULT_CONFIG, 0)).toThrow(
        'Spool weight must be a positive number (got 0)'
      );
    });
  });

  describe('loadConfigFromEnv', () => {
    it('should return the defaults for an empty environment', () => {
      expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
    });

    it('should overlay environment values', () => {
      const config = loadConfigFromEnv({
        FILAMENT_DIAMETER: '2.85',
        EXTRUSION_MODE: 'ABSOLUTE',
        COLOR_CHANGE_COMMAND: 'M0',
        FEEDRATE_THRESHOLD: 'off',
        DEBUG_INTERVAL: '25',
      });
      expect(config.filamentDiameter).toBe(2.85);
      expect(config.extrusionMode).toBe('absolute');
      expect(config.colorChangeCommand).toBe('M0');
      expect(config.feedrateThreshold).toBeUndefined();
      expect(config.debugInterval).toBe(25);
      expect(config.filamentDensity).toBe(1.25);
    });

    it('should reject an unknown extrusion mode', () => {
      expect(() => loadConfigFromEnv({ EXTRUSION_MODE: 'sideways' })).toThrow(ColorChangeConfigError);
    });
  });

  describe('resolveConfig', () => {
    it('should keep the base config when nothing is overridden', () => {
      expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('should take the density from a material preset', () => {
      expect(resolveConfig({ material: 'PETG' }).filamentDensity).toBe(1.27);
    });

    it('should let an explicit density win over the material', () => {
      expect(resolveConfig({ material: 'petg', filamentDensity: 1.3 }).filamentDensity).toBe(1.3);
    });

    it('should take the diameter from a material preset', () => {
      const base = { ...DEFAULT_CONFIG, filamentDiameter: 2.85 };
      const config = resolveConfig({ material: 'PLA' }, base);
      expect(config.filamentDiameter).toBe(1.75);
      expect(config.filamentDensity).toBe(1.24);
    });

    it('should let an explicit diameter win over the material', () => {
      const base = { ...DEFAULT_CONFIG, filamentDiameter: 1.75 };
      expect(resolveConfig({ material: 'PLA', filamentDiameter: 2.85 }, base).filamentDiameter).toBe(2.85);
    });

    it('should disable feedrate filtering with null', () => {
      expect(resolveConfig({ feedrateThreshold: null }).feedrateThreshold).toBeUndefined();
      expect(resolveConfig({ feedrateThreshold: 4500 }).feedrateThreshold).toBe(4500);
    });

    it('should merge onto a custom base', () => {
      const base = { ...DEFAULT_CONFIG, colorChangeCommand: 'M0', layerBased: true };
      const config = resolveConfig({ safetyMargin: 0.1 }, base);
      expect(config.colorChangeCommand).toBe('M0');
      expect(config.layerBased).toBe(true);
      expect(config.safetyMargin).toBe(0.1);
    });
  });

  describe('materials', () => {
    it('should look up presets by normalized name', () => {
      expect(getMaterial('cf-pla')?.name).toBe('CF-PLA');
      expect(getMaterial('pla')?.density).toBe(1.24);
      expect(getMaterial('wood')).toBeNull();
    });

    it('should list the presets', () => {
      expect(getAvailableMaterials()).toContain('PLA');
      expect(getAvailableMaterials()).toContain('TPU');
    });

    it('should name the presets when a material is unknown', () => {
      expect(() => applyMaterial(DEFAULT_CONFIG, 'wood')).toThrow(/^Unknown material: wood\. Available: PLA, /);
    });
  });
});
