import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ColorChangeConfigError } from './errors.js';
import type { ColorChangeConfig, MaterialProfile, MaterialsData } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load materials data
const materialsPath = join(__dirname, 'materials.json');
const materialsData: MaterialsData = JSON.parse(readFileSync(materialsPath, 'utf-8'));

/**
 * Get material profile by name (case-insensitive)
 */
export function getMaterial(materialName: string): MaterialProfile | null {
  const key = materialName.toUpperCase().replace(/[\s-]+/g, '_');
  return materialsData.materials[key] ?? null;
}

/**
 * Get all available materials
 */
export function getAvailableMaterials(): string[] {
  return Object.keys(materialsData.materials);
}

/**
 * Use a material preset's density and diameter in place of the configured ones.
 */
export function applyMaterial(config: ColorChangeConfig, materialName: string): ColorChangeConfig {
  const material = getMaterial(materialName);
  if (!material) {
    throw new ColorChangeConfigError(
      `Unknown material: ${materialName}. Available: ${getAvailableMaterials().join(', ')}`
    );
  }
  return { ...config, filamentDensity: material.density, filamentDiameter: material.diameter };
}
