export type ExtrusionMode = 'relative' | 'absolute';

export interface ColorChangeConfig {
  filamentDiameter: number; // mm
  filamentDensity: number; // g/cm³
  extrusionMode: ExtrusionMode;
  colorChangeCommand: string;
  safetyMargin: number; // fraction of the spool left unused
  feedrateThreshold?: number; // mm/min, moves above it are not counted
  scale: number; // multiplier on computed weight
  layerBased: boolean;
  axisFilter: boolean; // skip G1 E moves without X/Y/Z
  debugInterval: number; // lines between sampled extrusion events
}

/**
 * Per-run values the scan works from. Derived once from a
 * `ColorChangeConfig` and a spool weight.
 */
export interface ScanSettings {
  conversionFactor: number; // g per mm of E travel
  triggerWeight: number; // g
  extrusionMode: ExtrusionMode;
  colorChangeCommand: string;
  feedrateThreshold?: number;
  layerBased: boolean;
  axisFilter: boolean;
  debugInterval: number;
}

export type SkipReason = 'no-axis' | 'feedrate' | 'malformed';

export type ScanEvent =
  | {
      type: 'color-change';
      lineIndex: number;
      cumulativeWeight: number; // before the subtraction
      triggerWeight: number;
      atLayerChange: boolean;
    }
  | { type: 'extrusion-reset'; lineIndex: number; position: number }
  | { type: 'move-skipped'; lineIndex: number; reason: SkipReason; feedrate?: number }
  | {
      type: 'extrusion';
      lineIndex: number;
      extrusionDelta: number;
      weightDelta: number;
      cumulativeWeight: number;
    }
  | { type: 'scan-complete'; cumulativeWeight: number; totalWeight: number; colorChanges: number };

export type ScanObserver = (event: ScanEvent) => void;

export interface ScanResult {
  /** Input lines interleaved with injected directives. */
  lines: string[];
  /** `; TOTAL FILAMENT WEIGHT USED: ...` line that closes the output. */
  summaryLine: string;
  totalWeight: number;
  /** Weight accumulated since the last color change. */
  cumulativeWeight: number;
  colorChanges: number;
}

export interface SpoolWeightMatch {
  weight: number; // g
  lineIndex: number;
  line: string;
}

export type SpoolWeightSource = 'explicit' | 'header';

export interface MaterialProfile {
  name: string;
  fullName: string;
  density: number; // g/cm³
  diameter: number; // mm
}

export interface MaterialsData {
  materials: Record<string, MaterialProfile>;
}

/**
 * Overrides accepted by the pipeline. Anything left out falls back to
 * the base config (defaults or environment).
 */
export interface ColorChangeOptions extends Partial<Omit<ColorChangeConfig, 'feedrateThreshold'>> {
  /** `null` disables feedrate filtering. */
  feedrateThreshold?: number | null;
  /** Grams. Read from the G-code header when omitted. */
  spoolWeight?: number;
  /** Preset name from materials.json; sets density and diameter unless given explicitly. */
  material?: string;
}

export interface ColorChangeResult extends ScanResult {
  /** Full output text, one line per `\n`, summary last. */
  output: string;
  spoolWeight: number;
  spoolWeightSource: SpoolWeightSource;
  conversionFactor: number;
  triggerWeight: number;
}
