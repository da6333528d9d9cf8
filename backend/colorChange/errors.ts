/**
 * Raised for settings the run cannot start with: an unresolvable or
 * non-positive spool weight, out-of-range filament values, an unknown
 * material. Callers report it to the operator and write nothing.
 */
export class ColorChangeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ColorChangeConfigError';
  }
}
