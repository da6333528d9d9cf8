import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, describeScanEvent, logScanEvent } from '../../backend/colorChange/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop debug messages unless enabled', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger().debug('hidden');
    expect(spy).not.toHaveBeenCalled();

    createLogger({ debug: true }).debug('shown');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(expect.stringContaining(': shown'));
  });

  it('should tag messages with their level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger().info('saved');
    expect(spy).toHaveBeenCalledWith(expect.stringContaining('INFO'));
  });

  it('should describe scan events', () => {
    expect(describeScanEvent({ type: 'extrusion-reset', lineIndex: 3, position: 0 })).toBe(
      'G92 command at line 3: resetting last extrusion to 0.0000'
    );
    expect(
      describeScanEvent({
        type: 'color-change',
        lineIndex: 7,
        cumulativeWeight: 12.5,
        triggerWeight: 10,
        atLayerChange: false,
      })
    ).toBe('Inserting color change command at cumulative weight: 12.50g (Threshold: 10.00g)');
    expect(describeScanEvent({ type: 'move-skipped', lineIndex: 4, reason: 'feedrate', feedrate: 4000 })).toBe(
      'Line 4: skipping move at feedrate 4000'
    );
    expect(describeScanEvent({ type: 'move-skipped', lineIndex: 9, reason: 'malformed' })).toBe(
      'Line 9: ignoring out-of-range extrusion value'
    );
  });

  it('should log color changes at info and the rest at debug', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), debugEnabled: true };

    logScanEvent(logger, {
      type: 'color-change',
      lineIndex: 2,
      cumulativeWeight: 30,
      triggerWeight: 20,
      atLayerChange: true,
    });
    logScanEvent(logger, { type: 'scan-complete', cumulativeWeight: 1, totalWeight: 41, colorChanges: 2 });

    expect(logger.info).toHaveBeenCalledWith(
      'Layer-based insertion at line 2: cumulative weight 30.00g exceeds threshold 20.00g'
    );
    expect(logger.debug).toHaveBeenCalledWith(
      'Final cumulative weight: 1.00g, total 41.00g, 2 color change(s)'
    );
  });
});
