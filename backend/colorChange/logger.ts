import chalk from 'chalk';
import type { ScanEvent } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  readonly debugEnabled: boolean;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * `<timestamp> <LEVEL>: <message>` lines on stderr, so the
 * G-code itself can still go to stdout.
 */
export function createLogger(options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug ?? false;

  const write = (level: LogLevel, message: string) => {
    if (level === 'debug' && !debugEnabled) return;
    const tag = LEVEL_COLORS[level](level.toUpperCase());
    console.error(`${new Date().toISOString()} ${tag}: ${message}`);
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message),
    debugEnabled,
  };
}

export function describeScanEvent(event: ScanEvent): string {
  switch (event.type) {
    case 'color-change':
      return event.atLayerChange
        ? `Layer-based insertion at line ${event.lineIndex}: cumulative weight ${event.cumulativeWeight.toFixed(2)}g exceeds threshold ${event.triggerWeight.toFixed(2)}g`
        : `Inserting color change command at cumulative weight: ${event.cumulativeWeight.toFixed(2)}g (Threshold: ${event.triggerWeight.toFixed(2)}g)`;
    case 'extrusion-reset':
      return `G92 command at line ${event.lineIndex}: resetting last extrusion to ${event.position.toFixed(4)}`;
    case 'move-skipped':
      if (event.reason === 'feedrate') {
        return `Line ${event.lineIndex}: skipping move at feedrate ${event.feedrate ?? 0}`;
      }
      return event.reason === 'no-axis'
        ? `Line ${event.lineIndex}: skipping extrusion without X/Y/Z`
        : `Line ${event.lineIndex}: ignoring out-of-range extrusion value`;
    case 'extrusion':
      return `Line ${event.lineIndex}: Extrusion delta: ${event.extrusionDelta.toFixed(4)} mm, Weight delta: ${event.weightDelta.toFixed(6)}g, Cumulative weight: ${event.cumulativeWeight.toFixed(2)}g`;
    case 'scan-complete':
      return `Final cumulative weight: ${event.cumulativeWeight.toFixed(2)}g, total ${event.totalWeight.toFixed(2)}g, ${event.colorChanges} color change(s)`;
  }
}

/**
 * Route tracker observations to the logger. Everything is debug
 * output except the color changes themselves.
 */
export function logScanEvent(logger: Logger, event: ScanEvent): void {
  const message = describeScanEvent(event);
  if (event.type === 'color-change') {
    logger.info(message);
  } else {
    logger.debug(message);
  }
}
