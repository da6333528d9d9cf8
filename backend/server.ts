import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';

// Load environment variables from .env.back
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.join(__dirname, '.env.back') });

import {
  applyColorChanges,
  ColorChangeConfigError,
  findSpoolWeightInHeader,
  getAvailableMaterials,
  loadConfigFromEnv,
  splitLines,
} from './colorChange/index.js';
import { parseColorChangeRequest } from './colorChange/request.js';

const app = express();
const PORT = Number(process.env.PORT) || 3001;
const baseConfig = loadConfigFromEnv();

// Middleware
app.use(cors());
app.use(express.json({ limit: process.env.BODY_LIMIT || '50mb' }));

// Health check
app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// ═══════════════════════════════════════════════════════════════════════════
// G-CODE ENDPOINTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * GET /api/gcode/defaults
 * Effective configuration and material presets
 */
app.get('/api/gcode/defaults', (_req: Request, res: Response) => {
  res.json({ success: true, config: baseConfig, materials: getAvailableMaterials() });
});

/**
 * POST /api/gcode/spool-weight
 * Read the spool weight from a G-code header
 * Body: { gcode: string }
 */
app.post('/api/gcode/spool-weight', (req: Request, res: Response) => {
  const parsed = parseColorChangeRequest(req.body);
  if (!parsed.ok) {
    res.status(400).json({ error: parsed.error });
    return;
  }

  const match = findSpoolWeightInHeader(splitLines(parsed.value.gcode));
  res.json({
    success: true,
    spoolWeight: match?.weight ?? null,
    line: match?.line,
  });
});

/**
 * POST /api/gcode/color-change
 * Inject color change commands
 * Body: { gcode: string, spoolWeight?: number, material?: string, ...config overrides }
 */
app.post('/api/gcode/color-change', (req: Request, res: Response, next: NextFunction) => {
  const parsed = parseColorChangeRequest(req.body);
  if (!parsed.ok) {
    res.status(400).json({ error: parsed.error });
    return;
  }

  try {
    const result = applyColorChanges(parsed.value.gcode, parsed.value.options, { baseConfig });
    console.log(
      `Processed G-code: ${result.colorChanges} color change(s), ${result.totalWeight.toFixed(2)}g total`
    );

    res.json({
      success: true,
      gcode: result.output,
      totalWeight: round(result.totalWeight),
      colorChanges: result.colorChanges,
      spoolWeight: result.spoolWeight,
      spoolWeightSource: result.spoolWeightSource,
      triggerWeight: round(result.triggerWeight),
    });
  } catch (err) {
    if (err instanceof ColorChangeConfigError) {
      res.status(400).json({ error: err.message });
      return;
    }
    next(err);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// ERROR HANDLER
// ═══════════════════════════════════════════════════════════════════════════

app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error('Server error:', err);
  res.status(500).json({
    error: err.message || 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
});

function round(n: number, d: number = 2): number {
  const f = Math.pow(10, d);
  return Math.round(n * f) / f;
}

// ═══════════════════════════════════════════════════════════════════════════
// STARTUP
// ═══════════════════════════════════════════════════════════════════════════

function start() {
  console.log('Starting G-code color change server...');

  app.listen(PORT, () => {
    console.log(`\n🚀 Color change server running on http://localhost:${PORT}`);
    console.log('\nEndpoints:');
    console.log('  GET  /api/gcode/defaults      - Effective config and materials');
    console.log('  POST /api/gcode/spool-weight  - Read spool weight from header');
    console.log('  POST /api/gcode/color-change  - Inject color change commands');
    console.log('');
  });
}

start();
