#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import chalk from 'chalk';
import { createProgram } from './command.js';
import { loadConfigFromEnv } from './settings.js';

// Load environment variables from .env.back in the working directory
dotenv.config({ path: path.join(process.cwd(), '.env.back') });

try {
  const program = createProgram(loadConfigFromEnv());
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(chalk.red('❌ Failed to start:'), error instanceof Error ? error.message : error);
  process.exit(2);
}
