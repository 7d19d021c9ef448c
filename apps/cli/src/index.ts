#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for metadata-check.
 */

import { loadConfig, loadDotenv } from './config/index.js';
import { printError } from './lib/output.js';
import { createProgram } from './program.js';

try {
  loadDotenv();
  const program = createProgram(loadConfig());
  await program.parseAsync();
} catch (error) {
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
