/**
 * CLI Configuration
 * 
 * Defaults for the check command, read from the environment
 * (and a .env file in the working directory).
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@metadata-check/core';
import { DEFAULT_INPUT_FILE, DEFAULT_OUTPUT_FILE } from '@metadata-check/validation';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  METADATA_CHECK_INPUT: z.string().min(1).default(DEFAULT_INPUT_FILE),
  METADATA_CHECK_OUTPUT: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
});

export type Env = z.infer<typeof envSchema>;

export interface CliConfig {
  logLevel: Env['LOG_LEVEL'];
  inputPath: string;
  outputPath: string;
}

/**
 * Load .env from the working directory without overriding the environment
 */
export function loadDotenv(cwd: string = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(fields.join(', '), { fields });
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    inputPath: parsed.data.METADATA_CHECK_INPUT,
    outputPath: parsed.data.METADATA_CHECK_OUTPUT,
  };
}
