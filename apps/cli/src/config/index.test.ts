import { describe, expect, it } from 'vitest';

import { ConfigError } from '@metadata-check/core';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('should default to metadata.csv and report.csv', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'warn',
      inputPath: 'metadata.csv',
      outputPath: 'report.csv',
    });
  });

  it('should read paths and log level from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      METADATA_CHECK_INPUT: 'batches/in.csv',
      METADATA_CHECK_OUTPUT: 'batches/out.csv',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      inputPath: 'batches/in.csv',
      outputPath: 'batches/out.csv',
    });
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
