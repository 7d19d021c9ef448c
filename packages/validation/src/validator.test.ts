import { describe, expect, it } from 'vitest';

import { MetadataValidator } from './validator.js';

const validator = new MetadataValidator();

describe('MetadataValidator', () => {
  it('should run the rules in a fixed order', () => {
    expect(validator.getRules().map((rule) => rule.id)).toEqual([
      'required-fields',
      'date-format',
      'license-allowed',
      'filename-convention',
    ]);
  });

  it('should concatenate issues from every rule', () => {
    const issues = validator.validateRow({
      filename: '2023_proj_v01.tif',
      title: '',
      creator: '',
      date: '2023-13-40',
      license: 'Apache-2.0',
      format: 'image/tiff',
    });

    expect(issues).toEqual([
      'Missing title',
      'Missing creator',
      'Invalid date format (expected YYYY-MM-DD)',
      'License not allowed: Apache-2.0',
      'Filename does not follow expected structure',
    ]);
  });

  it('should keep input order and number rows from 1', () => {
    const results = validator.validateRows([
      { filename: '', title: 'a' },
      { filename: '', title: 'b' },
    ]);

    expect(results.map((result) => [result.line, result.row['title']])).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
  });

  it('should not modify the rows it validates', () => {
    const row = Object.freeze({ filename: ' x ', title: ' t ' });

    validator.validateRow(row);

    expect(row).toEqual({ filename: ' x ', title: ' t ' });
  });
});
