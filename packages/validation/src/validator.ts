/**
 * Metadata Validator
 * 
 * Applies every metadata rule to every row and keeps input order.
 */

import type { Issue, Row, RowResult } from '@metadata-check/core';
import { createLogger } from '@metadata-check/utils';
import { METADATA_RULES, type MetadataRule } from './rules/index.js';

const log = createLogger({ module: 'validator' });

export class MetadataValidator {
  private rules: readonly MetadataRule[];

  constructor() {
    this.rules = METADATA_RULES;
  }

  /**
   * All issues for one row, in rule order
   */
  validateRow(row: Row): Issue[] {
    return this.rules.flatMap((rule) => rule.check(row));
  }

  /**
   * Validate rows in input order
   */
  validateRows(rows: readonly Row[]): RowResult[] {
    const results = rows.map((row, index) => ({
      row,
      issues: this.validateRow(row),
      line: index + 1,
    }));

    for (const result of results) {
      if (result.issues.length > 0) {
        log.debug({ line: result.line, issues: result.issues }, 'Row has issues');
      }
    }

    return results;
  }

  /**
   * Get all rules
   */
  getRules(): MetadataRule[] {
    return [...this.rules];
  }
}

export const metadataValidator = new MetadataValidator();
