import type { Issue, Row } from '@metadata-check/core';
import { REQUIRED_FIELDS } from '../ruleSet.js';
import { fieldValue } from './field.js';

/**
 * One "Missing <field>" issue per blank required field, in list order
 */
export function checkRequiredFields(row: Row): Issue[] {
  const issues: Issue[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (fieldValue(row, field) === '') {
      issues.push(`Missing ${field}`);
    }
  }

  return issues;
}
