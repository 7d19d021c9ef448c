import type { Issue, Row } from '@metadata-check/core';
import { ALLOWED_LICENSES } from '../ruleSet.js';
import { fieldValue } from './field.js';

/**
 * Exact, case-sensitive match against the license allow-list
 */
export function checkLicense(row: Row): Issue[] {
  const license = fieldValue(row, 'license');
  if (license === '' || ALLOWED_LICENSES.has(license)) {
    return [];
  }

  return [`License not allowed: ${license}`];
}
