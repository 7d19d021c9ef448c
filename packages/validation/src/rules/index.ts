/**
 * Metadata Rules
 * 
 * The fixed, ordered rule list. Issues from every rule are concatenated
 * in this order; no rule depends on another's outcome.
 */

import type { Issue, Row } from '@metadata-check/core';
import { checkRequiredFields } from './requiredFields.js';
import { checkDate } from './date.js';
import { checkLicense } from './license.js';
import { checkFilename } from './filename.js';

export interface MetadataRule {
  id: string;
  name: string;
  check: (row: Row) => Issue[];
}

export const METADATA_RULES: readonly MetadataRule[] = [
  {
    id: 'required-fields',
    name: 'Required fields present',
    check: checkRequiredFields,
  },
  {
    id: 'date-format',
    name: 'Date is YYYY-MM-DD',
    check: checkDate,
  },
  {
    id: 'license-allowed',
    name: 'License is allow-listed',
    check: checkLicense,
  },
  {
    id: 'filename-convention',
    name: 'Filename follows naming convention',
    check: checkFilename,
  },
];

export { checkRequiredFields } from './requiredFields.js';
export { checkDate, isCalendarDate } from './date.js';
export { checkLicense } from './license.js';
export { checkFilename, splitFilename, type FilenameParts } from './filename.js';
export { fieldValue } from './field.js';
