/**
 * Rule Set
 * 
 * Lookup tables the metadata rules read from. New required fields,
 * licenses or separators are added here, not in the checks.
 */

export const REQUIRED_FIELDS = [
  'filename',
  'title',
  'creator',
  'date',
  'license',
  'format',
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export const ALLOWED_LICENSES: ReadonlySet<string> = new Set([
  'CC0-1.0',
  'CC-BY-4.0',
  'MIT',
  'GPL-3.0',
]);

export const DATE_FORMAT = 'YYYY-MM-DD';

// Filename convention: <YYYYMMDD>_<project>_<description>[_...]_<vNN>.<ext>
export const FILENAME_SEGMENT_SEPARATOR = '_';
export const FILENAME_MIN_SEGMENTS = 4;

export const ISSUES_COLUMN = 'issues';
export const ISSUE_SEPARATOR = '; ';

export const DEFAULT_INPUT_FILE = 'metadata.csv';
export const DEFAULT_OUTPUT_FILE = 'report.csv';
