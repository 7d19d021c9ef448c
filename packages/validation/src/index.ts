/**
 * @metadata-check/validation
 * 
 * Metadata validation layer.
 * 
 * Responsibilities:
 * - Hold the rule tables (required fields, licenses, formats)
 * - Check each row against the rules
 * - Read the input table and write the annotated report
 */

// Rule tables
export {
  REQUIRED_FIELDS,
  ALLOWED_LICENSES,
  DATE_FORMAT,
  FILENAME_MIN_SEGMENTS,
  FILENAME_SEGMENT_SEPARATOR,
  ISSUES_COLUMN,
  ISSUE_SEPARATOR,
  DEFAULT_INPUT_FILE,
  DEFAULT_OUTPUT_FILE,
  type RequiredField,
} from './ruleSet.js';

// Rules
export {
  METADATA_RULES,
  checkRequiredFields,
  checkDate,
  checkLicense,
  checkFilename,
  isCalendarDate,
  splitFilename,
  fieldValue,
  type MetadataRule,
  type FilenameParts,
} from './rules/index.js';

// Row validation
export { MetadataValidator, metadataValidator } from './validator.js';

// CSV
export { parseTable, stringifyRecords } from './csv.js';

// Pipeline
export {
  resolvePaths,
  loadTable,
  validateRows,
  reportHeader,
  joinIssues,
  buildReport,
  renderReport,
  writeReport,
  summarize,
  formatSummary,
  runCheck,
  type CheckOptions,
  type CheckResult,
  type Report,
} from './pipeline.js';
