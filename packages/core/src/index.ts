/**
 * @metadata-check/core
 * 
 * Core package containing:
 * - Error handling
 * - Shared types
 */

// Types
export type {
  Row,
  Issue,
  Table,
  RowResult,
  ReportRow,
  CheckSummary,
} from './types/metadata.js';

// Errors
export {
  MetadataCheckError,
  InputFileError,
  CsvFormatError,
  EmptyInputError,
  ReportWriteError,
  ConfigError,
  isMetadataCheckError,
} from './errors/index.js';
