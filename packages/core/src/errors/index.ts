/**
 * Custom Error Classes
 */

/**
 * Base error class for all metadata-check errors
 */
export class MetadataCheckError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MetadataCheckError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input table is missing or cannot be read
 */
export class InputFileError extends MetadataCheckError {
  constructor(path: string, cause: unknown) {
    super(
      `Cannot read input file ${path}: ${describeCause(cause)}`,
      'INPUT_FILE_ERROR',
      { path },
      { cause }
    );
    this.name = 'InputFileError';
  }
}

/**
 * Input table is not well-formed CSV
 */
export class CsvFormatError extends MetadataCheckError {
  constructor(path: string, message: string, line?: number) {
    super(
      line === undefined
        ? `Malformed CSV in ${path}: ${message}`
        : `Malformed CSV in ${path} at line ${line}: ${message}`,
      'CSV_FORMAT_ERROR',
      { path, line }
    );
    this.name = 'CsvFormatError';
  }
}

/**
 * Input table has no header record, so no report header can be derived
 */
export class EmptyInputError extends MetadataCheckError {
  constructor(path: string) {
    super(
      `Input file ${path} has no header row`,
      'EMPTY_INPUT',
      { path }
    );
    this.name = 'EmptyInputError';
  }
}

/**
 * Report cannot be written
 */
export class ReportWriteError extends MetadataCheckError {
  constructor(path: string, cause: unknown) {
    super(
      `Cannot write report ${path}: ${describeCause(cause)}`,
      'REPORT_WRITE_ERROR',
      { path },
      { cause }
    );
    this.name = 'ReportWriteError';
  }
}

/**
 * Environment or CLI configuration is invalid
 */
export class ConfigError extends MetadataCheckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export function isMetadataCheckError(error: unknown): error is MetadataCheckError {
  return error instanceof MetadataCheckError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
