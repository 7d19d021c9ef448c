/**
 * Metadata Types
 */

/**
 * One record of file metadata, keyed by column name.
 * Columns are whatever the input header defines.
 */
export type Row = Readonly<Record<string, string>>;

/**
 * A human-readable description of one violated rule
 */
export type Issue = string;

/**
 * The loaded input table. The header is kept apart from the rows so
 * that a table without data rows still carries its columns.
 */
export interface Table {
  header: readonly string[];
  rows: readonly Row[];
}

export interface RowResult {
  row: Row;
  issues: Issue[];
  // 1-based position among the data rows
  line: number;
}

/**
 * Input row plus the joined `issues` column
 */
export type ReportRow = Readonly<Record<string, string>>;

export interface CheckSummary {
  inputPath: string;
  outputPath: string;
  total: number;
  withIssues: number;
}
