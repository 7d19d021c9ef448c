/**
 * Check Pipeline
 * 
 * load → validate → report. The report is written once, after every
 * row is validated, or not at all.
 */

import { resolve } from 'node:path';
import {
  InputFileError,
  ReportWriteError,
  type CheckSummary,
  type ReportRow,
  type RowResult,
  type Table,
} from '@metadata-check/core';
import { createLogger, readTextFile, safeWriteFile } from '@metadata-check/utils';
import { parseTable, stringifyRecords } from './csv.js';
import {
  DEFAULT_INPUT_FILE,
  DEFAULT_OUTPUT_FILE,
  ISSUE_SEPARATOR,
  ISSUES_COLUMN,
} from './ruleSet.js';
import { metadataValidator } from './validator.js';

const log = createLogger({ module: 'pipeline' });

export interface CheckOptions {
  inputPath?: string;
  outputPath?: string;
  // Base directory for relative paths (default: process.cwd())
  cwd?: string;
  // Called once the table is loaded, before any row is validated
  onLoaded?: (table: Table) => void;
}

export interface CheckResult {
  summary: CheckSummary;
  results: RowResult[];
}

export interface Report {
  header: string[];
  rows: ReportRow[];
}

/**
 * Resolve input and output paths against the working directory
 */
export function resolvePaths(options: CheckOptions = {}): { inputPath: string; outputPath: string } {
  const cwd = options.cwd ?? process.cwd();
  return {
    inputPath: resolve(cwd, options.inputPath ?? DEFAULT_INPUT_FILE),
    outputPath: resolve(cwd, options.outputPath ?? DEFAULT_OUTPUT_FILE),
  };
}

/**
 * Read and parse the input table
 */
export async function loadTable(path: string): Promise<Table> {
  let content: string;
  try {
    content = await readTextFile(path);
  } catch (error) {
    throw new InputFileError(path, error);
  }

  const table = parseTable(content, path);
  log.info({ path, rows: table.rows.length, columns: table.header.length }, 'Loaded input table');
  return table;
}

/**
 * Validate every row in input order
 */
export function validateRows(rows: Table['rows']): RowResult[] {
  return metadataValidator.validateRows(rows);
}

/**
 * Header is the input header plus `issues`. An input that already has an
 * `issues` column keeps its position and gets the new value.
 */
export function reportHeader(header: readonly string[]): string[] {
  return header.includes(ISSUES_COLUMN) ? [...header] : [...header, ISSUES_COLUMN];
}

export function joinIssues(issues: readonly string[]): string {
  return issues.join(ISSUE_SEPARATOR);
}

export function buildReport(table: Table, results: readonly RowResult[]): Report {
  const header = reportHeader(table.header);
  const rows = results.map((result): ReportRow => {
    const issues = joinIssues(result.issues);
    return Object.fromEntries(
      header.map((column): [string, string] => [column, column === ISSUES_COLUMN ? issues : result.row[column] ?? ''])
    );
  });

  return { header, rows };
}

export function renderReport(report: Report): string {
  const records = report.rows.map((row) => report.header.map((column) => row[column] ?? ''));
  return stringifyRecords(report.header, records);
}

/**
 * Write the report for validated rows
 */
export async function writeReport(
  path: string,
  table: Table,
  results: readonly RowResult[]
): Promise<void> {
  const content = renderReport(buildReport(table, results));

  try {
    await safeWriteFile(path, content);
  } catch (error) {
    throw new ReportWriteError(path, error);
  }

  log.info({ path, rows: results.length }, 'Wrote report');
}

export function summarize(results: readonly RowResult[]): { total: number; withIssues: number } {
  return {
    total: results.length,
    withIssues: results.filter((result) => result.issues.length > 0).length,
  };
}

export function formatSummary(outputFile: string, summary: { total: number; withIssues: number }): string {
  return `Wrote ${outputFile}. ${summary.withIssues}/${summary.total} rows have issues.`;
}

/**
 * Run the whole check: load, validate, write
 */
export async function runCheck(options: CheckOptions = {}): Promise<CheckResult> {
  const { inputPath, outputPath } = resolvePaths(options);

  const table = await loadTable(inputPath);
  options.onLoaded?.(table);

  const results = validateRows(table.rows);
  await writeReport(outputPath, table, results);

  const counts = summarize(results);
  log.debug(counts, 'Check complete');

  return {
    summary: { inputPath, outputPath, ...counts },
    results,
  };
}
