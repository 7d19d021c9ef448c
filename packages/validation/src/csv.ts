/**
 * CSV Codec
 * 
 * Turns CSV text into a Table and a report back into CSV text.
 * Rows are keyed by header name; the header keeps the column order.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { CsvFormatError, EmptyInputError, type Row, type Table } from '@metadata-check/core';

const recordsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV content. The first record is the header.
 * 
 * - Blank lines are skipped
 * - Short records are padded with empty values
 * - Records longer than the header are rejected
 */
export function parseTable(content: string, source: string): Table {
  const records = parseRecords(content, source);

  const [header, ...data] = records;
  if (!header) {
    throw new EmptyInputError(source);
  }

  const duplicate = header.find((column, index) => header.indexOf(column) !== index);
  if (duplicate !== undefined) {
    throw new CsvFormatError(source, `duplicate column "${duplicate}"`, 1);
  }

  const rows = data.map((values) => toRow(header, values));
  return { header, rows };
}

/**
 * Serialize a header and its records
 */
export function stringifyRecords(
  header: readonly string[],
  records: readonly (readonly string[])[]
): string {
  return stringify([header, ...records], {
    record_delimiter: 'unix',
  });
}

function parseRecords(content: string, source: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      // leading byte-order mark is dropped here, not by the file reader
      bom: true,
      skip_empty_lines: true,
      relax_column_count_less: true,
    });
  } catch (error) {
    throw new CsvFormatError(
      source,
      error instanceof Error ? error.message : String(error),
      errorLine(error)
    );
  }

  const result = recordsSchema.safeParse(parsed);
  if (!result.success) {
    throw new CsvFormatError(source, result.error.message);
  }
  return result.data;
}

// Own properties: a "__proto__" column is a column like any other
function toRow(header: readonly string[], values: readonly string[]): Row {
  return Object.fromEntries(header.map((column, index): [string, string] => [column, values[index] ?? '']));
}

function errorLine(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'lines' in error) {
    const { lines } = error;
    return typeof lines === 'number' ? lines : undefined;
  }
  return undefined;
}
