import type { Row } from '@metadata-check/core';

/**
 * Trimmed value of a column; a column the table lacks reads as ''
 */
export function fieldValue(row: Row, field: string): string {
  return (row[field] ?? '').trim();
}
