import { describe, expect, it } from 'vitest';

import { CsvFormatError, EmptyInputError } from '@metadata-check/core';
import { parseTable, stringifyRecords } from './csv.js';

describe('parseTable', () => {
  it('should key rows by header name and keep column order', () => {
    const table = parseTable('filename,title\na.tif,First\nb.tif,Second\n', 'in.csv');

    expect(table.header).toEqual(['filename', 'title']);
    expect(table.rows).toEqual([
      { filename: 'a.tif', title: 'First' },
      { filename: 'b.tif', title: 'Second' },
    ]);
  });

  it('should handle quoted fields, CRLF line endings and blank lines', () => {
    const table = parseTable('title,creator\r\n"Smith, J.","He said ""hi"""\r\n\r\n', 'in.csv');

    expect(table.rows).toEqual([{ title: 'Smith, J.', creator: 'He said "hi"' }]);
  });

  it('should keep surrounding whitespace in values', () => {
    const table = parseTable('title\n  padded  \n', 'in.csv');

    expect(table.rows[0]).toEqual({ title: '  padded  ' });
  });

  it('should pad short records with empty values', () => {
    const table = parseTable('a,b,c\n1\n', 'in.csv');

    expect(table.rows).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('should reject records longer than the header', () => {
    expect(() => parseTable('a,b\n1,2,3\n', 'in.csv')).toThrow(CsvFormatError);
  });

  it('should reject duplicate column names', () => {
    expect(() => parseTable('a,b,a\n1,2,3\n', 'in.csv')).toThrow(
      'Malformed CSV in in.csv at line 1: duplicate column "a"'
    );
  });

  it('should keep a column named __proto__ as an own value', () => {
    const table = parseTable('__proto__,title\nkeep-me,T\n', 'in.csv');
    const row = table.rows[0];

    expect(row && Object.keys(row)).toEqual(['__proto__', 'title']);
    expect(row?.['__proto__']).toBe('keep-me');
  });

  it('should drop a leading byte-order mark', () => {
    const table = parseTable('\uFEFFfilename,title\na.tif,T\n', 'in.csv');

    expect(table.header).toEqual(['filename', 'title']);
    expect(table.rows).toEqual([{ filename: 'a.tif', title: 'T' }]);
  });

  it('should return a header-only table without rows', () => {
    expect(parseTable('filename,title\n', 'in.csv')).toEqual({
      header: ['filename', 'title'],
      rows: [],
    });
  });

  it('should fail when there is no header', () => {
    expect(() => parseTable('', 'in.csv')).toThrow(EmptyInputError);
    expect(() => parseTable('\n\n', 'in.csv')).toThrow(EmptyInputError);
  });
});

describe('stringifyRecords', () => {
  it('should quote only values that need it', () => {
    const text = stringifyRecords(['title', 'issues'], [['Smith, J.', 'Missing date; Missing format']]);

    expect(text).toBe('title,issues\n"Smith, J.",Missing date; Missing format\n');
  });

  it('should write empty values as empty fields', () => {
    expect(stringifyRecords(['a', 'b'], [['1', '']])).toBe('a,b\n1,\n');
  });
});
