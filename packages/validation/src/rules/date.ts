import type { Issue, Row } from '@metadata-check/core';
import { DATE_FORMAT } from '../ruleSet.js';
import { fieldValue } from './field.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Check that `date` is a real calendar day written as YYYY-MM-DD.
 * A blank date is left to the required-fields check.
 */
export function checkDate(row: Row): Issue[] {
  const value = fieldValue(row, 'date');
  if (value === '') {
    return [];
  }

  if (!isCalendarDate(value)) {
    return [`Invalid date format (expected ${DATE_FORMAT})`];
  }

  return [];
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  return day <= daysInMonth(year, month);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
