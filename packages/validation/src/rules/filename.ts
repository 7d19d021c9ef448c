/**
 * Filename Convention Check
 * 
 * Expected shape: 20230101_project_description_v01.tif
 * 
 * Structural failures (no extension, too few segments) end the check.
 * Content failures (date part, version part) are reported together.
 */

import type { Issue, Row } from '@metadata-check/core';
import { FILENAME_MIN_SEGMENTS, FILENAME_SEGMENT_SEPARATOR } from '../ruleSet.js';
import { fieldValue } from './field.js';

const DATE_SEGMENT_PATTERN = /^[0-9]{8}$/;
const VERSION_SEGMENT_PATTERN = /^v[0-9]+$/;

export interface FilenameParts {
  name: string;
  extension: string;
  segments: string[];
}

/**
 * Split at the last '.' and then on '_'. Returns null without an extension.
 */
export function splitFilename(filename: string): FilenameParts | null {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) {
    return null;
  }

  const name = filename.slice(0, dot);
  return {
    name,
    extension: filename.slice(dot + 1),
    segments: name.split(FILENAME_SEGMENT_SEPARATOR),
  };
}

export function checkFilename(row: Row): Issue[] {
  const filename = fieldValue(row, 'filename');
  if (filename === '') {
    return [];
  }

  const parts = splitFilename(filename);
  if (!parts) {
    return ['Filename has no file extension'];
  }

  const { segments } = parts;
  if (segments.length < FILENAME_MIN_SEGMENTS) {
    return ['Filename does not follow expected structure'];
  }

  const issues: Issue[] = [];
  const datePart = segments[0] ?? '';
  const versionPart = segments[segments.length - 1] ?? '';

  if (!DATE_SEGMENT_PATTERN.test(datePart)) {
    issues.push('Filename date must be YYYYMMDD');
  }

  if (!VERSION_SEGMENT_PATTERN.test(versionPart)) {
    issues.push('Filename version must look like v01');
  }

  return issues;
}
