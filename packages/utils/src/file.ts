/**
 * File Operations
 * 
 * Whole-file text reads and writes. Both read or write the full
 * content in one call so no handle stays open between pipeline phases.
 */

import { mkdir, writeFile, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Read a whole UTF-8 text file
 */
export async function readTextFile(filePath: string): Promise<string> {
  return readFile(filePath, 'utf8');
}
