/**
 * @metadata-check/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  readTextFile,
} from './file.js';

// Logger
export { logger, createLogger, setLogLevel, resolveLogLevel, type Logger } from './logger.js';
