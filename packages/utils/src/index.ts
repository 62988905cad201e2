/**
 * @pylayer/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  createTempDir,
  removePath,
  safeReadFile,
  pathExists,
  getFileSizeBytes,
  formatBytes,
} from './file.js';

// Type guards
export {
  isNonEmptyString,
  isErrnoException,
} from './guards.js';

// Time utilities
export { formatDuration } from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
