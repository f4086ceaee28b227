/**
 * @mediaconv/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - Path utilities
 * - Time utilities
 * - Logger
 */

// Command execution
export {
  executeCommand,
  outputTail,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// Path utilities
export {
  getExtension,
  getBasename,
} from './path.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
} from './time.js';

// Logger
export { logger, createLogger, type Logger, type LogContext } from './logger.js';
