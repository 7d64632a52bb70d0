/**
 * Utility functions for adapters and the sync engine
 */

export { serializeForLog, sanitizeHeadersForLog, errorToLog } from './logging.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
} from './logging-helpers.js';
export { currentMonth } from './time.js';
