import type { HttpClient } from './http-client.js';
import type { Logger } from './logger.js';

/**
 * Logging options for controlling verbosity of provider operations
 */
export interface LoggingOptions {
  /**
   * Maximum number of items to log in array responses
   * Set to 0 to skip logging the array entirely
   */
  maxArrayItems?: number;

  /**
   * Maximum depth for nested object logging
   */
  maxDepth?: number;

  /**
   * Whether to log raw provider responses
   * false = skip, true = full payload, "summary" = count, keys and type only
   * Default: "summary"
   */
  logRawResponse?: boolean | "summary";

  /**
   * Operations to suppress logging for
   * Examples: ["getTrackInfo"]
   */
  silentOperations?: string[];
}

/**
 * AdapterContext
 * Context passed to provider methods containing injected dependencies
 */
export interface AdapterContext {
  /** Injected HTTP client */
  http: HttpClient;

  /** Optional logger instance */
  logger?: Logger;

  /**
   * Optional logging configuration for this operation
   * Default: { logRawResponse: "summary", maxArrayItems: 10, maxDepth: 2 }
   */
  loggingOptions?: LoggingOptions;

  /**
   * Operation name for context-aware logging, matched against silentOperations
   * Examples: "register", "getTrackInfo"
   */
  operationName?: string;
}
