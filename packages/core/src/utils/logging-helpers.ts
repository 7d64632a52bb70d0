/**
 * Logging helpers for provider adapters
 *
 * Respect LoggingOptions so batch tracking payloads do not flood the logs.
 */

import type { AdapterContext, LoggingOptions } from '../interfaces/adapter-context.js';
import type { Logger } from '../interfaces/logger.js';

const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
  maxArrayItems: 10,
  maxDepth: 2,
  logRawResponse: 'summary',
  silentOperations: [],
};

/**
 * Check if logging should be suppressed for this operation
 */
export function isSilentOperation(
  ctx: AdapterContext,
  defaultSilentOps: string[] = []
): boolean {
  const operationName = ctx.operationName;
  if (!operationName) return false;

  const silentOps = ctx.loggingOptions?.silentOperations ?? defaultSilentOps;
  return silentOps.includes(operationName);
}

/**
 * Get merged logging options with defaults
 */
export function getLoggingOptions(ctx: AdapterContext): Required<LoggingOptions> {
  return {
    ...DEFAULT_LOGGING_OPTIONS,
    ...ctx.loggingOptions,
  };
}

/**
 * Truncate an object for logging, respecting maxDepth and maxArrayItems
 */
export function truncateForLogging(
  value: unknown,
  options: Required<LoggingOptions>,
  currentDepth: number = 0
): unknown {
  if (value === null || typeof value !== 'object') return value;

  if (currentDepth >= options.maxDepth) {
    return Array.isArray(value)
      ? `[Array: ${value.length} items]`
      : `[Object: ${Object.keys(value).length} keys]`;
  }

  if (Array.isArray(value)) {
    if (options.maxArrayItems === 0) {
      return `[Array: ${value.length} items (truncated)]`;
    }
    const mapped = value
      .slice(0, options.maxArrayItems)
      .map((item) => truncateForLogging(item, options, currentDepth + 1));
    if (value.length > options.maxArrayItems) {
      mapped.push(`... and ${value.length - options.maxArrayItems} more items`);
    }
    return mapped;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = truncateForLogging(entry, options, currentDepth + 1);
  }
  return result;
}

/**
 * Summary of a raw provider response (type, count, sample keys) without the payload
 */
export function summarizeRawResponse(raw: unknown): Record<string, unknown> {
  if (raw === null || raw === undefined) return { message: 'No raw response' };

  if (Array.isArray(raw)) {
    const first: unknown = raw[0];
    const keys = first !== null && typeof first === 'object' ? Object.keys(first) : [];
    return {
      type: 'array',
      count: raw.length,
      itemKeys: keys.slice(0, 5),
      itemCount: keys.length,
    };
  }

  if (typeof raw === 'object') {
    const keys = Object.keys(raw);
    return {
      type: 'object',
      keyCount: keys.length,
      keys: keys.slice(0, 10),
    };
  }

  return {
    type: typeof raw,
    value: String(raw).slice(0, 100),
  };
}

/**
 * Log through the context's logger, honouring silentOperations and
 * replacing a `raw` field according to logRawResponse.
 */
export function safeLog(
  logger: Logger | undefined,
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string,
  data: Record<string, unknown>,
  ctx: AdapterContext,
  silentOperationNames: string[] = []
): void {
  if (!logger) return;
  if (isSilentOperation(ctx, silentOperationNames)) return;

  const options = getLoggingOptions(ctx);
  const processed: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === 'raw') {
      if (options.logRawResponse === false) continue;
      processed.raw =
        options.logRawResponse === 'summary'
          ? summarizeRawResponse(value)
          : truncateForLogging(value, options);
      continue;
    }
    processed[key] = truncateForLogging(value, options);
  }

  logger[level](message, processed);
}
