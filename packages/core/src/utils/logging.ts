/**
 * Logging Utilities - Safe object serialization for logging
 */

/**
 * Header names whose values never reach a log line
 * `17token` is the 17TRACK API credential header.
 */
const SENSITIVE_HEADERS = [
  '17token',
  'authorization',
  'api-key',
  'x-api-key',
  'password',
  'token',
  'cookie',
  'set-cookie',
];

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and drops functions/undefined values.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Mask values of headers that carry credentials.
 */
export function sanitizeHeadersForLog(
  headers?: Record<string, unknown>
): Record<string, string> | undefined {
  if (!headers) return undefined;

  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? 'REDACTED' : String(value);
  }
  return sanitized;
}

/**
 * Create a safe log object from an error
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const out: Record<string, unknown> = {
      type: error.name,
      message: error.message,
    };
    if ('category' in error) out.category = error.category;
    if ('status' in error) out.status = error.status;
    if ('httpStatus' in error) out.status = error.httpStatus;
    if ('providerCode' in error) out.providerCode = error.providerCode;
    return out;
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null
      ? { ...serialized }
      : { message: String(serialized) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
