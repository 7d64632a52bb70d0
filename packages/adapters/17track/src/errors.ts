import { HttpError, ProviderError } from "@parcelwatch/core";
import { ErrorBodySchema } from "./validation.js";

const DEFAULT_RETRY_AFTER_MS = 60_000;

/**
 * 17TRACK error code from a failed response body, when it carries one
 */
function extractProviderCode(body: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(body);
  return parsed.success ? String(parsed.data.code) : undefined;
}

function parseRetryAfter(headers: Record<string, string | string[]> | undefined): number {
  const value = headers?.["retry-after"];
  const first = Array.isArray(value) ? value[0] : value;
  const seconds = first === undefined ? NaN : Number(first);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : DEFAULT_RETRY_AFTER_MS;
}

/**
 * Translate a failed 17TRACK call to ProviderError
 *
 * Error categorization:
 * - 401/403: Auth (API key rejected)
 * - 429: RateLimit (retry after the Retry-After delay, default 60s)
 * - 5xx: Transient
 * - other 4xx: Permanent
 * - network error, timeout, anything unrecognized: Transient
 *
 * ProviderErrors (e.g. Malformed from validation) pass through unchanged.
 */
export function translateSeventeenTrackError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  if (error instanceof HttpError) {
    const status = error.status;
    const body = error.response?.data;
    const meta = {
      httpStatus: status,
      providerCode: extractProviderCode(body) ?? (status !== undefined ? `HTTP_${status}` : error.code),
      raw: body,
    };

    if (status === undefined) {
      return error.timedOut
        ? new ProviderError("17TRACK request timed out", "Transient", meta)
        : new ProviderError(`17TRACK connection error: ${error.message}`, "Transient", meta);
    }

    if (status === 401 || status === 403) {
      return new ProviderError("17TRACK API key rejected", "Auth", meta);
    }

    if (status === 429) {
      return new ProviderError("17TRACK rate limit exceeded", "RateLimit", {
        ...meta,
        retryAfterMs: parseRetryAfter(error.response?.headers),
      });
    }

    if (status >= 500) {
      return new ProviderError(`17TRACK server error (HTTP ${status})`, "Transient", meta);
    }

    return new ProviderError(`17TRACK request failed (HTTP ${status})`, "Permanent", meta);
  }

  if (error instanceof Error) {
    return new ProviderError(`17TRACK connection error: ${error.message}`, "Transient", { raw: error });
  }

  return new ProviderError("Unknown 17TRACK error", "Transient", { raw: error });
}
