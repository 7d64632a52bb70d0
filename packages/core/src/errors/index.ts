/**
 * Error category reported by a tracking provider call
 *
 * - "Auth": credential rejected by the provider (401/403) — don't retry
 * - "RateLimit": too many requests (429) — retry with backoff
 * - "Transient": network error, timeout, 5xx — retry
 * - "Malformed": response did not match the documented shape — don't retry
 * - "Rejected": provider explicitly refused the request — don't retry
 * - "Permanent": anything else that will not succeed on retry
 */
export type ProviderErrorCategory =
  | "Auth"
  | "RateLimit"
  | "Transient"
  | "Malformed"
  | "Rejected"
  | "Permanent";

/**
 * ProviderError
 * Structured error type thrown by tracking provider adapters
 * Lets callers decide between saving locally, retrying later or failing hard
 */
export class ProviderError extends Error {
  readonly category: ProviderErrorCategory;

  /**
   * Provider-specific error code (e.g. "-18019901" or "HTTP_503")
   */
  readonly providerCode?: string;

  /**
   * HTTP status of the failed call, when there was one
   */
  readonly httpStatus?: number;

  /**
   * Raw provider payload for debugging
   */
  readonly raw?: unknown;

  /**
   * Suggested retry delay in milliseconds (for RateLimit errors)
   */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    category: ProviderErrorCategory,
    opts?: {
      providerCode?: string;
      httpStatus?: number;
      raw?: unknown;
      retryAfterMs?: number;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, ProviderError.prototype);
    this.name = "ProviderError";
    this.category = category;
    this.providerCode = opts?.providerCode;
    this.httpStatus = opts?.httpStatus;
    this.raw = opts?.raw;
    this.retryAfterMs = opts?.retryAfterMs;
  }
}

/**
 * ConfigurationError
 * Thrown before any remote call when a required setting (the API credential) is missing
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly setting?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
    this.name = "ConfigurationError";
  }
}

/**
 * QuotaExceededError
 * Thrown when the monthly registration cap has been reached
 */
export class QuotaExceededError extends Error {
  constructor(
    readonly used: number,
    readonly limit: number
  ) {
    super(
      `Monthly registration limit reached (${used}/${limit}). ` +
        "Wait for next month or upgrade your 17TRACK plan."
    );
    Object.setPrototypeOf(this, QuotaExceededError.prototype);
    this.name = "QuotaExceededError";
  }
}

/**
 * DuplicatePackageError
 * Raised by a store when a tracking number is inserted twice
 */
export class DuplicatePackageError extends Error {
  constructor(readonly trackingNumber: string) {
    super(`Package ${trackingNumber} already exists`);
    Object.setPrototypeOf(this, DuplicatePackageError.prototype);
    this.name = "DuplicatePackageError";
  }
}

/**
 * ValidationError
 * Thrown when input validation fails
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
  }
}
