import type { AdapterContext } from './adapter-context.js';
import type { RegistrationOutcome, TrackInfoBatch } from '../types/index.js';

export interface RegisterRequest {
  /** Normalized tracking number */
  trackingNumber: string;

  /** Provider carrier code; 0 lets the provider auto-detect */
  carrierCode: number;
}

export interface TrackInfoRequest {
  /** All numbers are sent in a single batch call */
  trackingNumbers: string[];
}

/**
 * TrackingProvider
 * Contract for a carrier-aggregation API (e.g. 17TRACK)
 *
 * Implementations throw:
 * - ConfigurationError when the API credential is missing (before any request)
 * - ProviderError for transport failures, provider-side errors and malformed payloads
 */
export interface TrackingProvider {
  /** Provider identifier; also the key of the monthly usage counter */
  readonly id: string;

  readonly displayName: string;

  /**
   * Register a number for monitoring. Consumes one unit of the provider's registration quota.
   */
  register(req: RegisterRequest, ctx: AdapterContext): Promise<RegistrationOutcome>;

  /**
   * Fetch current status and event history for registered numbers.
   */
  getTrackInfo(req: TrackInfoRequest, ctx: AdapterContext): Promise<TrackInfoBatch>;

  /**
   * Fetch the provider's own quota payload, returned unmodified.
   */
  getQuota(ctx: AdapterContext): Promise<unknown>;
}
