/**
 * Structured results returned by PackageTracker operations
 * Callers always receive one of these; operations do not throw for expected failures.
 */

import type { Package } from './package.js';
import type { TrackingEvent, TrackingUpdate } from './tracking.js';

/**
 * Failure shape shared by the operation results
 */
export interface OperationFailure {
  ok: false;
  error: string;

  /** Set when the referenced tracking number is unknown */
  notFound?: boolean;

  /** Machine-readable reason, for callers mapping failures to e.g. HTTP status codes */
  reason?:
    | 'validation'
    | 'already-tracked'
    | 'already-inactive'
    | 'not-found'
    | 'quota-exceeded'
    | 'rejected';
}

export interface AddPackageSuccess {
  ok: true;
  package: Package;

  /** Carrier name for display; "Auto-detect" when none is known */
  carrier: string;

  registered: boolean;

  /** True when an inactive package was reactivated instead of created */
  reactivated: boolean;

  trackingUrl: string;

  message: string;

  /** Side-channel messages (low quota, registration deferred, ...) */
  warnings: string[];
}

export type AddPackageResult = AddPackageSuccess | OperationFailure;

export type RemovePackageResult = { ok: true; message: string } | OperationFailure;

export type PackageDetailsResult =
  | {
      ok: true;
      package: Package;
      /** Event history, newest eventDate first */
      events: TrackingEvent[];
      trackingUrl: string;
    }
  | OperationFailure;

/**
 * Local view of this month's registration usage
 */
export interface LocalUsage {
  /** YYYY-MM (UTC) */
  month: string;
  registrationsUsed: number;
  registrationsRemaining: number;
  limit: number;
}

export interface QuotaReport {
  localUsage: LocalUsage;

  /** Provider quota payload, passed through unmodified */
  apiQuota?: unknown;

  /** Why the provider quota could not be fetched */
  apiError?: string;
}

/**
 * Why a check cycle was aborted
 */
export interface CheckCycleError {
  type: string;
  message: string;
  category?: string;
}

export type CheckCycleResult =
  | { ok: true; checked: number; updates: TrackingUpdate[] }
  | { ok: false; checked: number; updates: []; error: CheckCycleError };

/**
 * Per-number outcome of PackageTracker.registerPending()
 */
export interface PendingRegistrationOutcome {
  trackingNumber: string;
  registered: boolean;
  error?: string;

  /** Set when the provider refused the number and the package stopped being tracked */
  deactivated?: boolean;
}
