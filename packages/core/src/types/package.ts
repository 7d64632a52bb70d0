/**
 * Status of a tracked package
 *
 * `pending` is assigned locally at creation, before any check cycle has run.
 * The remaining values are decoded from the provider's numeric status code;
 * codes outside the known table become `Unknown (<code>)` rather than failing.
 */
export type KnownPackageStatus =
  | "Not Found"       // 0
  | "In Transit"      // 10
  | "Expired"         // 20
  | "Pick Up"         // 30
  | "Undelivered"     // 35
  | "Delivered"       // 40 (terminal)
  | "Alert";          // 50

export type PackageStatus = "pending" | KnownPackageStatus | `Unknown (${number})`;

/**
 * Package domain type
 * One row per tracked shipment, keyed by its normalized tracking number
 */
export interface Package {
  /** Store-assigned identifier */
  id: number;

  /** Trimmed, uppercase tracking number. Immutable once created. */
  trackingNumber: string;

  /** Carrier display name (detected or user supplied); null lets the provider auto-detect */
  carrier: string | null;

  /** Provider carrier code; 0 means unknown / auto-detect */
  carrierCode: number;

  description: string | null;

  status: PackageStatus;

  /** Description of the most recent provider event */
  lastEvent: string | null;

  /** Provider-supplied date of the most recent event (not guaranteed parseable) */
  lastEventDate: string | null;

  /** ISO 8601 timestamp of the last check cycle that saw this package */
  lastChecked: string | null;

  /** ISO 8601 timestamp stamped when the package first reached Delivered */
  deliveredDate: string | null;

  /** Last raw provider payload for this package, replaced on every cycle */
  rawResponse: unknown;

  /** True once the provider accepted the number (or reported it already registered) */
  registered: boolean;

  /** False once delivered or explicitly removed */
  active: boolean;

  createdAt: string;
  updatedAt: string;
}

/**
 * Fields supplied when inserting a new package
 * Status starts as "pending" and the package starts active.
 */
export interface NewPackage {
  trackingNumber: string;
  carrier: string | null;
  carrierCode: number;
  description: string | null;
  registered: boolean;
  rawResponse: unknown;
  createdAt: string;
}
