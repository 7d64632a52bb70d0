import type {
  EventKey,
  NewPackage,
  NewTrackingEvent,
  Package,
  PackageStatus,
  TrackingEvent,
} from '../types/index.js';

/**
 * Usage counter key: one row per (provider, YYYY-MM)
 */
export interface UsageKey {
  provider: string;
  month: string;
}

/**
 * A registration to count: the month's counter and the cap it must stay under
 */
export interface RegistrationCount {
  key: UsageKey;
  limit: number;
}

/**
 * Package columns a check cycle may change
 */
export interface PackageCyclePatch {
  status: PackageStatus;
  lastChecked: string;
  rawResponse: unknown;
  updatedAt: string;
  lastEvent?: string;
  lastEventDate?: string;
  deliveredDate?: string;
  active?: false;
}

/**
 * Everything one check cycle writes for one package
 */
export interface PackageCycleWrite {
  packageId: number;
  newEvents: NewTrackingEvent[];
  patch: PackageCyclePatch;
}

/**
 * PackageStore
 * Persistence contract for packages, their event history and registration usage.
 *
 * Methods that take `countRegistration` re-read that usage counter, throw
 * QuotaExceededError when it has reached the limit, and otherwise increment it,
 * all in the same transaction as the package write.
 */
export interface PackageStore {
  getPackageById(id: number): Promise<Package | null>;

  getPackageByTrackingNumber(trackingNumber: string): Promise<Package | null>;

  /**
   * activeOnly: active packages, newest first.
   * Otherwise: active packages first, then newest first.
   */
  listPackages(opts: { activeOnly: boolean }): Promise<Package[]>;

  /**
   * Insert a package with status "pending".
   * @throws DuplicatePackageError when the tracking number already exists
   * @throws QuotaExceededError when `countRegistration` is at its limit; nothing is written
   */
  createPackage(pkg: NewPackage, opts?: { countRegistration?: RegistrationCount }): Promise<Package>;

  reactivatePackage(id: number, at: string): Promise<Package>;

  deactivatePackage(id: number, at: string): Promise<void>;

  /**
   * @throws QuotaExceededError when `countRegistration` is at its limit; nothing is written
   */
  markRegistered(
    id: number,
    update: { carrierCode: number; rawResponse: unknown; at: string },
    opts?: { countRegistration?: RegistrationCount }
  ): Promise<void>;

  getEventKeys(packageId: number): Promise<EventKey[]>;

  /**
   * Event history, newest eventDate first
   */
  listEvents(packageId: number): Promise<TrackingEvent[]>;

  /**
   * Apply all writes of one check cycle atomically: either every event insert
   * and package update lands, or none does.
   */
  commitCheckCycle(writes: PackageCycleWrite[]): Promise<void>;

  /**
   * Registrations counted for the key; 0 when the counter does not exist yet
   */
  getUsage(key: UsageKey): Promise<number>;
}
