import type {
  PackageCycleWrite,
  PackageStore,
  RegistrationCount,
  UsageKey,
} from "../interfaces/index.js";
import type { EventKey, NewPackage, Package, TrackingEvent } from "../types/index.js";
import { DuplicatePackageError, QuotaExceededError } from "../errors/index.js";
import { INITIAL_STATUS } from "../status/status-map.js";

/**
 * InMemoryPackageStore
 * PackageStore kept in process memory, for tests and local development.
 * Writes are applied to copies and swapped in, so a failing cycle leaves no trace.
 */
export class InMemoryPackageStore implements PackageStore {
  private packages = new Map<number, Package>();
  private events = new Map<number, TrackingEvent[]>();
  private usage = new Map<string, number>();
  private nextPackageId = 1;
  private nextEventId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getPackageById(id: number): Promise<Package | null> {
    const pkg = this.packages.get(id);
    return pkg ? { ...pkg } : null;
  }

  async getPackageByTrackingNumber(trackingNumber: string): Promise<Package | null> {
    const pkg = this.findByTrackingNumber(trackingNumber);
    return pkg ? { ...pkg } : null;
  }

  async listPackages(opts: { activeOnly: boolean }): Promise<Package[]> {
    const rows = [...this.packages.values()]
      .filter((p) => !opts.activeOnly || p.active)
      .map((p) => ({ ...p }));
    return rows.sort((a, b) => {
      if (a.active !== b.active) return a.active ? -1 : 1;
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
      return b.id - a.id;
    });
  }

  // checks and writes run with no await in between
  async createPackage(pkg: NewPackage, opts?: { countRegistration?: RegistrationCount }): Promise<Package> {
    if (this.findByTrackingNumber(pkg.trackingNumber)) {
      throw new DuplicatePackageError(pkg.trackingNumber);
    }
    if (opts?.countRegistration) this.checkLimit(opts.countRegistration);
    const row: Package = {
      id: this.nextPackageId++,
      trackingNumber: pkg.trackingNumber,
      carrier: pkg.carrier,
      carrierCode: pkg.carrierCode,
      description: pkg.description,
      status: INITIAL_STATUS,
      lastEvent: null,
      lastEventDate: null,
      lastChecked: null,
      deliveredDate: null,
      rawResponse: pkg.rawResponse,
      registered: pkg.registered,
      active: true,
      createdAt: pkg.createdAt,
      updatedAt: pkg.createdAt,
    };
    this.packages.set(row.id, row);
    if (opts?.countRegistration) this.incrementUsage(opts.countRegistration.key);
    return { ...row };
  }

  async reactivatePackage(id: number, at: string): Promise<Package> {
    const pkg = this.require(id);
    const row = { ...pkg, active: true, updatedAt: at };
    this.packages.set(id, row);
    return { ...row };
  }

  async deactivatePackage(id: number, at: string): Promise<void> {
    const pkg = this.require(id);
    this.packages.set(id, { ...pkg, active: false, updatedAt: at });
  }

  async markRegistered(
    id: number,
    update: { carrierCode: number; rawResponse: unknown; at: string },
    opts?: { countRegistration?: RegistrationCount }
  ): Promise<void> {
    const pkg = this.require(id);
    if (opts?.countRegistration) this.checkLimit(opts.countRegistration);
    this.packages.set(id, {
      ...pkg,
      registered: true,
      carrierCode: update.carrierCode,
      rawResponse: update.rawResponse,
      updatedAt: update.at,
    });
    if (opts?.countRegistration) this.incrementUsage(opts.countRegistration.key);
  }

  async getEventKeys(packageId: number): Promise<EventKey[]> {
    return (this.events.get(packageId) ?? []).map((e) => ({
      eventDate: e.eventDate,
      description: e.description,
    }));
  }

  async listEvents(packageId: number): Promise<TrackingEvent[]> {
    return [...(this.events.get(packageId) ?? [])]
      .sort((a, b) => (a.eventDate === b.eventDate ? 0 : a.eventDate < b.eventDate ? 1 : -1))
      .map((e) => ({ ...e }));
  }

  async commitCheckCycle(writes: PackageCycleWrite[]): Promise<void> {
    const packages = new Map(this.packages);
    const events = new Map(this.events);
    let nextEventId = this.nextEventId;
    const createdAt = this.now().toISOString();

    for (const write of writes) {
      const pkg = packages.get(write.packageId);
      if (!pkg) throw new Error(`Package ${write.packageId} not found`);

      const history = [...(events.get(write.packageId) ?? [])];
      for (const event of write.newEvents) {
        const duplicate = history.some(
          (e) => e.eventDate === event.eventDate && e.description === event.description
        );
        if (duplicate) continue;
        history.push({ ...event, id: nextEventId++, packageId: write.packageId, createdAt });
      }
      events.set(write.packageId, history);

      const { deliveredDate, ...patch } = write.patch;
      packages.set(write.packageId, {
        ...pkg,
        ...patch,
        deliveredDate: pkg.deliveredDate ?? deliveredDate ?? null,
      });
    }

    this.packages = packages;
    this.events = events;
    this.nextEventId = nextEventId;
  }

  async getUsage(key: UsageKey): Promise<number> {
    return this.usage.get(usageId(key)) ?? 0;
  }

  /**
   * Clear all data (useful for testing)
   */
  clear(): void {
    this.packages.clear();
    this.events.clear();
    this.usage.clear();
  }

  private findByTrackingNumber(trackingNumber: string): Package | undefined {
    for (const pkg of this.packages.values()) {
      if (pkg.trackingNumber === trackingNumber) return pkg;
    }
    return undefined;
  }

  private checkLimit({ key, limit }: RegistrationCount): void {
    const used = this.usage.get(usageId(key)) ?? 0;
    if (used >= limit) throw new QuotaExceededError(used, limit);
  }

  private incrementUsage(key: UsageKey): void {
    const id = usageId(key);
    this.usage.set(id, (this.usage.get(id) ?? 0) + 1);
  }

  private require(id: number): Package {
    const pkg = this.packages.get(id);
    if (!pkg) throw new Error(`Package ${id} not found`);
    return pkg;
  }
}

function usageId(key: UsageKey): string {
  return `${key.provider}:${key.month}`;
}
