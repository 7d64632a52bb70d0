import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, desc, eq, sql } from "drizzle-orm";
import {
  DuplicatePackageError,
  INITIAL_STATUS,
  QuotaExceededError,
  parsePackageStatus,
} from "@parcelwatch/core";
import type {
  EventKey,
  NewPackage,
  Package,
  PackageCycleWrite,
  PackageStore,
  RegistrationCount,
  TrackingEvent,
  UsageKey,
} from "@parcelwatch/core";
import {
  CREATE_TABLES_SQL,
  apiUsage,
  packages,
  trackingEvents,
  type PackageRow,
} from "./schema.js";

type Transaction = Parameters<Parameters<BetterSQLite3Database["transaction"]>[0]>[0];

/**
 * SqlitePackageStore
 * PackageStore on a single SQLite file (better-sqlite3 + drizzle-orm).
 *
 * better-sqlite3 is synchronous, so every method completes before it returns
 * and each multi-statement write runs inside one transaction.
 */
export class SqlitePackageStore implements PackageStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;

  constructor(
    path = ":memory:",
    private readonly now: () => Date = () => new Date()
  ) {
    this.sqlite = new Database(path);
    this.sqlite.pragma("journal_mode = WAL");
    this.sqlite.pragma("foreign_keys = ON");
    this.db = drizzle(this.sqlite);
    this.sqlite.exec(CREATE_TABLES_SQL);
  }

  async getPackageById(id: number): Promise<Package | null> {
    const row = this.db.select().from(packages).where(eq(packages.id, id)).get();
    return row ? toPackage(row) : null;
  }

  async getPackageByTrackingNumber(trackingNumber: string): Promise<Package | null> {
    const row = this.db.select().from(packages).where(eq(packages.trackingNumber, trackingNumber)).get();
    return row ? toPackage(row) : null;
  }

  async listPackages(opts: { activeOnly: boolean }): Promise<Package[]> {
    const rows = this.db
      .select()
      .from(packages)
      .where(opts.activeOnly ? eq(packages.active, true) : undefined)
      .orderBy(desc(packages.active), desc(packages.createdAt), desc(packages.id))
      .all();
    return rows.map(toPackage);
  }

  async createPackage(pkg: NewPackage, opts?: { countRegistration?: RegistrationCount }): Promise<Package> {
    try {
      return this.db.transaction((tx) => {
        if (opts?.countRegistration) countRegistration(tx, opts.countRegistration);
        const row = tx
          .insert(packages)
          .values({
            trackingNumber: pkg.trackingNumber,
            carrier: pkg.carrier,
            carrierCode: pkg.carrierCode,
            description: pkg.description,
            status: INITIAL_STATUS,
            rawData: toJson(pkg.rawResponse),
            registered: pkg.registered,
            active: true,
            createdAt: pkg.createdAt,
            updatedAt: pkg.createdAt,
          })
          .returning()
          .get();
        return toPackage(row);
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicatePackageError(pkg.trackingNumber);
      throw err;
    }
  }

  async reactivatePackage(id: number, at: string): Promise<Package> {
    const row = this.db
      .update(packages)
      .set({ active: true, updatedAt: at })
      .where(eq(packages.id, id))
      .returning()
      .get();
    if (!row) throw new Error(`Package ${id} not found`);
    return toPackage(row);
  }

  async deactivatePackage(id: number, at: string): Promise<void> {
    const res = this.db
      .update(packages)
      .set({ active: false, updatedAt: at })
      .where(eq(packages.id, id))
      .run();
    if (res.changes === 0) throw new Error(`Package ${id} not found`);
  }

  async markRegistered(
    id: number,
    update: { carrierCode: number; rawResponse: unknown; at: string },
    opts?: { countRegistration?: RegistrationCount }
  ): Promise<void> {
    this.db.transaction((tx) => {
      if (opts?.countRegistration) countRegistration(tx, opts.countRegistration);
      const res = tx
        .update(packages)
        .set({
          registered: true,
          carrierCode: update.carrierCode,
          rawData: toJson(update.rawResponse),
          updatedAt: update.at,
        })
        .where(eq(packages.id, id))
        .run();
      if (res.changes === 0) throw new Error(`Package ${id} not found`);
    });
  }

  async getEventKeys(packageId: number): Promise<EventKey[]> {
    return this.db
      .select({ eventDate: trackingEvents.eventDate, description: trackingEvents.description })
      .from(trackingEvents)
      .where(eq(trackingEvents.packageId, packageId))
      .all();
  }

  async listEvents(packageId: number): Promise<TrackingEvent[]> {
    return this.db
      .select()
      .from(trackingEvents)
      .where(eq(trackingEvents.packageId, packageId))
      .orderBy(desc(trackingEvents.eventDate), asc(trackingEvents.id))
      .all();
  }

  async commitCheckCycle(writes: PackageCycleWrite[]): Promise<void> {
    const createdAt = this.now().toISOString();

    this.db.transaction((tx) => {
      for (const write of writes) {
        const { deliveredDate, rawResponse, ...patch } = write.patch;
        const res = tx
          .update(packages)
          .set({
            ...patch,
            rawData: toJson(rawResponse),
            // the first delivery timestamp is kept
            ...(deliveredDate !== undefined && {
              deliveredDate: sql`coalesce(${packages.deliveredDate}, ${deliveredDate})`,
            }),
          })
          .where(eq(packages.id, write.packageId))
          .run();
        if (res.changes === 0) throw new Error(`Package ${write.packageId} not found`);

        for (const event of write.newEvents) {
          tx.insert(trackingEvents)
            .values({ ...event, packageId: write.packageId, createdAt })
            .onConflictDoNothing()
            .run();
        }
      }
    });
  }

  async getUsage(key: UsageKey): Promise<number> {
    const row = this.db
      .select({ used: apiUsage.registrationsUsed })
      .from(apiUsage)
      .where(and(eq(apiUsage.apiName, key.provider), eq(apiUsage.month, key.month)))
      .get();
    return row?.used ?? 0;
  }

  close(): void {
    this.sqlite.close();
  }
}

/**
 * Re-check the cap inside the write transaction, then count the registration.
 */
function countRegistration(tx: Transaction, count: RegistrationCount): void {
  const { key, limit } = count;
  const row = tx
    .select({ used: apiUsage.registrationsUsed })
    .from(apiUsage)
    .where(and(eq(apiUsage.apiName, key.provider), eq(apiUsage.month, key.month)))
    .get();
  const used = row?.used ?? 0;
  if (used >= limit) throw new QuotaExceededError(used, limit);

  tx.insert(apiUsage)
    .values({ apiName: key.provider, month: key.month, registrationsUsed: 1 })
    .onConflictDoUpdate({
      target: [apiUsage.apiName, apiUsage.month],
      set: { registrationsUsed: sql`${apiUsage.registrationsUsed} + 1` },
    })
    .run();
}

function toPackage(row: PackageRow): Package {
  return {
    id: row.id,
    trackingNumber: row.trackingNumber,
    carrier: row.carrier,
    carrierCode: row.carrierCode,
    description: row.description,
    status: parsePackageStatus(row.status),
    lastEvent: row.lastEvent,
    lastEventDate: row.lastEventDate,
    lastChecked: row.lastChecked,
    deliveredDate: row.deliveredDate,
    rawResponse: fromJson(row.rawData),
    registered: row.registered,
    active: row.active,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

function fromJson(text: string | null): unknown {
  return text === null ? null : JSON.parse(text);
}

function isUniqueViolation(err: unknown): boolean {
  if (err instanceof Database.SqliteError) return err.code === "SQLITE_CONSTRAINT_UNIQUE";
  return err instanceof Error && err.cause !== undefined && isUniqueViolation(err.cause);
}
