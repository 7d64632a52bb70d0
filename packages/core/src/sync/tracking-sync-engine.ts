import type {
  AdapterContext,
  PackageCycleWrite,
  PackageStore,
  TrackingProvider,
} from '../interfaces/index.js';
import type {
  CheckCycleError,
  CheckCycleResult,
  Package,
  TrackInfo,
  TrackInfoBatch,
  TrackingUpdate,
} from '../types/index.js';
import { TrackingUrlResolver } from '../carriers/tracking-url-resolver.js';
import { decodeStatus, isTerminalStatusCode } from '../status/status-map.js';
import { formatNotification, formatStatusLine } from '../notifications/format-notification.js';
import { diffEvents } from './event-diff.js';
import { errorToLog, safeLog } from '../utils/index.js';

export interface TrackingSyncEngineOptions {
  store: PackageStore;
  provider: TrackingProvider;
  context: AdapterContext;
  urlResolver?: TrackingUrlResolver;
  now?: () => Date;
}

/**
 * Per-package outcome of reconciling one provider item
 */
interface ReconciledPackage {
  write: PackageCycleWrite;
  update: TrackingUpdate | null;
}

/**
 * TrackingSyncEngine
 * Runs check cycles: one batch provider call for the selected active packages,
 * event diffing against stored history, one store transaction for all writes.
 *
 * A cycle is all-or-nothing. If reading the store, the provider call or the
 * commit fails, nothing is written and no updates are returned.
 */
export class TrackingSyncEngine {
  private readonly store: PackageStore;
  private readonly provider: TrackingProvider;
  private readonly ctx: AdapterContext;
  private readonly urlResolver: TrackingUrlResolver;
  private readonly now: () => Date;

  constructor(opts: TrackingSyncEngineOptions) {
    this.store = opts.store;
    this.provider = opts.provider;
    this.ctx = { ...opts.context, operationName: 'getTrackInfo' };
    this.urlResolver = opts.urlResolver ?? new TrackingUrlResolver();
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Check active packages (or the single active package `packageId`) and
   * return the updates worth notifying about. Failures yield an empty list.
   */
  async checkUpdates(packageId?: number): Promise<TrackingUpdate[]> {
    const result = await this.checkUpdatesDetailed(packageId);
    return result.updates;
  }

  async checkUpdatesDetailed(packageId?: number): Promise<CheckCycleResult> {
    const logger = this.ctx.logger;

    let packages: Package[];
    try {
      packages = await this.selectPackages(packageId);
    } catch (err) {
      logger?.error('Failed to load packages; check cycle aborted', { packageId, error: errorToLog(err) });
      return { ok: false, checked: 0, updates: [], error: toCycleError(err) };
    }

    if (packages.length === 0) {
      logger?.info('No active packages to check', { packageId });
      return { ok: true, checked: 0, updates: [] };
    }

    let batch: TrackInfoBatch;
    try {
      batch = await this.provider.getTrackInfo(
        { trackingNumbers: packages.map((p) => p.trackingNumber) },
        this.ctx
      );
    } catch (err) {
      logger?.error('Failed to fetch tracking info; check cycle aborted', {
        provider: this.provider.id,
        packages: packages.length,
        error: errorToLog(err),
      });
      return { ok: false, checked: packages.length, updates: [], error: toCycleError(err) };
    }

    if (batch.rejected.length > 0) {
      safeLog(logger, 'warn', 'Provider rejected tracking numbers', {
        rejected: batch.rejected,
      }, this.ctx);
    }

    const now = this.now().toISOString();
    const byNumber = new Map(packages.map((p) => [p.trackingNumber, p]));
    const writes: PackageCycleWrite[] = [];
    const updates: TrackingUpdate[] = [];

    try {
      for (const item of batch.accepted) {
        const pkg = byNumber.get(item.trackingNumber);
        // unknown numbers are ignored; a repeated item is reconciled once
        if (!pkg) continue;
        byNumber.delete(item.trackingNumber);

        const reconciled = await this.reconcile(pkg, item, now);
        writes.push(reconciled.write);
        if (reconciled.update) updates.push(reconciled.update);
      }

      await this.store.commitCheckCycle(writes);
    } catch (err) {
      logger?.error('Failed to apply check cycle results; nothing was written', {
        packages: writes.length,
        error: errorToLog(err),
      });
      return { ok: false, checked: packages.length, updates: [], error: toCycleError(err) };
    }

    for (const update of updates) {
      logger?.info(formatStatusLine(update), {
        trackingNumber: update.trackingNumber,
        newEvents: update.newEventsCount,
      });
    }
    if (updates.length === 0) {
      logger?.info('No new updates found', { checked: packages.length });
    }

    return { ok: true, checked: packages.length, updates };
  }

  private async selectPackages(packageId?: number): Promise<Package[]> {
    if (packageId === undefined) {
      return this.store.listPackages({ activeOnly: true });
    }
    const pkg = await this.store.getPackageById(packageId);
    return pkg && pkg.active ? [pkg] : [];
  }

  private async reconcile(pkg: Package, item: TrackInfo, now: string): Promise<ReconciledPackage> {
    const newStatus = decodeStatus(item.statusCode);
    const stored = await this.store.getEventKeys(pkg.id);
    const newEvents = diffEvents(stored, item.events);
    const latestEvent = item.events[0] ?? null;
    const statusCode = String(item.statusCode);

    const write: PackageCycleWrite = {
      packageId: pkg.id,
      newEvents: newEvents.map((e) => ({
        eventDate: e.date,
        location: e.location,
        description: e.description,
        statusCode,
      })),
      patch: {
        status: newStatus,
        lastChecked: now,
        rawResponse: item.raw,
        updatedAt: now,
      },
    };

    if (latestEvent) {
      write.patch.lastEvent = latestEvent.description;
      write.patch.lastEventDate = latestEvent.date;
    }

    // Delivered is terminal: stamp once and drop out of future cycles
    if (isTerminalStatusCode(item.statusCode)) {
      write.patch.deliveredDate = now;
      write.patch.active = false;
    }

    if (newStatus === pkg.status && newEvents.length === 0) {
      return { write, update: null };
    }

    const payload = {
      trackingNumber: pkg.trackingNumber,
      description: pkg.description,
      carrier: pkg.carrier,
      oldStatus: pkg.status,
      newStatus,
      latestEvent,
      newEventsCount: newEvents.length,
      trackingUrl: this.urlResolver.resolve(pkg.trackingNumber, pkg.carrier),
    };

    return { write, update: { ...payload, text: formatNotification(payload) } };
  }
}

function toCycleError(err: unknown): CheckCycleError {
  if (err instanceof Error) {
    const out: CheckCycleError = { type: err.name, message: err.message };
    if ('category' in err && typeof err.category === 'string') out.category = err.category;
    return out;
  }
  return { type: typeof err, message: String(err) };
}
