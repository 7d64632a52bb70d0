import type {
  AdapterContext,
  HttpClient,
  Logger,
  LoggingOptions,
  PackageStore,
  TrackingProvider,
} from '../interfaces/index.js';
import type {
  AddPackageResult,
  CheckCycleResult,
  OperationFailure,
  Package,
  PackageDetailsResult,
  PendingRegistrationOutcome,
  QuotaReport,
  RegistrationOutcome,
  RemovePackageResult,
  TrackingUpdate,
} from '../types/index.js';
import type { TrackerConfig } from '../config/index.js';
import { CarrierDetector } from '../carriers/carrier-detector.js';
import { TrackingUrlResolver } from '../carriers/tracking-url-resolver.js';
import { RegistrationQuotaManager } from '../quota/registration-quota-manager.js';
import { TrackingSyncEngine } from '../sync/tracking-sync-engine.js';
import {
  ConfigurationError,
  DuplicatePackageError,
  ProviderError,
  QuotaExceededError,
} from '../errors/index.js';
import { errorToLog } from '../utils/index.js';

export interface PackageTrackerOptions {
  store: PackageStore;
  provider: TrackingProvider;
  http: HttpClient;
  config: TrackerConfig;
  logger?: Logger;
  /** Passed to the provider with every call (silent operations, raw payload logging) */
  loggingOptions?: LoggingOptions;
  detector?: CarrierDetector;
  now?: () => Date;
}

export interface AddPackageInput {
  trackingNumber: string;
  description?: string | null;
  /** Carrier name override; replaces the detected name for display and URLs */
  carrier?: string | null;
}

/**
 * What happened when asking the provider to register a number
 *
 * - refused: the provider will not take this number (a rejected item, or a
 *   Rejected/Permanent ProviderError); retrying cannot help
 * - deferred: anything else that failed; the number can be registered later
 */
type RegistrationAttempt =
  | { kind: 'registered'; carrierCode: number; raw: unknown }
  | { kind: 'refused'; error: string }
  | { kind: 'deferred'; reason: string; error: unknown };

const AUTO_DETECT = 'Auto-detect';

/**
 * PackageTracker
 * Entry point for the tracking operations: add, check, list, details, remove,
 * quota, and retrying deferred registrations.
 *
 * Every operation returns a structured result; expected failures are never thrown.
 */
export class PackageTracker {
  private readonly store: PackageStore;
  private readonly provider: TrackingProvider;
  private readonly logger?: Logger;
  private readonly ctx: AdapterContext;
  private readonly now: () => Date;

  readonly detector: CarrierDetector;
  readonly urlResolver: TrackingUrlResolver;
  readonly quota: RegistrationQuotaManager;
  readonly engine: TrackingSyncEngine;

  constructor(opts: PackageTrackerOptions) {
    this.store = opts.store;
    this.provider = opts.provider;
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
    this.ctx = { http: opts.http, logger: opts.logger, loggingOptions: opts.loggingOptions };

    this.detector = opts.detector ?? new CarrierDetector();
    this.urlResolver = new TrackingUrlResolver({ detector: this.detector });
    this.quota = new RegistrationQuotaManager({
      store: opts.store,
      provider: opts.provider.id,
      monthlyLimit: opts.config.monthlyRegistrationLimit,
      warningThreshold: opts.config.quotaWarningThreshold,
      now: this.now,
    });
    this.engine = new TrackingSyncEngine({
      store: opts.store,
      provider: opts.provider,
      context: this.ctx,
      urlResolver: this.urlResolver,
      now: this.now,
    });
  }

  async addPackage(input: AddPackageInput): Promise<AddPackageResult> {
    const trackingNumber = normalizeTrackingNumber(input.trackingNumber);
    if (!trackingNumber) {
      return failure('Tracking number cannot be empty', 'validation');
    }

    const existing = await this.store.getPackageByTrackingNumber(trackingNumber);
    if (existing) {
      if (existing.active) {
        return failure(`Package ${trackingNumber} is already being tracked`, 'already-tracked');
      }
      const pkg = await this.store.reactivatePackage(existing.id, this.timestamp());
      this.logger?.info('Package reactivated', { trackingNumber, id: pkg.id });
      return this.added(pkg, { reactivated: true, message: 'Package reactivated', warnings: [] });
    }

    const detected = this.detector.detect(trackingNumber);
    const carrier = input.carrier?.trim() || detected.carrier;
    const description = input.description?.trim() || null;

    const quota = await this.quota.check();
    const warnings: string[] = [];
    if (quota.warning) {
      warnings.push(quota.warning);
      this.logger?.warn(quota.warning, { used: quota.used, limit: quota.limit });
    }
    if (quota.exceeded) {
      return failure(new QuotaExceededError(quota.used, quota.limit).message, 'quota-exceeded');
    }

    const attempt = await this.attemptRegistration(trackingNumber, detected.carrierCode);
    if (attempt.kind === 'refused') {
      return failure(attempt.error, 'rejected');
    }
    if (attempt.kind === 'deferred') {
      warnings.push(`${attempt.reason}. Package saved locally; registration will be retried.`);
    }

    const registered = attempt.kind === 'registered';
    let pkg: Package;
    try {
      pkg = await this.store.createPackage(
        {
          trackingNumber,
          carrier,
          carrierCode: registered ? attempt.carrierCode : detected.carrierCode,
          description,
          registered,
          rawResponse: registered ? attempt.raw : null,
          createdAt: this.timestamp(),
        },
        registered ? { countRegistration: this.quota.registrationCount() } : undefined
      );
    } catch (err) {
      // a concurrent add won the unique insert
      if (err instanceof DuplicatePackageError) {
        return failure(`Package ${trackingNumber} is already being tracked`, 'already-tracked');
      }
      // concurrent adds used up the month while this one was registering
      if (err instanceof QuotaExceededError) {
        this.logger?.warn('Registration not recorded; monthly limit reached', {
          trackingNumber,
          used: err.used,
          limit: err.limit,
        });
        return failure(err.message, 'quota-exceeded');
      }
      throw err;
    }

    if (registered) {
      const used = await this.quota.usedThisMonth();
      this.logger?.info('Registered with 17TRACK', {
        trackingNumber,
        quota: `${used}/${this.quota.monthlyLimit}`,
      });
    }

    return this.added(pkg, { reactivated: false, message: 'Package added successfully', warnings });
  }

  checkUpdates(packageId?: number): Promise<TrackingUpdate[]> {
    return this.engine.checkUpdates(packageId);
  }

  checkUpdatesDetailed(packageId?: number): Promise<CheckCycleResult> {
    return this.engine.checkUpdatesDetailed(packageId);
  }

  listPackages(opts: { activeOnly?: boolean } = {}): Promise<Package[]> {
    return this.store.listPackages({ activeOnly: opts.activeOnly ?? true });
  }

  async removePackage(rawTrackingNumber: string): Promise<RemovePackageResult> {
    const trackingNumber = normalizeTrackingNumber(rawTrackingNumber);
    if (!trackingNumber) {
      return failure('Tracking number cannot be empty', 'validation');
    }

    const pkg = await this.store.getPackageByTrackingNumber(trackingNumber);
    if (!pkg) {
      return { ...failure(`Package ${trackingNumber} not found`, 'not-found'), notFound: true };
    }
    if (!pkg.active) {
      return failure(`Package ${trackingNumber} is already inactive`, 'already-inactive');
    }

    await this.store.deactivatePackage(pkg.id, this.timestamp());
    this.logger?.info('Stopped tracking package', { trackingNumber });
    return { ok: true, message: `Stopped tracking ${trackingNumber}` };
  }

  async getPackageDetails(rawTrackingNumber: string): Promise<PackageDetailsResult> {
    const trackingNumber = normalizeTrackingNumber(rawTrackingNumber);
    if (!trackingNumber) {
      return failure('Tracking number cannot be empty', 'validation');
    }

    const pkg = await this.store.getPackageByTrackingNumber(trackingNumber);
    if (!pkg) {
      return { ...failure(`Package ${trackingNumber} not found`, 'not-found'), notFound: true };
    }

    const events = await this.store.listEvents(pkg.id);
    return {
      ok: true,
      package: pkg,
      events,
      trackingUrl: this.urlResolver.resolve(pkg.trackingNumber, pkg.carrier),
    };
  }

  async getQuotaReport(): Promise<QuotaReport> {
    const report: QuotaReport = { localUsage: await this.quota.report() };
    try {
      report.apiQuota = await this.provider.getQuota({ ...this.ctx, operationName: 'getQuota' });
    } catch (err) {
      this.logger?.warn('Failed to fetch provider quota', { error: errorToLog(err) });
      report.apiError = err instanceof Error ? err.message : `Failed to fetch quota: ${String(err)}`;
    }
    return report;
  }

  /**
   * Retry registration for active packages saved while the provider was
   * unreachable or unconfigured.
   *
   * A number the provider refuses is deactivated, so it is not retried again.
   * A failure that would repeat for every number (rate limit, bad or missing
   * API key) stops the run; the remaining packages are reported as skipped.
   */
  async registerPending(): Promise<PendingRegistrationOutcome[]> {
    const pending = (await this.store.listPackages({ activeOnly: true })).filter((p) => !p.registered);
    const outcomes: PendingRegistrationOutcome[] = [];

    for (const [index, pkg] of pending.entries()) {
      const quota = await this.quota.check();
      if (quota.exceeded) {
        outcomes.push({
          trackingNumber: pkg.trackingNumber,
          registered: false,
          error: `Monthly registration limit reached (${quota.used}/${quota.limit})`,
        });
        continue;
      }

      const attempt = await this.attemptRegistration(pkg.trackingNumber, pkg.carrierCode);

      if (attempt.kind === 'refused') {
        await this.store.deactivatePackage(pkg.id, this.timestamp());
        this.logger?.info('Stopped tracking refused package', { trackingNumber: pkg.trackingNumber });
        outcomes.push({
          trackingNumber: pkg.trackingNumber,
          registered: false,
          error: attempt.error,
          deactivated: true,
        });
        continue;
      }

      if (attempt.kind === 'deferred') {
        outcomes.push({ trackingNumber: pkg.trackingNumber, registered: false, error: attempt.reason });
        const stop = batchStopReason(attempt.error);
        if (stop) {
          for (const rest of pending.slice(index + 1)) {
            outcomes.push({ trackingNumber: rest.trackingNumber, registered: false, error: stop });
          }
          break;
        }
        continue;
      }

      try {
        await this.store.markRegistered(
          pkg.id,
          { carrierCode: attempt.carrierCode, rawResponse: attempt.raw, at: this.timestamp() },
          { countRegistration: this.quota.registrationCount() }
        );
      } catch (err) {
        if (!(err instanceof QuotaExceededError)) throw err;
        outcomes.push({
          trackingNumber: pkg.trackingNumber,
          registered: false,
          error: `Monthly registration limit reached (${err.used}/${err.limit})`,
        });
        continue;
      }
      outcomes.push({ trackingNumber: pkg.trackingNumber, registered: true });
    }

    return outcomes;
  }

  /**
   * Call the provider and classify the result. Only 'registered' consumes quota.
   */
  private async attemptRegistration(trackingNumber: string, carrierCode: number): Promise<RegistrationAttempt> {
    let outcome: RegistrationOutcome;
    try {
      outcome = await this.provider.register(
        { trackingNumber, carrierCode },
        { ...this.ctx, operationName: 'register' }
      );
    } catch (err) {
      this.logger?.warn('17TRACK registration failed', { trackingNumber, error: errorToLog(err) });
      const message = (err instanceof Error ? err.message : String(err)).replace(/\.+$/, '');
      if (err instanceof ProviderError && (err.category === 'Rejected' || err.category === 'Permanent')) {
        return { kind: 'refused', error: `17TRACK rejected: ${message}` };
      }
      return { kind: 'deferred', reason: `17TRACK registration failed: ${message}`, error: err };
    }

    switch (outcome.status) {
      case 'accepted':
        return { kind: 'registered', carrierCode: outcome.carrierCode || carrierCode, raw: outcome.raw };
      case 'already-registered':
        return { kind: 'registered', carrierCode, raw: outcome.raw };
      case 'rejected':
        this.logger?.warn('17TRACK rejected registration', {
          trackingNumber,
          code: outcome.code,
          message: outcome.message,
        });
        return { kind: 'refused', error: `17TRACK rejected: ${outcome.message} (code ${outcome.code})` };
    }
  }

  private added(
    pkg: Package,
    extra: { reactivated: boolean; message: string; warnings: string[] }
  ): AddPackageResult {
    return {
      ok: true,
      package: pkg,
      carrier: pkg.carrier ?? AUTO_DETECT,
      registered: pkg.registered,
      reactivated: extra.reactivated,
      trackingUrl: this.urlResolver.resolve(pkg.trackingNumber, pkg.carrier),
      message: extra.message,
      warnings: extra.warnings,
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

export function normalizeTrackingNumber(value: string): string {
  return value.trim().toUpperCase();
}

/**
 * Why the remaining registrations of a run should not be attempted, if the
 * error would repeat for every number
 */
function batchStopReason(err: unknown): string | null {
  if (err instanceof ConfigurationError) {
    return 'Skipped: 17TRACK API key is not configured';
  }
  if (err instanceof ProviderError && err.category === 'Auth') {
    return 'Skipped: 17TRACK API key rejected';
  }
  if (err instanceof ProviderError && err.category === 'RateLimit') {
    const wait = err.retryAfterMs ? `; retry after ${Math.ceil(err.retryAfterMs / 1000)}s` : '';
    return `Skipped: 17TRACK rate limit reached${wait}`;
  }
  return null;
}

function failure(error: string, reason: OperationFailure['reason']): OperationFailure {
  return { ok: false, error, reason };
}
