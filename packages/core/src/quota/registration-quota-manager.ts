import type { PackageStore, RegistrationCount, UsageKey } from '../interfaces/index.js';
import type { LocalUsage } from '../types/index.js';
import { currentMonth } from '../utils/time.js';

export interface RegistrationQuotaManagerOptions {
  store: PackageStore;
  /** Usage counter owner, normally the provider id */
  provider: string;
  monthlyLimit: number;
  warningThreshold: number;
  now?: () => Date;
}

/**
 * Result of consulting the quota before a registration
 */
export interface QuotaCheck {
  used: number;
  limit: number;
  /** No registration may be attempted */
  exceeded: boolean;
  /** Low-quota message when usage reached the warning threshold */
  warning?: string;
}

/**
 * RegistrationQuotaManager
 * Governs the monthly cap on provider registrations.
 *
 * The counter itself lives in the PackageStore. check() is advisory and runs
 * before the remote call; the store re-checks registrationCount() and increments
 * it in the same transaction as the package write that follows a confirmed
 * registration.
 */
export class RegistrationQuotaManager {
  private readonly store: PackageStore;
  private readonly now: () => Date;

  readonly provider: string;
  readonly monthlyLimit: number;
  readonly warningThreshold: number;

  constructor(opts: RegistrationQuotaManagerOptions) {
    this.store = opts.store;
    this.provider = opts.provider;
    this.monthlyLimit = opts.monthlyLimit;
    this.warningThreshold = opts.warningThreshold;
    this.now = opts.now ?? (() => new Date());
  }

  /** Counter key for the current UTC month */
  usageKey(): UsageKey {
    return { provider: this.provider, month: currentMonth(this.now()) };
  }

  /** Counter and cap handed to the store with a registered package write */
  registrationCount(): RegistrationCount {
    return { key: this.usageKey(), limit: this.monthlyLimit };
  }

  usedThisMonth(): Promise<number> {
    return this.store.getUsage(this.usageKey());
  }

  async check(): Promise<QuotaCheck> {
    const used = await this.usedThisMonth();
    const result: QuotaCheck = {
      used,
      limit: this.monthlyLimit,
      exceeded: used >= this.monthlyLimit,
    };
    if (used >= this.warningThreshold) {
      result.warning = `Warning: ${used}/${this.monthlyLimit} registrations used this month!`;
    }
    return result;
  }

  async report(): Promise<LocalUsage> {
    const key = this.usageKey();
    const used = await this.store.getUsage(key);
    return {
      month: key.month,
      registrationsUsed: used,
      registrationsRemaining: Math.max(0, this.monthlyLimit - used),
      limit: this.monthlyLimit,
    };
  }
}
