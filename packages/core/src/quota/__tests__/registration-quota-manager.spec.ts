import { describe, it, expect, beforeEach } from 'vitest';
import { RegistrationQuotaManager } from '../registration-quota-manager.js';
import { InMemoryPackageStore } from '../../stores/in-memory.js';
import type { UsageKey } from '../../interfaces/index.js';

const now = () => new Date('2024-03-15T12:00:00.000Z');

async function seedUsage(store: InMemoryPackageStore, key: UsageKey, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await store.createPackage(
      {
        trackingNumber: `SEED${i}`,
        carrier: null,
        carrierCode: 0,
        description: null,
        registered: true,
        rawResponse: null,
        createdAt: now().toISOString(),
      },
      { countRegistration: { key, limit: Number.MAX_SAFE_INTEGER } }
    );
  }
}

describe('RegistrationQuotaManager', () => {
  let store: InMemoryPackageStore;
  let quota: RegistrationQuotaManager;

  beforeEach(() => {
    store = new InMemoryPackageStore(now);
    quota = new RegistrationQuotaManager({ store, provider: '17track', monthlyLimit: 3, warningThreshold: 2, now });
  });

  it('keys usage by provider and UTC month', () => {
    expect(quota.usageKey()).toEqual({ provider: '17track', month: '2024-03' });

    const lateEvening = new RegistrationQuotaManager({
      store,
      provider: '17track',
      monthlyLimit: 3,
      warningThreshold: 2,
      now: () => new Date('2024-03-31T23:30:00.000-02:00'),
    });
    expect(lateEvening.usageKey().month).toBe('2024-04');
  });

  it('allows registrations below the threshold without a warning', async () => {
    await seedUsage(store, quota.usageKey(), 1);
    expect(await quota.check()).toEqual({ used: 1, limit: 3, exceeded: false });
  });

  it('warns from the threshold on', async () => {
    await seedUsage(store, quota.usageKey(), 2);
    expect(await quota.check()).toEqual({
      used: 2,
      limit: 3,
      exceeded: false,
      warning: 'Warning: 2/3 registrations used this month!',
    });
  });

  it('refuses at the limit', async () => {
    await seedUsage(store, quota.usageKey(), 3);
    expect((await quota.check()).exceeded).toBe(true);
  });

  it('ignores usage from other months', async () => {
    await seedUsage(store, { provider: '17track', month: '2024-02' }, 3);
    expect(await quota.usedThisMonth()).toBe(0);
  });

  it('reports usage and remaining registrations', async () => {
    await seedUsage(store, quota.usageKey(), 2);
    expect(await quota.report()).toEqual({
      month: '2024-03',
      registrationsUsed: 2,
      registrationsRemaining: 1,
      limit: 3,
    });
  });
});
