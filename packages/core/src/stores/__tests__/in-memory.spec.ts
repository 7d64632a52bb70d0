import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryPackageStore } from '../in-memory.js';
import { DuplicatePackageError, QuotaExceededError } from '../../errors/index.js';
import type { NewPackage } from '../../types/index.js';
import type { PackageCycleWrite } from '../../interfaces/index.js';

function newPackage(trackingNumber: string, createdAt = '2024-03-01T00:00:00.000Z'): NewPackage {
  return {
    trackingNumber,
    carrier: null,
    carrierCode: 0,
    description: null,
    registered: true,
    rawResponse: null,
    createdAt,
  };
}

describe('InMemoryPackageStore', () => {
  let store: InMemoryPackageStore;

  beforeEach(() => {
    store = new InMemoryPackageStore(() => new Date('2024-03-02T00:00:00.000Z'));
  });

  it('rejects duplicate tracking numbers', async () => {
    await store.createPackage(newPackage('A1'));
    await expect(store.createPackage(newPackage('A1'))).rejects.toBeInstanceOf(DuplicatePackageError);
  });

  it('keeps one row when the same number is created concurrently', async () => {
    const settled = await Promise.allSettled([
      store.createPackage(newPackage('RR123456789CN')),
      store.createPackage(newPackage('RR123456789CN')),
    ]);

    expect(settled.map((s) => s.status)).toEqual(['fulfilled', 'rejected']);
    expect(settled[1].status === 'rejected' && settled[1].reason).toBeInstanceOf(DuplicatePackageError);
    expect(await store.listPackages({ activeOnly: false })).toHaveLength(1);
  });

  it('refuses a counted write at the limit and writes nothing', async () => {
    const count = { key: { provider: '17track', month: '2024-03' }, limit: 2 };

    const settled = await Promise.allSettled([
      store.createPackage(newPackage('A1'), { countRegistration: count }),
      store.createPackage(newPackage('A2'), { countRegistration: count }),
      store.createPackage(newPackage('A3'), { countRegistration: count }),
    ]);

    expect(settled.map((s) => s.status)).toEqual(['fulfilled', 'fulfilled', 'rejected']);
    expect(settled[2].status === 'rejected' && settled[2].reason).toBeInstanceOf(QuotaExceededError);
    expect(await store.getUsage(count.key)).toBe(2);
    expect(await store.getPackageByTrackingNumber('A3')).toBeNull();
  });

  it('refuses markRegistered at the limit and leaves the package unregistered', async () => {
    const count = { key: { provider: '17track', month: '2024-03' }, limit: 1 };
    await store.createPackage(newPackage('A1'), { countRegistration: count });
    const pending = await store.createPackage({ ...newPackage('A2'), registered: false });

    await expect(
      store.markRegistered(pending.id, { carrierCode: 0, rawResponse: null, at: 'x' }, { countRegistration: count })
    ).rejects.toBeInstanceOf(QuotaExceededError);
    expect((await store.getPackageById(pending.id))?.registered).toBe(false);
    expect(await store.getUsage(count.key)).toBe(1);
  });

  it('returns copies that callers cannot mutate', async () => {
    const pkg = await store.createPackage(newPackage('A1'));
    pkg.status = 'Delivered';
    expect((await store.getPackageById(pkg.id))?.status).toBe('pending');
  });

  it('orders active packages first, then newest', async () => {
    await store.createPackage(newPackage('OLD', '2024-03-01T00:00:00.000Z'));
    const gone = await store.createPackage(newPackage('GONE', '2024-03-03T00:00:00.000Z'));
    await store.createPackage(newPackage('NEW', '2024-03-02T00:00:00.000Z'));
    await store.deactivatePackage(gone.id, '2024-03-04T00:00:00.000Z');

    const all = await store.listPackages({ activeOnly: false });
    expect(all.map((p) => p.trackingNumber)).toEqual(['NEW', 'OLD', 'GONE']);
  });

  it('leaves no trace of a failed cycle', async () => {
    const pkg = await store.createPackage(newPackage('A1'));
    const write: PackageCycleWrite = {
      packageId: pkg.id,
      newEvents: [{ eventDate: '2024-03-01', location: null, description: 'Created', statusCode: '10' }],
      patch: { status: 'In Transit', lastChecked: 'x', rawResponse: null, updatedAt: 'x' },
    };

    await expect(store.commitCheckCycle([write, { ...write, packageId: 42 }])).rejects.toThrow('Package 42 not found');

    expect(await store.listEvents(pkg.id)).toEqual([]);
    expect((await store.getPackageById(pkg.id))?.status).toBe('pending');
  });

  it('lists events newest first', async () => {
    const pkg = await store.createPackage(newPackage('A1'));
    await store.commitCheckCycle([
      {
        packageId: pkg.id,
        newEvents: [
          { eventDate: '2024-03-01', location: null, description: 'Created', statusCode: '10' },
          { eventDate: '2024-03-03', location: 'Hub', description: 'Arrived', statusCode: '10' },
        ],
        patch: { status: 'In Transit', lastChecked: 'x', rawResponse: null, updatedAt: 'x' },
      },
    ]);

    const events = await store.listEvents(pkg.id);
    expect(events.map((e) => e.description)).toEqual(['Arrived', 'Created']);
    expect(events[0]).toMatchObject({ id: 2, packageId: pkg.id, createdAt: '2024-03-02T00:00:00.000Z' });
  });

  it('clears all data', async () => {
    await store.createPackage(newPackage('A1'), {
      countRegistration: { key: { provider: 'p', month: '2024-03' }, limit: 100 },
    });
    store.clear();
    expect(await store.listPackages({ activeOnly: false })).toEqual([]);
    expect(await store.getUsage({ provider: 'p', month: '2024-03' })).toBe(0);
  });
});
