import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { PackageTracker } from '@parcelwatch/core';
import type { Logger, PackageStore } from '@parcelwatch/core';
import { SeventeenTrackProvider } from '@parcelwatch/adapters-17track';
import { SqlitePackageStore } from '@parcelwatch/store-sqlite';
import type { ServerConfig } from './config.js';
import { makeHttpClient } from './http-client.js';

/**
 * Open the SQLite store, creating the database directory on first use.
 */
export function openStore(dbPath: string): SqlitePackageStore {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(resolve(dbPath)), { recursive: true });
  }
  return new SqlitePackageStore(dbPath);
}

/**
 * Wire a PackageTracker to the 17TRACK provider with the configured HTTP client.
 */
export function createTracker(config: ServerConfig, store: PackageStore, logger: Logger): PackageTracker {
  const provider = new SeventeenTrackProvider({
    apiKey: config.tracker.apiKey,
    baseUrl: config.tracker.apiBaseUrl,
    timeoutMs: config.tracker.httpTimeoutMs,
  });

  return new PackageTracker({
    store,
    provider,
    http: makeHttpClient(config.http, logger),
    config: config.tracker,
    logger,
  });
}
