/**
 * Standalone update checker for cron / scheduled tasks.
 *
 *   tsx src/check-updates.ts            # check all active packages
 *   tsx src/check-updates.ts --quiet    # print nothing when there are no updates
 *
 * Each notification text goes to stdout between separator lines, ready for a
 * messaging relay. Exit codes: 0 = success, 1 = error.
 */

import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { pino } from 'pino';
import type { PackageTracker } from '@parcelwatch/core';
import { loadConfig } from './config.js';
import { wrapPinoLogger } from './http-client.js';
import { createTracker, openStore } from './tracker.js';

export const SEPARATOR = '=====';

export interface CheckUpdatesJobOptions {
  tracker: PackageTracker;
  quiet?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export async function runCheckUpdates(opts: CheckUpdatesJobOptions): Promise<number> {
  const out = opts.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = opts.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const quiet = opts.quiet ?? false;

  try {
    const active = await opts.tracker.listPackages({ activeOnly: true });
    if (active.length === 0) {
      if (!quiet) out('No active packages to check');
      return 0;
    }

    if (!quiet) out(`Checking ${active.length} active package(s)...`);

    const result = await opts.tracker.checkUpdatesDetailed();
    if (!result.ok) {
      err(`Error: ${result.error.message}`);
      return 1;
    }

    for (const update of result.updates) {
      out(SEPARATOR);
      out(update.text);
      out(SEPARATOR);
    }

    if (!quiet || result.updates.length > 0) {
      out(`Check complete. ${result.updates.length} update(s) found.`);
    }
    return 0;
  } catch (e) {
    err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: { quiet: { type: 'boolean', short: 'q', default: false } },
  });

  const config = loadConfig();
  // logs go to stderr so stdout carries only the notifications
  const logger = pino({ level: config.logLevel }, pino.destination(2));
  const store = openStore(config.dbPath);
  try {
    const tracker = createTracker(config, store, wrapPinoLogger(logger));
    return await runCheckUpdates({ tracker, quiet: values.quiet });
  } finally {
    store.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 1;
    }
  );
}
