import { z } from 'zod';
import { ConfigurationError, resolveTrackerConfig } from '@parcelwatch/core';
import type { TrackerConfig } from '@parcelwatch/core';

/**
 * "1"/"true" enable a flag; anything else (or unset) leaves it off
 */
const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v?.toLowerCase() === 'true');

/**
 * Unset and empty variables both fall back to the default
 */
const blankAsUnset = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

export const EnvSchema = z.object({
  SEVENTEEN_TRACK_API_KEY: z.preprocess(blankAsUnset, z.string().optional()),
  SEVENTEEN_TRACK_API_BASE: z.preprocess(blankAsUnset, z.url().optional()),
  HTTP_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  HTTP_DEBUG: flag,
  HTTP_DEBUG_FULL: flag,
  PARCELWATCH_DB_PATH: z.preprocess(blankAsUnset, z.string().default('data/tracker.db')),
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(3000)),
  HOST: z.preprocess(blankAsUnset, z.string().default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface ServerConfig {
  tracker: TrackerConfig;
  http: {
    timeoutMs: number;
    debug: boolean;
    debugFullBody: boolean;
  };
  dbPath: string;
  port: number;
  host: string;
  logLevel: LogLevel;
}

/**
 * Read the server and job configuration from environment variables.
 * A missing API key is allowed here; remote calls report it instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    const setting = parsed.error.issues[0]?.path.map(String).join('.');
    throw new ConfigurationError(`Invalid environment: ${details}`, setting);
  }

  const e = parsed.data;
  const tracker = resolveTrackerConfig({
    apiKey: e.SEVENTEEN_TRACK_API_KEY?.trim(),
    apiBaseUrl: e.SEVENTEEN_TRACK_API_BASE,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
  });

  return {
    tracker,
    http: {
      timeoutMs: tracker.httpTimeoutMs,
      debug: e.HTTP_DEBUG,
      debugFullBody: e.HTTP_DEBUG_FULL,
    },
    dbPath: e.PARCELWATCH_DB_PATH,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
  };
}
