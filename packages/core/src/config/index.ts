/**
 * Tracker configuration
 *
 * Passed explicitly to constructors; nothing reads the environment here.
 */
export interface TrackerConfig {
  /** 17TRACK API key; when absent every remote call fails with ConfigurationError */
  apiKey?: string;

  apiBaseUrl: string;

  /** Bound on every provider request */
  httpTimeoutMs: number;

  /** Registrations allowed per calendar month (17TRACK free tier: 100) */
  monthlyRegistrationLimit: number;

  /** Usage at which additions start carrying a low-quota warning */
  quotaWarningThreshold: number;
}

export const DEFAULT_TRACKER_CONFIG: Readonly<TrackerConfig> = Object.freeze({
  apiBaseUrl: "https://api.17track.net/track/v2.2",
  httpTimeoutMs: 30_000,
  monthlyRegistrationLimit: 100,
  quotaWarningThreshold: 95,
});

export function resolveTrackerConfig(overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  const merged: TrackerConfig = { ...DEFAULT_TRACKER_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
