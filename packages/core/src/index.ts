// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  ProviderError,
  ConfigurationError,
  QuotaExceededError,
  DuplicatePackageError,
  ValidationError,
} from './errors/index.js';
export type { ProviderErrorCategory } from './errors/index.js';
export { HttpError } from './http/errors.js';

// Configuration
export { DEFAULT_TRACKER_CONFIG, resolveTrackerConfig } from './config/index.js';
export type { TrackerConfig } from './config/index.js';

// Carriers and statuses
export {
  DEFAULT_CARRIER_RULES,
  DEFAULT_TRACKING_URL_TEMPLATES,
  FALLBACK_TRACKING_URL_TEMPLATE,
} from './carriers/carrier-table.js';
export type { CarrierRule } from './carriers/carrier-table.js';
export { CarrierDetector } from './carriers/carrier-detector.js';
export type { DetectedCarrier } from './carriers/carrier-detector.js';
export { TrackingUrlResolver } from './carriers/tracking-url-resolver.js';
export {
  STATUS_MAP,
  DELIVERED_STATUS_CODE,
  INITIAL_STATUS,
  decodeStatus,
  isTerminalStatusCode,
  statusEmoji,
  parsePackageStatus,
} from './status/status-map.js';

// Sync
export { diffEvents } from './sync/event-diff.js';
export { TrackingSyncEngine } from './sync/tracking-sync-engine.js';
export type { TrackingSyncEngineOptions } from './sync/tracking-sync-engine.js';
export { formatNotification, formatStatusChange, formatStatusLine } from './notifications/format-notification.js';
export { RegistrationQuotaManager } from './quota/registration-quota-manager.js';
export type { QuotaCheck, RegistrationQuotaManagerOptions } from './quota/registration-quota-manager.js';

// Orchestration
export { PackageTracker, normalizeTrackingNumber } from './tracker/package-tracker.js';
export type { PackageTrackerOptions, AddPackageInput } from './tracker/package-tracker.js';

// Persistence
export { InMemoryPackageStore } from './stores/in-memory.js';

// Http clients (convenience exports)
export { createAxiosHttpClient } from './http/axios-client.js';
export type { AxiosHttpClientOptions } from './http/axios-client.js';

// Utilities
export { serializeForLog, sanitizeHeadersForLog, errorToLog, currentMonth } from './utils/index.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
} from './utils/logging-helpers.js';
