export type { HttpClient, HttpClientConfig, HttpResponse } from './http-client.js';
export type { Logger } from './logger.js';
export type { AdapterContext, LoggingOptions } from './adapter-context.js';
export type { TrackingProvider, RegisterRequest, TrackInfoRequest } from './tracking-provider.js';
export type {
  PackageStore,
  PackageCycleWrite,
  PackageCyclePatch,
  UsageKey,
  RegistrationCount,
} from './package-store.js';
