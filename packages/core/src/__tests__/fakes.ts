import { vi } from 'vitest';
import type {
  AdapterContext,
  HttpClient,
  Logger,
  RegisterRequest,
  TrackInfoRequest,
  TrackingProvider,
} from '../interfaces/index.js';
import type { RegistrationOutcome, TrackInfo, TrackInfoBatch } from '../types/index.js';

/**
 * HttpClient that fails every call; fake providers never use it
 */
export const unusedHttp: HttpClient = {
  get: () => Promise.reject(new Error('unexpected GET')),
  post: () => Promise.reject(new Error('unexpected POST')),
};

export function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/**
 * Scriptable TrackingProvider recording every call
 */
export class FakeTrackingProvider implements TrackingProvider {
  readonly id = '17track';
  readonly displayName = 'Fake 17TRACK';

  registerCalls: RegisterRequest[] = [];
  trackInfoCalls: TrackInfoRequest[] = [];
  contexts: AdapterContext[] = [];

  registerOutcome: RegistrationOutcome = { status: 'accepted', raw: { code: 0 } };
  registerError: Error | null = null;

  trackInfo: TrackInfoBatch = { accepted: [], rejected: [] };
  trackInfoError: Error | null = null;

  quotaPayload: unknown = { code: 0, data: { quota_remain: 93 } };
  quotaError: Error | null = null;

  async register(req: RegisterRequest, ctx: AdapterContext): Promise<RegistrationOutcome> {
    this.registerCalls.push(req);
    this.contexts.push(ctx);
    if (this.registerError) throw this.registerError;
    return this.registerOutcome;
  }

  async getTrackInfo(req: TrackInfoRequest, ctx: AdapterContext): Promise<TrackInfoBatch> {
    this.trackInfoCalls.push(req);
    this.contexts.push(ctx);
    if (this.trackInfoError) throw this.trackInfoError;
    return this.trackInfo;
  }

  async getQuota(ctx: AdapterContext): Promise<unknown> {
    this.contexts.push(ctx);
    if (this.quotaError) throw this.quotaError;
    return this.quotaPayload;
  }
}

export const UPS_NUMBER = '1Z999AA10123456784';

/**
 * Provider item for the UPS test number with two events, newest first
 */
export function upsInTransit(statusCode = 10): TrackInfo {
  const raw = { number: UPS_NUMBER, track: { e: statusCode } };
  return {
    trackingNumber: UPS_NUMBER,
    statusCode,
    events: [
      { date: '2024-03-02 09:00', location: 'Louisville, KY', description: 'Departed facility' },
      { date: '2024-03-01 18:00', location: null, description: 'Label created' },
    ],
    raw,
  };
}
