/**
 * 17TRACK Tracking Provider
 * Implements the TrackingProvider interface for the 17TRACK API v2.2
 */

import type {
  AdapterContext,
  RegisterRequest,
  RegistrationOutcome,
  TrackInfoBatch,
  TrackInfoRequest,
  TrackingProvider,
} from "@parcelwatch/core";
import { ConfigurationError, ProviderError, safeLog } from "@parcelwatch/core";
import { SeventeenTrackClient } from "./client/index.js";
import { translateSeventeenTrackError } from "./errors.js";
import { mapRegisterResponse, mapTrackInfoResponse } from "./mappers/index.js";
import { parseRegisterResponse, parseTrackInfoResponse } from "./validation.js";
import { SEVENTEEN_TRACK_DEFAULT_BASE_URL } from "./types/index.js";

export interface SeventeenTrackProviderOptions {
  /** API key sent as the `17token` header; remote calls fail with ConfigurationError without it */
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * SeventeenTrackProvider
 *
 * 17TRACK aggregates tracking data from thousands of carriers.
 *
 * Notes:
 * - /register costs one unit of the monthly registration quota per number
 * - /gettrackinfo is free and takes the whole batch in one call
 * - a number the account already monitors is rejected with -18010012; that
 *   is reported as 'already-registered'
 */
export class SeventeenTrackProvider implements TrackingProvider {
  readonly id = "17track";
  readonly displayName = "17TRACK";

  private readonly client: SeventeenTrackClient | null;

  constructor(opts: SeventeenTrackProviderOptions = {}) {
    const apiKey = opts.apiKey?.trim();
    this.client = apiKey
      ? new SeventeenTrackClient({
          apiKey,
          baseUrl: opts.baseUrl ?? SEVENTEEN_TRACK_DEFAULT_BASE_URL,
          timeoutMs: opts.timeoutMs,
        })
      : null;
  }

  async register(req: RegisterRequest, ctx: AdapterContext): Promise<RegistrationOutcome> {
    const client = this.requireClient();

    let body: unknown;
    try {
      const res = await client.register([{ number: req.trackingNumber, carrier: req.carrierCode }], ctx.http);
      body = res.body;
    } catch (err) {
      throw translateSeventeenTrackError(err);
    }

    safeLog(ctx.logger, "debug", "17TRACK: register response", {
      trackingNumber: req.trackingNumber,
      raw: body,
    }, ctx);

    const parsed = parseRegisterResponse(body);
    const outcome = mapRegisterResponse(parsed, body);
    if (outcome) return outcome;

    if (parsed.code !== 0) {
      throw new ProviderError(`17TRACK refused the request (code ${parsed.code})`, "Rejected", {
        providerCode: String(parsed.code),
        raw: body,
      });
    }
    throw new ProviderError(
      `17TRACK register response did not mention ${req.trackingNumber}`,
      "Malformed",
      { raw: body }
    );
  }

  async getTrackInfo(req: TrackInfoRequest, ctx: AdapterContext): Promise<TrackInfoBatch> {
    const client = this.requireClient();
    if (req.trackingNumbers.length === 0) return { accepted: [], rejected: [] };

    let body: unknown;
    try {
      const res = await client.getTrackInfo(req.trackingNumbers.map((number) => ({ number })), ctx.http);
      body = res.body;
    } catch (err) {
      throw translateSeventeenTrackError(err);
    }

    safeLog(ctx.logger, "debug", "17TRACK: gettrackinfo response", {
      count: req.trackingNumbers.length,
      raw: body,
    }, ctx);

    const parsed = parseTrackInfoResponse(body);
    if (parsed.code !== 0) {
      throw new ProviderError(`17TRACK refused the request (code ${parsed.code})`, "Rejected", {
        providerCode: String(parsed.code),
        raw: body,
      });
    }
    return mapTrackInfoResponse(parsed);
  }

  async getQuota(ctx: AdapterContext): Promise<unknown> {
    const client = this.requireClient();
    try {
      const res = await client.getQuota(ctx.http);
      return res.body;
    } catch (err) {
      throw translateSeventeenTrackError(err);
    }
  }

  private requireClient(): SeventeenTrackClient {
    if (!this.client) {
      throw new ConfigurationError(
        "SEVENTEEN_TRACK_API_KEY is not set. Get an API key at https://admin.17track.net",
        "SEVENTEEN_TRACK_API_KEY"
      );
    }
    return this.client;
  }
}

export { SeventeenTrackClient } from "./client/index.js";
export { translateSeventeenTrackError } from "./errors.js";
export * from "./mappers/index.js";
export * from "./validation.js";
export * from "./types/index.js";
