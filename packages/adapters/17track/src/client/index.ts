/**
 * 17TRACK HTTP Client Wrapper
 * Thin wrapper around the three 17TRACK API v2.2 endpoints
 */

import type { HttpClient, HttpResponse } from "@parcelwatch/core";
import type { RegisterItem, TrackInfoItem } from "../types/index.js";

export interface SeventeenTrackClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout; the HttpClient default applies when absent */
  timeoutMs?: number;
}

/**
 * SeventeenTrackClient
 * Bodies are returned unvalidated; callers parse them with the zod schemas.
 */
export class SeventeenTrackClient {
  private readonly baseUrl: string;

  constructor(private readonly opts: SeventeenTrackClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Register numbers for monitoring (costs one quota unit each)
   */
  register(items: RegisterItem[], http: HttpClient): Promise<HttpResponse<unknown>> {
    return http.post<unknown>(`${this.baseUrl}/register`, items, this.requestConfig());
  }

  /**
   * Fetch tracking info for registered numbers (free)
   */
  getTrackInfo(items: TrackInfoItem[], http: HttpClient): Promise<HttpResponse<unknown>> {
    return http.post<unknown>(`${this.baseUrl}/gettrackinfo`, items, this.requestConfig());
  }

  getQuota(http: HttpClient): Promise<HttpResponse<unknown>> {
    return http.get<unknown>(`${this.baseUrl}/getquota`, this.requestConfig());
  }

  private requestConfig(): { headers: Record<string, string>; timeout?: number } {
    const config: { headers: Record<string, string>; timeout?: number } = {
      headers: {
        "17token": this.opts.apiKey,
        "Content-Type": "application/json",
      },
    };
    if (this.opts.timeoutMs !== undefined) config.timeout = this.opts.timeoutMs;
    return config;
  }
}
