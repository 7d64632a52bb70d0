/**
 * 17TRACK API v2.2 request types and constants
 *
 * Response shapes are defined as zod schemas in ../validation.ts.
 */

export const SEVENTEEN_TRACK_DEFAULT_BASE_URL = "https://api.17track.net/track/v2.2";

/** Rejection code meaning the number is already monitored on this account */
export const ALREADY_REGISTERED_CODE = -18010012;

export interface RegisterItem {
  number: string;
  /** 17TRACK carrier code; 0 = auto-detect */
  carrier: number;
}

export interface TrackInfoItem {
  number: string;
}
