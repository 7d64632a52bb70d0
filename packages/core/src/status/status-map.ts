/**
 * 17TRACK status code mapping
 *
 * Maps the provider's numeric package status (`track.e`) to the display status
 * stored on a package, plus the emoji used in one-line summaries.
 */

import type { KnownPackageStatus, PackageStatus } from '../types/index.js';

export const STATUS_MAP: Readonly<Record<number, KnownPackageStatus>> = Object.freeze({
  0: "Not Found",
  10: "In Transit",
  20: "Expired",
  30: "Pick Up",
  35: "Undelivered",
  40: "Delivered",
  50: "Alert",
});

/** Provider status code that ends a package's polling lifecycle */
export const DELIVERED_STATUS_CODE = 40;

export const INITIAL_STATUS: PackageStatus = "pending";

export const STATUS_EMOJI: Readonly<Record<string, string>> = Object.freeze({
  "pending": "⏳",
  "Not Found": "❓",
  "In Transit": "🚚",
  "Expired": "⌛",
  "Pick Up": "📬",
  "Undelivered": "⚠️",
  "Delivered": "✅",
  "Alert": "🚨",
});

const DEFAULT_EMOJI = "📦";

/**
 * Decode a provider status code. Unknown codes become `Unknown (<code>)`.
 */
export function decodeStatus(code: number): PackageStatus {
  return STATUS_MAP[code] ?? `Unknown (${code})`;
}

export function isTerminalStatusCode(code: number): boolean {
  return code === DELIVERED_STATUS_CODE;
}

export function statusEmoji(status: string): string {
  return STATUS_EMOJI[status] ?? DEFAULT_EMOJI;
}

const UNKNOWN_STATUS = /^Unknown \((-?\d+)\)$/;

/**
 * Narrow a persisted status string back to PackageStatus.
 * Anything unrecognised is treated as the initial "pending" status.
 */
export function parsePackageStatus(value: string): PackageStatus {
  const known = Object.values(STATUS_MAP).find((status) => status === value);
  if (known) return known;
  const unknown = UNKNOWN_STATUS.exec(value);
  if (unknown) return `Unknown (${Number(unknown[1])})`;
  return INITIAL_STATUS;
}
