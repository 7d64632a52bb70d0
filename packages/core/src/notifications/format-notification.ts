/**
 * Notification text rendering
 *
 * Plain text with emoji markers, ready for a messaging relay
 * (Telegram, Signal, Discord, ...) to send as-is.
 */

import type { NotificationPayload, PackageStatus } from '../types/index.js';
import { statusEmoji } from '../status/status-map.js';

export function formatStatusChange(oldStatus: PackageStatus, newStatus: PackageStatus): string {
  return oldStatus !== newStatus ? `${oldStatus} → ${newStatus}` : newStatus;
}

/**
 * Render an update as multi-line text. Deterministic for a given payload.
 */
export function formatNotification(update: NotificationPayload): string {
  const emoji = update.newStatus === "Delivered" ? "✅" : "📦";

  const lines = [
    `${emoji} Package Update`,
    `📮 Tracking: ${update.trackingNumber}`,
    `📦 Carrier: ${update.carrier || "Auto-detect"}`,
    `📊 Status: ${formatStatusChange(update.oldStatus, update.newStatus)}`,
  ];

  if (update.description) {
    lines.push(`📝 Description: ${update.description}`);
  }

  const latest = update.latestEvent;
  if (latest) {
    let line = `📍 Latest: ${latest.description}`;
    if (latest.location) line += ` — ${latest.location}`;
    if (latest.date) line += ` (${latest.date})`;
    lines.push(line);
  }

  lines.push(`🔗 Track online: ${update.trackingUrl}`);

  return lines.join("\n");
}

/**
 * One-line summary, e.g. "🚚 1Z999AA10123456784: pending → In Transit"
 */
export function formatStatusLine(update: NotificationPayload): string {
  return `${statusEmoji(update.newStatus)} ${update.trackingNumber}: ${formatStatusChange(update.oldStatus, update.newStatus)}`;
}
