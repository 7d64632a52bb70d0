import type { PackageStatus } from './package.js';

/**
 * TrackingEvent domain type
 * Append-only history entry owned by exactly one package.
 *
 * Providers do not supply event ids, so (eventDate, description) is the
 * deduplication key within a package. Stored events are never updated.
 */
export interface TrackingEvent {
  id: number;
  packageId: number;

  /** Provider-supplied date string, stored verbatim */
  eventDate: string;

  location: string | null;

  description: string;

  /** Provider numeric status at the time the event was stored, as a string (e.g. "10") */
  statusCode: string;

  createdAt: string;
}

/**
 * Event row to be inserted by a check cycle
 */
export type NewTrackingEvent = Omit<TrackingEvent, 'id' | 'packageId' | 'createdAt'>;

/**
 * Deduplication key of a stored event
 */
export interface EventKey {
  eventDate: string;
  description: string;
}

/**
 * A single event as reported by the provider
 */
export interface FetchedEvent {
  date: string;
  location: string | null;
  description: string;
}

/**
 * Tracking information for one number, decoded from a batch response
 */
export interface TrackInfo {
  trackingNumber: string;

  /** Provider numeric status (17TRACK `track.e`); 0 when the provider omitted it */
  statusCode: number;

  /** Provider event list, newest first */
  events: FetchedEvent[];

  /** The raw provider item, kept for Package.rawResponse */
  raw: unknown;
}

/**
 * A tracking number the provider refused to process
 */
export interface ProviderRejection {
  trackingNumber: string;
  code: number;
  message: string;
}

/**
 * Decoded result of a batch tracking-info call
 */
export interface TrackInfoBatch {
  accepted: TrackInfo[];
  rejected: ProviderRejection[];
}

/**
 * Notification payload handed to the external messaging relay
 */
export interface NotificationPayload {
  trackingNumber: string;
  description: string | null;
  carrier: string | null;
  oldStatus: PackageStatus;
  newStatus: PackageStatus;
  latestEvent: FetchedEvent | null;
  newEventsCount: number;
  trackingUrl: string;
}

/**
 * A triggered update from a check cycle: the payload plus its rendered text
 */
export interface TrackingUpdate extends NotificationPayload {
  text: string;
}
