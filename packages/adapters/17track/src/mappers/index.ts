/**
 * Mappers from validated 17TRACK payloads to core types
 */

import type {
  FetchedEvent,
  ProviderRejection,
  RegistrationOutcome,
  TrackInfo,
  TrackInfoBatch,
} from '@parcelwatch/core';
import { ALREADY_REGISTERED_CODE } from '../types/index.js';
import type {
  RegisterResponse,
  RejectedItem,
  TrackInfoAcceptedItem,
  TrackInfoResponse,
} from '../validation.js';

const UNKNOWN_ERROR_CODE = -1;
const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export function mapRejection(item: RejectedItem): ProviderRejection {
  return {
    trackingNumber: item.number,
    code: item.error?.code ?? UNKNOWN_ERROR_CODE,
    message: item.error?.message || UNKNOWN_ERROR_MESSAGE,
  };
}

/**
 * Outcome of registering a single number, or null when the response
 * reported the number neither as accepted nor as rejected
 */
export function mapRegisterResponse(res: RegisterResponse, raw: unknown): RegistrationOutcome | null {
  const accepted = res.data?.accepted ?? [];
  const rejected = res.data?.rejected ?? [];

  const first = accepted[0];
  if (first) {
    // carrier 0 means the provider did not resolve one
    return first.carrier
      ? { status: 'accepted', carrierCode: first.carrier, raw }
      : { status: 'accepted', raw };
  }

  const refusal = rejected[0];
  if (refusal) {
    const { code, message } = mapRejection(refusal);
    if (code === ALREADY_REGISTERED_CODE) return { status: 'already-registered', raw };
    return { status: 'rejected', code, message, raw };
  }

  return null;
}

/**
 * Events newest first, as the provider sends them. Missing date and
 * description become "", a missing location null.
 */
export function mapTrackEvents(item: TrackInfoAcceptedItem): FetchedEvent[] {
  const events = item.track?.z0?.z ?? [];
  return events.map((ev) => ({
    date: ev.a ?? '',
    location: ev.z ?? null,
    description: ev.c ?? '',
  }));
}

export function mapTrackInfoItem(item: TrackInfoAcceptedItem): TrackInfo {
  return {
    trackingNumber: item.number,
    statusCode: item.track?.e ?? 0,
    events: mapTrackEvents(item),
    raw: item,
  };
}

export function mapTrackInfoResponse(res: TrackInfoResponse): TrackInfoBatch {
  return {
    accepted: (res.data?.accepted ?? []).map(mapTrackInfoItem),
    rejected: (res.data?.rejected ?? []).map(mapRejection),
  };
}
