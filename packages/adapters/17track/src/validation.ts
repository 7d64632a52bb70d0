import { z } from 'zod';
import { ProviderError } from '@parcelwatch/core';

/**
 * Zod schemas for 17TRACK responses
 *
 * Objects are loose: unknown keys are kept, so a parsed item can be stored as
 * the raw provider payload.
 */

const ItemErrorSchema = z.looseObject({
  code: z.number(),
  message: z.string().nullish(),
});

export const RejectedItemSchema = z.looseObject({
  number: z.string(),
  error: ItemErrorSchema.nullish(),
});

export const RegisterAcceptedItemSchema = z.looseObject({
  number: z.string(),
  carrier: z.number().nullish(),
});

export const RegisterResponseSchema = z.looseObject({
  code: z.number(),
  data: z
    .looseObject({
      accepted: z.array(RegisterAcceptedItemSchema).nullish(),
      rejected: z.array(RejectedItemSchema).nullish(),
    })
    .nullish(),
});

/**
 * One tracking event: `a` date, `z` location, `c` description
 */
export const TrackEventSchema = z.looseObject({
  a: z.string().nullish(),
  z: z.string().nullish(),
  c: z.string().nullish(),
});

export const TrackInfoAcceptedItemSchema = z.looseObject({
  number: z.string(),
  track: z
    .looseObject({
      /** Package status code */
      e: z.number().nullish(),
      z0: z
        .looseObject({
          z: z.array(TrackEventSchema).nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

export const TrackInfoResponseSchema = z.looseObject({
  code: z.number(),
  data: z
    .looseObject({
      accepted: z.array(TrackInfoAcceptedItemSchema).nullish(),
      rejected: z.array(RejectedItemSchema).nullish(),
    })
    .nullish(),
});

/**
 * Error body some 17TRACK failures carry alongside a non-2xx status
 */
export const ErrorBodySchema = z.looseObject({
  code: z.number(),
});

export type RegisterResponse = z.infer<typeof RegisterResponseSchema>;
export type TrackInfoResponse = z.infer<typeof TrackInfoResponseSchema>;
export type TrackInfoAcceptedItem = z.infer<typeof TrackInfoAcceptedItemSchema>;
export type RejectedItem = z.infer<typeof RejectedItemSchema>;

function malformed(endpoint: string, error: z.ZodError, raw: unknown): ProviderError {
  const details = error.issues
    .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return new ProviderError(
    `17TRACK returned an unexpected ${endpoint} response: ${details}`,
    'Malformed',
    { raw }
  );
}

/**
 * Validate a /register response body
 * @throws ProviderError (Malformed) when the body does not match
 */
export function parseRegisterResponse(body: unknown): RegisterResponse {
  const result = RegisterResponseSchema.safeParse(body);
  if (!result.success) throw malformed('/register', result.error, body);
  return result.data;
}

/**
 * Validate a /gettrackinfo response body
 * @throws ProviderError (Malformed) when the body does not match
 */
export function parseTrackInfoResponse(body: unknown): TrackInfoResponse {
  const result = TrackInfoResponseSchema.safeParse(body);
  if (!result.success) throw malformed('/gettrackinfo', result.error, body);
  return result.data;
}
