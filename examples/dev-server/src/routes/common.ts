/**
 * Tracker routes - shared schemas and failure mapping
 */

import { z } from 'zod';
import type { FastifyReply } from 'fastify';
import { ValidationError } from '@parcelwatch/core';
import type { OperationFailure } from '@parcelwatch/core';

/**
 * Failure body returned by every route (OperationFailure as-is)
 */
export const FAILURE_SCHEMA = {
  description: 'Operation failed',
  type: 'object',
  properties: {
    ok: { type: 'boolean', examples: [false] },
    error: { type: 'string', examples: ['Package 1Z999AA10123456784 is already being tracked'] },
    reason: { type: 'string', examples: ['already-tracked'] },
    notFound: { type: 'boolean' },
  },
};

/**
 * Loose object schema: documents the route without filtering the payload
 */
export function passThrough(description: string) {
  return { description, type: 'object', additionalProperties: true };
}

export const TRACKING_NUMBER_PARAMS_SCHEMA = {
  type: 'object',
  required: ['trackingNumber'],
  properties: {
    trackingNumber: { type: 'string', description: 'Tracking number (case-insensitive)' },
  },
};

export const AddPackageBodySchema = z.object({
  trackingNumber: z.string(),
  description: z.string().nullish(),
  carrier: z.string().nullish(),
});

export const CheckBodySchema = z
  .object({
    packageId: z.number().int().positive().optional(),
  })
  .nullish();

const FAILURE_STATUS: Record<NonNullable<OperationFailure['reason']>, number> = {
  validation: 400,
  'not-found': 404,
  'already-tracked': 409,
  'already-inactive': 409,
  rejected: 422,
  'quota-exceeded': 429,
};

export function failureStatus(failure: OperationFailure): number {
  if (failure.reason) return FAILURE_STATUS[failure.reason];
  return failure.notFound ? 404 : 400;
}

export function sendFailure(reply: FastifyReply, failure: OperationFailure) {
  return reply.status(failureStatus(failure)).send(failure);
}

/**
 * Turn a zod failure on request input into a ValidationError (answered with 400)
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const message = error.issues
    .map((issue) => (issue.path.length ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(message, { issues: error.issues });
}
