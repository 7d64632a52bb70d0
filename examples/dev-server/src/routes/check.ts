import type { FastifyInstance } from 'fastify';
import type { PackageTracker } from '@parcelwatch/core';
import { CheckBodySchema, passThrough, toValidationError } from './common.js';

/**
 * POST /check - run one check cycle over all active packages, or one package
 *
 * The body is optional, so it is validated here rather than by a route schema.
 */
export async function registerCheckRoute(fastify: FastifyInstance, tracker: PackageTracker) {
  fastify.post('/check', {
    schema: {
      description: 'Run a check cycle and return the triggered notifications. Body: { packageId?: number }',
      tags: ['Tracking'],
      summary: 'Check for updates',
      response: {
        200: passThrough('Notifications triggered by this cycle'),
      },
    },
    async handler(request) {
      const body = CheckBodySchema.safeParse(request.body);
      if (!body.success) {
        throw toValidationError(body.error);
      }

      const updates = await tracker.checkUpdates(body.data?.packageId);
      return { updates };
    },
  });
}
