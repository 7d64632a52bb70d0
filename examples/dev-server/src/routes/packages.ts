import type { FastifyInstance } from 'fastify';
import type { PackageTracker } from '@parcelwatch/core';
import {
  AddPackageBodySchema,
  FAILURE_SCHEMA,
  TRACKING_NUMBER_PARAMS_SCHEMA,
  passThrough,
  sendFailure,
  toValidationError,
} from './common.js';

interface TrackingNumberParams {
  trackingNumber: string;
}

/**
 * Register package routes
 *
 * - GET    /packages                   list (active only unless ?all=true)
 * - POST   /packages                   add and register with 17TRACK
 * - GET    /packages/:trackingNumber   details with event history
 * - DELETE /packages/:trackingNumber   stop tracking
 * - POST   /packages/register-pending  retry deferred registrations
 */
export async function registerPackageRoutes(fastify: FastifyInstance, tracker: PackageTracker) {
  fastify.get<{ Querystring: { all?: boolean } }>('/packages', {
    schema: {
      description: 'List tracked packages',
      tags: ['Packages'],
      summary: 'List packages',
      querystring: {
        type: 'object',
        properties: {
          all: { type: 'boolean', default: false, description: 'Include delivered and removed packages' },
        },
      },
      response: {
        200: passThrough('Packages, newest first'),
      },
    },
    async handler(request) {
      const packages = await tracker.listPackages({ activeOnly: !request.query.all });
      return { packages };
    },
  });

  fastify.post('/packages', {
    schema: {
      description: 'Add a package and register its tracking number with 17TRACK',
      tags: ['Packages'],
      summary: 'Add package',
      body: {
        type: 'object',
        required: ['trackingNumber'],
        properties: {
          trackingNumber: { type: 'string', examples: ['1Z999AA10123456784'] },
          description: { type: ['string', 'null'], examples: ['USB-C cables'] },
          carrier: { type: ['string', 'null'], description: 'Carrier name override' },
        },
      },
      response: {
        201: passThrough('Package added or reactivated'),
        400: FAILURE_SCHEMA,
        409: FAILURE_SCHEMA,
        422: FAILURE_SCHEMA,
        429: FAILURE_SCHEMA,
      },
    },
    async handler(request, reply) {
      const body = AddPackageBodySchema.safeParse(request.body);
      if (!body.success) {
        throw toValidationError(body.error);
      }

      const result = await tracker.addPackage(body.data);
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return reply.status(201).send(result);
    },
  });

  fastify.post('/packages/register-pending', {
    schema: {
      description: 'Retry 17TRACK registration for packages saved while the API was unavailable',
      tags: ['Packages'],
      summary: 'Register pending packages',
      response: {
        200: passThrough('Per-number registration outcomes'),
      },
    },
    async handler() {
      const outcomes = await tracker.registerPending();
      return { outcomes };
    },
  });

  fastify.get<{ Params: TrackingNumberParams }>('/packages/:trackingNumber', {
    schema: {
      description: 'Package details with full event history',
      tags: ['Packages'],
      summary: 'Package details',
      params: TRACKING_NUMBER_PARAMS_SCHEMA,
      response: {
        200: passThrough('Package, events (newest first) and tracking URL'),
        400: FAILURE_SCHEMA,
        404: FAILURE_SCHEMA,
      },
    },
    async handler(request, reply) {
      const result = await tracker.getPackageDetails(request.params.trackingNumber);
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return result;
    },
  });

  fastify.delete<{ Params: TrackingNumberParams }>('/packages/:trackingNumber', {
    schema: {
      description: 'Stop tracking a package; its history is kept',
      tags: ['Packages'],
      summary: 'Remove package',
      params: TRACKING_NUMBER_PARAMS_SCHEMA,
      response: {
        200: passThrough('Package deactivated'),
        400: FAILURE_SCHEMA,
        404: FAILURE_SCHEMA,
        409: FAILURE_SCHEMA,
      },
    },
    async handler(request, reply) {
      const result = await tracker.removePackage(request.params.trackingNumber);
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return result;
    },
  });
}
