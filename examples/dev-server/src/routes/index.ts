/**
 * Tracker Routes - Main Export
 * Registers all route handlers to a Fastify instance
 */

import type { FastifyInstance } from 'fastify';
import type { PackageTracker } from '@parcelwatch/core';
import { registerPackageRoutes } from './packages.js';
import { registerCheckRoute } from './check.js';
import { registerQuotaRoute } from './quota.js';

export async function registerTrackerRoutes(fastify: FastifyInstance, tracker: PackageTracker) {
  fastify.get('/health', {
    schema: {
      description: 'Health check',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            ts: { type: 'string' },
          },
        },
      },
    },
  }, async () => ({ status: 'ok', ts: new Date().toISOString() }));

  await registerPackageRoutes(fastify, tracker);
  await registerCheckRoute(fastify, tracker);
  await registerQuotaRoute(fastify, tracker);
}

export * from './common.js';
