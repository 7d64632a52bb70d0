import type { FastifyInstance } from 'fastify';
import type { PackageTracker } from '@parcelwatch/core';
import { passThrough } from './common.js';

// GET /quota - local monthly usage plus the 17TRACK quota payload
export async function registerQuotaRoute(fastify: FastifyInstance, tracker: PackageTracker) {
  fastify.get('/quota', {
    schema: {
      description: 'Registration usage for this month and the quota reported by 17TRACK',
      tags: ['Tracking'],
      summary: 'Quota report',
      response: {
        200: passThrough('localUsage, and apiQuota or apiError'),
      },
    },
    async handler() {
      return tracker.getQuotaReport();
    },
  });
}
