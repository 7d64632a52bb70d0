import { pathToFileURL } from 'node:url';
import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import FastifyCors from '@fastify/cors';
import swaggerPlugin from '@fastify/swagger';
import swaggerUiPlugin from '@fastify/swagger-ui';
import { pino } from 'pino';
import { ValidationError } from '@parcelwatch/core';
import type { OperationFailure, PackageTracker } from '@parcelwatch/core';
import { loadConfig } from './config.js';
import { wrapPinoLogger } from './http-client.js';
import { registerTrackerRoutes } from './routes/index.js';
import { createTracker, openStore } from './tracker.js';

export interface BuildServerOptions {
  tracker: PackageTracker;

  /** Pino instance for request logs; logging is off when omitted */
  logger?: FastifyBaseLogger;
}

/**
 * Build the HTTP surface over a PackageTracker. Does not listen.
 */
export async function buildServer(opts: BuildServerOptions): Promise<FastifyInstance> {
  const fastify = opts.logger ? Fastify({ loggerInstance: opts.logger }) : Fastify({ logger: false });

  await fastify.register(FastifyCors, { origin: true });

  // Register swagger and UI before routes so the plugin hooks onRoute events
  await fastify.register(swaggerPlugin, {
    openapi: {
      info: {
        title: 'ParcelWatch',
        description: 'Parcel tracking over the 17TRACK API',
        version: '0.1.0',
      },
    },
  });
  await fastify.register(swaggerUiPlugin, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation || error instanceof ValidationError) {
      const failure: OperationFailure = { ok: false, error: error.message, reason: 'validation' };
      return reply.status(400).send(failure);
    }

    const status = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (status >= 500) {
      request.log.error(error);
    }
    return reply.status(status).send({ ok: false, error: error.message });
  });

  await fastify.register(async (instance) => {
    await registerTrackerRoutes(instance, opts.tracker);
  });

  return fastify;
}

const start = async () => {
  const config = loadConfig();
  const logger = pino({ level: config.logLevel });

  const store = openStore(config.dbPath);
  const tracker = createTracker(config, store, wrapPinoLogger(logger));
  const fastify = await buildServer({ tracker, logger });
  fastify.addHook('onClose', async () => {
    store.close();
  });

  if (!config.tracker.apiKey) {
    logger.warn('SEVENTEEN_TRACK_API_KEY is not set; registrations are deferred and checks will fail');
  }

  await fastify.listen({ port: config.port, host: config.host });
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start().catch((err: unknown) => {
    console.error('Failed to start server', err);
    process.exit(1);
  });
}
