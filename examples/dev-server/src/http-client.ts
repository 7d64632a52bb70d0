import { createAxiosHttpClient } from '@parcelwatch/core';
import type { HttpClient, Logger } from '@parcelwatch/core';
import type { ServerConfig } from './config.js';

/**
 * The part of a pino logger the wrapper needs.
 * Both `pino()` instances and Fastify's `app.log` satisfy it.
 */
export interface PinoLike {
  debug(obj: object): void;
  info(obj: object): void;
  warn(obj: object): void;
  error(obj: object): void;
}

/**
 * Wrapper to convert a Pino logger to our Logger interface.
 * Pino takes metadata in the first parameter as {msg: '...', ...fields},
 * while Logger takes (message, meta).
 */
export function wrapPinoLogger(pinoLogger: PinoLike): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.debug({ msg: message, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.info({ msg: message, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.warn({ msg: message, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.error({ msg: message, ...meta });
    },
  };
}

// HttpClient whose debug logs go through the given logger.
export function makeHttpClient(options: ServerConfig['http'], logger?: Logger): HttpClient {
  return createAxiosHttpClient({
    defaultTimeoutMs: options.timeoutMs,
    debug: options.debug,
    debugFullBody: options.debugFullBody,
    logger,
  });
}
