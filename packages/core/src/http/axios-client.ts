import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { HttpClient, HttpClientConfig, HttpResponse } from "../interfaces/http-client.js";
import type { Logger } from '../interfaces/logger.js';
import { HttpError } from './errors.js';
import { sanitizeHeadersForLog } from '../utils/logging.js';

export interface AxiosHttpClientOptions {
  axiosInstance?: AxiosInstance;
  defaultTimeoutMs?: number;
  debug?: boolean;
  debugFullBody?: boolean;
  logger?: Logger;
}

const BODY_PREVIEW_LENGTH = 200;

function defaultLogger(): Logger {
  return {
    debug: (m, meta) => console.debug('[http][debug]', m, meta),
    info: (m, meta) => console.info('[http][info]', m, meta),
    warn: (m, meta) => console.warn('[http][warn]', m, meta),
    error: (m, meta) => console.error('[http][error]', m, meta),
  };
}

function toAxiosConfig(config?: HttpClientConfig): AxiosRequestConfig {
  const ac: AxiosRequestConfig = {};
  if (!config) return ac;
  if (config.headers) ac.headers = config.headers;
  if (typeof config.timeout === "number") ac.timeout = config.timeout;
  return ac;
}

function normalizeHeaders(headers: AxiosResponse['headers'] | undefined): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  if (!headers) return out;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string' || Array.isArray(value)) out[key] = value;
    else if (value !== undefined && value !== null) out[key] = String(value);
  }
  return out;
}

function bodyPreview(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.slice(0, BODY_PREVIEW_LENGTH);
}

/**
 * Convert axios failures to HttpError so adapters see one error shape.
 */
function toHttpError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    const timedOut = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
    return new HttpError(err.message, {
      status: err.response?.status,
      code: err.code,
      timedOut,
      response: err.response
        ? {
            status: err.response.status,
            statusText: err.response.statusText,
            data: err.response.data,
            headers: normalizeHeaders(err.response.headers),
          }
        : undefined,
    });
  }
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Create a HttpClient implementation backed by Axios.
 * - Every request is bounded by `defaultTimeoutMs` (30s unless configured).
 * - Errors are normalized to HttpError with `status`, `code` and `response.data`.
 * - With `debug`, sanitized request/response metadata is logged; `debugFullBody`
 *   adds a body preview truncated to 200 characters.
 */
export function createAxiosHttpClient(opts: AxiosHttpClientOptions = {}): HttpClient {
  const instance: AxiosInstance =
    opts.axiosInstance ??
    axios.create({ timeout: opts.defaultTimeoutMs ?? 30_000 });

  const resolvedDebug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const resolvedFull = opts.debugFullBody ?? (process.env.HTTP_DEBUG_FULL === '1');
  const log = opts.logger ?? defaultLogger();

  async function send<T>(
    method: 'GET' | 'POST',
    url: string,
    data: unknown,
    config?: HttpClientConfig
  ): Promise<HttpResponse<T>> {
    const ac = toAxiosConfig(config);

    if (resolvedDebug) {
      const meta: Record<string, unknown> = {
        method,
        url,
        headers: sanitizeHeadersForLog(config?.headers),
      };
      if (data !== undefined) {
        meta.bodyLength = JSON.stringify(data).length;
        if (resolvedFull) meta.bodyPreview = bodyPreview(data);
      }
      log.debug('request', meta);
    }

    try {
      const res = await instance.request<T>({ method, url, data, ...ac });
      const headers = normalizeHeaders(res.headers);
      if (resolvedDebug) {
        const meta: Record<string, unknown> = {
          status: res.status,
          statusText: res.statusText,
          headers: sanitizeHeadersForLog(headers),
          bodyLength: (JSON.stringify(res.data) ?? '').length,
        };
        if (resolvedFull) meta.bodyPreview = bodyPreview(res.data);
        log.debug('response', meta);
      }
      return { status: res.status, headers, body: res.data };
    } catch (err) {
      const httpErr = toHttpError(err);
      if (resolvedDebug) {
        const meta: Record<string, unknown> = { error: httpErr.message };
        if (httpErr instanceof HttpError) {
          meta.status = httpErr.status;
          meta.code = httpErr.code;
          if (resolvedFull && httpErr.response?.data !== undefined) {
            meta.bodyPreview = bodyPreview(httpErr.response.data);
          }
        }
        log.debug('error', meta);
      }
      throw httpErr;
    }
  }

  return {
    get<T = unknown>(url: string, config?: HttpClientConfig): Promise<HttpResponse<T>> {
      return send<T>('GET', url, undefined, config);
    },

    post<T = unknown>(url: string, data?: unknown, config?: HttpClientConfig): Promise<HttpResponse<T>> {
      return send<T>('POST', url, data, config);
    },
  };
}

export default createAxiosHttpClient;
