import { describe, it, expect, vi } from 'vitest';
import {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
} from '../logging-helpers.js';
import type { AdapterContext } from '../../interfaces/adapter-context.js';
import type { HttpClient } from '../../interfaces/http-client.js';
import type { Logger } from '../../interfaces/logger.js';

const http: HttpClient = {
  get: () => Promise.reject(new Error('not used')),
  post: () => Promise.reject(new Error('not used')),
};

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('logging helpers', () => {
  describe('isSilentOperation', () => {
    it('is false without an operation name', () => {
      expect(isSilentOperation({ http, loggingOptions: { silentOperations: ['getTrackInfo'] } })).toBe(false);
    });

    it('matches the configured silent operations', () => {
      const ctx: AdapterContext = {
        http,
        operationName: 'getTrackInfo',
        loggingOptions: { silentOperations: ['getTrackInfo'] },
      };
      expect(isSilentOperation(ctx)).toBe(true);
      expect(isSilentOperation({ ...ctx, operationName: 'register' })).toBe(false);
    });

    it('falls back to the default list when none is configured', () => {
      expect(isSilentOperation({ http, operationName: 'register' }, ['register'])).toBe(true);
    });
  });

  describe('getLoggingOptions', () => {
    it('merges overrides onto the defaults', () => {
      expect(getLoggingOptions({ http, loggingOptions: { maxArrayItems: 3 } })).toEqual({
        maxArrayItems: 3,
        maxDepth: 2,
        logRawResponse: 'summary',
        silentOperations: [],
      });
    });
  });

  describe('truncateForLogging', () => {
    const options = getLoggingOptions({ http });

    it('caps arrays at maxArrayItems', () => {
      const result = truncateForLogging(Array.from({ length: 12 }, (_, i) => i), options);
      expect(result).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, '... and 2 more items']);
    });

    it('summarizes values below maxDepth', () => {
      const value = { track: { z0: { z: [1, 2, 3] } } };
      expect(truncateForLogging(value, options)).toEqual({ track: { z0: '[Object: 1 keys]' } });
    });

    it('replaces arrays entirely when maxArrayItems is 0', () => {
      expect(truncateForLogging([1, 2], { ...options, maxArrayItems: 0 })).toBe('[Array: 2 items (truncated)]');
    });
  });

  describe('summarizeRawResponse', () => {
    it('describes arrays by count and item keys', () => {
      expect(summarizeRawResponse([{ number: 'A', track: {} }, { number: 'B' }])).toEqual({
        type: 'array',
        count: 2,
        itemKeys: ['number', 'track'],
        itemCount: 2,
      });
    });

    it('describes objects by keys', () => {
      expect(summarizeRawResponse({ code: 0, data: {} })).toEqual({
        type: 'object',
        keyCount: 2,
        keys: ['code', 'data'],
      });
    });

    it('handles missing responses', () => {
      expect(summarizeRawResponse(undefined)).toEqual({ message: 'No raw response' });
    });
  });

  describe('safeLog', () => {
    it('summarizes the raw field by default', () => {
      const logger = spyLogger();
      safeLog(logger, 'debug', 'response', { trackingNumber: 'A1', raw: { code: 0, data: {} } }, { http });

      expect(logger.debug).toHaveBeenCalledWith('response', {
        trackingNumber: 'A1',
        raw: { type: 'object', keyCount: 2, keys: ['code', 'data'] },
      });
    });

    it('drops the raw field when logRawResponse is false', () => {
      const logger = spyLogger();
      safeLog(logger, 'info', 'response', { count: 1, raw: { code: 0 } }, {
        http,
        loggingOptions: { logRawResponse: false },
      });

      expect(logger.info).toHaveBeenCalledWith('response', { count: 1 });
    });

    it('stays quiet for silent operations', () => {
      const logger = spyLogger();
      safeLog(logger, 'warn', 'rejected', { rejected: [] }, {
        http,
        operationName: 'getTrackInfo',
        loggingOptions: { silentOperations: ['getTrackInfo'] },
      });

      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('is a no-op without a logger', () => {
      expect(() => safeLog(undefined, 'info', 'x', {}, { http })).not.toThrow();
    });
  });
});
