import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import nock from 'nock';
import { createAxiosHttpClient } from '../axios-client.js';
import type { Logger } from '../../interfaces/logger.js';

function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('axios client debug logging', () => {
  beforeAll(() => nock.disableNetConnect());
  afterEach(() => nock.cleanAll());
  afterAll(() => nock.enableNetConnect());

  it('logs nothing when debug is off', async () => {
    nock('https://api.test').get('/ok').reply(200, {});
    const logger = spyLogger();

    await createAxiosHttpClient({ debug: false, logger }).get('https://api.test/ok');

    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('redacts the 17token header and other credentials in the request log', async () => {
    nock('https://api.test').post('/register').reply(200, { code: 0 });
    const logger = spyLogger();

    const client = createAxiosHttpClient({ debug: true, logger });
    await client.post('https://api.test/register', [{ number: 'X' }], {
      headers: {
        '17token': 'test-secret',
        Authorization: 'Bearer test-secret',
        'X-API-Key': 'test-secret',
        'Content-Type': 'application/json',
      },
    });

    const call = logger.debug.mock.calls.find((c) => c[0] === 'request');
    expect(call?.[1]).toEqual({
      method: 'POST',
      url: 'https://api.test/register',
      headers: {
        '17token': 'REDACTED',
        Authorization: 'REDACTED',
        'X-API-Key': 'REDACTED',
        'Content-Type': 'application/json',
      },
      bodyLength: JSON.stringify([{ number: 'X' }]).length,
    });
  });

  it('redacts response headers and omits the body preview unless debugFullBody', async () => {
    nock('https://api.test')
      .get('/bar')
      .reply(200, { secret: 's' }, { 'x-api-key': 'resp-secret', other: 'ok' });
    const logger = spyLogger();

    await createAxiosHttpClient({ debug: true, debugFullBody: false, logger }).get('https://api.test/bar');

    const meta = logger.debug.mock.calls.find((c) => c[0] === 'response')?.[1];
    expect(meta.status).toBe(200);
    expect(meta.headers['x-api-key']).toBe('REDACTED');
    expect(meta.headers.other).toBe('ok');
    expect(meta.bodyPreview).toBeUndefined();
  });

  it('truncates the body preview to 200 characters with debugFullBody', async () => {
    const body = { big: 'a'.repeat(1000), ok: true };
    nock('https://api.test').get('/big').reply(200, body);
    const logger = spyLogger();

    await createAxiosHttpClient({ debug: true, debugFullBody: true, logger }).get('https://api.test/big');

    const meta = logger.debug.mock.calls.find((c) => c[0] === 'response')?.[1];
    expect(meta.bodyPreview).toBe(JSON.stringify(body).slice(0, 200));
  });

  it('logs failed requests with their status', async () => {
    nock('https://api.test').get('/down').reply(503, { code: -1 });
    const logger = spyLogger();

    await expect(
      createAxiosHttpClient({ debug: true, logger }).get('https://api.test/down')
    ).rejects.toMatchObject({ status: 503 });

    const meta = logger.debug.mock.calls.find((c) => c[0] === 'error')?.[1];
    expect(meta.status).toBe(503);
    expect(meta.bodyPreview).toBeUndefined();
  });
});
