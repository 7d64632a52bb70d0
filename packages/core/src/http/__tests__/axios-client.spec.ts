import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { createAxiosHttpClient } from '../axios-client.js';
import { HttpError } from '../errors.js';

describe('createAxiosHttpClient', () => {
  beforeAll(() => nock.disableNetConnect());
  afterEach(() => nock.cleanAll());
  afterAll(() => nock.enableNetConnect());

  it('performs a GET and normalizes the response', async () => {
    nock('https://api.test').get('/quota').reply(200, { code: 0, data: { remaining: 42 } });

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.get('https://api.test/quota');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ code: 0, data: { remaining: 42 } });
    expect(res.headers['content-type']).toContain('application/json');
  });

  it('sends JSON bodies and headers on POST', async () => {
    nock('https://api.test', { reqheaders: { '17token': 'test-secret' } })
      .post('/register', [{ number: 'RR123456789CN', carrier: 0 }])
      .reply(200, { code: 0 });

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.post(
      'https://api.test/register',
      [{ number: 'RR123456789CN', carrier: 0 }],
      { headers: { '17token': 'test-secret' } }
    );

    expect(res.body).toEqual({ code: 0 });
  });

  it('normalizes a 500 response to HttpError', async () => {
    nock('https://api.test').post('/foo').reply(500, { message: 'boom' });

    const client = createAxiosHttpClient({ defaultTimeoutMs: 1000, debug: false });
    const err = await client.post('https://api.test/foo', { a: 1 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({
      status: 500,
      timedOut: false,
      response: { status: 500, data: { message: 'boom' } },
    });
  });

  it('flags timeouts', async () => {
    nock('https://api.test').get('/slow').delay(500).reply(200, {});

    const client = createAxiosHttpClient({ defaultTimeoutMs: 50, debug: false });
    const err = await client.get('https://api.test/slow').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: undefined, timedOut: true });
  });

  it('reports connection failures without a status', async () => {
    const client = createAxiosHttpClient({ debug: false });
    const err = await client.get('https://unreachable.test/').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: undefined, timedOut: false, response: undefined });
  });
});
