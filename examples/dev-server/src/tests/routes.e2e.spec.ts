import type { FastifyInstance } from 'fastify';
import { buildServer } from '../server.js';
import { NOW, UPS_NUMBER, makeTracker, upsInTransit } from './fakes.js';

describe('tracker routes', () => {
  let app: FastifyInstance;
  let ctx: ReturnType<typeof makeTracker>;

  beforeEach(async () => {
    ctx = makeTracker();
    app = await buildServer({ tracker: ctx.tracker });
  });

  afterEach(async () => {
    await app.close();
  });

  async function addUps() {
    return app.inject({
      method: 'POST',
      url: '/packages',
      payload: { trackingNumber: ` ${UPS_NUMBER.toLowerCase()} `, description: 'USB-C cables' },
    });
  }

  it('GET /health reports ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  it('POST /packages adds and registers a package', async () => {
    const res = await addUps();

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.package.trackingNumber).toBe(UPS_NUMBER);
    expect(body.package.status).toBe('pending');
    expect(body.carrier).toBe('UPS');
    expect(body.registered).toBe(true);
    expect(body.trackingUrl).toBe(`https://www.ups.com/track?tracknum=${UPS_NUMBER}`);
    expect(body.message).toBe('Package added successfully');
    expect(body.warnings).toEqual([]);
    expect(ctx.provider.registerCalls).toEqual([{ trackingNumber: UPS_NUMBER, carrierCode: 100002 }]);
  });

  it('POST /packages returns 409 for a package already tracked', async () => {
    await addUps();
    const res = await addUps();

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      ok: false,
      error: `Package ${UPS_NUMBER} is already being tracked`,
      reason: 'already-tracked',
    });
  });

  it('POST /packages returns 400 when trackingNumber is missing', async () => {
    const res = await app.inject({ method: 'POST', url: '/packages', payload: { description: 'x' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().reason).toBe('validation');
    expect(ctx.provider.registerCalls).toHaveLength(0);
  });

  it('POST /packages returns 400 for a blank tracking number', async () => {
    const res = await app.inject({ method: 'POST', url: '/packages', payload: { trackingNumber: '   ' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Tracking number cannot be empty');
  });

  it('POST /packages returns 422 when 17TRACK rejects the number', async () => {
    ctx.provider.registerOutcome = { status: 'rejected', code: -18019901, message: 'Invalid number', raw: {} };

    const res = await addUps();

    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe('17TRACK rejected: Invalid number (code -18019901)');

    const list = await app.inject({ method: 'GET', url: '/packages?all=true' });
    expect(list.json().packages).toEqual([]);
  });

  it('POST /packages returns 429 once the monthly limit is used up', async () => {
    await app.close();
    ctx = makeTracker({ monthlyRegistrationLimit: 1, quotaWarningThreshold: 1 });
    app = await buildServer({ tracker: ctx.tracker });

    await addUps();
    const res = await app.inject({ method: 'POST', url: '/packages', payload: { trackingNumber: 'RR123456789CN' } });

    expect(res.statusCode).toBe(429);
    expect(res.json().reason).toBe('quota-exceeded');
    expect(ctx.provider.registerCalls).toHaveLength(1);
  });

  it('POST /packages saves the package unregistered when 17TRACK is unreachable', async () => {
    ctx.provider.registerError = new Error('connect ECONNREFUSED');

    const res = await addUps();

    expect(res.statusCode).toBe(201);
    expect(res.json().registered).toBe(false);
    expect(res.json().warnings).toEqual([
      '17TRACK registration failed: connect ECONNREFUSED. Package saved locally; registration will be retried.',
    ]);

    ctx.provider.registerError = null;
    const retry = await app.inject({ method: 'POST', url: '/packages/register-pending' });

    expect(retry.statusCode).toBe(200);
    expect(retry.json()).toEqual({ outcomes: [{ trackingNumber: UPS_NUMBER, registered: true }] });
  });

  it('GET /packages lists active packages unless all=true', async () => {
    await addUps();
    await app.inject({ method: 'DELETE', url: `/packages/${UPS_NUMBER}` });

    const active = await app.inject({ method: 'GET', url: '/packages' });
    const all = await app.inject({ method: 'GET', url: '/packages?all=true' });

    expect(active.json().packages).toEqual([]);
    expect(all.json().packages).toHaveLength(1);
    expect(all.json().packages[0].active).toBe(false);
  });

  it('DELETE /packages/:trackingNumber stops tracking, then reports 409 and 404', async () => {
    await addUps();

    const first = await app.inject({ method: 'DELETE', url: `/packages/${UPS_NUMBER.toLowerCase()}` });
    const second = await app.inject({ method: 'DELETE', url: `/packages/${UPS_NUMBER}` });
    const unknown = await app.inject({ method: 'DELETE', url: '/packages/nope' });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ ok: true, message: `Stopped tracking ${UPS_NUMBER}` });
    expect(second.statusCode).toBe(409);
    expect(second.json().error).toBe(`Package ${UPS_NUMBER} is already inactive`);
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ ok: false, error: 'Package NOPE not found', reason: 'not-found', notFound: true });
  });

  it('POST /check returns notifications and GET details shows the stored history', async () => {
    await addUps();
    ctx.provider.trackInfo = { accepted: [upsInTransit()], rejected: [] };

    const check = await app.inject({ method: 'POST', url: '/check', payload: {} });

    expect(check.statusCode).toBe(200);
    const { updates } = check.json();
    expect(updates).toHaveLength(1);
    expect(updates[0].oldStatus).toBe('pending');
    expect(updates[0].newStatus).toBe('In Transit');
    expect(updates[0].newEventsCount).toBe(2);
    expect(updates[0].text).toBe(
      [
        '📦 Package Update',
        `📮 Tracking: ${UPS_NUMBER}`,
        '📦 Carrier: UPS',
        '📊 Status: pending → In Transit',
        '📝 Description: USB-C cables',
        '📍 Latest: Departed facility — Louisville, KY (2024-03-02 09:00)',
        `🔗 Track online: https://www.ups.com/track?tracknum=${UPS_NUMBER}`,
      ].join('\n')
    );

    const details = await app.inject({ method: 'GET', url: `/packages/${UPS_NUMBER}` });
    const body = details.json();
    expect(body.package.status).toBe('In Transit');
    expect(body.package.lastChecked).toBe(NOW.toISOString());
    expect(body.events.map((e: { description: string }) => e.description)).toEqual([
      'Departed facility',
      'Label created',
    ]);

    // same provider data again: nothing new to report
    const again = await app.inject({ method: 'POST', url: '/check' });
    expect(again.json()).toEqual({ updates: [] });
  });

  it('POST /check returns no updates when the provider call fails', async () => {
    await addUps();
    ctx.provider.trackInfoError = new Error('socket hang up');

    const res = await app.inject({ method: 'POST', url: '/check', payload: {} });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ updates: [] });
  });

  it('POST /check rejects a non-numeric packageId', async () => {
    const res = await app.inject({ method: 'POST', url: '/check', payload: { packageId: 'abc' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().reason).toBe('validation');
  });

  it('GET /packages/:trackingNumber returns 404 for an unknown number', async () => {
    const res = await app.inject({ method: 'GET', url: '/packages/unknown1' });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('Package UNKNOWN1 not found');
  });

  it('GET /quota combines local usage with the provider payload', async () => {
    await addUps();

    const res = await app.inject({ method: 'GET', url: '/quota' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      localUsage: { month: '2024-03', registrationsUsed: 1, registrationsRemaining: 99, limit: 100 },
      apiQuota: { code: 0, data: { quota_remain: 93 } },
    });
  });

  it('serves the OpenAPI document under /docs', async () => {
    const res = await app.inject({ method: 'GET', url: '/docs/json' });

    expect(res.statusCode).toBe(200);
    expect(Object.keys(res.json().paths)).toEqual(
      expect.arrayContaining(['/packages', '/packages/{trackingNumber}', '/check', '/quota'])
    );
  });
});
