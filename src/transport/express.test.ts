/**
 * Tests for the Express binding
 */

import { describe, it, expect } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { HttpError } from '../errors.js';
import { MetricsCollector } from '../metrics.js';
import { SpecRouter } from '../spec-router.js';
import { DEFINITIONS_DIR } from '../testing/fixtures.js';
import { createExpressRouter, toExpressPath } from './express.js';

const company = {
  name: 'Example Oy',
  companyId: '1234567-8',
  companyForm: 'LLC',
  registrationDate: '2020-05-01',
};

function createApp(configure: (router: SpecRouter) => void = () => {}, metrics?: MetricsCollector): Express {
  const router = new SpecRouter(DEFINITIONS_DIR);
  configure(router);
  const app = express();
  app.use(createExpressRouter(router.build(), { metrics }));
  return app;
}

describe('toExpressPath', () => {
  it('should convert path templates', () => {
    expect(toExpressPath('/pets/{petId}/toys/{toyId}')).toBe('/pets/:petId/toys/:toyId');
    expect(toExpressPath('/Company/BasicInfo')).toBe('/Company/BasicInfo');
  });
});

describe('createExpressRouter', () => {
  it('should answer with the validated response', async () => {
    const app = createApp(router => router.post(() => company, { path: '/Company/BasicInfo' }));

    const response = await request(app)
      .post('/Company/BasicInfo')
      .set('Authorization', 'Bearer test-token')
      .set('X-Authorization-Provider', 'test-provider')
      .send({ companyId: '1234567-8' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual(company);
  });

  it('should reject a missing header with 422', async () => {
    const app = createApp(router => router.post(() => company, { path: '/Company/BasicInfo' }));

    const response = await request(app)
      .post('/Company/BasicInfo')
      .set('Authorization', 'Bearer test-token')
      .send({ companyId: '1234567-8' });

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      detail: [{ type: 'missing', loc: ['header', 'X-Authorization-Provider'], msg: 'Field required', input: null }],
    });
  });

  it('should reject an invalid body with 422', async () => {
    const app = createApp();

    const response = await request(app).post('/Weather/Current/Metric').send({ lat: 91, lon: 24.9 });

    expect(response.status).toBe(422);
    expect(response.body.detail).toHaveLength(1);
    expect(response.body.detail[0]).toMatchObject({ loc: ['body', 'lat'], input: 91 });
  });

  it('should reject malformed JSON with 422', async () => {
    const app = createApp();

    const response = await request(app)
      .post('/Weather/Current/Metric')
      .set('Content-Type', 'application/json')
      .send('{"lat": ');

    expect(response.status).toBe(422);
    expect(response.body.detail[0]).toMatchObject({ type: 'json_invalid', loc: ['body'], msg: 'JSON decode error' });
  });

  it('should answer 405 for a method the contract does not declare', async () => {
    const app = createApp();

    const response = await request(app).get('/Company/BasicInfo');

    expect(response.status).toBe(405);
    expect(response.headers.allow).toBe('POST');
  });

  it('should route GET with query parameters', async () => {
    const app = createApp(router =>
      router.get((_body, context) => ({ days: [{ date: '2025-06-01', high: 21, low: 12, city: context.query.city }] }), {
        path: '/Weather/Forecast/Daily',
      })
    );

    const response = await request(app).get('/Weather/Forecast/Daily').query({ city: 'Helsinki' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ days: [{ date: '2025-06-01', high: 21, low: 12 }] });
  });

  it('should answer with the status of an HttpError', async () => {
    const app = createApp(router =>
      router.post(
        () => {
          throw new HttpError(418, { error: 'Out of coffee' });
        },
        { path: '/Coffee/Brew' }
      )
    );

    const response = await request(app).post('/Coffee/Brew').send({});

    expect(response.status).toBe(418);
    expect(response.body).toEqual({ detail: { error: 'Out of coffee' } });
  });

  it('should let dependencies reject a request', async () => {
    const app = createApp(router =>
      router.post(() => ({ cups: 1 }), {
        path: '/Coffee/Brew',
        dependencies: [
          context => {
            if (context.headers['x-api-key'] !== 'test-secret') {
              throw new HttpError(401, 'Invalid API key');
            }
          },
        ],
      })
    );

    const rejected = await request(app).post('/Coffee/Brew').send({});
    const accepted = await request(app).post('/Coffee/Brew').set('X-Api-Key', 'test-secret').send({});

    expect(rejected.status).toBe(401);
    expect(rejected.body).toEqual({ detail: 'Invalid API key' });
    expect(accepted.status).toBe(200);
    expect(accepted.body).toEqual({ cups: 1 });
  });

  it('should answer 500 when the response breaks the contract', async () => {
    const app = createApp(router => router.post(() => ({ cups: 0 }), { path: '/Coffee/Brew' }));

    const response = await request(app).post('/Coffee/Brew').send({});

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ detail: 'Internal Server Error' });
  });

  it('should count rejected requests', async () => {
    const metrics = new MetricsCollector({ enabled: true, prefix: 'test_' });
    const app = createApp(() => {}, metrics);

    await request(app).post('/Weather/Current/Metric').send({ lat: 'north' });
    const output = await metrics.getMetrics();

    expect(output).toContain('test_request_validation_failures_total{method="POST",path="/Weather/Current/Metric"} 1');
  });
});
