/**
 * Tests for the served OpenAPI document
 */

import { describe, it, expect } from 'vitest';
import { buildOpenAPIDocument, buildOperation, OPENAPI_VERSION } from './openapi-document.js';
import { SpecRouter } from './spec-router.js';
import { DEFINITIONS_DIR } from './testing/fixtures.js';

const info = { title: 'Contract routes', version: '1.0.0' };

describe('buildOperation', () => {
  it('should describe a route after overrides', () => {
    const table = new SpecRouter(DEFINITIONS_DIR)
      .post(() => ({}), { path: '/Coffee/Brew', name: 'brew', tags: ['Coffee'] })
      .build();
    const route = table.find('post', '/Coffee/Brew');
    if (!route) throw new Error('route missing');

    expect(buildOperation(route)).toEqual({
      summary: 'Brew a cup',
      operationId: 'brew',
      tags: ['Coffee'],
      requestBody: {
        required: true,
        content: { 'application/json': { schema: { $ref: '#/components/schemas/BrewRequest' } } },
      },
      responses: {
        '200': {
          description: 'Coffee is ready',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/BrewResponse' } } },
        },
        '418': {
          description: "I'm a teapot",
          content: { 'application/json': { schema: { $ref: '#/components/schemas/TeapotResponse' } } },
        },
        '422': {
          description: 'Validation Error',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/HTTPValidationError' } } },
        },
      },
    });
  });

  it('should list header parameters and omit an empty body', () => {
    const table = new SpecRouter(DEFINITIONS_DIR).build();
    const company = table.find('post', '/Company/BasicInfo');
    const forecast = table.find('get', '/Weather/Forecast/Daily');
    if (!company || !forecast) throw new Error('route missing');

    expect(buildOperation(company).parameters).toEqual([
      {
        name: 'X-Consent-Token',
        in: 'header',
        required: false,
        description: 'Optional consent token',
        schema: { type: 'string' },
      },
      {
        name: 'Authorization',
        in: 'header',
        required: true,
        description: 'User bearer token',
        schema: { type: 'string' },
      },
      {
        name: 'X-Authorization-Provider',
        in: 'header',
        required: true,
        description: 'Identity provider of the bearer token',
        schema: { type: 'string' },
      },
    ]);
    expect(buildOperation(forecast).requestBody).toBeUndefined();
    expect(buildOperation(forecast).deprecated).toBe(true);
  });
});

describe('buildOpenAPIDocument', () => {
  it('should cover every route and model', () => {
    const document = buildOpenAPIDocument(new SpecRouter(DEFINITIONS_DIR).build(), info);

    expect(document.openapi).toBe(OPENAPI_VERSION);
    expect(document.info).toEqual(info);
    expect(Object.keys(document.paths)).toEqual([
      '/Weather/Forecast/Daily',
      '/Coffee/Brew',
      '/Company/BasicInfo',
      '/TestValidation_v0.1',
      '/TestValidation_v0.2',
      '/Weather/Current/Metric',
    ]);
    expect(Object.keys(document.paths['/Weather/Forecast/Daily'] ?? {})).toEqual(['get']);
    expect(document.components.schemas.BrewRequest).toMatchObject({ type: 'object' });
    expect(document.components.schemas.ForecastDay).toMatchObject({ required: ['date', 'high', 'low'] });
    expect(document.components.schemas.HTTPValidationError).toMatchObject({ title: 'HTTPValidationError' });
  });
});
