/**
 * Tests for the house-convention validator
 */

import { describe, it, expect } from 'vitest';
import {
  AuthorizationHeaderMissingError,
  AuthProviderHeaderMissingError,
  NoEndpointsDefinedError,
  OnlyOneEndpointAllowedError,
  OnlyPostMethodAllowedError,
  PostMethodIsMissingError,
  RequestBodyMissingError,
  ResponseBodyMissingError,
  SchemaMissingError,
  SecurityShouldNotBeDefinedError,
  ServersShouldNotBeDefinedError,
  WrongContentTypeError,
} from '../errors.js';
import { STANDARDS_DIR } from '../testing/fixtures.js';
import type { ContractDocument } from '../types/contract.js';
import { StandardsValidator, validateComponentSchema, validateStandards } from './standards.js';
import path from 'path';

const PATH = '/Draft/Contract';

const HEADERS = [
  { name: 'Authorization', in: 'header', required: true },
  { name: 'X-Authorization-Provider', in: 'header', required: true },
];

function jsonBody(model: string): Record<string, unknown> {
  return { content: { 'application/json': { schema: { $ref: `#/components/schemas/${model}` } } } };
}

function post(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    parameters: HEADERS,
    requestBody: jsonBody('DraftRequest'),
    responses: { '200': { description: 'OK', ...jsonBody('DraftResponse') } },
    ...overrides,
  };
}

function contract(
  pathItem: Record<string, unknown> = { post: post() },
  overrides: Record<string, unknown> = {}
): ContractDocument {
  return {
    openapi: '3.0.2',
    info: { title: 'Draft', version: '1.0.0' },
    paths: { [PATH]: pathItem },
    components: {
      schemas: {
        DraftRequest: { type: 'object', properties: {} },
        DraftResponse: { type: 'object', properties: {} },
      },
    },
    ...overrides,
  };
}

describe('validateStandards', () => {
  it('should accept a compliant contract', () => {
    expect(() => validateStandards(contract())).not.toThrow();
  });

  it('should reject a servers section', () => {
    expect(() => validateStandards(contract(undefined, { servers: [] }))).toThrow(ServersShouldNotBeDefinedError);
  });

  it('should require exactly one path', () => {
    expect(() => validateStandards(contract(undefined, { paths: {} }))).toThrow(NoEndpointsDefinedError);
    expect(() =>
      validateStandards(contract(undefined, { paths: { '/a': { post: post() }, '/b': { post: post() } } }))
    ).toThrow(OnlyOneEndpointAllowedError);
  });

  it('should require POST as the only method', () => {
    expect(() => validateStandards(contract({ get: post() }))).toThrow(PostMethodIsMissingError);
    expect(() => validateStandards(contract({ get: post(), post: post() }))).toThrow(OnlyPostMethodAllowedError);
  });

  it('should ignore path-item keys that are not methods', () => {
    expect(() =>
      validateStandards(contract({ summary: 'Draft', parameters: [], post: post() }))
    ).not.toThrow();
  });

  it('should require component schemas', () => {
    expect(() => validateStandards(contract(undefined, { components: {} }))).toThrow(
      'No "components/schemas" section defined'
    );
  });

  it('should reject security on the operation', () => {
    expect(() => validateStandards(contract({ post: post({ security: [] }) }))).toThrow(
      SecurityShouldNotBeDefinedError
    );
  });

  it('should tolerate a missing request body', () => {
    const operation = post();
    delete operation.requestBody;

    expect(() => validateStandards(contract({ post: operation }))).not.toThrow();
  });

  it('should reject a request body without content', () => {
    expect(() => validateStandards(contract({ post: post({ requestBody: { required: true } }) }))).toThrow(
      RequestBodyMissingError
    );
  });

  it('should require a 200 response with content', () => {
    expect(() => validateStandards(contract({ post: post({ responses: {} }) }))).toThrow(ResponseBodyMissingError);
    expect(() =>
      validateStandards(contract({ post: post({ responses: { '200': { description: 'OK' } } }) }))
    ).toThrow(ResponseBodyMissingError);
  });

  it('should check request and response bodies with the same rules', () => {
    const xml = { content: { 'application/xml': { schema: { $ref: '#/components/schemas/DraftRequest' } } } };

    expect(() => validateStandards(contract({ post: post({ requestBody: xml }) }))).toThrow(WrongContentTypeError);
    expect(() => validateStandards(contract({ post: post({ responses: { '200': xml } }) }))).toThrow(
      WrongContentTypeError
    );
  });

  it('should require both authorization headers, ignoring case', () => {
    const lowerCase = HEADERS.map(header => ({ ...header, name: header.name.toLowerCase() }));

    expect(() => validateStandards(contract({ post: post({ parameters: lowerCase }) }))).not.toThrow();
    expect(() => validateStandards(contract({ post: post({ parameters: [HEADERS[1]] }) }))).toThrow(
      AuthorizationHeaderMissingError
    );
    expect(() => validateStandards(contract({ post: post({ parameters: [HEADERS[0]] }) }))).toThrow(
      AuthProviderHeaderMissingError
    );
  });

  it('should not count query parameters as headers', () => {
    const parameters = [{ name: 'Authorization', in: 'query' }, HEADERS[1]];

    expect(() => validateStandards(contract({ post: post({ parameters }) }))).toThrow(
      AuthorizationHeaderMissingError
    );
  });
});

describe('validateComponentSchema', () => {
  const schemas = { Pet: { type: 'object' } };

  it('should accept a reference to an existing component', () => {
    expect(() => validateComponentSchema(jsonBody('Pet'), schemas)).not.toThrow();
  });

  it('should require a $ref', () => {
    const inline = { content: { 'application/json': { schema: { type: 'object' } } } };

    expect(() => validateComponentSchema(inline, schemas)).toThrow(
      'Request or response model is missing from "schema/$ref" section'
    );
  });

  it('should require the reference to point at components/schemas', () => {
    const external = { content: { 'application/json': { schema: { $ref: 'pet.json#/Pet' } } } };

    expect(() => validateComponentSchema(external, schemas)).toThrow(SchemaMissingError);
    expect(() => validateComponentSchema(external, schemas)).toThrow(
      'Request and response models must be defined at "#/components/schemas/" section'
    );
  });

  it('should require the referenced component to exist', () => {
    expect(() => validateComponentSchema(jsonBody('Owner'), schemas)).toThrow('Component schema is missing for Owner');
  });

  it('should list the declared content types', () => {
    try {
      validateComponentSchema({ content: { 'text/plain': {} } }, schemas);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(WrongContentTypeError);
      expect(error).toMatchObject({ details: { contentTypes: ['text/plain'] } });
    }
  });
});

describe('StandardsValidator', () => {
  it('should validate contract files', () => {
    expect(() => new StandardsValidator(path.join(STANDARDS_DIR, 'PaymentInitiation.json')).validate()).not.toThrow();
  });
});
