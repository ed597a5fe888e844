/**
 * House-convention validator
 *
 * A standards-compliant contract describes exactly one POST endpoint with
 * JSON request/response bodies defined under `components/schemas`, the two
 * authorization headers, and no `servers` or `security` sections.
 */

import {
  COMPONENT_SCHEMA_PREFIX,
  JSON_CONTENT_TYPE,
  OPENAPI_METHODS,
  REQUIRED_STANDARD_HEADERS,
} from '../constants.js';
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
import type { ContractDocument } from '../types/contract.js';
import { asArray, asRecord, asString, isRecord } from '../validation-utils.js';
import { BaseValidator } from './core.js';

function hasContent(body: Readonly<Record<string, unknown>>): boolean {
  return Object.keys(asRecord(body.content)).length > 0;
}

/**
 * Check that a request body or response references a component schema
 * through `application/json`. Request and response bodies go through the
 * same routine, so both fail with the same error kinds.
 */
export function validateComponentSchema(
  body: Readonly<Record<string, unknown>>,
  componentSchemas: Readonly<Record<string, unknown>>
): void {
  const content = asRecord(body.content);
  const jsonContent = content[JSON_CONTENT_TYPE];
  if (!isRecord(jsonContent)) {
    throw new WrongContentTypeError(Object.keys(content));
  }

  const ref = asString(asRecord(jsonContent.schema).$ref);
  if (!ref) {
    throw new SchemaMissingError('Request or response model is missing from "schema/$ref" section');
  }
  if (!ref.startsWith(COMPONENT_SCHEMA_PREFIX)) {
    throw new SchemaMissingError(
      `Request and response models must be defined at "${COMPONENT_SCHEMA_PREFIX}" section`,
      { ref }
    );
  }

  const modelName = ref.slice(COMPONENT_SCHEMA_PREFIX.length);
  if (!componentSchemas[modelName]) {
    throw new SchemaMissingError(`Component schema is missing for ${modelName}`, { modelName });
  }
}

export function validateStandards(document: ContractDocument): void {
  if ('servers' in document) {
    throw new ServersShouldNotBeDefinedError();
  }

  const paths = asRecord(document.paths);
  const pathNames = Object.keys(paths);
  if (pathNames.length === 0) {
    throw new NoEndpointsDefinedError();
  }
  if (pathNames.length > 1) {
    throw new OnlyOneEndpointAllowedError(pathNames);
  }

  const [path] = pathNames;
  const pathItem = asRecord(paths[path]);
  const methods = Object.keys(pathItem).filter(key =>
    OPENAPI_METHODS.some(method => method === key)
  );
  if (!methods.includes('post')) {
    throw new PostMethodIsMissingError(path);
  }
  if (methods.length > 1) {
    throw new OnlyPostMethodAllowedError(path, methods);
  }
  const postRoute = asRecord(pathItem.post);

  const componentSchemas = asRecord(asRecord(document.components).schemas);
  if (Object.keys(componentSchemas).length === 0) {
    throw new SchemaMissingError('No "components/schemas" section defined');
  }

  if ('security' in postRoute) {
    throw new SecurityShouldNotBeDefinedError();
  }

  if ('requestBody' in postRoute) {
    const requestBody = asRecord(postRoute.requestBody);
    if (!hasContent(requestBody)) {
      throw new RequestBodyMissingError();
    }
    validateComponentSchema(requestBody, componentSchemas);
  }

  const okResponse = asRecord(asRecord(postRoute.responses)['200']);
  if (!hasContent(okResponse)) {
    throw new ResponseBodyMissingError();
  }
  validateComponentSchema(okResponse, componentSchemas);

  const headers = asArray(postRoute.parameters)
    .map(asRecord)
    .filter(param => param.in === 'header')
    .map(param => (asString(param.name) ?? '').toLowerCase());

  if (!headers.includes(REQUIRED_STANDARD_HEADERS.AUTHORIZATION)) {
    throw new AuthorizationHeaderMissingError();
  }
  if (!headers.includes(REQUIRED_STANDARD_HEADERS.AUTH_PROVIDER)) {
    throw new AuthProviderHeaderMissingError();
  }
}

export class StandardsValidator extends BaseValidator {
  validateSpec(document: ContractDocument): void {
    validateStandards(document);
  }
}
