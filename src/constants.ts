/**
 * Application constants
 *
 * Why: Contract conventions and HTTP codes are shared by the validators,
 * the parser and the transport binding. Keeping them here keeps the
 * string literals in one place.
 */

/**
 * HTTP status codes used by the route binding
 */
export const HTTP_STATUS = {
  OK: 200,
  METHOD_NOT_ALLOWED: 405,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * HTTP methods that produce routes
 */
export const ROUTE_METHODS = ['get', 'post'] as const;

/**
 * Every HTTP method an OpenAPI path item may declare
 */
export const OPENAPI_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

export const JSON_CONTENT_TYPE = 'application/json';

export const COMPONENT_SCHEMA_PREFIX = '#/components/schemas/';
export const COMPONENT_PARAMETER_PREFIX = '#/components/parameters/';

export const SUPPORTED_OPENAPI_MAJOR = '3';

/**
 * Contract-level switch for strict model generation (lives under `info`)
 */
export const STRICT_VALIDATION_EXTENSION = 'x-strict-validation';

export const DEFAULT_RESPONSE_DESCRIPTION = 'Successful response';

/**
 * Header parameters every standards-compliant contract must declare
 */
export const REQUIRED_STANDARD_HEADERS = {
  AUTHORIZATION: 'authorization',
  AUTH_PROVIDER: 'x-authorization-provider',
} as const;

/**
 * Companion files expected next to a contract, by extension
 */
export const COMPANION_EXTENSIONS = {
  HUMAN_READABLE: '.md',
  LINKED_DATA: '.jsonld',
} as const;

/**
 * Schema names of the transport's own error payload
 */
export const VALIDATION_ERROR_MODELS = {
  ENVELOPE: 'HTTPValidationError',
  ENTRY: 'ValidationError',
} as const;

export const EMPTY_BODY_MODEL = 'EmptyBody';

export const GENERATED_MODULE_PREFIX = 'oas_models_';
