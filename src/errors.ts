/**
 * Structured error types
 *
 * Every failure carries a machine-readable code and structured details.
 * Document errors (validator chain, parser) extend OpenApiValidationError,
 * house-convention errors extend StandardsError.
 */

import type { ValidationErrorEntry } from './types/validation.js';

export class ContractError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ContractError';
  }
}

// ---------------------------------------------------------------------------
// Contract document errors

export class OpenApiValidationError extends ContractError {
  constructor(message: string, code: string = 'OPENAPI_VALIDATION_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'OpenApiValidationError';
  }
}

export class InvalidJSONError extends OpenApiValidationError {
  constructor(contractPath: string, reason?: string) {
    super(`Incorrect JSON: ${contractPath}`, 'INVALID_JSON', { contractPath, reason });
    this.name = 'InvalidJSONError';
  }
}

export class UnsupportedVersionError extends OpenApiValidationError {
  constructor(version: unknown) {
    super(
      `Unsupported OpenAPI version: ${String(version)}`,
      'UNSUPPORTED_VERSION',
      { version }
    );
    this.name = 'UnsupportedVersionError';
  }
}

export class MissingParameterError extends OpenApiValidationError {
  constructor(parameter: unknown) {
    super(`Name is missing: ${JSON.stringify(parameter)}`, 'MISSING_PARAMETER', { parameter });
    this.name = 'MissingParameterError';
  }
}

// ---------------------------------------------------------------------------
// House-convention errors

export class StandardsError extends OpenApiValidationError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'StandardsError';
  }
}

export class NoEndpointsDefinedError extends StandardsError {
  constructor() {
    super('No endpoints defined in "paths"', 'NO_ENDPOINTS_DEFINED');
    this.name = 'NoEndpointsDefinedError';
  }
}

export class OnlyOneEndpointAllowedError extends StandardsError {
  constructor(paths: string[]) {
    super(`Only one endpoint is allowed, found ${paths.length}`, 'ONLY_ONE_ENDPOINT_ALLOWED', { paths });
    this.name = 'OnlyOneEndpointAllowedError';
  }
}

export class PostMethodIsMissingError extends StandardsError {
  constructor(path: string) {
    super(`POST method is missing for ${path}`, 'POST_METHOD_IS_MISSING', { path });
    this.name = 'PostMethodIsMissingError';
  }
}

export class OnlyPostMethodAllowedError extends StandardsError {
  constructor(path: string, methods: string[]) {
    super(
      `Only POST method is allowed for ${path}, found: ${methods.join(', ')}`,
      'ONLY_POST_METHOD_ALLOWED',
      { path, methods }
    );
    this.name = 'OnlyPostMethodAllowedError';
  }
}

export class RequestBodyMissingError extends StandardsError {
  constructor() {
    super('Request body is declared without content', 'REQUEST_BODY_MISSING');
    this.name = 'RequestBodyMissingError';
  }
}

export class ResponseBodyMissingError extends StandardsError {
  constructor() {
    super('Response with status 200 and content is required', 'RESPONSE_BODY_MISSING');
    this.name = 'ResponseBodyMissingError';
  }
}

export class WrongContentTypeError extends StandardsError {
  constructor(contentTypes: string[]) {
    super(
      'Model description must be in application/json format',
      'WRONG_CONTENT_TYPE',
      { contentTypes }
    );
    this.name = 'WrongContentTypeError';
  }
}

export class SchemaMissingError extends StandardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_MISSING', details);
    this.name = 'SchemaMissingError';
  }
}

export class AuthorizationHeaderMissingError extends StandardsError {
  constructor() {
    super('Header parameter "Authorization" is required', 'AUTHORIZATION_HEADER_MISSING');
    this.name = 'AuthorizationHeaderMissingError';
  }
}

export class AuthProviderHeaderMissingError extends StandardsError {
  constructor() {
    super('Header parameter "X-Authorization-Provider" is required', 'AUTH_PROVIDER_HEADER_MISSING');
    this.name = 'AuthProviderHeaderMissingError';
  }
}

export class ServersShouldNotBeDefinedError extends StandardsError {
  constructor() {
    super('"servers" section found', 'SERVERS_SHOULD_NOT_BE_DEFINED');
    this.name = 'ServersShouldNotBeDefinedError';
  }
}

export class SecurityShouldNotBeDefinedError extends StandardsError {
  constructor() {
    super('"security" section found', 'SECURITY_SHOULD_NOT_BE_DEFINED');
    this.name = 'SecurityShouldNotBeDefinedError';
  }
}

export class CompanionFileMissingError extends StandardsError {
  constructor(filePath: string) {
    super(`Companion file is missing: ${filePath}`, 'COMPANION_FILE_MISSING', { filePath });
    this.name = 'CompanionFileMissingError';
  }
}

export class CompanionFileEmptyError extends StandardsError {
  constructor(filePath: string) {
    super(`Companion file is empty: ${filePath}`, 'COMPANION_FILE_EMPTY', { filePath });
    this.name = 'CompanionFileEmptyError';
  }
}

export class CompanionFileMalformedError extends StandardsError {
  constructor(filePath: string, reason: string) {
    super(`Companion file is malformed: ${filePath} (${reason})`, 'COMPANION_FILE_MALFORMED', { filePath, reason });
    this.name = 'CompanionFileMalformedError';
  }
}

// ---------------------------------------------------------------------------
// Generation and construction errors

export class ModelGenerationError extends ContractError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MODEL_GENERATION_ERROR', details);
    this.name = 'ModelGenerationError';
  }
}

export class RouteConfigurationError extends ContractError {
  constructor(message: string, code: string = 'ROUTE_CONFIGURATION_ERROR', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'RouteConfigurationError';
  }
}

export class UnknownRouteError extends RouteConfigurationError {
  constructor(path: string, method: string) {
    super(`Route not found in contract: ${method.toUpperCase()} ${path}`, 'UNKNOWN_ROUTE', { path, method });
    this.name = 'UnknownRouteError';
  }
}

export class UnsupportedMethodError extends RouteConfigurationError {
  constructor(method: string) {
    super(`Unsupported HTTP method: ${method}`, 'UNSUPPORTED_METHOD', { method });
    this.name = 'UnsupportedMethodError';
  }
}

export class ModelNotFoundError extends RouteConfigurationError {
  constructor(modelName: string, path: string) {
    super(`Model '${modelName}' referenced by ${path} was not generated`, 'MODEL_NOT_FOUND', { modelName, path });
    this.name = 'ModelNotFoundError';
  }
}

export class ConfigurationError extends ContractError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

// ---------------------------------------------------------------------------
// Request-time errors raised by the handler adapter

export class RequestValidationError extends ContractError {
  constructor(public errors: ValidationErrorEntry[]) {
    super('Request validation failed', 'REQUEST_VALIDATION_ERROR', { errors });
    this.name = 'RequestValidationError';
  }
}

export class ResponseValidationError extends ContractError {
  constructor(public errors: ValidationErrorEntry[]) {
    super('Response validation failed', 'RESPONSE_VALIDATION_ERROR', { errors });
    this.name = 'ResponseValidationError';
  }
}

/**
 * Raised by handlers and dependencies to answer with a specific status
 */
export class HttpError extends ContractError {
  constructor(
    public status: number,
    public detail: unknown = null
  ) {
    super(typeof detail === 'string' ? detail : `HTTP ${status}`, 'HTTP_ERROR', { status, detail });
    this.name = 'HttpError';
  }
}

/**
 * Helper function to check if an error is a ContractError
 */
export function isContractError(error: unknown): error is ContractError {
  return error instanceof ContractError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isContractError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
