/**
 * Contract routing model
 *
 * Why simplified: Routing only needs the subset of an OpenAPI operation that
 * decides bindings (models, headers, metadata). The full document stays
 * available as ContractDocument for validators.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { ROUTE_METHODS } from '../constants.js';

/**
 * Parsed contract document. Deep-frozen once loaded.
 */
export type ContractDocument = Readonly<Record<string, unknown>>;

export type HttpMethod = (typeof ROUTE_METHODS)[number];

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie';

export interface ContractSource {
  path: string;
  raw: string;
  document: ContractDocument;
}

export interface Parameter {
  name: string;
  in: ParameterLocation;
  required: boolean;
  description?: string;
  schema?: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;
}

export interface HeaderInfo {
  /** Name as declared in the contract */
  name: string;
  required: boolean;
  description?: string;
  schema?: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;
}

export interface ResponseInfo {
  description?: string;
  /** Component schema name of the `application/json` body */
  model?: string;
}

export interface Operation {
  operationId?: string;
  summary?: string;
  description?: string;
  parameters: Parameter[];
  requestBodyModel?: string;
  responses: Map<number, ResponseInfo>;
  /** Keyed by lower-cased header name */
  headers: Map<string, HeaderInfo>;
  tags: string[];
  deprecated: boolean;
}

export interface PathItem {
  path: string;
  description?: string;
  get?: Operation;
  post?: Operation;
}
