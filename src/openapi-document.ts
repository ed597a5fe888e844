/**
 * OpenAPI document for a finalized route table
 *
 * Describes what the table actually serves: resolved names, summaries and
 * tags after overrides, the request/response models of each route and the
 * 422 validation error payload. Component schemas come from the generated
 * model modules; when two modules define the same name the first wins.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { COMPONENT_SCHEMA_PREFIX, JSON_CONTENT_TYPE, VALIDATION_ERROR_MODELS } from './constants.js';
import { EmptyBodyModel, type Model } from './model.js';
import type { ResolvedRoute, RouteTable } from './route-table.js';

export const OPENAPI_VERSION = '3.0.3';

export type OpenAPIDocument = Omit<OpenAPIV3.Document, 'components'> & {
  components: { schemas: Record<string, Readonly<Record<string, unknown>>> };
};

function jsonContent(model: Model): { [media: string]: OpenAPIV3.MediaTypeObject } {
  return { [JSON_CONTENT_TYPE]: { schema: { $ref: `${COMPONENT_SCHEMA_PREFIX}${model.name}` } } };
}

function responses(route: ResolvedRoute): OpenAPIV3.ResponsesObject {
  const result: OpenAPIV3.ResponsesObject = {
    '200': {
      description: route.responseDescription,
      ...(route.responseModel ? { content: jsonContent(route.responseModel) } : {}),
    },
  };

  for (const [status, response] of Object.entries(route.responses)) {
    result[status] = {
      description: response.description ?? '',
      ...(response.model ? { content: jsonContent(response.model) } : {}),
    };
  }

  result['422'] = {
    description: 'Validation Error',
    content: {
      [JSON_CONTENT_TYPE]: { schema: { $ref: `${COMPONENT_SCHEMA_PREFIX}${VALIDATION_ERROR_MODELS.ENVELOPE}` } },
    },
  };
  return result;
}

function parameters(route: ResolvedRoute): OpenAPIV3.ParameterObject[] {
  return Array.from(route.headers.values(), header => ({
    name: header.name,
    in: 'header',
    required: header.required,
    ...(header.description ? { description: header.description } : {}),
    ...(header.schema ? { schema: header.schema } : {}),
  }));
}

export function buildOperation(route: ResolvedRoute): OpenAPIV3.OperationObject {
  const operation: OpenAPIV3.OperationObject = {
    summary: route.summary,
    operationId: route.name,
    responses: responses(route),
  };

  if (route.description) operation.description = route.description;
  if (route.tags.length > 0) operation.tags = [...route.tags];
  if (route.deprecated) operation.deprecated = true;

  const params = parameters(route);
  if (params.length > 0) operation.parameters = params;

  if (!(route.requestModel instanceof EmptyBodyModel)) {
    operation.requestBody = { required: true, content: jsonContent(route.requestModel) };
  }

  return operation;
}

export function buildOpenAPIDocument(table: RouteTable, info: OpenAPIV3.InfoObject): OpenAPIDocument {
  const paths: OpenAPIV3.PathsObject = {};
  for (const route of table) {
    const item: OpenAPIV3.PathItemObject = paths[route.path] ?? {};
    item[route.method] = buildOperation(route);
    paths[route.path] = item;
  }

  const schemas: Record<string, Readonly<Record<string, unknown>>> = {};
  for (const module of table.modules()) {
    for (const [name, schema] of module.schemas()) {
      if (!(name in schemas)) {
        schemas[name] = schema;
      }
    }
  }

  return {
    openapi: OPENAPI_VERSION,
    info,
    paths,
    components: { schemas },
  };
}
