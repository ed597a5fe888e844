/**
 * Contract parser
 *
 * Builds the routing model (path → PathItem) from a validated contract.
 * Only `get` and `post` produce operations; request and response models
 * are the component schema names referenced through `application/json`.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { COMPONENT_PARAMETER_PREFIX, JSON_CONTENT_TYPE, ROUTE_METHODS } from './constants.js';
import { MissingParameterError } from './errors.js';
import type {
  ContractDocument,
  HeaderInfo,
  HttpMethod,
  Operation,
  Parameter,
  ParameterLocation,
  PathItem,
  ResponseInfo,
} from './types/contract.js';
import { asArray, asRecord, asString, asStringArray, isRecord } from './validation-utils.js';

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['query', 'header', 'path', 'cookie'];

function isParameterLocation(value: unknown): value is ParameterLocation {
  return typeof value === 'string' && PARAMETER_LOCATIONS.some(location => location === value);
}

function isSchemaOrRef(value: unknown): value is OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject {
  return isRecord(value);
}

/**
 * Component schema name referenced by a request body or response
 *
 * Only `application/json` content is considered; inline schemas and other
 * media types yield no model.
 */
export function getModelNameFromRef(spec: unknown): string | undefined {
  const jsonContent = asRecord(asRecord(asRecord(spec).content)[JSON_CONTENT_TYPE]);
  const ref = asString(asRecord(jsonContent.schema).$ref);
  if (!ref) return undefined;
  return ref.split('/').pop() || undefined;
}

export class ContractParser {
  constructor(private readonly document: ContractDocument) {}

  parse(): Map<string, PathItem> {
    const pathItems = new Map<string, PathItem>();

    for (const [path, data] of Object.entries(asRecord(this.document.paths))) {
      const pathData = asRecord(data);
      const pathItem: PathItem = { path, description: asString(pathData.description) };

      for (const method of ROUTE_METHODS) {
        const operation = this.parseOperation(pathData, method);
        if (operation) {
          pathItem[method] = operation;
        }
      }

      pathItems.set(path, pathItem);
    }

    return pathItems;
  }

  parseOperation(pathData: Readonly<Record<string, unknown>>, method: HttpMethod): Operation | undefined {
    const data = pathData[method];
    if (!isRecord(data)) return undefined;

    const parameters = this.parseParameters([
      ...asArray(pathData.parameters),
      ...asArray(data.parameters),
    ]);

    return {
      operationId: asString(data.operationId),
      summary: asString(data.summary),
      description: asString(data.description),
      parameters,
      requestBodyModel: getModelNameFromRef(data.requestBody),
      responses: this.parseResponses(data.responses),
      headers: this.collectHeaders(parameters),
      tags: asStringArray(data.tags),
      deprecated: data.deprecated === true,
    };
  }

  /**
   * Parameters in declaration order; path-level ones come first and are
   * overridden by an operation-level parameter with the same name and location
   */
  parseParameters(specs: readonly unknown[]): Parameter[] {
    const byKey = new Map<string, Parameter>();

    for (const spec of specs) {
      const param = this.resolveParameter(spec);
      const name = asString(param.name);
      if (!name) {
        throw new MissingParameterError(param);
      }
      const location = isParameterLocation(param.in) ? param.in : 'query';

      byKey.set(`${location}:${name}`, {
        name,
        in: location,
        required: param.required === true,
        description: asString(param.description),
        schema: isSchemaOrRef(param.schema) ? param.schema : undefined,
      });
    }

    return Array.from(byKey.values());
  }

  /**
   * Resolve `$ref` to a shared parameter definition
   */
  private resolveParameter(spec: unknown): Readonly<Record<string, unknown>> {
    const param = asRecord(spec);
    const ref = asString(param.$ref);
    if (!ref || !ref.startsWith(COMPONENT_PARAMETER_PREFIX)) return param;

    const refName = ref.slice(COMPONENT_PARAMETER_PREFIX.length);
    const shared = asRecord(asRecord(this.document.components).parameters)[refName];
    return isRecord(shared) ? shared : param;
  }

  private parseResponses(spec: unknown): Map<number, ResponseInfo> {
    const responses = new Map<number, ResponseInfo>();

    for (const [code, data] of Object.entries(asRecord(spec))) {
      if (!/^\d{3}$/.test(code)) continue;

      responses.set(Number(code), {
        description: asString(asRecord(data).description),
        model: getModelNameFromRef(data),
      });
    }

    return responses;
  }

  /**
   * Header parameters keyed by lower-cased name; the first declaration wins
   */
  private collectHeaders(parameters: Parameter[]): Map<string, HeaderInfo> {
    const headers = new Map<string, HeaderInfo>();

    for (const param of parameters) {
      if (param.in !== 'header') continue;
      const key = param.name.toLowerCase();
      if (headers.has(key)) continue;

      headers.set(key, {
        name: param.name,
        required: param.required,
        description: param.description,
        schema: param.schema,
      });
    }

    return headers;
  }
}

export function parseContract(document: ContractDocument): Map<string, PathItem> {
  return new ContractParser(document).parse();
}
