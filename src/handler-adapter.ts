/**
 * Handler adapter
 *
 * Wraps a resolved route's handler with the request lifecycle: run the
 * route's dependencies, check required headers and the body against the
 * request model, call the handler with the validated body, then check its
 * result against the response model. Transport bindings only translate
 * HTTP to and from this function.
 */

import { HTTP_STATUS } from './constants.js';
import { RequestValidationError, ResponseValidationError } from './errors.js';
import type { ResolvedRoute } from './route-table.js';
import type { RequestContext } from './types/routes.js';
import type { ValidationErrorEntry } from './types/validation.js';

/**
 * Returned by a handler to choose the status and headers itself.
 * The body is sent as-is, without response model validation.
 */
export class RouteResponse {
  constructor(
    readonly status: number,
    readonly body: unknown = null,
    readonly headers: Readonly<Record<string, string>> = {}
  ) {}
}

export interface HandlerResult {
  status: number;
  body: unknown;
  headers: Readonly<Record<string, string>>;
}

export type AdaptedHandler = (body: unknown, context: RequestContext) => Promise<HandlerResult>;

function missingHeaders(route: ResolvedRoute, context: RequestContext): ValidationErrorEntry[] {
  const errors: ValidationErrorEntry[] = [];
  for (const [key, header] of route.headers) {
    if (header.required && context.headers[key] === undefined) {
      errors.push({ type: 'missing', loc: ['header', header.name], msg: 'Field required', input: null });
    }
  }
  return errors;
}

export function adaptHandler(route: ResolvedRoute): AdaptedHandler {
  return async (body, context) => {
    for (const dependency of route.dependencies) {
      await dependency(context);
    }

    const errors = missingHeaders(route, context);
    const request = route.requestModel.validate(body, ['body']);
    if (!request.valid) {
      errors.push(...request.errors);
    }
    if (!request.valid || errors.length > 0) {
      throw new RequestValidationError(errors);
    }

    const result = await route.handler(request.data, context);
    if (result instanceof RouteResponse) {
      return { status: result.status, body: result.body, headers: result.headers };
    }
    if (!route.responseModel) {
      return { status: HTTP_STATUS.OK, body: result ?? null, headers: {} };
    }

    const response = route.responseModel.validate(result, ['response']);
    if (!response.valid) {
      throw new ResponseValidationError(response.errors);
    }
    return { status: HTTP_STATUS.OK, body: response.data, headers: {} };
  };
}
