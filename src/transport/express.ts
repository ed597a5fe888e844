/**
 * Express binding for a finalized route table
 *
 * Why a Router, not an app: the caller owns the server (listening, TLS,
 * other middleware) and mounts the contract routes where it wants them.
 *
 * Error mapping:
 * - RequestValidationError and malformed JSON → 422 `{ detail: [...] }`
 * - HttpError → its status, `{ detail }`
 * - known path, other method → 405
 * - anything else (including response validation) → 500
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response, type Router } from 'express';
import { HTTP_STATUS } from '../constants.js';
import { getErrorDetails, HttpError, RequestValidationError, ResponseValidationError } from '../errors.js';
import { adaptHandler } from '../handler-adapter.js';
import type { Logger } from '../logger.js';
import { SilentLogger } from '../logger.js';
import type { MetricsCollector } from '../metrics.js';
import type { ResolvedRoute, RouteTable } from '../route-table.js';
import type { RequestContext } from '../types/routes.js';
import type { HTTPValidationErrorBody } from '../types/validation.js';
import { isRecord } from '../validation-utils.js';

export interface ExpressRouterOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Request body size limit passed to express.json (default 1mb) */
  bodyLimit?: string;
}

/**
 * `/pets/{petId}` → `/pets/:petId`
 */
export function toExpressPath(path: string): string {
  return path.replace(/\{([^}]+)\}/g, ':$1');
}

function requestHeaders(req: Request): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

/**
 * Decoded JSON body, or undefined when the request carried none
 */
function requestBody(req: Request): unknown {
  return req.is('application/json') ? req.body : undefined;
}

function isBodyParserError(error: unknown): error is { type: string; status: number; message: string } {
  return isRecord(error) && typeof error.type === 'string' && typeof error.status === 'number';
}

function dispatcher(route: ResolvedRoute, logger: Logger, metrics?: MetricsCollector): RequestHandler {
  const handle = adaptHandler(route);

  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.locals.routePath = route.path;
    res.on('finish', () => {
      metrics?.recordHttpRequest(req.method, route.path, res.statusCode, (Date.now() - started) / 1000);
    });

    const context: RequestContext = {
      method: route.method,
      path: route.path,
      headers: requestHeaders(req),
      query: req.query,
      params: req.params,
      state: {},
    };

    logger.debug('Dispatching request', { method: route.method, path: route.path, route: route.name });
    handle(requestBody(req), context)
      .then(result => {
        res.status(result.status).set(result.headers).json(result.body);
      })
      .catch(next);
  };
}

function register(router: Router, route: ResolvedRoute, handler: RequestHandler): void {
  const path = toExpressPath(route.path);
  if (route.method === 'get') {
    router.get(path, handler);
  } else {
    router.post(path, handler);
  }
}

function errorHandler(logger: Logger, metrics?: MetricsCollector) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const routePath = typeof res.locals.routePath === 'string' ? res.locals.routePath : req.path;

    if (error instanceof RequestValidationError) {
      metrics?.recordRequestValidationFailure(req.method, routePath);
      const body: HTTPValidationErrorBody = { detail: error.errors };
      res.status(HTTP_STATUS.UNPROCESSABLE_ENTITY).json(body);
      return;
    }

    if (error instanceof HttpError) {
      res.status(error.status).json({ detail: error.detail });
      return;
    }

    if (isBodyParserError(error)) {
      if (error.type === 'entity.parse.failed') {
        metrics?.recordRequestValidationFailure(req.method, routePath);
        const body: HTTPValidationErrorBody = {
          detail: [{ type: 'json_invalid', loc: ['body'], msg: 'JSON decode error', input: {}, ctx: { error: error.message } }],
        };
        res.status(HTTP_STATUS.UNPROCESSABLE_ENTITY).json(body);
        return;
      }
      res.status(error.status).json({ detail: error.message });
      return;
    }

    if (error instanceof ResponseValidationError) {
      logger.error('Response does not match the contract', error, { path: routePath, errors: error.errors });
    } else {
      logger.error('Unhandled error in route handler', error instanceof Error ? error : undefined, {
        path: routePath,
        ...getErrorDetails(error),
      });
    }
    res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ detail: 'Internal Server Error' });
  };
}

export function createExpressRouter(table: RouteTable, options: ExpressRouterOptions = {}): Router {
  const logger = options.logger ?? new SilentLogger();
  const router = express.Router();

  router.use(express.json({ limit: options.bodyLimit ?? '1mb' }));

  for (const route of table) {
    register(router, route, dispatcher(route, logger, options.metrics));
  }

  for (const path of table.paths()) {
    const allowed = table
      .all()
      .filter(route => route.path === path)
      .map(route => route.method.toUpperCase());

    router.all(toExpressPath(path), (_req: Request, res: Response) => {
      res.status(HTTP_STATUS.METHOD_NOT_ALLOWED).set('Allow', allowed.join(', ')).json({ detail: 'Method Not Allowed' });
    });
  }

  router.use(errorHandler(logger, options.metrics));
  logger.info('Express routes registered', { routes: table.size });
  return router;
}
