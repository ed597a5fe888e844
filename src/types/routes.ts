/**
 * Route registration and dispatch types
 *
 * Why transport-neutral: handlers receive the validated body and a
 * RequestContext instead of framework objects, so the same route table can
 * be bound to Express or called directly in tests.
 */

import type { Model } from '../model.js';
import type { HttpMethod, Operation } from './contract.js';

export interface RequestContext {
  method: HttpMethod;
  /** Contract path template, e.g. `/pets/{id}` */
  path: string;
  /** Lower-cased header names */
  headers: Readonly<Record<string, string | undefined>>;
  query: Readonly<Record<string, unknown>>;
  params: Readonly<Record<string, string>>;
  /** Scratch space shared by dependencies and the handler of one request */
  state: Record<string, unknown>;
}

/**
 * Receives the body after request-model validation
 */
export type RouteHandler = (body: unknown, context: RequestContext) => unknown;

/**
 * Runs before validation; throw HttpError to short-circuit the request
 */
export type Dependency = (context: RequestContext) => void | Promise<void>;

export type NameFactory = (path: string, operation?: Operation) => string;

export interface ResponseSpec {
  description?: string;
  model?: Model;
}

/**
 * Overrides accepted by SpecRouter.post/get/route
 */
export interface RouteOptions {
  /** Contract path; omitted registers the default for the method */
  path?: string;
  name?: string;
  nameFactory?: NameFactory;
  tags?: string[];
  summary?: string;
  description?: string;
  responseDescription?: string;
  deprecated?: boolean;
  dependencies?: Dependency[];
  responses?: Record<number, ResponseSpec>;
}
