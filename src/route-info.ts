/**
 * Route configuration under construction
 *
 * A RouteInfo collects what is known about one (path, method): values
 * derived from the contract, a default registration for the method, and a
 * registration for the exact path. `mergeWith` fills only what is still
 * undefined, so merging layers in precedence order yields the final route.
 */

import type { Model } from './model.js';
import type { HeaderInfo, HttpMethod, Operation } from './types/contract.js';
import type {
  Dependency,
  NameFactory,
  ResponseSpec,
  RouteHandler,
  RouteOptions,
} from './types/routes.js';

export interface RouteInfoFields {
  description?: string;
  name?: string;
  nameFactory?: NameFactory;
  responseDescription?: string;
  tags?: string[];
  summary?: string;
  deprecated?: boolean;
  dependencies?: Dependency[];
  headers?: ReadonlyMap<string, HeaderInfo>;
  requestModel?: Model;
  responseModel?: Model;
  responses?: Record<number, ResponseSpec>;
  handler?: RouteHandler;
  operation?: Operation;
}

const FIELDS: ReadonlyArray<keyof RouteInfoFields> = [
  'description',
  'name',
  'nameFactory',
  'responseDescription',
  'tags',
  'summary',
  'deprecated',
  'dependencies',
  'headers',
  'requestModel',
  'responseModel',
  'responses',
  'handler',
  'operation',
];

function fill<K extends keyof RouteInfoFields>(target: RouteInfoFields, source: RouteInfoFields, key: K): void {
  if (target[key] === undefined && source[key] !== undefined) {
    target[key] = source[key];
  }
}

export class RouteInfo implements RouteInfoFields {
  description?: string;
  name?: string;
  nameFactory?: NameFactory;
  responseDescription?: string;
  tags?: string[];
  summary?: string;
  deprecated?: boolean;
  dependencies?: Dependency[];
  headers?: ReadonlyMap<string, HeaderInfo>;
  requestModel?: Model;
  responseModel?: Model;
  responses?: Record<number, ResponseSpec>;
  handler?: RouteHandler;
  operation?: Operation;

  constructor(fields: RouteInfoFields = {}) {
    for (const key of FIELDS) {
      fill(this, fields, key);
    }
  }

  static fromRegistration(handler: RouteHandler, options: RouteOptions = {}): RouteInfo {
    return new RouteInfo({
      handler,
      name: options.name,
      nameFactory: options.nameFactory,
      tags: options.tags && [...options.tags],
      summary: options.summary,
      description: options.description,
      responseDescription: options.responseDescription,
      deprecated: options.deprecated,
      dependencies: options.dependencies && [...options.dependencies],
      responses: options.responses && { ...options.responses },
    });
  }

  /**
   * Fill every field that is still undefined from `other`
   */
  mergeWith(other: RouteInfoFields | undefined): this {
    if (!other) return this;
    for (const key of FIELDS) {
      fill(this, other, key);
    }
    return this;
  }

  clone(): RouteInfo {
    return new RouteInfo(this);
  }
}

/**
 * Per-router route state: contract-derived routes, per-path registrations
 * and the default registration of each method
 */
export class RoutesMapping {
  defaultGet?: RouteInfo;
  defaultPost?: RouteInfo;
  readonly getMap = new Map<string, RouteInfo>();
  readonly postMap = new Map<string, RouteInfo>();
  private readonly registrations: Record<HttpMethod, Map<string, RouteInfo>> = {
    get: new Map(),
    post: new Map(),
  };

  routes(method: HttpMethod): Map<string, RouteInfo> {
    return method === 'get' ? this.getMap : this.postMap;
  }

  defaultFor(method: HttpMethod): RouteInfo | undefined {
    return method === 'get' ? this.defaultGet : this.defaultPost;
  }

  setDefault(method: HttpMethod, route: RouteInfo): void {
    if (method === 'get') {
      this.defaultGet = route;
    } else {
      this.defaultPost = route;
    }
  }

  registrationsFor(method: HttpMethod): Map<string, RouteInfo> {
    return this.registrations[method];
  }
}
