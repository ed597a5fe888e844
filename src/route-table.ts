/**
 * Finalized route table
 *
 * Produced by SpecRouter.build(). Routes are frozen; transports and the
 * OpenAPI emitter only read them.
 */

import type { GeneratedModelModule } from './model-generator.js';
import type { Model } from './model.js';
import type { HeaderInfo, HttpMethod, Operation } from './types/contract.js';
import type { Dependency, ResponseSpec, RouteHandler } from './types/routes.js';

export interface ResolvedRoute {
  readonly method: HttpMethod;
  readonly path: string;
  readonly name: string;
  readonly summary: string;
  readonly description?: string;
  readonly responseDescription: string;
  readonly tags: readonly string[];
  readonly deprecated: boolean;
  readonly dependencies: readonly Dependency[];
  /** Keyed by lower-cased header name */
  readonly headers: ReadonlyMap<string, HeaderInfo>;
  readonly requestModel: Model;
  readonly responseModel?: Model;
  readonly responses: Readonly<Record<number, ResponseSpec>>;
  readonly handler: RouteHandler;
  readonly operation?: Operation;
  /** Module the route's models were generated into */
  readonly models: GeneratedModelModule;
}

export class RouteTable implements Iterable<ResolvedRoute> {
  private readonly routes: readonly ResolvedRoute[];

  constructor(routes: ResolvedRoute[]) {
    this.routes = Object.freeze(
      routes.map(route =>
        Object.freeze({
          ...route,
          tags: Object.freeze([...route.tags]),
          dependencies: Object.freeze([...route.dependencies]),
          responses: Object.freeze({ ...route.responses }),
        })
      )
    );
  }

  get size(): number {
    return this.routes.length;
  }

  [Symbol.iterator](): Iterator<ResolvedRoute> {
    return this.routes[Symbol.iterator]();
  }

  all(): readonly ResolvedRoute[] {
    return this.routes;
  }

  find(method: HttpMethod, path: string): ResolvedRoute | undefined {
    return this.routes.find(route => route.method === method && route.path === path);
  }

  forMethod(method: HttpMethod): ResolvedRoute[] {
    return this.routes.filter(route => route.method === method);
  }

  paths(): string[] {
    return Array.from(new Set(this.routes.map(route => route.path)));
  }

  /**
   * Distinct model modules contributing to the table, in route order
   */
  modules(): GeneratedModelModule[] {
    return Array.from(new Set(this.routes.map(route => route.models)));
  }
}
