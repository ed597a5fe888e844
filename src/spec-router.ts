/**
 * Contract-driven route table builder
 *
 * Loads one contract file or every `*.json` contract below a directory,
 * gates each through the validator chain, generates models per path and
 * derives one RouteInfo per declared (path, method). Callers then register
 * handlers, per path or as the default for a method, and call build().
 *
 * Precedence at build time: per-path registration > default registration
 * for the method > contract-derived values.
 */

import { DEFAULT_RESPONSE_DESCRIPTION, EMPTY_BODY_MODEL, ROUTE_METHODS } from './constants.js';
import { findContractFiles } from './contract-loader.js';
import { parseContract } from './contract-parser.js';
import { ModelNotFoundError, UnknownRouteError, UnsupportedMethodError } from './errors.js';
import type { Logger } from './logger.js';
import { SilentLogger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { EmptyBodyModel, type Model } from './model.js';
import { loadModels, type GeneratedModelModule } from './model-generator.js';
import { RouteInfo, RoutesMapping } from './route-info.js';
import { RouteTable, type ResolvedRoute } from './route-table.js';
import type { ContractSource, HttpMethod, Operation } from './types/contract.js';
import type { ResponseSpec, RouteHandler, RouteOptions } from './types/routes.js';
import { ValidatorChain, type ValidatorConstructor } from './validator/core.js';

export interface SpecRouterOptions {
  /** Run after the built-in version check, in order */
  validators?: ValidatorConstructor[];
  /** Strict models unless a contract sets `info["x-strict-validation"]` */
  strictValidation?: boolean;
  /** Indent the generated declaration artifact */
  formatCode?: boolean;
  /** Keep the declaration artifact in the temp dir */
  keepGeneratedModels?: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
}

const emptyHandler: RouteHandler = () => ({});

function isRouteMethod(method: string): method is HttpMethod {
  return ROUTE_METHODS.some(candidate => candidate === method);
}

export class SpecRouter {
  readonly specsPath: string;
  private readonly routes = new RoutesMapping();
  private readonly modelsByPath = new Map<string, GeneratedModelModule>();
  private readonly chain: ValidatorChain;
  private readonly logger: Logger;

  constructor(
    specsPath: string,
    private readonly options: SpecRouterOptions = {}
  ) {
    this.specsPath = specsPath;
    this.logger = options.logger ?? new SilentLogger();
    this.chain = new ValidatorChain(options.validators ?? [], this.logger);
    this.validateAndParseSpecs();
  }

  get postMap(): ReadonlyMap<string, RouteInfo> {
    return this.routes.postMap;
  }

  get getMap(): ReadonlyMap<string, RouteInfo> {
    return this.routes.getMap;
  }

  /**
   * Register a POST handler; without `options.path` it becomes the default
   */
  post(handler: RouteHandler, options: RouteOptions = {}): this {
    return this.route('post', handler, options);
  }

  /**
   * Register a GET handler; without `options.path` it becomes the default
   */
  get(handler: RouteHandler, options: RouteOptions = {}): this {
    return this.route('get', handler, options);
  }

  route(method: string, handler: RouteHandler, options: RouteOptions = {}): this {
    const routeMethod = this.checkMethod(method);
    const registration = RouteInfo.fromRegistration(handler, options);

    if (options.path === undefined) {
      this.routes.setDefault(routeMethod, registration);
      return this;
    }

    if (!this.routes.routes(routeMethod).has(options.path)) {
      throw new UnknownRouteError(options.path, routeMethod);
    }
    this.routes.registrationsFor(routeMethod).set(options.path, registration);
    return this;
  }

  /**
   * Contract-derived route info, before any registration is applied
   */
  getRouteInfo(routePath: string, method: string): RouteInfo | undefined {
    return this.routes.routes(this.checkMethod(method)).get(routePath);
  }

  getResponseModel(routePath: string, method: string): Model | undefined {
    return this.getRouteInfo(routePath, method)?.responseModel;
  }

  getModels(routePath: string): GeneratedModelModule | undefined {
    return this.modelsByPath.get(routePath);
  }

  /**
   * Resolve every route. Throws without publishing anything when a name
   * factory fails.
   */
  build(): RouteTable {
    const resolved: ResolvedRoute[] = [];

    for (const method of ROUTE_METHODS) {
      for (const [routePath, contractRoute] of this.routes.routes(method)) {
        const registration = this.routes.registrationsFor(method).get(routePath);
        const merged = (registration ? registration.clone() : new RouteInfo())
          .mergeWith(this.routes.defaultFor(method))
          .mergeWith(contractRoute);
        resolved.push(this.resolve(method, routePath, merged));
      }
    }

    const table = new RouteTable(resolved);
    this.logger.info('Route table built', { routes: table.size, specsPath: this.specsPath });
    return table;
  }

  private resolve(method: HttpMethod, routePath: string, route: RouteInfo): ResolvedRoute {
    const models = this.modelsByPath.get(routePath);
    if (!models) {
      throw new UnknownRouteError(routePath, method);
    }

    const name = route.nameFactory
      ? route.nameFactory(routePath, route.operation)
      : route.name ?? `${method}_${routePath}`;

    return {
      method,
      path: routePath,
      name,
      summary: route.summary ?? name,
      description: route.description,
      responseDescription: route.responseDescription ?? DEFAULT_RESPONSE_DESCRIPTION,
      tags: route.tags ?? [],
      deprecated: route.deprecated ?? false,
      dependencies: route.dependencies ?? [],
      headers: route.headers ?? new Map(),
      requestModel: route.requestModel ?? new EmptyBodyModel(EMPTY_BODY_MODEL),
      responseModel: route.responseModel,
      responses: route.responses ?? {},
      handler: route.handler ?? emptyHandler,
      operation: route.operation,
      models,
    };
  }

  private checkMethod(method: string): HttpMethod {
    const normalized = method.toLowerCase();
    if (!isRouteMethod(normalized)) {
      throw new UnsupportedMethodError(method);
    }
    return normalized;
  }

  private validateAndParseSpecs(): void {
    for (const contractPath of findContractFiles(this.specsPath)) {
      this.loadContract(contractPath);
    }
  }

  private loadContract(contractPath: string): void {
    const metrics = this.options.metrics;
    let source: ContractSource;
    try {
      source = this.chain.validate(contractPath);
    } catch (error) {
      metrics?.recordContractLoad('failure');
      throw error;
    }
    metrics?.recordContractLoad('success');
    this.logger.debug('Contract validated', { contractPath, validators: this.chain.names });

    for (const [routePath, pathItem] of parseContract(source.document)) {
      const started = Date.now();
      const models = loadModels(source.document, routePath, {
        strictValidation: this.options.strictValidation,
        formatCode: this.options.formatCode,
        cleanup: !this.options.keepGeneratedModels,
        logger: this.logger,
      });
      metrics?.recordModelGeneration((Date.now() - started) / 1000);

      if (this.modelsByPath.has(routePath)) {
        this.logger.warn('Path declared by more than one contract, last one wins', { path: routePath, contractPath });
        for (const method of ROUTE_METHODS) {
          this.routes.routes(method).delete(routePath);
        }
      }
      this.modelsByPath.set(routePath, models);

      for (const method of ROUTE_METHODS) {
        const operation = pathItem[method];
        if (operation) {
          this.routes.routes(method).set(routePath, this.routeFromOperation(routePath, operation, models));
        }
      }
    }
  }

  private routeFromOperation(routePath: string, operation: Operation, models: GeneratedModelModule): RouteInfo {
    const requireModel = (name: string): Model => {
      const model = models.get(name);
      if (!model) {
        throw new ModelNotFoundError(name, routePath);
      }
      return model;
    };

    const ok = operation.responses.get(200);
    const responses: Record<number, ResponseSpec> = {};
    for (const [status, response] of operation.responses) {
      if (status === 200) continue;
      const model = response.model ? models.get(response.model) : undefined;
      if (response.model && !model) {
        this.logger.warn('Response model not found, body left undocumented', {
          path: routePath,
          status,
          model: response.model,
        });
      }
      responses[status] = { description: response.description, model };
    }

    return new RouteInfo({
      name: operation.operationId,
      summary: operation.summary,
      description: operation.description,
      responseDescription: ok?.description,
      tags: operation.tags.length > 0 ? operation.tags : undefined,
      deprecated: operation.deprecated,
      headers: operation.headers,
      requestModel: operation.requestBodyModel
        ? requireModel(operation.requestBodyModel)
        : new EmptyBodyModel(EMPTY_BODY_MODEL),
      responseModel: ok?.model ? requireModel(ok.model) : undefined,
      responses,
      operation,
    });
  }
}
