/**
 * Library exports for programmatic usage
 */
export { SpecRouter } from './spec-router.js';
export type { SpecRouterOptions } from './spec-router.js';
export { RouteInfo } from './route-info.js';
export { RouteTable } from './route-table.js';
export type { ResolvedRoute } from './route-table.js';
export { adaptHandler, RouteResponse } from './handler-adapter.js';
export type { AdaptedHandler, HandlerResult } from './handler-adapter.js';
export { createExpressRouter, toExpressPath } from './transport/express.js';
export type { ExpressRouterOptions } from './transport/express.js';
export { buildOpenAPIDocument, buildOperation, OPENAPI_VERSION } from './openapi-document.js';
export type { OpenAPIDocument } from './openapi-document.js';
export { generateModels, loadModels, resolveStrictValidation, GeneratedModelModule } from './model-generator.js';
export type { ModelGenerationOptions, LoadModelsOptions } from './model-generator.js';
export { Model, EmptyBodyModel } from './model.js';
export { emitModelSource } from './model-source.js';
export { loadContract, parseContractText, findContractFiles } from './contract-loader.js';
export { ContractParser, parseContract, getModelNameFromRef } from './contract-parser.js';
export { validateContracts, exitCodeFor } from './batch-validator.js';
export type { BatchOptions, BatchReport, ContractResult } from './batch-validator.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { MetricsCollector } from './metrics.js';
export { ConsoleLogger, JsonLogger, SilentLogger, createLogger, LogLevel } from './logger.js';
export type { Logger } from './logger.js';
export * from './validator/index.js';
export * from './errors.js';
export type { ContractDocument, Operation, PathItem, HeaderInfo, HttpMethod } from './types/contract.js';
export type { RequestContext, RouteHandler, Dependency, NameFactory, RouteOptions, ResponseSpec } from './types/routes.js';
export type { ValidationErrorEntry, HTTPValidationErrorBody } from './types/validation.js';
