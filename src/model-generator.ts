/**
 * Model generator
 *
 * Turns every `components/schemas` entry of a contract into a validating
 * Model. Generation happens once per contract load and keeps everything in
 * memory; loadModels() additionally writes the module's TypeScript
 * declarations to a uniquely named temp file for inspection.
 */

import Ajv from 'ajv';
import { randomUUID } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { componentMetaSchema } from './component-meta-schema.js';
import { parseContractText } from './contract-loader.js';
import {
  GENERATED_MODULE_PREFIX,
  STRICT_VALIDATION_EXTENSION,
  VALIDATION_ERROR_MODELS,
} from './constants.js';
import { ModelGenerationError } from './errors.js';
import type { Logger } from './logger.js';
import { SilentLogger } from './logger.js';
import { Model } from './model.js';
import { emitModelSource } from './model-source.js';
import { SchemaCompiler } from './schema-compiler.js';
import type { ContractDocument } from './types/contract.js';
import { asRecord, isRecord } from './validation-utils.js';

export interface ModelGenerationOptions {
  /** Default when the contract does not set `info["x-strict-validation"]` */
  strictValidation?: boolean;
  /** Indent the emitted declarations */
  formatCode?: boolean;
}

export interface LoadModelsOptions extends ModelGenerationOptions {
  /** Remove the declaration artifact once written (default true) */
  cleanup?: boolean;
  logger?: Logger;
}

/**
 * Error payload shapes rendered by the transport; added to every module
 * unless the contract defines its own
 */
const VALIDATION_ERROR_SCHEMAS: Record<string, Record<string, unknown>> = {
  [VALIDATION_ERROR_MODELS.ENTRY]: {
    title: VALIDATION_ERROR_MODELS.ENTRY,
    type: 'object',
    required: ['loc', 'msg', 'type'],
    properties: {
      loc: {
        title: 'Location',
        type: 'array',
        items: { anyOf: [{ type: 'string' }, { type: 'integer' }] },
      },
      msg: { title: 'Message', type: 'string' },
      type: { title: 'Error Type', type: 'string' },
      input: { title: 'Input' },
      ctx: { title: 'Context', type: 'object', additionalProperties: true },
    },
  },
  [VALIDATION_ERROR_MODELS.ENVELOPE]: {
    title: VALIDATION_ERROR_MODELS.ENVELOPE,
    type: 'object',
    properties: {
      detail: {
        title: 'Detail',
        type: 'array',
        items: { $ref: `#/components/schemas/${VALIDATION_ERROR_MODELS.ENTRY}` },
      },
    },
  },
};

const ajv = new Ajv.default({ allErrors: true, strict: false });
const validateComponent = ajv.compile(componentMetaSchema);

export class GeneratedModelModule {
  /** Declaration artifact kept on disk, when requested */
  artifactPath?: string;

  constructor(
    readonly id: string,
    readonly strict: boolean,
    private readonly models: ReadonlyMap<string, Model>
  ) {}

  get(name: string): Model | undefined {
    return this.models.get(name);
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  names(): string[] {
    return Array.from(this.models.keys());
  }

  /**
   * Source JSON Schemas keyed by model name
   */
  schemas(): Map<string, Readonly<Record<string, unknown>>> {
    return new Map(Array.from(this.models, ([name, model]) => [name, model.jsonSchema]));
  }

  source(format: boolean = false): string {
    return emitModelSource({ id: this.id, strict: this.strict, schemas: this.schemas() }, { format });
  }
}

function toDocument(contract: string | ContractDocument): ContractDocument {
  return typeof contract === 'string' ? parseContractText(contract) : contract;
}

/**
 * Strictness for a contract: its own `x-strict-validation` flag wins
 */
export function resolveStrictValidation(document: ContractDocument, fallback: boolean = false): boolean {
  const flag = asRecord(document.info)[STRICT_VALIDATION_EXTENSION];
  return typeof flag === 'boolean' ? flag : fallback;
}

function checkComponent(name: string, schema: unknown): void {
  if (!validateComponent(schema)) {
    throw new ModelGenerationError(`Malformed schema for component '${name}': ${ajv.errorsText(validateComponent.errors)}`, {
      component: name,
      errors: validateComponent.errors,
    });
  }
}

export function generateModels(
  contract: string | ContractDocument,
  options: ModelGenerationOptions = {}
): GeneratedModelModule {
  const document = toDocument(contract);
  const strict = resolveStrictValidation(document, options.strictValidation ?? false);
  const declared = asRecord(asRecord(document.components).schemas);

  for (const [name, schema] of Object.entries(declared)) {
    checkComponent(name, schema);
  }

  const components: Record<string, unknown> = { ...declared };
  for (const [name, schema] of Object.entries(VALIDATION_ERROR_SCHEMAS)) {
    if (!(name in components)) {
      components[name] = schema;
    }
  }

  const compiler = new SchemaCompiler(components, { strict });
  const models = new Map<string, Model>();
  for (const [name, schema] of Object.entries(components)) {
    if (!isRecord(schema)) continue;
    models.set(name, new Model(name, compiler.component(name), schema));
  }

  return new GeneratedModelModule(`${GENERATED_MODULE_PREFIX}${randomUUID()}`, strict, models);
}

function artifactPrefix(name: string): string {
  return `${name.replace(/[/\\ ]/g, '')}_`;
}

/**
 * Generate models and write their declarations to a temp file
 *
 * The file name is unique per call. With `cleanup: false` the file is kept
 * and its path is logged and exposed as `artifactPath`.
 */
export function loadModels(
  contract: string | ContractDocument,
  name: string = '',
  options: LoadModelsOptions = {}
): GeneratedModelModule {
  const logger = options.logger ?? new SilentLogger();
  const cleanup = options.cleanup ?? true;
  const module = generateModels(contract, options);

  const artifactPath = path.join(os.tmpdir(), `${artifactPrefix(name)}${module.id}.d.ts`);
  fs.writeFileSync(artifactPath, module.source(options.formatCode ?? false), { encoding: 'utf8', flag: 'wx' });

  if (cleanup) {
    fs.rmSync(artifactPath, { force: true });
  } else {
    module.artifactPath = artifactPath;
    logger.info('Generated models', { name, module: module.id, artifactPath });
  }

  return module;
}
