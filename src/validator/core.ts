/**
 * Validator chain
 *
 * A chain is an ordered list of validator constructors. DefaultValidator
 * always runs first; custom validators follow in registration order. The
 * chain loads the contract once, freezes it, and hands the same document
 * to every validator.
 */

import { loadContract } from '../contract-loader.js';
import { SUPPORTED_OPENAPI_MAJOR } from '../constants.js';
import { OpenApiValidationError, UnsupportedVersionError } from '../errors.js';
import type { Logger } from '../logger.js';
import { SilentLogger } from '../logger.js';
import type { ContractDocument, ContractSource } from '../types/contract.js';

export abstract class BaseValidator {
  constructor(protected readonly contractPath: string) {}

  /**
   * Load the contract on its own and validate it
   */
  validate(): void {
    this.validateSpec(loadContract(this.contractPath).document);
  }

  /**
   * Throw an OpenApiValidationError subclass on the first violated rule.
   * The document is frozen; validators only read it.
   */
  abstract validateSpec(document: ContractDocument): void;
}

export type ValidatorConstructor = new (contractPath: string) => BaseValidator;

/**
 * Baseline: rejects documents whose `openapi` major version is not 3
 */
export class DefaultValidator extends BaseValidator {
  validateSpec(document: ContractDocument): void {
    const version = document.openapi;
    if (typeof version !== 'string' || version.split('.')[0] !== SUPPORTED_OPENAPI_MAJOR) {
      throw new UnsupportedVersionError(version);
    }
  }
}

export function isValidatorConstructor(value: unknown): value is ValidatorConstructor {
  return typeof value === 'function' && value.prototype instanceof BaseValidator;
}

export class ValidatorChain {
  private readonly validators: ValidatorConstructor[];

  constructor(
    validators: ValidatorConstructor[] = [],
    private readonly logger: Logger = new SilentLogger()
  ) {
    this.validators = [DefaultValidator, ...validators.filter(v => v !== DefaultValidator)];
  }

  get names(): string[] {
    return this.validators.map(v => v.name);
  }

  /**
   * Run every validator in order; the first failure is rethrown.
   * Returns the loaded contract once the whole chain has passed.
   */
  validate(contractPath: string): ContractSource {
    const source = loadContract(contractPath);
    for (const Validator of this.validators) {
      this.logger.debug('Running validator', { validator: Validator.name, contractPath });
      new Validator(contractPath).validateSpec(source.document);
    }
    return source;
  }

  /**
   * Run every validator against the same document and collect failures
   *
   * Errors that are not validation errors (I/O, programming errors) still
   * propagate.
   */
  collect(contractPath: string): OpenApiValidationError[] {
    let source: ContractSource;
    try {
      source = loadContract(contractPath);
    } catch (error) {
      if (!(error instanceof OpenApiValidationError)) throw error;
      return [error];
    }

    const errors: OpenApiValidationError[] = [];
    for (const Validator of this.validators) {
      try {
        new Validator(contractPath).validateSpec(source.document);
      } catch (error) {
        if (!(error instanceof OpenApiValidationError)) throw error;
        errors.push(error);
      }
    }
    return errors;
  }
}
