/**
 * Named validator registry
 *
 * Validators are selected by name (CLI flags, environment). Names resolve
 * against explicitly registered constructors; external modules register
 * theirs by exporting a `validators` record.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { ConfigurationError } from '../errors.js';
import { isRecord } from '../validation-utils.js';
import { CompanionFilesValidator, StrictStandardsValidator } from './companion-files.js';
import { DefaultValidator, isValidatorConstructor, type ValidatorConstructor } from './core.js';
import { StandardsValidator } from './standards.js';

export class ValidatorRegistry {
  private readonly constructors = new Map<string, ValidatorConstructor>();

  static withBuiltins(): ValidatorRegistry {
    return new ValidatorRegistry()
      .register('DefaultValidator', DefaultValidator)
      .register('StandardsValidator', StandardsValidator)
      .register('CompanionFilesValidator', CompanionFilesValidator)
      .register('StrictStandardsValidator', StrictStandardsValidator);
  }

  register(name: string, validator: ValidatorConstructor): this {
    const existing = this.constructors.get(name);
    if (existing && existing !== validator) {
      throw new ConfigurationError(`Validator name already registered: ${name}`, { name });
    }
    this.constructors.set(name, validator);
    return this;
  }

  has(name: string): boolean {
    return this.constructors.has(name);
  }

  get names(): string[] {
    return Array.from(this.constructors.keys());
  }

  /**
   * Resolve validator names in order; unknown names fail immediately
   */
  resolve(names: string[]): ValidatorConstructor[] {
    return names.map(name => {
      const validator = this.constructors.get(name);
      if (!validator) {
        throw new ConfigurationError(`Failed to load validator: ${name}`, {
          name,
          available: this.names,
        });
      }
      return validator;
    });
  }

  /**
   * Import a module and register every entry of its `validators` export
   */
  async loadModule(modulePath: string): Promise<string[]> {
    const url = pathToFileURL(path.resolve(modulePath)).href;
    let loaded: unknown;
    try {
      loaded = await import(url);
    } catch (error) {
      throw new ConfigurationError(`Failed to import validator module: ${modulePath}`, {
        modulePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const exported = isRecord(loaded) ? loaded.validators : undefined;
    if (!isRecord(exported)) {
      throw new ConfigurationError(`Validator module has no "validators" export: ${modulePath}`, { modulePath });
    }

    const registered: string[] = [];
    for (const [name, candidate] of Object.entries(exported)) {
      if (!isValidatorConstructor(candidate)) {
        throw new ConfigurationError(`Export "${name}" of ${modulePath} is not a validator class`, {
          modulePath,
          name,
        });
      }
      this.register(name, candidate);
      registered.push(name);
    }
    return registered;
  }
}
