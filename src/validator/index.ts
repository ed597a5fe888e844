export { BaseValidator, DefaultValidator, ValidatorChain, isValidatorConstructor } from './core.js';
export type { ValidatorConstructor } from './core.js';
export { StandardsValidator, validateStandards, validateComponentSchema } from './standards.js';
export {
  CompanionFilesValidator,
  StrictStandardsValidator,
  validateCompanionFiles,
  companionPath,
} from './companion-files.js';
export { ValidatorRegistry } from './registry.js';
