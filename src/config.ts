/**
 * Runtime configuration
 *
 * Why zod: environment values are strings from users; validate them once at
 * startup and fail with the offending variable instead of deep in a load.
 *
 * Command-line flags take precedence over the environment:
 *   -p, --path <dir|file>       contracts root (CONTRACTS_PATH)
 *   -v, --validator <name>      extra validator, repeatable (CONTRACT_VALIDATORS)
 *   -m, --module <file>         validator module, repeatable (CONTRACT_VALIDATOR_MODULES)
 *   --strict                    strict models by default (STRICT_VALIDATION)
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { parseLogLevel, type LogFormat, type LogLevel } from './logger.js';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off', ''];

const booleanFlag = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .refine(value => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: `expected one of ${[...TRUE_VALUES, ...FALSE_VALUES.filter(Boolean)].join(', ')}`,
  })
  .transform(value => TRUE_VALUES.includes(value));

const commaList = z.string().transform(value =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
);

const envSchema = z.object({
  CONTRACTS_PATH: z.string().min(1).optional(),
  CONTRACT_VALIDATORS: commaList.optional(),
  CONTRACT_VALIDATOR_MODULES: commaList.optional(),
  STRICT_VALIDATION: booleanFlag.optional(),
  KEEP_GENERATED_MODELS: booleanFlag.optional(),
  FORMAT_GENERATED_CODE: booleanFlag.optional(),
  LOG_LEVEL: z
    .string()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']))
    .optional(),
  LOG_FORMAT: z.enum(['console', 'json']).optional(),
});

export interface AppConfig {
  contractsPath?: string;
  validators: string[];
  validatorModules: string[];
  strictValidation: boolean;
  keepGeneratedModels: boolean;
  formatCode: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Print usage and exit */
  help: boolean;
}

export interface CliArgs {
  path?: string;
  validators: string[];
  modules: string[];
  strict: boolean;
  help: boolean;
}

export function parseCliArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = { validators: [], modules: [], strict: false, help: false };

  const valueAfter = (index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new ConfigurationError(`Missing value for ${flag}`, { flag });
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-p':
      case '--path':
        result.path = valueAfter(i++, arg);
        break;
      case '-v':
      case '--validator':
        result.validators.push(valueAfter(i++, arg));
        break;
      case '-m':
      case '--module':
        result.modules.push(valueAfter(i++, arg));
        break;
      case '--strict':
        result.strict = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigurationError(`Unknown option: ${arg}`, { option: arg });
        }
        result.path = arg;
    }
  }

  return result;
}

/**
 * Merge environment and command-line arguments into a validated config
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  args: readonly string[] = []
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const values = parsed.data;
  const cli = parseCliArgs(args);

  return {
    contractsPath: cli.path ?? values.CONTRACTS_PATH,
    validators: [...(values.CONTRACT_VALIDATORS ?? []), ...cli.validators],
    validatorModules: [...(values.CONTRACT_VALIDATOR_MODULES ?? []), ...cli.modules],
    strictValidation: cli.strict || (values.STRICT_VALIDATION ?? false),
    keepGeneratedModels: values.KEEP_GENERATED_MODELS ?? false,
    formatCode: values.FORMAT_GENERATED_CODE ?? false,
    logLevel: parseLogLevel(values.LOG_LEVEL),
    logFormat: values.LOG_FORMAT ?? 'console',
    help: cli.help,
  };
}
