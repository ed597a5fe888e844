#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Why: Validates a directory of contracts in CI. Reads env vars, resolves
 * validators by name and exits non-zero when any contract failed.
 */

import 'dotenv/config';
import { exitCodeFor, validateContracts } from './batch-validator.js';
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { ValidatorRegistry } from './validator/registry.js';

const USAGE = `Usage: contract-validator [--path] <dir|file> [-v <validator>]... [-m <module>]... [--strict]

Validators: DefaultValidator (always), StandardsValidator, CompanionFilesValidator,
StrictStandardsValidator, or any class exported from a module's "validators" record.`;

async function main(logger: Logger): Promise<number> {
  const config = loadConfig(process.env, process.argv.slice(2));
  if (config.help) {
    console.log(USAGE);
    return 0;
  }
  if (!config.contractsPath) {
    console.error(USAGE);
    return 2;
  }

  const registry = ValidatorRegistry.withBuiltins();
  for (const modulePath of config.validatorModules) {
    const registered = await registry.loadModule(modulePath);
    logger.debug('Validator module loaded', { modulePath, validators: registered });
  }

  const report = validateContracts(config.contractsPath, {
    validators: registry.resolve(config.validators),
    strictValidation: config.strictValidation,
    keepGeneratedModels: config.keepGeneratedModels,
    formatCode: config.formatCode,
    logger,
  });
  return exitCodeFor(report);
}

const bootstrap = loadBootstrapLogger();
main(bootstrap)
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    bootstrap.error('Fatal error', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });

function loadBootstrapLogger(): Logger {
  try {
    const config = loadConfig(process.env);
    return createLogger(config.logFormat, config.logLevel);
  } catch {
    return createLogger('console');
  }
}
